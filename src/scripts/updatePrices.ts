import type { AxiosInstance } from 'axios';
import * as dotenv from 'dotenv';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { loadConfig } from '../lib/config';
import {
    ApiError,
    AuthenticationError,
    ConfigurationError,
    NetworkError,
    OutputWriteError,
    PipelineEmptyError,
    describeError
} from '../lib/errors';
import { FuelPriceFetcher } from '../lib/fuelPriceFetcher';
import { createHttpClient } from '../lib/http';
import { createLogger, readLogLevel } from '../lib/logger';
import { FuelPricePipeline } from '../lib/pipeline';
import { JsonSnapshotWriter } from '../lib/snapshotWriter';
import { OAuthTokenAcquirer } from '../lib/tokenAcquirer';
import type { Logger } from '../types';

const PROJECT_ROOT = fileURLToPath(new URL('../..', import.meta.url));

/**
 * Log a fatal failure as one human-readable line, by category.
 */
function reportFailure(error: unknown, logger: Logger): void {
    if (error instanceof ConfigurationError) {
        logger.error(`Configuration error: ${error.message}`);
    } else if (error instanceof AuthenticationError) {
        logger.error(`Authentication error: ${error.message}`);
    } else if (error instanceof ApiError) {
        logger.error(`API error: ${error.message}`);
    } else if (error instanceof NetworkError) {
        logger.error(`Network error: ${error.message}`);
    } else if (error instanceof PipelineEmptyError) {
        logger.error(error.message);
    } else if (error instanceof OutputWriteError) {
        logger.error(`Output error: ${error.message}`);
    } else {
        logger.error(`Unexpected error: ${describeError(error)}`, {
            stack: error instanceof Error ? error.stack : undefined
        });
    }
}

export interface UpdatePricesOptions {
    logger?: Logger;
    projectRoot?: string;
    http?: AxiosInstance;
}

/**
 * One fetch-transform-save pass. Resolves to the process exit code: 0 once
 * stations have been written, 1 on any failure.
 */
export async function updatePrices(env: NodeJS.ProcessEnv, options: UpdatePricesOptions = {}): Promise<number> {
    const logger = options.logger ?? createLogger(readLogLevel(env.LOG_LEVEL));

    try {
        logger.info('Starting GOV UK Fuel Finder data fetch...');
        const config = loadConfig(env, options.projectRoot ?? PROJECT_ROOT);
        logger.info(`API Base URL: ${config.api.baseUrl}`);

        const http = options.http ?? createHttpClient();
        const pipeline = new FuelPricePipeline({
            tokenAcquirer: new OAuthTokenAcquirer({
                baseUrl: config.api.baseUrl,
                tokenPaths: config.api.tokenPaths,
                scope: config.api.scope,
                timeoutMs: config.requestTimeoutMs,
                logger,
                http
            }),
            priceFetcher: new FuelPriceFetcher({
                baseUrl: config.api.baseUrl,
                pricesPath: config.api.pricesPath,
                timeoutMs: config.requestTimeoutMs,
                logger,
                http
            }),
            writer: new JsonSnapshotWriter({ logger }),
            logger
        });

        const result = await pipeline.run(config.credentials, config.outputPath);
        if (result.failedFuelTypes.length > 0) {
            logger.warn(`Saved without prices for: ${result.failedFuelTypes.join(', ')}`);
        }
        logger.info(`Successfully fetched and saved ${result.normalized} stations`);
        return 0;
    } catch (error) {
        reportFailure(error, logger);
        return 1;
    }
}

// Run the update when executed directly, not when imported
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    dotenv.config();
    updatePrices(process.env).then((code) => process.exit(code));
}
