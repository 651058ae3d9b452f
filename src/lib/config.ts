import path from 'node:path';
import { z } from 'zod';
import type { ClientCredentials } from '../types';
import { ConfigurationError } from './errors';
import { readLogLevel, type LogLevel } from './logger';

export const DEFAULT_API_BASE_URL = 'https://www.fuel-finder.service.gov.uk';

// Published documentation disagrees on the token endpoint, so several are probed in order
export const DEFAULT_TOKEN_PATHS = [
    '/api/v1/oauth/generate_access_token',
    '/oauth/token',
    '/api/oauth/token',
    '/v1/oauth/token'
];

export const DEFAULT_OUTPUT_PATH = 'data/uk-fuel-prices.json';

const ConfigSchema = z.object({
    GOV_UK_CLIENT_ID: z.string().trim().min(1, 'must not be empty'),
    GOV_UK_CLIENT_SECRET: z.string().trim().min(1, 'must not be empty'),

    FUEL_FINDER_API_BASE_URL: z
        .string()
        .url()
        .default(DEFAULT_API_BASE_URL)
        .transform((url) => url.replace(/\/+$/, '')),
    FUEL_FINDER_TOKEN_PATHS: z
        .string()
        .default(DEFAULT_TOKEN_PATHS.join(','))
        .transform((list) => list.split(',').map((entry) => entry.trim()).filter((entry) => entry.length > 0))
        .pipe(z.array(z.string().startsWith('/', 'paths must start with "/"')).min(1, 'at least one token path is required')),
    FUEL_FINDER_PRICES_PATH: z.string().startsWith('/', 'paths must start with "/"').default('/v1/prices'),
    FUEL_FINDER_SCOPE: z.string().min(1).default('fuelfinder.read'),

    REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(30000),
    OUTPUT_PATH: z.string().min(1).default(DEFAULT_OUTPUT_PATH),
    LOG_LEVEL: z.unknown().transform(readLogLevel)
});

export interface AppConfig {
    credentials: ClientCredentials;
    api: {
        baseUrl: string;
        tokenPaths: string[];
        pricesPath: string;
        scope: string;
    };
    requestTimeoutMs: number;
    outputPath: string;
    logLevel: LogLevel;
}

/**
 * Validate the environment into an AppConfig. A relative OUTPUT_PATH is
 * resolved against `projectRoot`. Every invalid variable is reported in one
 * ConfigurationError.
 */
export function loadConfig(env: NodeJS.ProcessEnv, projectRoot: string): AppConfig {
    const result = ConfigSchema.safeParse(env);

    if (!result.success) {
        const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, { problems });
    }

    const values = result.data;
    return {
        credentials: {
            clientId: values.GOV_UK_CLIENT_ID,
            clientSecret: values.GOV_UK_CLIENT_SECRET
        },
        api: {
            baseUrl: values.FUEL_FINDER_API_BASE_URL,
            tokenPaths: values.FUEL_FINDER_TOKEN_PATHS,
            pricesPath: values.FUEL_FINDER_PRICES_PATH,
            scope: values.FUEL_FINDER_SCOPE
        },
        requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
        outputPath: path.resolve(projectRoot, values.OUTPUT_PATH),
        logLevel: values.LOG_LEVEL
    };
}
