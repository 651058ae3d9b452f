import type {
    ClientCredentials,
    FuelType,
    Logger,
    PriceFetcher,
    RawStationRecord,
    Snapshot,
    StationWriter,
    TokenAcquirer
} from '../types';
import { aggregateStations } from './aggregator';
import { ApiError, PipelineEmptyError } from './errors';
import { normalizeStations } from './normalizer';

// Fetch order matters: on a duplicate price key the later fuel type wins
export const FUEL_TYPES: readonly FuelType[] = ['E10', 'E5', 'B7', 'SDV'];

export interface PipelineDependencies {
    tokenAcquirer: TokenAcquirer;
    priceFetcher: PriceFetcher;
    writer: StationWriter;
    logger: Logger;
    fuelTypes?: readonly FuelType[];
}

export interface PipelineResult {
    fetched: number;
    aggregated: number;
    normalized: number;
    failedFuelTypes: FuelType[];
    snapshot: Snapshot;
}

export class FuelPricePipeline {
    private readonly fuelTypes: readonly FuelType[];

    constructor(private readonly deps: PipelineDependencies) {
        this.fuelTypes = deps.fuelTypes ?? FUEL_TYPES;
    }

    /**
     * Fetch every fuel type in order. An API error for one type is logged and
     * that type skipped; any other failure propagates.
     */
    async fetchAllFuelTypes(token: string): Promise<{ records: RawStationRecord[]; failedFuelTypes: FuelType[] }> {
        const records: RawStationRecord[] = [];
        const failedFuelTypes: FuelType[] = [];

        for (const fuelType of this.fuelTypes) {
            try {
                const stations = await this.deps.priceFetcher.fetchByFuelType(token, fuelType);
                records.push(...stations);
            } catch (error) {
                if (!(error instanceof ApiError)) throw error;
                this.deps.logger.error(`Failed to fetch ${fuelType} prices: ${error.message}`, { status: error.status });
                failedFuelTypes.push(fuelType);
            }
        }

        return { records, failedFuelTypes };
    }

    async run(credentials: ClientCredentials, outputPath: string): Promise<PipelineResult> {
        const { logger } = this.deps;

        const token = await this.deps.tokenAcquirer.acquire(credentials);
        const { records, failedFuelTypes } = await this.fetchAllFuelTypes(token);

        logger.info(`Aggregating ${records.length} station records...`);
        const aggregated = aggregateStations(records);
        logger.info(`Aggregated to ${aggregated.length} unique stations`);

        if (aggregated.length === 0) {
            throw new PipelineEmptyError('No stations fetched');
        }

        const normalized = normalizeStations(aggregated, logger);
        if (normalized.length === 0) {
            throw new PipelineEmptyError('No valid stations after transformation');
        }

        const snapshot = await this.deps.writer.save(normalized, outputPath);

        return {
            fetched: records.length,
            aggregated: aggregated.length,
            normalized: normalized.length,
            failedFuelTypes,
            snapshot
        };
    }
}
