import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import type { FuelType, Logger, PriceFetcher, RawStationRecord } from '../types';
import { ApiError } from './errors';
import { toRequestError } from './http';

// Fields of the wrong type are read as absent instead of failing the whole batch
const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().optional().catch(undefined);

const StructuredAddressSchema = z.object({
    line1: optionalString,
    town: optionalString,
    postcode: optionalString
});

const RawStationSchema = z.object({
    site_id: optionalString,
    brand: optionalString,
    address: z.union([z.string(), StructuredAddressSchema]).optional().catch(undefined),
    postcode: optionalString,
    location: z
        .object({ latitude: optionalNumber, longitude: optionalNumber })
        .optional()
        .catch(undefined),
    prices: z.unknown()
});

const PricesResponseSchema = z.object({
    // A non-object entry becomes an empty record, which aggregation discards
    stations: z.array(RawStationSchema.catch({})).optional()
});

export function parseStations(body: unknown): RawStationRecord[] | undefined {
    const result = PricesResponseSchema.safeParse(body);
    if (!result.success) return undefined;
    return result.data.stations ?? [];
}

export interface FuelPriceFetcherOptions {
    baseUrl: string;
    pricesPath: string;
    timeoutMs: number;
    logger: Logger;
    http?: AxiosInstance;
}

export class FuelPriceFetcher implements PriceFetcher {
    private readonly http: AxiosInstance;

    constructor(private readonly options: FuelPriceFetcherOptions) {
        this.http = options.http ?? axios.create();
    }

    async fetchByFuelType(token: string, fuelType: FuelType): Promise<RawStationRecord[]> {
        const { logger } = this.options;
        const pricesUrl = `${this.options.baseUrl}${this.options.pricesPath}`;
        logger.info(`Fetching ${fuelType} prices from ${pricesUrl}...`);

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.get<unknown>(pricesUrl, {
                params: { fuel_type: fuelType },
                timeout: this.options.timeoutMs,
                headers: {
                    'Authorization': `Bearer ${token}`,
                    'Accept': 'application/json'
                }
            });
        } catch (error) {
            throw toRequestError(error, `${fuelType} prices request`);
        }

        const stations = parseStations(response.data);
        if (!stations) {
            throw new ApiError(`Unexpected response shape for ${fuelType} prices`, response.status, { fuelType });
        }

        logger.info(`Fetched ${stations.length} stations with ${fuelType} prices`);
        return stations;
    }
}
