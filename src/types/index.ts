export type FuelType = 'E10' | 'E5' | 'B7' | 'SDV';

// Fuel-type code -> price as delivered upstream (pence per litre, normally a number)
export type PriceMap = Record<string, unknown>;

export interface StructuredAddress {
    line1?: string;
    town?: string;
    postcode?: string;
}

export interface Coordinates {
    latitude: number;
    longitude: number;
}

/**
 * One station as delivered by the prices endpoint for a single fuel type.
 * Every field is optional because the payload is untrusted; `prices` stays
 * raw until aggregation decides what it can use.
 */
export interface RawStationRecord {
    site_id?: string;
    brand?: string;
    address?: string | StructuredAddress;
    postcode?: string;
    location?: Partial<Coordinates>;
    prices?: unknown;
}

export interface AggregatedStation extends Omit<RawStationRecord, 'site_id' | 'prices'> {
    site_id: string;
    prices: PriceMap;
}

export interface NormalizedStation {
    site_id: string;
    brand: string;
    address: string;
    postcode: string;
    location: Coordinates;
    prices: PriceMap;
}

export interface Snapshot {
    last_updated: string;
    source: string;
    station_count: number;
    stations: NormalizedStation[];
}

export interface ClientCredentials {
    clientId: string;
    clientSecret: string;
}

export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
}

export interface TokenAcquirer {
    acquire(credentials: ClientCredentials): Promise<string>;
}

export interface PriceFetcher {
    fetchByFuelType(token: string, fuelType: FuelType): Promise<RawStationRecord[]>;
}

export interface StationWriter {
    save(stations: NormalizedStation[], path: string): Promise<Snapshot>;
}
