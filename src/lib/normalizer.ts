import type { AggregatedStation, Logger, NormalizedStation } from '../types';

export const DEFAULT_BRAND = 'Unknown';

export function isValidCoordinate(latitude: number, longitude: number): boolean {
    return latitude >= -90 && latitude <= 90 && longitude >= -180 && longitude <= 180;
}

/**
 * A structured address joins `line1` and `town` and carries its own postcode.
 * A plain string is used as is, with the postcode taken from the station.
 */
export function resolveAddress(station: Pick<AggregatedStation, 'address' | 'postcode'>): {
    address: string;
    postcode: string;
} {
    const { address } = station;

    if (typeof address === 'object') {
        const parts = [address.line1, address.town].filter((part): part is string => Boolean(part));
        return { address: parts.join(', '), postcode: address.postcode ?? '' };
    }

    return { address: address ?? '', postcode: station.postcode ?? '' };
}

// Convert aggregated stations to the CMA schema, dropping any without usable coordinates
export function normalizeStations(stations: readonly AggregatedStation[], logger: Logger): NormalizedStation[] {
    const normalized: NormalizedStation[] = [];

    for (const station of stations) {
        const latitude = station.location?.latitude;
        const longitude = station.location?.longitude;
        if (latitude === undefined || longitude === undefined) continue;

        if (!isValidCoordinate(latitude, longitude)) {
            logger.warn(`Invalid coordinates for station ${station.site_id}: lat=${latitude}, lng=${longitude}`);
            continue;
        }

        const { address, postcode } = resolveAddress(station);
        normalized.push({
            site_id: station.site_id,
            brand: station.brand ?? DEFAULT_BRAND,
            address,
            postcode,
            location: { latitude, longitude },
            prices: station.prices
        });
    }

    return normalized;
}
