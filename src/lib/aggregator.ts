import type { AggregatedStation, PriceMap, RawStationRecord } from '../types';

// Only plain objects count as price maps; their entries are copied as delivered
function readPrices(value: unknown): PriceMap {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
    return Object.fromEntries(Object.entries(value));
}

/**
 * Merge per-fuel-type station lists into one record per `site_id`.
 *
 * The first record seen for a site supplies every non-price field; later
 * records only add to its prices, overwriting keys already present. Records
 * without a `site_id` are dropped. Output keeps first-seen order.
 */
export function aggregateStations(records: readonly RawStationRecord[]): AggregatedStation[] {
    const bySiteId = new Map<string, AggregatedStation>();

    for (const record of records) {
        const { site_id: siteId, prices, ...details } = record;
        if (!siteId) continue;

        const existing = bySiteId.get(siteId);
        if (existing) {
            Object.assign(existing.prices, readPrices(prices));
        } else {
            bySiteId.set(siteId, { ...details, site_id: siteId, prices: readPrices(prices) });
        }
    }

    return Array.from(bySiteId.values());
}
