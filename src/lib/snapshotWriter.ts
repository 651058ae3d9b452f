import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger, NormalizedStation, Snapshot, StationWriter } from '../types';
import { OutputWriteError, describeError } from './errors';

export const SNAPSHOT_SOURCE = 'GOV UK Fuel Finder API';

export interface JsonSnapshotWriterOptions {
    logger: Logger;
    now?: () => Date;
}

export class JsonSnapshotWriter implements StationWriter {
    private readonly now: () => Date;

    constructor(private readonly options: JsonSnapshotWriterOptions) {
        this.now = options.now ?? (() => new Date());
    }

    async save(stations: NormalizedStation[], outputPath: string): Promise<Snapshot> {
        const snapshot: Snapshot = {
            last_updated: this.now().toISOString(),
            source: SNAPSHOT_SOURCE,
            station_count: stations.length,
            stations
        };

        try {
            await mkdir(path.dirname(outputPath), { recursive: true });
            await writeFile(outputPath, JSON.stringify(snapshot, null, 2), 'utf-8');
        } catch (error) {
            throw new OutputWriteError(`Failed to write ${outputPath}: ${describeError(error)}`, { path: outputPath });
        }

        this.options.logger.info(`Saved ${stations.length} stations to ${outputPath}`);
        return snapshot;
    }
}
