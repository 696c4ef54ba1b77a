import { loadConfig } from '../config.js';
import type { EntityPools } from '../engine/expedition/pools.js';
import { loadExpeditionData } from './dataset-loader.js';

export { loadExpeditionData, readDatasetInput, DATASET_FILES } from './dataset-loader.js';

let cached: { dataDir: string; pools: EntityPools } | null = null;

/**
 * Datasets for the current process, loaded once per directory.
 */
export function getExpeditionData(dataDir: string = loadConfig().dataDir): EntityPools {
    if (!cached || cached.dataDir !== dataDir) {
        cached = { dataDir, pools: loadExpeditionData(dataDir) };
    }
    return cached.pools;
}

export function resetExpeditionData(): void {
    cached = null;
}
