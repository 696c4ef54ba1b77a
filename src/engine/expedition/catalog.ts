import {
    EXPEDITION_LENGTHS,
    STRICTNESS_MODES,
    type ExpeditionLength,
    type Strictness
} from '../../schema/expedition.js';
import type { EntityPools } from './pools.js';

export interface CatalogWave {
    id: string;
    boxes: string[];
    xaxosEligible: boolean;
    settingVariants: string[];
    counts: {
        mages: number;
        nemeses: number;
        friends: number;
        foes: number;
    };
}

export interface CatalogBox {
    name: string;
    wave: string;
}

export interface ExpeditionCatalog {
    waves: CatalogWave[];
    boxes: CatalogBox[];
    lengths: ExpeditionLength[];
    strictnessModes: Strictness[];
}

const byName = (a: string, b: string): number => a.localeCompare(b, 'en', { numeric: true });

/**
 * What the datasets offer, for building requests: waves sorted by id,
 * boxes sorted by wave then name.
 */
export function describeCatalog(pools: EntityPools): ExpeditionCatalog {
    const waves = [...pools.waves]
        .sort((a, b) => byName(a.id, b.id))
        .map(wave => {
            const only = new Set([wave.id]);
            return {
                id: wave.id,
                boxes: [...wave.boxes].sort(byName),
                xaxosEligible: wave.xaxosEligible,
                settingVariants: pools.settingFor(wave.id).variants.map(v => v.name),
                counts: {
                    mages: pools.magesIn(only).length,
                    nemeses: pools.nemesesIn(only).length,
                    friends: pools.friendsIn(only).length,
                    foes: pools.foesIn(only).length
                }
            };
        });

    const waveOrder = new Map(waves.map((wave, i) => [wave.id, i]));
    const boxes = [...pools.boxes]
        .sort((a, b) => (waveOrder.get(a.wave) ?? 0) - (waveOrder.get(b.wave) ?? 0) || byName(a.name, b.name))
        .map(box => ({ name: box.name, wave: box.wave }));

    return {
        waves,
        boxes,
        lengths: [...EXPEDITION_LENGTHS],
        strictnessModes: [...STRICTNESS_MODES]
    };
}
