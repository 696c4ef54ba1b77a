import type { Strictness, Tier } from '../../schema/expedition.js';
import type { CharacterEntry, EntityPools, MageCandidate, NemesisEntry, SettingEntry } from './pools.js';

export interface CandidatePools {
    settings: readonly SettingEntry[];
    mages: readonly MageCandidate[];
    nemeses: readonly NemesisEntry[];
    /** Empty whenever foes are empty */
    friends: readonly CharacterEntry[];
    /** Empty whenever friends are empty */
    foes: readonly CharacterEntry[];
    pairsAvailable: boolean;
}

/**
 * Per-category candidate pools for one setting wave.
 *
 * thematic: every category from the setting's wave.
 * mixed: mages from the setting's wave, the rest from the whole scope.
 * open: everything from the whole scope.
 */
export function filterPools(
    pools: EntityPools,
    allowedWaves: readonly string[],
    settingWave: string,
    strictness: Strictness
): CandidatePools {
    const scope = new Set(allowedWaves);
    const settingOnly = new Set([settingWave]);

    const mageWaves = strictness === 'open' ? scope : settingOnly;
    const otherWaves = strictness === 'thematic' ? settingOnly : scope;

    const friends = pools.friendsIn(otherWaves);
    const foes = pools.foesIn(otherWaves);
    const pairsAvailable = friends.length > 0 && foes.length > 0;

    return {
        settings: pools.settings.filter(s => otherWaves.has(s.wave)),
        mages: pools.magesIn(mageWaves),
        nemeses: pools.nemesesIn(otherWaves),
        friends: pairsAvailable ? friends : [],
        foes: pairsAvailable ? foes : [],
        pairsAvailable
    };
}

export function groupByTier(nemeses: readonly NemesisEntry[]): Record<Tier, NemesisEntry[]> {
    const groups: Record<Tier, NemesisEntry[]> = { 1: [], 2: [], 3: [], 4: [] };
    for (const nemesis of nemeses) {
        groups[nemesis.tier].push(nemesis);
    }
    return groups;
}
