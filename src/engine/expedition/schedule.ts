import type { ExpeditionLength, RewardKind, Tier } from '../../schema/expedition.js';

export type OpeningTier = 1 | 2;

export interface PlannedBattle {
    index: number;
    tier: Tier;
}

export interface PlannedRewardSlot {
    afterBattle: number;
    kind: RewardKind;
}

export interface BattleSchedule {
    length: ExpeditionLength;
    battles: readonly PlannedBattle[];
    rewardSlots: readonly PlannedRewardSlot[];
}

interface LengthRow {
    /** 'opening' is the short expedition's first battle: tier 1 or 2 */
    tiers: readonly (Tier | 'opening')[];
    rewards: readonly PlannedRewardSlot[];
}

const LENGTH_TABLE: Record<ExpeditionLength, LengthRow> = {
    short: {
        tiers: ['opening', 3, 4],
        rewards: [
            { afterBattle: 1, kind: 'group' },
            { afterBattle: 2, kind: 'personal' },
            { afterBattle: 3, kind: 'finale' }
        ]
    },
    standard: {
        tiers: [1, 2, 3, 4],
        rewards: [
            { afterBattle: 1, kind: 'personal' },
            { afterBattle: 2, kind: 'group' },
            { afterBattle: 3, kind: 'personal' },
            { afterBattle: 4, kind: 'finale' }
        ]
    },
    long: {
        tiers: [1, 1, 2, 2, 3, 3, 4, 4],
        rewards: [
            { afterBattle: 2, kind: 'personal' },
            { afterBattle: 4, kind: 'group' },
            { afterBattle: 6, kind: 'personal' },
            { afterBattle: 8, kind: 'finale' }
        ]
    }
};

export function battleCount(length: ExpeditionLength): number {
    return LENGTH_TABLE[length].tiers.length;
}

/**
 * Fixed battle/tier/reward plan for an expedition length.
 * `openingTier` only applies to short expeditions (defaults to 1).
 */
export function planBattleSchedule(
    length: ExpeditionLength,
    options: { openingTier?: OpeningTier } = {}
): BattleSchedule {
    const row = LENGTH_TABLE[length];
    const opening = options.openingTier ?? 1;
    return {
        length,
        battles: row.tiers.map((tier, i) => ({
            index: i + 1,
            tier: tier === 'opening' ? opening : tier
        })),
        rewardSlots: row.rewards.map(slot => ({ ...slot }))
    };
}

/**
 * Accepted tiers per battle position. Short expeditions accept 1 or 2 first.
 */
export function allowedTiers(length: ExpeditionLength): ReadonlyArray<readonly Tier[]> {
    return LENGTH_TABLE[length].tiers.map((tier): readonly Tier[] => (tier === 'opening' ? [1, 2] : [tier]));
}

/**
 * Nemeses needed per tier, not counting the short opening battle.
 */
export function fixedTierDemand(length: ExpeditionLength): Record<Tier, number> {
    const demand: Record<Tier, number> = { 1: 0, 2: 0, 3: 0, 4: 0 };
    for (const tier of LENGTH_TABLE[length].tiers) {
        if (tier !== 'opening') {
            demand[tier] += 1;
        }
    }
    return demand;
}

export function hasOpeningChoice(length: ExpeditionLength): boolean {
    return LENGTH_TABLE[length].tiers.includes('opening');
}

export function rewardSlotsFor(length: ExpeditionLength): readonly PlannedRewardSlot[] {
    return LENGTH_TABLE[length].rewards;
}
