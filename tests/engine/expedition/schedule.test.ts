import { describe, it, expect } from 'vitest';
import {
    allowedTiers,
    battleCount,
    fixedTierDemand,
    hasOpeningChoice,
    planBattleSchedule,
    rewardSlotsFor
} from '../../../src/engine/expedition/schedule.js';

describe('battle schedule', () => {
    it('counts battles per length', () => {
        expect(battleCount('short')).toBe(3);
        expect(battleCount('standard')).toBe(4);
        expect(battleCount('long')).toBe(8);
    });

    it('plans a standard expedition as one battle per tier', () => {
        const schedule = planBattleSchedule('standard');
        expect(schedule.battles).toEqual([
            { index: 1, tier: 1 },
            { index: 2, tier: 2 },
            { index: 3, tier: 3 },
            { index: 4, tier: 4 }
        ]);
        expect(schedule.rewardSlots).toEqual([
            { afterBattle: 1, kind: 'personal' },
            { afterBattle: 2, kind: 'group' },
            { afterBattle: 3, kind: 'personal' },
            { afterBattle: 4, kind: 'finale' }
        ]);
    });

    it('plans a long expedition as two battles per tier with rewards every other battle', () => {
        const schedule = planBattleSchedule('long');
        expect(schedule.battles.map(b => b.tier)).toEqual([1, 1, 2, 2, 3, 3, 4, 4]);
        expect(schedule.rewardSlots.map(s => s.afterBattle)).toEqual([2, 4, 6, 8]);
        expect(schedule.rewardSlots.map(s => s.kind)).toEqual(['personal', 'group', 'personal', 'finale']);
    });

    it('opens a short expedition at the chosen tier', () => {
        expect(planBattleSchedule('short').battles.map(b => b.tier)).toEqual([1, 3, 4]);
        expect(planBattleSchedule('short', { openingTier: 2 }).battles.map(b => b.tier)).toEqual([2, 3, 4]);
        expect(planBattleSchedule('short').rewardSlots.map(s => s.kind)).toEqual(['group', 'personal', 'finale']);
    });

    it('ignores the opening tier outside short expeditions', () => {
        expect(planBattleSchedule('standard', { openingTier: 2 }).battles[0].tier).toBe(1);
    });

    it('accepts tier 1 or 2 for the short opening battle only', () => {
        expect(allowedTiers('short')).toEqual([[1, 2], [3], [4]]);
        expect(allowedTiers('standard')).toEqual([[1], [2], [3], [4]]);
    });

    it('counts fixed nemesis demand per tier', () => {
        expect(fixedTierDemand('short')).toEqual({ 1: 0, 2: 0, 3: 1, 4: 1 });
        expect(fixedTierDemand('long')).toEqual({ 1: 2, 2: 2, 3: 2, 4: 2 });
        expect(hasOpeningChoice('short')).toBe(true);
        expect(hasOpeningChoice('long')).toBe(false);
    });

    it('hands out fresh reward slot copies', () => {
        const first = planBattleSchedule('standard');
        const second = planBattleSchedule('standard');
        expect(first.rewardSlots[0]).not.toBe(second.rewardSlots[0]);
        expect(rewardSlotsFor('standard')).toEqual(first.rewardSlots);
    });
});
