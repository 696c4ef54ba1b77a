import { describe, it, expect } from 'vitest';
import { extractStoryInputs, resolveEffectiveSeed } from '../../../src/engine/expedition/packet-tools.js';
import { selectExpedition } from '../../../src/engine/expedition/selector.js';
import { basicPools } from '../../helpers/datasets.js';

describe('resolveEffectiveSeed', () => {
    it('prefers the requested seed', () => {
        expect(resolveEffectiveSeed({ requestedSeed: 5, rootSeed: 5 })).toBe(5);
    });

    it('falls back to the drawn root seed', () => {
        expect(resolveEffectiveSeed({ requestedSeed: null, rootSeed: 9 })).toBe(9);
    });
});

describe('extractStoryInputs', () => {
    const packet = selectExpedition(basicPools(), {
        mageCount: 2,
        strictness: 'thematic',
        settingWave: '1st Wave',
        seed: 21
    });
    const story = extractStoryInputs(packet);

    it('keeps the setting narration fields', () => {
        expect(story.setting).toEqual({
            wave: '1st Wave',
            variant: null,
            text: 'Gravehold under siege',
            mood: 'grim',
            themes: ['siege']
        });
        expect(story.protectTarget).toBe('Gravehold');
    });

    it('reduces battles to names and gathers their notes, nemesis first', () => {
        expect(story.battles.map(b => b.nemesis)).toEqual(['Rageborn Husk', 'Hollow Tyrant', 'Mire Queen', 'Crown of Ash']);
        expect(story.battles.map(b => b.friend)).toEqual(packet.battles.map(b => b.friend?.name));
        expect(story.battles[0].storyNotes[0]).toBe('Hungers for fire.');
        expect(story.battles[1].storyNotes.every(note => note !== 'Hungers for fire.')).toBe(true);
    });

    it('lists mages and reward labels', () => {
        expect(story.mages.map(m => m.name)).toEqual(packet.mages.map(m => m.name));
        expect(story.rewards.map(r => [r.afterBattle, r.kind])).toEqual([
            [1, 'personal'], [2, 'group'], [3, 'personal'], [4, 'finale']
        ]);
        expect(story.rewards[3].label).toBe('VICTORY HOARD');
    });

    it('names the seed that reproduces the packet', () => {
        expect(story.seeds).toEqual({ effective: 21, attempt: packet.meta.attemptSeed });
    });
});
