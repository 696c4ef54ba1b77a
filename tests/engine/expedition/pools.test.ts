import { describe, it, expect } from 'vitest';
import { DatasetValidationError } from '../../../src/engine/expedition/errors.js';
import { createEntityPools, DEFAULT_REWARD_LABELS } from '../../../src/engine/expedition/pools.js';
import { basicDataset, basicPools } from '../../helpers/datasets.js';
import { catchError } from '../../helpers/errors.js';

describe('createEntityPools', () => {
    describe('valid datasets', () => {
        const pools = basicPools();

        it('keeps dataset order for waves and boxes', () => {
            expect(pools.waves.map(w => w.id)).toEqual(['1st Wave', '2nd Wave', '5th Wave']);
            expect(pools.boxes).toEqual([
                { name: 'Cinder Gate', wave: '1st Wave' },
                { name: 'Ashen Vault', wave: '1st Wave' },
                { name: 'Tideworn Depths', wave: '2nd Wave' },
                { name: 'Exiles', wave: '5th Wave' }
            ]);
        });

        it('defaults xaxosEligible to false', () => {
            expect(pools.waves.map(w => w.xaxosEligible)).toEqual([false, false, true]);
        });

        it('looks up waves and boxes by normalized name', () => {
            expect(pools.findWave('  1ST   wave ')?.id).toBe('1st Wave');
            expect(pools.findBox('tideworn depths')?.wave).toBe('2nd Wave');
            expect(pools.findWave('9th Wave')).toBeUndefined();
        });

        it('resolves mage variants to their waves', () => {
            const ember = pools.mages.find(m => m.name === 'Ember Vance');
            expect(ember?.variants).toEqual([
                { box: 'Cinder Gate', wave: '1st Wave', storyNotes: null },
                { box: 'Exiles', wave: '5th Wave', storyNotes: 'Older and scarred.' }
            ]);
            expect(ember?.storyNotes).toBe('Keeps the last ember lit.');
        });

        it('filters mages by wave and keeps only matching variants', () => {
            const candidates = pools.magesIn(new Set(['5th Wave']));
            expect(candidates.map(c => c.mage.name)).toEqual(['Ember Vance', 'Tova Lark', 'Quinn Rook']);
            expect(candidates[0].variants.map(v => v.box)).toEqual(['Exiles']);
        });

        it('derives friend and foe waves from their boxes', () => {
            expect(pools.friendsIn(new Set(['2nd Wave'])).map(f => f.name)).toEqual(['Tidewatcher']);
            expect(pools.foesIn(new Set(['1st Wave'])).map(f => f.name)).toEqual([
                'Ash Hounds', 'Gloom Bats', 'Rot Crawlers', 'Cinder Imps'
            ]);
        });

        it('stores setting variants with unset fields as null', () => {
            const setting = pools.settingFor('2nd wave');
            expect(setting.wave).toBe('2nd Wave');
            expect(setting.mood).toBeNull();
            expect(setting.themes).toEqual([]);
            expect(setting.variants).toEqual([
                { name: 'past', text: 'Before the flood', mood: null, themes: null },
                { name: 'future', text: null, mood: 'hopeful', themes: null }
            ]);
        });

        it('falls back to the default reward labels', () => {
            expect(pools.rewardLabels).toEqual(DEFAULT_REWARD_LABELS);
        });

        it('gives each pool its own copy of the default reward labels', () => {
            const first = basicPools();
            first.rewardLabels.group.push('STOLEN');

            expect(DEFAULT_REWARD_LABELS.group).not.toContain('STOLEN');
            expect(basicPools().rewardLabels.group).toEqual(DEFAULT_REWARD_LABELS.group);
        });

        it('normalizes custom reward labels', () => {
            const custom = createEntityPools({
                ...basicDataset(),
                rewardLabels: { group: [' SUPPLY   CACHE ', 'NEW MAGE'], personal: ['BANISH'], finale: ['HOARD'] }
            });
            expect(custom.rewardLabels.group).toEqual(['SUPPLY CACHE', 'NEW MAGE']);
        });

        it('throws for an unknown wave id', () => {
            expect(() => pools.getWave('9th Wave')).toThrow('Unknown wave: 9th Wave');
        });
    });

    describe('rejected datasets', () => {
        it('rejects names that only differ in case or spacing', () => {
            const dataset = basicDataset();
            const error = catchError(() => createEntityPools({
                ...dataset,
                mages: { ...dataset.mages, 'ember  VANCE': { variants: [{ box: 'Exiles' }] } }
            }), DatasetValidationError);

            expect(error.dataset).toBe('mages');
            expect(error.key).toBe('ember VANCE');
            expect(error.issues).toEqual(['duplicate of "Ember Vance"']);
        });

        it('rejects a box listed under two waves', () => {
            const error = catchError(() => createEntityPools({
                ...basicDataset(),
                waves: { W1: { boxes: ['Shared'] }, W2: { boxes: ['shared'] } }
            }), DatasetValidationError);

            expect(error.key).toBe('W2');
            expect(error.issues).toEqual(['box "shared" already belongs to wave "W1"']);
        });

        it('requires at least one wave', () => {
            const error = catchError(() => createEntityPools({ ...basicDataset(), waves: {} }), DatasetValidationError);
            expect(error.dataset).toBe('waves');
            expect(error.key).toBeNull();
            expect(error.issues).toEqual(['at least one wave is required']);
        });

        it('requires a setting for every wave', () => {
            const { '5th Wave': _dropped, ...settings } = basicDataset().settings;
            const error = catchError(() => createEntityPools({ ...basicDataset(), settings }), DatasetValidationError);
            expect(error.dataset).toBe('settings');
            expect(error.key).toBe('5th Wave');
            expect(error.issues).toEqual(['every wave needs a setting']);
        });

        it('rejects a setting for an unknown wave', () => {
            const dataset = basicDataset();
            const error = catchError(() => createEntityPools({
                ...dataset,
                settings: { ...dataset.settings, '9th Wave': { text: 'Nowhere' } }
            }), DatasetValidationError);
            expect(error.issues).toEqual(['unknown wave "9th Wave"']);
        });

        it('rejects references to unknown boxes', () => {
            const dataset = basicDataset();
            const error = catchError(() => createEntityPools({
                ...dataset,
                nemeses: { ...dataset.nemeses, Stray: { tier: 1, box: 'Nowhere' } }
            }), DatasetValidationError);
            expect(error.dataset).toBe('nemeses');
            expect(error.key).toBe('Stray');
            expect(error.issues).toEqual(['unknown box "Nowhere"']);
        });

        it('rejects a friend whose wave contradicts its box', () => {
            const dataset = basicDataset();
            const error = catchError(() => createEntityPools({
                ...dataset,
                friends: { ...dataset.friends, Brin: { box: 'Cinder Gate', wave: '5th Wave' } }
            }), DatasetValidationError);
            expect(error.issues).toEqual(['wave "5th Wave" does not match box "Cinder Gate" (wave "1st Wave")']);
        });

        it('rejects a mage without variants', () => {
            const dataset = basicDataset();
            const error = catchError(() => createEntityPools({
                ...dataset,
                mages: { ...dataset.mages, 'Gale Dusk': { variants: [] } }
            }), DatasetValidationError);
            expect(error.issues).toEqual(['variants: a mage needs at least one variant']);
        });

        it('rejects an out-of-range tier', () => {
            const dataset = basicDataset();
            const error = catchError(() => createEntityPools({
                ...dataset,
                nemeses: { ...dataset.nemeses, 'Rageborn Husk': { tier: 5, box: 'Cinder Gate' } }
            }), DatasetValidationError);
            expect(error.key).toBe('Rageborn Husk');
            expect(error.issues[0]).toMatch(/^tier: /);
        });

        it('requires a label besides NEW MAGE for each reward kind', () => {
            const error = catchError(() => createEntityPools({
                ...basicDataset(),
                rewardLabels: { group: ['NEW MAGE'], personal: ['BANISH'], finale: ['HOARD'] }
            }), DatasetValidationError);
            expect(error.dataset).toBe('rewardLabels');
            expect(error.key).toBe('group');
            expect(error.issues).toEqual(['needs at least one label besides NEW MAGE']);
        });

        it('reports where the problem is in the message', () => {
            const error = catchError(() => createEntityPools({ ...basicDataset(), waves: {} }), DatasetValidationError);
            expect(error.message).toBe('Invalid dataset waves: at least one wave is required');
            expect(error.code).toBe('DATASET_INVALID');
        });
    });
});
