import { z } from 'zod';
import {
    CharacterRecordSchema,
    MageRecordSchema,
    NEW_MAGE_LABEL,
    NemesisRecordSchema,
    REWARD_KINDS,
    RewardLabelTableSchema,
    SettingRecordSchema,
    WaveRecordSchema,
    type RewardLabelTable,
    type Tier
} from '../../schema/expedition.js';
import { DatasetValidationError } from './errors.js';
import { nameKey, normalizeSpace } from './names.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Raw dataset handed over by a loader: identifier -> record mappings.
 * Records are validated here, so loaders may pass anything.
 */
export interface DatasetInput {
    waves: Readonly<Record<string, unknown>>;
    settings: Readonly<Record<string, unknown>>;
    mages: Readonly<Record<string, unknown>>;
    nemeses: Readonly<Record<string, unknown>>;
    friends: Readonly<Record<string, unknown>>;
    foes: Readonly<Record<string, unknown>>;
    rewardLabels?: unknown;
}

export interface WaveEntry {
    id: string;
    boxes: readonly string[];
    xaxosEligible: boolean;
}

export interface BoxEntry {
    name: string;
    wave: string;
}

export interface SettingVariantEntry {
    name: string;
    text: string | null;
    mood: string | null;
    themes: readonly string[] | null;
}

export interface SettingEntry {
    wave: string;
    text: string;
    mood: string | null;
    themes: readonly string[];
    variants: readonly SettingVariantEntry[];
}

export interface MageVariantEntry {
    box: string;
    wave: string;
    storyNotes: string | null;
}

export interface MageEntry {
    name: string;
    key: string;
    storyNotes: string | null;
    variants: readonly MageVariantEntry[];
}

/** A mage together with the variants the current scope permits. */
export interface MageCandidate {
    mage: MageEntry;
    variants: readonly MageVariantEntry[];
}

export interface NemesisEntry {
    name: string;
    key: string;
    tier: Tier;
    box: string;
    wave: string;
    storyNotes: string | null;
}

/** Friend or foe */
export interface CharacterEntry {
    name: string;
    key: string;
    box: string;
    wave: string;
    storyNotes: string | null;
}

export const DEFAULT_REWARD_LABELS: RewardLabelTable = {
    group: ['SUPPLY CACHE', NEW_MAGE_LABEL, 'TREASURE'],
    personal: ['UPGRADED ABILITY', 'BANISH', 'TREASURE'],
    finale: ['VICTORY HOARD']
};

interface EntityPoolsData {
    waves: WaveEntry[];
    boxes: BoxEntry[];
    settings: SettingEntry[];
    mages: MageEntry[];
    nemeses: NemesisEntry[];
    friends: CharacterEntry[];
    foes: CharacterEntry[];
    rewardLabels: RewardLabelTable;
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTITY POOLS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Read-only, validated view over the expedition datasets.
 * Every list keeps dataset order; wave ids are canonical (as spelled in the wave table).
 */
export class EntityPools {
    readonly waves: readonly WaveEntry[];
    readonly boxes: readonly BoxEntry[];
    readonly settings: readonly SettingEntry[];
    readonly mages: readonly MageEntry[];
    readonly nemeses: readonly NemesisEntry[];
    readonly friends: readonly CharacterEntry[];
    readonly foes: readonly CharacterEntry[];
    readonly rewardLabels: Readonly<RewardLabelTable>;

    private readonly waveByKey: ReadonlyMap<string, WaveEntry>;
    private readonly boxByKey: ReadonlyMap<string, BoxEntry>;
    private readonly settingByWave: ReadonlyMap<string, SettingEntry>;

    constructor(data: EntityPoolsData) {
        this.waves = data.waves;
        this.boxes = data.boxes;
        this.settings = data.settings;
        this.mages = data.mages;
        this.nemeses = data.nemeses;
        this.friends = data.friends;
        this.foes = data.foes;
        this.rewardLabels = data.rewardLabels;

        this.waveByKey = new Map(data.waves.map(w => [nameKey(w.id), w]));
        this.boxByKey = new Map(data.boxes.map(b => [nameKey(b.name), b]));
        this.settingByWave = new Map(data.settings.map(s => [s.wave, s]));
    }

    findWave(name: string): WaveEntry | undefined {
        return this.waveByKey.get(nameKey(name));
    }

    findBox(name: string): BoxEntry | undefined {
        return this.boxByKey.get(nameKey(name));
    }

    getWave(id: string): WaveEntry {
        const wave = this.findWave(id);
        if (!wave) {
            throw new Error(`Unknown wave: ${id}`);
        }
        return wave;
    }

    settingFor(waveId: string): SettingEntry {
        const setting = this.settingByWave.get(this.getWave(waveId).id);
        if (!setting) {
            throw new Error(`No setting for wave: ${waveId}`);
        }
        return setting;
    }

    magesIn(waves: ReadonlySet<string>): MageCandidate[] {
        const candidates: MageCandidate[] = [];
        for (const mage of this.mages) {
            const variants = mage.variants.filter(v => waves.has(v.wave));
            if (variants.length > 0) {
                candidates.push({ mage, variants });
            }
        }
        return candidates;
    }

    nemesesIn(waves: ReadonlySet<string>): NemesisEntry[] {
        return this.nemeses.filter(n => waves.has(n.wave));
    }

    friendsIn(waves: ReadonlySet<string>): CharacterEntry[] {
        return this.friends.filter(f => waves.has(f.wave));
    }

    foesIn(waves: ReadonlySet<string>): CharacterEntry[] {
        return this.foes.filter(f => waves.has(f.wave));
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTION & VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
}

function parseRecord<T extends z.ZodTypeAny>(
    schema: T,
    dataset: string,
    key: string,
    value: unknown
): z.output<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new DatasetValidationError(dataset, key, formatIssues(result.error));
    }
    return result.data;
}

/**
 * Tracks normalized names within one category and rejects duplicates.
 */
function uniqueKeys(dataset: string) {
    const seen = new Map<string, string>();
    return (rawKey: string): { name: string; key: string } => {
        const name = normalizeSpace(rawKey);
        if (name.length === 0) {
            throw new DatasetValidationError(dataset, rawKey, ['identifier must not be empty']);
        }
        const key = nameKey(name);
        const previous = seen.get(key);
        if (previous !== undefined) {
            throw new DatasetValidationError(dataset, name, [`duplicate of "${previous}"`]);
        }
        seen.set(key, name);
        return { name, key };
    };
}

function buildWaves(records: DatasetInput['waves']): { waves: WaveEntry[]; boxes: BoxEntry[] } {
    const waves: WaveEntry[] = [];
    const boxes: BoxEntry[] = [];
    const boxOwners = new Map<string, BoxEntry>();
    const claim = uniqueKeys('waves');

    for (const [rawId, value] of Object.entries(records)) {
        const { name: id } = claim(rawId);
        const record = parseRecord(WaveRecordSchema, 'waves', id, value);
        const waveBoxes: string[] = [];

        for (const rawBox of record.boxes) {
            const box = normalizeSpace(rawBox);
            const owner = boxOwners.get(nameKey(box));
            if (owner) {
                throw new DatasetValidationError('waves', id, [
                    `box "${box}" already belongs to wave "${owner.wave}"`
                ]);
            }
            const entry = { name: box, wave: id };
            boxOwners.set(nameKey(box), entry);
            boxes.push(entry);
            waveBoxes.push(box);
        }

        waves.push({ id, boxes: waveBoxes, xaxosEligible: record.xaxosEligible });
    }

    if (waves.length === 0) {
        throw new DatasetValidationError('waves', null, ['at least one wave is required']);
    }

    return { waves, boxes };
}

function optionalText(value: string | undefined): string | null {
    if (value === undefined) return null;
    const text = value.trim();
    return text.length > 0 ? text : null;
}

/**
 * Validate the raw datasets and build the read-only pools.
 *
 * Cross-record checks on top of the per-record schemas:
 * - every box belongs to exactly one wave
 * - every wave has exactly one setting, and every setting names a known wave
 * - every mage variant, nemesis, friend and foe names a known box
 * - an explicit friend/foe wave must match its box's wave
 * - names are unique (after normalization) within each category
 * - each reward kind offers at least one label besides NEW MAGE
 *
 * @throws DatasetValidationError on the first problem found
 */
export function createEntityPools(input: DatasetInput): EntityPools {
    const { waves, boxes } = buildWaves(input.waves);
    const waveByKey = new Map(waves.map(w => [nameKey(w.id), w]));
    const boxByKey = new Map(boxes.map(b => [nameKey(b.name), b]));

    const resolveBox = (dataset: string, key: string, box: string): BoxEntry => {
        const entry = boxByKey.get(nameKey(box));
        if (!entry) {
            throw new DatasetValidationError(dataset, key, [`unknown box "${box}"`]);
        }
        return entry;
    };

    // Settings: keyed by wave id
    const settings: SettingEntry[] = [];
    const claimSetting = uniqueKeys('settings');
    for (const [rawWave, value] of Object.entries(input.settings)) {
        const { name } = claimSetting(rawWave);
        const wave = waveByKey.get(nameKey(name));
        if (!wave) {
            throw new DatasetValidationError('settings', name, [`unknown wave "${name}"`]);
        }
        const record = parseRecord(SettingRecordSchema, 'settings', name, value);
        const claimVariant = uniqueKeys(`settings["${wave.id}"].variants`);
        const variants = Object.entries(record.variants ?? {}).map(([rawVariant, variant]) => ({
            name: claimVariant(rawVariant).name,
            text: optionalText(variant.text),
            mood: optionalText(variant.mood),
            themes: variant.themes ?? null
        }));

        settings.push({
            wave: wave.id,
            text: record.text,
            mood: optionalText(record.mood),
            themes: record.themes,
            variants
        });
    }
    for (const wave of waves) {
        if (!settings.some(s => s.wave === wave.id)) {
            throw new DatasetValidationError('settings', wave.id, ['every wave needs a setting']);
        }
    }

    const mages: MageEntry[] = [];
    const claimMage = uniqueKeys('mages');
    for (const [rawName, value] of Object.entries(input.mages)) {
        const { name, key } = claimMage(rawName);
        const record = parseRecord(MageRecordSchema, 'mages', name, value);
        const variants = record.variants.map(variant => {
            const box = resolveBox('mages', name, variant.box);
            return { box: box.name, wave: box.wave, storyNotes: optionalText(variant.storyNotes) };
        });
        mages.push({ name, key, storyNotes: optionalText(record.storyNotes), variants });
    }

    const nemeses: NemesisEntry[] = [];
    const claimNemesis = uniqueKeys('nemeses');
    for (const [rawName, value] of Object.entries(input.nemeses)) {
        const { name, key } = claimNemesis(rawName);
        const record = parseRecord(NemesisRecordSchema, 'nemeses', name, value);
        const box = resolveBox('nemeses', name, record.box);
        nemeses.push({
            name,
            key,
            tier: record.tier,
            box: box.name,
            wave: box.wave,
            storyNotes: optionalText(record.storyNotes)
        });
    }

    const buildCharacters = (dataset: 'friends' | 'foes', records: DatasetInput['friends']): CharacterEntry[] => {
        const entries: CharacterEntry[] = [];
        const claim = uniqueKeys(dataset);
        for (const [rawName, value] of Object.entries(records)) {
            const { name, key } = claim(rawName);
            const record = parseRecord(CharacterRecordSchema, dataset, name, value);
            const box = resolveBox(dataset, name, record.box);
            if (record.wave !== undefined) {
                const declared = waveByKey.get(nameKey(record.wave));
                if (!declared) {
                    throw new DatasetValidationError(dataset, name, [`unknown wave "${record.wave}"`]);
                }
                if (declared.id !== box.wave) {
                    throw new DatasetValidationError(dataset, name, [
                        `wave "${declared.id}" does not match box "${box.name}" (wave "${box.wave}")`
                    ]);
                }
            }
            entries.push({ name, key, box: box.name, wave: box.wave, storyNotes: optionalText(record.storyNotes) });
        }
        return entries;
    };

    return new EntityPools({
        waves,
        boxes,
        settings,
        mages,
        nemeses,
        friends: buildCharacters('friends', input.friends),
        foes: buildCharacters('foes', input.foes),
        rewardLabels: buildRewardLabels(input.rewardLabels)
    });
}

function buildRewardLabels(value: unknown): RewardLabelTable {
    if (value === undefined) {
        return {
            group: [...DEFAULT_REWARD_LABELS.group],
            personal: [...DEFAULT_REWARD_LABELS.personal],
            finale: [...DEFAULT_REWARD_LABELS.finale]
        };
    }
    const result = RewardLabelTableSchema.safeParse(value);
    if (!result.success) {
        throw new DatasetValidationError('rewardLabels', null, formatIssues(result.error));
    }
    const table = result.data;
    const newMageKey = nameKey(NEW_MAGE_LABEL);
    for (const kind of REWARD_KINDS) {
        table[kind] = table[kind].map(normalizeSpace);
        if (table[kind].every(label => nameKey(label) === newMageKey)) {
            throw new DatasetValidationError('rewardLabels', kind, [
                `needs at least one label besides ${NEW_MAGE_LABEL}`
            ]);
        }
    }
    return table;
}
