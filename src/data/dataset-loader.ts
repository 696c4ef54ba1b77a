import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DatasetValidationError } from '../engine/expedition/errors.js';
import { createEntityPools, type DatasetInput, type EntityPools } from '../engine/expedition/pools.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Datasets');

export const DATASET_FILES = {
    waves: 'waves.yaml',
    settings: 'settings.yaml',
    mages: 'mages.yaml',
    nemeses: 'nemeses.yaml',
    friends: 'friends.yaml',
    foes: 'foes.yaml',
    rewards: 'rewards.yaml'
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// FILE SHAPES
// Only the root shape and identity fields are checked here; record contents
// are validated by createEntityPools.
// ═══════════════════════════════════════════════════════════════════════════

const WavesFileSchema = z.object({
    waves: z.array(z.object({
        id: z.string(),
        boxes: z.unknown(),
        xaxos_eligible: z.unknown().optional()
    }))
});

const SettingsFileSchema = z.object({
    settings: z.array(z.object({
        wave: z.string(),
        text: z.unknown(),
        mood: z.unknown().optional(),
        themes: z.unknown().optional(),
        variants: z.unknown().optional()
    }))
});

const MagesFileSchema = z.object({
    mages: z.array(z.object({
        name: z.string(),
        story_notes: z.unknown().optional(),
        variants: z.array(z.object({
            box: z.unknown(),
            story_notes: z.unknown().optional()
        }))
    }))
});

const NemesesFileSchema = z.object({
    nemeses: z.array(z.object({
        name: z.string(),
        tier: z.unknown(),
        box: z.unknown(),
        story_notes: z.unknown().optional()
    }))
});

const CharacterListSchema = z.array(z.object({
    name: z.string(),
    box: z.unknown(),
    wave: z.unknown().optional(),
    story_notes: z.unknown().optional()
}));

const FriendsFileSchema = z.object({ friends: CharacterListSchema });
const FoesFileSchema = z.object({ foes: CharacterListSchema });
const RewardsFileSchema = z.object({ reward_labels: z.unknown() });

// ═══════════════════════════════════════════════════════════════════════════
// READING
// ═══════════════════════════════════════════════════════════════════════════

function readYamlFile(dataDir: string, fileName: string): unknown {
    const path = join(dataDir, fileName);
    let source: string;
    try {
        source = readFileSync(path, 'utf8');
    } catch (error) {
        throw new DatasetValidationError(fileName, null, [
            `cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
        ]);
    }
    try {
        return parseYaml(source);
    } catch (error) {
        throw new DatasetValidationError(fileName, null, [
            `invalid YAML: ${error instanceof Error ? error.message : String(error)}`
        ]);
    }
}

function readDataset<T extends z.ZodTypeAny>(dataDir: string, fileName: string, schema: T): z.output<T> {
    const result = schema.safeParse(readYamlFile(dataDir, fileName));
    if (!result.success) {
        throw new DatasetValidationError(
            fileName,
            null,
            result.error.issues.map(issue =>
                issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
            )
        );
    }
    return result.data;
}

/**
 * Turn a list of records into an identifier-keyed mapping, rejecting repeated identifiers.
 */
function keyBy<T>(fileName: string, items: readonly T[], id: (item: T) => string, toRecord: (item: T) => unknown): Record<string, unknown> {
    const records: Record<string, unknown> = {};
    for (const item of items) {
        const key = id(item);
        if (Object.prototype.hasOwnProperty.call(records, key)) {
            throw new DatasetValidationError(fileName, key, ['listed more than once']);
        }
        records[key] = toRecord(item);
    }
    return records;
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Read the YAML datasets in `dataDir` into a DatasetInput.
 * rewards.yaml is optional; the others are required.
 *
 * @throws DatasetValidationError for unreadable, unparsable or malformed files
 */
export function readDatasetInput(dataDir: string): DatasetInput {
    const waves = readDataset(dataDir, DATASET_FILES.waves, WavesFileSchema).waves;
    const settings = readDataset(dataDir, DATASET_FILES.settings, SettingsFileSchema).settings;
    const mages = readDataset(dataDir, DATASET_FILES.mages, MagesFileSchema).mages;
    const nemeses = readDataset(dataDir, DATASET_FILES.nemeses, NemesesFileSchema).nemeses;
    const friends = readDataset(dataDir, DATASET_FILES.friends, FriendsFileSchema).friends;
    const foes = readDataset(dataDir, DATASET_FILES.foes, FoesFileSchema).foes;

    const toCharacter = (c: z.infer<typeof CharacterListSchema>[number]) => ({
        box: c.box,
        wave: c.wave,
        storyNotes: c.story_notes
    });

    const input: DatasetInput = {
        waves: keyBy(DATASET_FILES.waves, waves, w => w.id, w => ({
            boxes: w.boxes,
            xaxosEligible: w.xaxos_eligible
        })),
        settings: keyBy(DATASET_FILES.settings, settings, s => s.wave, s => ({
            text: s.text,
            mood: s.mood,
            themes: s.themes,
            variants: s.variants
        })),
        mages: keyBy(DATASET_FILES.mages, mages, m => m.name, m => ({
            storyNotes: m.story_notes,
            variants: m.variants.map(v => ({ box: v.box, storyNotes: v.story_notes }))
        })),
        nemeses: keyBy(DATASET_FILES.nemeses, nemeses, n => n.name, n => ({
            tier: n.tier,
            box: n.box,
            storyNotes: n.story_notes
        })),
        friends: keyBy(DATASET_FILES.friends, friends, f => f.name, toCharacter),
        foes: keyBy(DATASET_FILES.foes, foes, f => f.name, toCharacter)
    };

    if (existsSync(join(dataDir, DATASET_FILES.rewards))) {
        input.rewardLabels = readDataset(dataDir, DATASET_FILES.rewards, RewardsFileSchema).reward_labels;
    }

    return input;
}

/**
 * Load and validate the datasets in `dataDir`.
 */
export function loadExpeditionData(dataDir: string): EntityPools {
    const pools = createEntityPools(readDatasetInput(dataDir));
    log.info(
        `Loaded ${pools.waves.length} waves, ${pools.mages.length} mages, ${pools.nemeses.length} nemeses, ` +
        `${pools.friends.length} friends, ${pools.foes.length} foes from ${dataDir}`
    );
    return pools;
}
