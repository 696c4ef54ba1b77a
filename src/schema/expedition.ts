import { z } from 'zod';

// ============================================================================
// ENUMS
// ============================================================================

export const EXPEDITION_LENGTHS = ['short', 'standard', 'long'] as const;
export const ExpeditionLengthSchema = z.enum(EXPEDITION_LENGTHS);

/**
 * How tightly non-setting entities must match the setting's wave.
 * - thematic: every category comes from the setting's wave
 * - mixed: mages from the setting's wave, everything else from the whole scope
 * - open: everything from the whole scope
 */
export const STRICTNESS_MODES = ['thematic', 'mixed', 'open'] as const;
export const StrictnessSchema = z.enum(STRICTNESS_MODES);

export const TIERS = [1, 2, 3, 4] as const;
export const TierSchema = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]);

export const PROTECT_TARGETS = ['Gravehold', 'Xaxos'] as const;
export const ProtectTargetSchema = z.enum(PROTECT_TARGETS);

export const REWARD_KINDS = ['group', 'personal', 'finale'] as const;
export const RewardKindSchema = z.enum(REWARD_KINDS);

export const NEW_MAGE_LABEL = 'NEW MAGE';

// ============================================================================
// DATASET RECORDS (as handed over by a loader, keyed by identifier)
// ============================================================================

const NameField = z.string().trim().min(1, 'must not be empty');
const StoryNotesField = z.string().optional();

export const WaveRecordSchema = z.object({
    boxes: z.array(NameField).min(1, 'a wave needs at least one box'),
    xaxosEligible: z.boolean().default(false)
});

export const SettingVariantRecordSchema = z.object({
    text: z.string().optional(),
    mood: z.string().optional(),
    themes: z.array(z.string()).optional()
});

export const SettingRecordSchema = z.object({
    text: NameField,
    mood: z.string().optional(),
    themes: z.array(z.string()).default([]),
    variants: z.record(SettingVariantRecordSchema).optional()
});

export const MageVariantRecordSchema = z.object({
    box: NameField,
    storyNotes: StoryNotesField
});

export const MageRecordSchema = z.object({
    storyNotes: StoryNotesField,
    variants: z.array(MageVariantRecordSchema).min(1, 'a mage needs at least one variant')
});

export const NemesisRecordSchema = z.object({
    tier: TierSchema,
    box: NameField,
    storyNotes: StoryNotesField
});

/** Friends and foes share a shape; the wave may be omitted and derived from the box. */
export const CharacterRecordSchema = z.object({
    box: NameField,
    wave: NameField.optional(),
    storyNotes: StoryNotesField
});

export const RewardLabelTableSchema = z.object({
    group: z.array(NameField).min(1),
    personal: z.array(NameField).min(1),
    finale: z.array(NameField).min(1)
});

export type WaveRecord = z.input<typeof WaveRecordSchema>;
export type SettingRecord = z.input<typeof SettingRecordSchema>;
export type MageRecord = z.input<typeof MageRecordSchema>;
export type NemesisRecord = z.input<typeof NemesisRecordSchema>;
export type CharacterRecord = z.input<typeof CharacterRecordSchema>;
export type RewardLabelTable = z.infer<typeof RewardLabelTableSchema>;

// ============================================================================
// REQUEST
// ============================================================================

export const NormalizedRequestSchema = z.object({
    mageCount: z.number().int().min(1),
    length: ExpeditionLengthSchema,
    strictness: StrictnessSchema,
    contentWaves: z.array(z.string()),
    contentBoxes: z.array(z.string()),
    settingWave: z.string().nullable(),
    settingVariant: z.string().nullable(),
    maxAttempts: z.number().int().min(1)
});

// ============================================================================
// EXPEDITION PACKET
// ============================================================================

export const PacketMageSchema = z.object({
    name: NameField,
    sourceBox: z.string(),
    storyNotes: z.string().nullable()
});

export const PacketEntitySchema = z.object({
    name: NameField,
    sourceBox: z.string(),
    wave: z.string(),
    storyNotes: z.string().nullable()
});

export const PacketBattleSchema = z.object({
    index: z.number().int().min(1),
    tier: TierSchema,
    nemesis: PacketEntitySchema,
    friend: PacketEntitySchema.nullable(),
    foe: PacketEntitySchema.nullable()
});

export const RewardSlotSchema = z.object({
    afterBattle: z.number().int().min(1),
    kind: RewardKindSchema,
    label: z.string(),
    newMage: PacketMageSchema.nullable(),
    earnedTags: z.array(z.string())
});

export const SettingSelectionSchema = z.object({
    wave: z.string(),
    variant: z.string().nullable(),
    text: z.string(),
    mood: z.string().nullable(),
    themes: z.array(z.string()),
    xaxosEligible: z.boolean()
});

export const PacketMetaSchema = z.object({
    requestedSeed: z.number().int().nullable(),
    rootSeed: z.number().int(),
    attemptSeed: z.number().int(),
    attemptsTaken: z.number().int().min(1),
    request: NormalizedRequestSchema,
    scope: z.object({ waves: z.array(z.string()) })
});

export const ExpeditionPacketSchema = z.object({
    setting: SettingSelectionSchema,
    mages: z.array(PacketMageSchema),
    battles: z.array(PacketBattleSchema),
    protectTarget: ProtectTargetSchema,
    rewardSchedule: z.array(RewardSlotSchema),
    meta: PacketMetaSchema
});

export type ExpeditionLength = z.infer<typeof ExpeditionLengthSchema>;
export type Strictness = z.infer<typeof StrictnessSchema>;
export type Tier = z.infer<typeof TierSchema>;
export type ProtectTarget = z.infer<typeof ProtectTargetSchema>;
export type RewardKind = z.infer<typeof RewardKindSchema>;
export type NormalizedRequest = z.infer<typeof NormalizedRequestSchema>;
export type PacketMage = z.infer<typeof PacketMageSchema>;
export type PacketEntity = z.infer<typeof PacketEntitySchema>;
export type PacketBattle = z.infer<typeof PacketBattleSchema>;
export type RewardSlot = z.infer<typeof RewardSlotSchema>;
export type SettingSelection = z.infer<typeof SettingSelectionSchema>;
export type PacketMeta = z.infer<typeof PacketMetaSchema>;
export type ExpeditionPacket = z.infer<typeof ExpeditionPacketSchema>;
