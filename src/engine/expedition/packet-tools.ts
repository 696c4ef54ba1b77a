import type {
    ExpeditionPacket,
    PacketMeta,
    ProtectTarget,
    RewardKind,
    Tier
} from '../../schema/expedition.js';

/**
 * Seed that reproduces a packet: the requested one, or the root seed drawn for an unseeded request.
 */
export function resolveEffectiveSeed(meta: Pick<PacketMeta, 'requestedSeed' | 'rootSeed'>): number {
    return meta.requestedSeed ?? meta.rootSeed;
}

export interface StoryInputs {
    setting: {
        wave: string;
        variant: string | null;
        text: string;
        mood: string | null;
        themes: string[];
    };
    mages: { name: string; sourceBox: string; storyNotes: string | null }[];
    battles: {
        index: number;
        tier: Tier;
        nemesis: string;
        friend: string | null;
        foe: string | null;
        storyNotes: string[];
    }[];
    protectTarget: ProtectTarget;
    rewards: { afterBattle: number; kind: RewardKind; label: string; newMage: string | null }[];
    seeds: { effective: number; attempt: number };
}

/**
 * Compact brief of a packet for narration: names and notes only.
 */
export function extractStoryInputs(packet: ExpeditionPacket): StoryInputs {
    return {
        setting: {
            wave: packet.setting.wave,
            variant: packet.setting.variant,
            text: packet.setting.text,
            mood: packet.setting.mood,
            themes: [...packet.setting.themes]
        },
        mages: packet.mages.map(m => ({ name: m.name, sourceBox: m.sourceBox, storyNotes: m.storyNotes })),
        battles: packet.battles.map(b => ({
            index: b.index,
            tier: b.tier,
            nemesis: b.nemesis.name,
            friend: b.friend?.name ?? null,
            foe: b.foe?.name ?? null,
            storyNotes: [b.nemesis, b.friend, b.foe].flatMap(e => (e?.storyNotes ? [e.storyNotes] : []))
        })),
        protectTarget: packet.protectTarget,
        rewards: packet.rewardSchedule.map(slot => ({
            afterBattle: slot.afterBattle,
            kind: slot.kind,
            label: slot.label,
            newMage: slot.newMage?.name ?? null
        })),
        seeds: {
            effective: resolveEffectiveSeed(packet.meta),
            attempt: packet.meta.attemptSeed
        }
    };
}
