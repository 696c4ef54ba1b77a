import type {
    ExpeditionPacket,
    PacketBattle,
    PacketEntity,
    PacketMage,
    PacketMeta,
    ProtectTarget,
    SettingSelection
} from '../../schema/expedition.js';
import type { CharacterEntry, MageEntry, MageVariantEntry, NemesisEntry } from './pools.js';
import type { BattleSchedule } from './schedule.js';

/** What one attempt drew, before it becomes a packet */
export interface ExpeditionSelection {
    setting: SettingSelection;
    mages: PacketMage[];
    battles: PacketBattle[];
    protectTarget: ProtectTarget;
    /** One per schedule reward slot, in slot order */
    rewards: { label: string; newMage: PacketMage | null }[];
}

/** A mage as it appears in a packet: the variant's box, its notes before the mage's own */
export function toPacketMage(mage: MageEntry, variant: MageVariantEntry): PacketMage {
    return {
        name: mage.name,
        sourceBox: variant.box,
        storyNotes: variant.storyNotes ?? mage.storyNotes
    };
}

export function toPacketEntity(entry: NemesisEntry | CharacterEntry): PacketEntity {
    return {
        name: entry.name,
        sourceBox: entry.box,
        wave: entry.wave,
        storyNotes: entry.storyNotes
    };
}

export function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

/**
 * Merge selections, schedule and run metadata into a frozen packet.
 * No draws happen here.
 */
export function assemblePacket(
    selection: ExpeditionSelection,
    schedule: BattleSchedule,
    meta: PacketMeta
): ExpeditionPacket {
    if (selection.rewards.length !== schedule.rewardSlots.length) {
        throw new Error(
            `Expected ${schedule.rewardSlots.length} reward labels, got ${selection.rewards.length}`
        );
    }

    const packet: ExpeditionPacket = {
        setting: { ...selection.setting, themes: [...selection.setting.themes] },
        mages: selection.mages.map(m => ({ ...m })),
        battles: selection.battles.map(b => ({
            index: b.index,
            tier: b.tier,
            nemesis: { ...b.nemesis },
            friend: b.friend ? { ...b.friend } : null,
            foe: b.foe ? { ...b.foe } : null
        })),
        protectTarget: selection.protectTarget,
        rewardSchedule: schedule.rewardSlots.map((slot, i) => {
            const { label, newMage } = selection.rewards[i];
            return {
                afterBattle: slot.afterBattle,
                kind: slot.kind,
                label,
                newMage: newMage ? { ...newMage } : null,
                earnedTags: []
            };
        }),
        meta: {
            ...meta,
            request: {
                ...meta.request,
                contentWaves: [...meta.request.contentWaves],
                contentBoxes: [...meta.request.contentBoxes]
            },
            scope: { waves: [...meta.scope.waves] }
        }
    };

    return deepFreeze(packet);
}
