import {
    ExpeditionPacketSchema,
    NEW_MAGE_LABEL,
    type ExpeditionPacket
} from '../../schema/expedition.js';
import { nameKey } from './names.js';
import { allowedTiers, rewardSlotsFor } from './schedule.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type ViolationCode =
    | 'ROSTER_SIZE'
    | 'ROSTER_DUPLICATE'
    | 'ROSTER_OVERLAP'
    | 'NEMESIS_REPEAT'
    | 'FRIEND_REPEAT'
    | 'FOE_REPEAT'
    | 'PAIRING'
    | 'PROTECT_TARGET'
    | 'SCHEDULE'
    | 'ROLE_OVERLAP'
    | 'REINFORCEMENT_OVERLAP'
    | 'PACKET_SHAPE';

export interface CollisionViolation {
    code: ViolationCode;
    /** Packet invariant number (1-7), null for the cross-cutting checks */
    invariant: number | null;
    message: string;
    names: readonly string[];
}

export type ValidationResult =
    | { ok: true }
    | { ok: false; violations: CollisionViolation[] };

export type PacketCheck =
    | { ok: true; packet: ExpeditionPacket }
    | { ok: false; violations: CollisionViolation[] };

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/** Names that occur more than once, reported once each in first-seen spelling */
function duplicates(names: readonly string[]): string[] {
    const seen = new Set<string>();
    const reported = new Set<string>();
    const result: string[] = [];
    for (const name of names) {
        const key = nameKey(name);
        if (seen.has(key) && !reported.has(key)) {
            reported.add(key);
            result.push(name);
        }
        seen.add(key);
    }
    return result;
}

function uniqueNames(names: readonly string[]): string[] {
    const seen = new Set<string>();
    return names.filter(name => {
        const key = nameKey(name);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

/** Names of `names` that also occur in `others` */
function overlap(names: readonly string[], others: readonly string[]): string[] {
    const otherKeys = new Set(others.map(nameKey));
    const result: string[] = [];
    const reported = new Set<string>();
    for (const name of names) {
        const key = nameKey(name);
        if (otherKeys.has(key) && !reported.has(key)) {
            reported.add(key);
            result.push(name);
        }
    }
    return result;
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check every packet invariant plus role and reinforcement uniqueness.
 * Returns all violations, not just the first.
 */
export function validatePacket(packet: ExpeditionPacket): ValidationResult {
    const violations: CollisionViolation[] = [];
    const report = (code: ViolationCode, invariant: number | null, message: string, names: string[] = []) => {
        violations.push({ code, invariant, message, names });
    };

    const roster = packet.mages.map(m => m.name);
    const nemeses = packet.battles.map(b => b.nemesis.name);
    const friends = packet.battles.flatMap(b => (b.friend ? [b.friend.name] : []));
    const foes = packet.battles.flatMap(b => (b.foe ? [b.foe.name] : []));
    const battleNames = [...nemeses, ...friends, ...foes];

    // 1. roster size and distinct names
    const expected = packet.meta.request.mageCount;
    if (roster.length !== expected) {
        report('ROSTER_SIZE', 1, `Roster has ${roster.length} mage(s), expected ${expected}`);
    }
    const rosterRepeats = duplicates(roster);
    if (rosterRepeats.length > 0) {
        report('ROSTER_DUPLICATE', 1, 'Roster names a mage more than once', rosterRepeats);
    }

    // 2. roster vs battle sequence
    const rosterClash = overlap(roster, battleNames);
    if (rosterClash.length > 0) {
        report('ROSTER_OVERLAP', 2, 'Rostered mage also appears in the battle sequence', rosterClash);
    }

    // 3-4. sequence uniqueness
    const nemesisRepeats = duplicates(nemeses);
    if (nemesisRepeats.length > 0) {
        report('NEMESIS_REPEAT', 3, 'Nemesis appears in more than one battle', nemesisRepeats);
    }
    const friendRepeats = duplicates(friends);
    if (friendRepeats.length > 0) {
        report('FRIEND_REPEAT', 4, 'Friend appears in more than one battle', friendRepeats);
    }
    const foeRepeats = duplicates(foes);
    if (foeRepeats.length > 0) {
        report('FOE_REPEAT', 4, 'Foe appears in more than one battle', foeRepeats);
    }

    // 5. pairing
    for (const battle of packet.battles) {
        if ((battle.friend === null) !== (battle.foe === null)) {
            const present = battle.friend?.name ?? battle.foe?.name;
            report('PAIRING', 5, `Battle ${battle.index} has a friend or a foe but not both`, present ? [present] : []);
        }
    }

    // 6. protect target
    if (packet.protectTarget === 'Xaxos' && !packet.setting.xaxosEligible) {
        report('PROTECT_TARGET', 6, `Wave "${packet.setting.wave}" cannot protect Xaxos`);
    }

    // 7. schedule fidelity
    const length = packet.meta.request.length;
    const tiers = allowedTiers(length);
    if (packet.battles.length !== tiers.length) {
        report('SCHEDULE', 7, `A ${length} expedition has ${tiers.length} battles, got ${packet.battles.length}`);
    }
    packet.battles.forEach((battle, i) => {
        const accepted = tiers[i];
        if (battle.index !== i + 1) {
            report('SCHEDULE', 7, `Battle at position ${i + 1} is numbered ${battle.index}`);
        }
        if (accepted !== undefined && !accepted.includes(battle.tier)) {
            report('SCHEDULE', 7, `Battle ${i + 1} must be tier ${accepted.join(' or ')}, got tier ${battle.tier}`, [battle.nemesis.name]);
        }
    });

    const slots = rewardSlotsFor(length);
    const rewardsMatch = packet.rewardSchedule.length === slots.length
        && packet.rewardSchedule.every((slot, i) =>
            slot.afterBattle === slots[i].afterBattle && slot.kind === slots[i].kind);
    if (!rewardsMatch) {
        report('SCHEDULE', 7, `Reward slots do not match the ${length} schedule`);
    }
    const newMageKey = nameKey(NEW_MAGE_LABEL);
    for (const slot of packet.rewardSchedule) {
        if ((nameKey(slot.label) === newMageKey) !== (slot.newMage !== null)) {
            report('SCHEDULE', 7, `Reward after battle ${slot.afterBattle} must carry a mage exactly when labelled ${NEW_MAGE_LABEL}`);
        }
    }

    // Cross-cutting: one role per name in the battle sequence
    const roleClash = [
        ...overlap(nemeses, [...friends, ...foes]),
        ...overlap(friends, foes)
    ];
    const roleNames = uniqueNames(roleClash);
    if (roleNames.length > 0) {
        report('ROLE_OVERLAP', null, 'Name appears in more than one battle role', roleNames);
    }

    // Cross-cutting: reinforcements are new faces
    const reinforcements = packet.rewardSchedule.flatMap(s => (s.newMage ? [s.newMage.name] : []));
    const reinforcementClash = uniqueNames([
        ...overlap(reinforcements, [...roster, ...battleNames]),
        ...duplicates(reinforcements)
    ]);
    if (reinforcementClash.length > 0) {
        report('REINFORCEMENT_OVERLAP', null, 'NEW MAGE reward repeats a character already in the packet', reinforcementClash);
    }

    return violations.length === 0 ? { ok: true } : { ok: false, violations };
}

/**
 * Shape-check an arbitrary value as a packet. Shape problems come back as
 * PACKET_SHAPE violations so callers get one uniform report.
 */
export function parsePacket(value: unknown): PacketCheck {
    const result = ExpeditionPacketSchema.safeParse(value);
    if (!result.success) {
        return {
            ok: false,
            violations: result.error.issues.map((issue): CollisionViolation => ({
                code: 'PACKET_SHAPE',
                invariant: null,
                message: issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
                names: []
            }))
        };
    }
    return { ok: true, packet: result.data };
}

/** parsePacket followed by validatePacket */
export function checkPacket(value: unknown): PacketCheck {
    const parsed = parsePacket(value);
    if (!parsed.ok) {
        return parsed;
    }
    const validation = validatePacket(parsed.packet);
    return validation.ok ? parsed : { ok: false, violations: validation.violations };
}
