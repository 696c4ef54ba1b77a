import { describe, it, expect } from 'vitest';
import { checkPacket, parsePacket, validatePacket } from '../../../src/engine/expedition/validator.js';
import type { ExpeditionPacket, PacketEntity } from '../../../src/schema/expedition.js';

function entity(name: string, sourceBox: string): PacketEntity {
    return { name, sourceBox, wave: '1st Wave', storyNotes: null };
}

/** A hand-built standard packet that satisfies every invariant */
function validPacket(): ExpeditionPacket {
    return {
        setting: { wave: '1st Wave', variant: null, text: 'Siege', mood: null, themes: [], xaxosEligible: false },
        mages: [
            { name: 'Ember Vance', sourceBox: 'Cinder Gate', storyNotes: null },
            { name: 'Gale Dusk', sourceBox: 'Cinder Gate', storyNotes: null }
        ],
        battles: [
            { index: 1, tier: 1, nemesis: entity('Rageborn Husk', 'Cinder Gate'), friend: entity('Old Mara', 'Cinder Gate'), foe: entity('Ash Hounds', 'Cinder Gate') },
            { index: 2, tier: 2, nemesis: entity('Hollow Tyrant', 'Ashen Vault'), friend: entity('Brin', 'Cinder Gate'), foe: entity('Gloom Bats', 'Cinder Gate') },
            { index: 3, tier: 3, nemesis: entity('Mire Queen', 'Cinder Gate'), friend: entity('Captain Rhys', 'Ashen Vault'), foe: entity('Rot Crawlers', 'Ashen Vault') },
            { index: 4, tier: 4, nemesis: entity('Crown of Ash', 'Ashen Vault'), friend: entity('Lena Ash', 'Ashen Vault'), foe: entity('Cinder Imps', 'Ashen Vault') }
        ],
        protectTarget: 'Gravehold',
        rewardSchedule: [
            { afterBattle: 1, kind: 'personal', label: 'BANISH', newMage: null, earnedTags: [] },
            { afterBattle: 2, kind: 'group', label: 'NEW MAGE', newMage: { name: 'Ivo Marsh', sourceBox: 'Ashen Vault', storyNotes: null }, earnedTags: [] },
            { afterBattle: 3, kind: 'personal', label: 'TREASURE', newMage: null, earnedTags: [] },
            { afterBattle: 4, kind: 'finale', label: 'VICTORY HOARD', newMage: null, earnedTags: [] }
        ],
        meta: {
            requestedSeed: 7,
            rootSeed: 7,
            attemptSeed: 99,
            attemptsTaken: 1,
            request: {
                mageCount: 2,
                length: 'standard',
                strictness: 'open',
                contentWaves: [],
                contentBoxes: [],
                settingWave: null,
                settingVariant: null,
                maxAttempts: 200
            },
            scope: { waves: ['1st Wave'] }
        }
    };
}

function violationsOf(packet: ExpeditionPacket) {
    const result = validatePacket(packet);
    return result.ok ? [] : result.violations;
}

describe('validatePacket', () => {
    it('accepts a packet that satisfies every invariant', () => {
        expect(validatePacket(validPacket())).toEqual({ ok: true });
    });

    it('flags a roster of the wrong size', () => {
        const packet = validPacket();
        packet.meta.request.mageCount = 3;
        expect(violationsOf(packet)).toEqual([{
            code: 'ROSTER_SIZE',
            invariant: 1,
            message: 'Roster has 2 mage(s), expected 3',
            names: []
        }]);
    });

    it('flags the same mage twice, ignoring case', () => {
        const packet = validPacket();
        packet.mages[1].name = 'EMBER VANCE';
        const violations = violationsOf(packet);
        expect(violations.map(v => v.code)).toEqual(['ROSTER_DUPLICATE']);
        expect(violations[0].names).toEqual(['EMBER VANCE']);
    });

    it('flags a rostered mage who also appears in a battle', () => {
        const packet = validPacket();
        packet.battles[0].friend = entity('ember  vance', 'Cinder Gate');
        const violations = violationsOf(packet);
        expect(violations.map(v => v.code)).toEqual(['ROSTER_OVERLAP']);
        expect(violations[0].invariant).toBe(2);
        expect(violations[0].names).toEqual(['Ember Vance']);
    });

    it('flags a repeated nemesis', () => {
        const packet = validPacket();
        packet.battles[3].nemesis = entity('Rageborn Husk', 'Cinder Gate');
        const violations = violationsOf(packet);
        expect(violations.map(v => v.code)).toEqual(['NEMESIS_REPEAT']);
        expect(violations[0].names).toEqual(['Rageborn Husk']);
    });

    it('flags repeated friends and foes separately', () => {
        const packet = validPacket();
        packet.battles[2].friend = entity('Old Mara', 'Cinder Gate');
        packet.battles[3].foe = entity('Ash Hounds', 'Cinder Gate');
        expect(violationsOf(packet).map(v => [v.code, v.invariant])).toEqual([
            ['FRIEND_REPEAT', 4],
            ['FOE_REPEAT', 4]
        ]);
    });

    it('flags a friend without a foe', () => {
        const packet = validPacket();
        packet.battles[1].foe = null;
        expect(violationsOf(packet)).toEqual([{
            code: 'PAIRING',
            invariant: 5,
            message: 'Battle 2 has a friend or a foe but not both',
            names: ['Brin']
        }]);
    });

    it('accepts battles with neither friend nor foe', () => {
        const packet = validPacket();
        for (const battle of packet.battles) {
            battle.friend = null;
            battle.foe = null;
        }
        expect(validatePacket(packet)).toEqual({ ok: true });
    });

    it('flags Xaxos outside an eligible wave', () => {
        const packet = validPacket();
        packet.protectTarget = 'Xaxos';
        expect(violationsOf(packet).map(v => v.message)).toEqual(['Wave "1st Wave" cannot protect Xaxos']);

        packet.setting.xaxosEligible = true;
        expect(validatePacket(packet)).toEqual({ ok: true });
    });

    it('flags a battle at the wrong tier', () => {
        const packet = validPacket();
        packet.battles[1].tier = 3;
        expect(violationsOf(packet)).toEqual([{
            code: 'SCHEDULE',
            invariant: 7,
            message: 'Battle 2 must be tier 2, got tier 3',
            names: ['Hollow Tyrant']
        }]);
    });

    it('flags a missing battle', () => {
        const packet = validPacket();
        packet.battles.pop();
        expect(violationsOf(packet).map(v => v.message)).toEqual(['A standard expedition has 4 battles, got 3']);
    });

    it('flags reward slots that do not follow the schedule', () => {
        const packet = validPacket();
        packet.rewardSchedule[0].kind = 'group';
        expect(violationsOf(packet).map(v => v.message)).toEqual(['Reward slots do not match the standard schedule']);
    });

    it('flags a NEW MAGE reward without a mage', () => {
        const packet = validPacket();
        packet.rewardSchedule[1].newMage = null;
        expect(violationsOf(packet).map(v => v.message)).toEqual([
            'Reward after battle 2 must carry a mage exactly when labelled NEW MAGE'
        ]);
    });

    it('flags a name in two battle roles', () => {
        const packet = validPacket();
        packet.battles[0].foe = entity('Brin', 'Cinder Gate');
        const violations = violationsOf(packet);
        expect(violations.map(v => v.code)).toEqual(['ROLE_OVERLAP']);
        expect(violations[0].invariant).toBeNull();
        expect(violations[0].names).toEqual(['Brin']);
    });

    it('flags a reinforcement who is already in the party', () => {
        const packet = validPacket();
        packet.rewardSchedule[1].newMage = { name: 'Gale Dusk', sourceBox: 'Cinder Gate', storyNotes: null };
        const violations = violationsOf(packet);
        expect(violations.map(v => v.code)).toEqual(['REINFORCEMENT_OVERLAP']);
        expect(violations[0].names).toEqual(['Gale Dusk']);
    });

    it('reports every violation, not just the first', () => {
        const packet = validPacket();
        packet.mages[1].name = 'Ember Vance';
        packet.protectTarget = 'Xaxos';
        expect(violationsOf(packet).map(v => v.code)).toEqual(['ROSTER_DUPLICATE', 'PROTECT_TARGET']);
    });
});

describe('parsePacket', () => {
    it('returns the parsed packet for a well-formed value', () => {
        const result = parsePacket(JSON.parse(JSON.stringify(validPacket())));
        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.packet).toEqual(validPacket());
        }
    });

    it('turns shape problems into PACKET_SHAPE violations', () => {
        expect(parsePacket('not a packet')).toEqual({
            ok: false,
            violations: [{ code: 'PACKET_SHAPE', invariant: null, message: 'Expected object, received string', names: [] }]
        });
    });

    it('names the path of a malformed field', () => {
        const packet = validPacket();
        const result = parsePacket({
            ...packet,
            battles: [{ ...packet.battles[0], tier: 9 }, ...packet.battles.slice(1)]
        });
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.violations[0].message).toMatch(/^battles\.0\.tier: /);
        }
    });
});

describe('checkPacket', () => {
    it('passes a valid packet through', () => {
        const result = checkPacket(validPacket());
        expect(result.ok).toBe(true);
    });

    it('reports invariant violations after a successful parse', () => {
        const packet = validPacket();
        packet.protectTarget = 'Xaxos';
        const result = checkPacket(packet);
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.violations.map(v => v.code)).toEqual(['PROTECT_TARGET']);
        }
    });
});
