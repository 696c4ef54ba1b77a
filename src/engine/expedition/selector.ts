import {
    NEW_MAGE_LABEL,
    PROTECT_TARGETS,
    TIERS,
    type ExpeditionPacket,
    type NormalizedRequest,
    type PacketBattle,
    type PacketEntity,
    type ProtectTarget,
    type SettingSelection
} from '../../schema/expedition.js';
import { createLogger, createTimer } from '../../utils/logger.js';
import { assemblePacket, toPacketEntity, toPacketMage } from './assembler.js';
import { InsufficientPoolError, InvalidRequestError, ScopeError, type PoolShortfall } from './errors.js';
import { nameKey } from './names.js';
import { RetryOrchestrator, type AttemptContext, type AttemptOutcome } from './orchestrator.js';
import { filterPools, groupByTier } from './pool-filter.js';
import type { EntityPools, SettingEntry, SettingVariantEntry } from './pools.js';
import { normalizeRequest, validateSeed, type SelectionRequestInput, type SelectorOptions } from './request.js';
import { SeededSampler } from './sampler.js';
import {
    battleCount,
    fixedTierDemand,
    hasOpeningChoice,
    planBattleSchedule,
    type OpeningTier
} from './schedule.js';
import { resolveScope, type ResolvedScope } from './scope.js';
import { validatePacket } from './validator.js';

const defaultLog = createLogger('Selector');

const OPENING_TIERS = [1, 2] as const;

// ═══════════════════════════════════════════════════════════════════════════
// FEASIBILITY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Structural check for one candidate setting wave: can any draw at all
 * satisfy the request? Returns the first shortfall, or null.
 */
export function assessFeasibility(
    pools: EntityPools,
    allowedWaves: readonly string[],
    settingWave: string,
    request: Pick<NormalizedRequest, 'mageCount' | 'length' | 'strictness'>
): PoolShortfall | null {
    const candidates = filterPools(pools, allowedWaves, settingWave, request.strictness);

    if (candidates.mages.length < request.mageCount) {
        return { category: 'mages', required: request.mageCount, available: candidates.mages.length, wave: settingWave };
    }

    const byTier = groupByTier(candidates.nemeses);
    const demand = fixedTierDemand(request.length);
    for (const tier of TIERS) {
        if (byTier[tier].length < demand[tier]) {
            return {
                category: `nemeses:tier-${tier}`,
                required: demand[tier],
                available: byTier[tier].length,
                wave: settingWave
            };
        }
    }
    if (hasOpeningChoice(request.length) && byTier[1].length + byTier[2].length === 0) {
        return { category: 'nemeses:tier-1-or-2', required: 1, available: 0, wave: settingWave };
    }

    if (candidates.pairsAvailable) {
        const battles = battleCount(request.length);
        if (candidates.friends.length < battles) {
            return { category: 'friends', required: battles, available: candidates.friends.length, wave: settingWave };
        }
        if (candidates.foes.length < battles) {
            return { category: 'foes', required: battles, available: candidates.foes.length, wave: settingWave };
        }
    }

    return null;
}

// ═══════════════════════════════════════════════════════════════════════════
// FORCED SETTING
// ═══════════════════════════════════════════════════════════════════════════

interface ForcedSetting {
    setting: SettingEntry;
    variant: SettingVariantEntry | null;
}

function resolveForcedSetting(
    pools: EntityPools,
    scope: ResolvedScope,
    request: NormalizedRequest
): ForcedSetting | null {
    const waveName = request.settingWave;
    if (waveName === null) return null;

    const wave = pools.findWave(waveName);
    if (!wave) {
        throw new ScopeError(`Unknown setting wave "${waveName}"`, [waveName]);
    }
    if (!scope.waves.includes(wave.id)) {
        throw new ScopeError(
            `Setting wave "${wave.id}" is outside the content scope (${scope.waves.join(', ')})`
        );
    }

    const setting = pools.settingFor(wave.id);
    const variantName = request.settingVariant;
    if (variantName === null) {
        return { setting, variant: null };
    }

    const variant = setting.variants.find(v => nameKey(v.name) === nameKey(variantName));
    if (!variant) {
        const available = setting.variants.map(v => v.name);
        throw new InvalidRequestError(
            'settingVariant',
            `Setting "${wave.id}" has no variant "${variantName}". Available: ${available.length > 0 ? available.join(', ') : 'none'}`
        );
    }
    return { setting, variant };
}

function toSettingSelection(
    setting: SettingEntry,
    variant: SettingVariantEntry | null,
    xaxosEligible: boolean
): SettingSelection {
    return {
        wave: setting.wave,
        variant: variant?.name ?? null,
        text: variant?.text ?? setting.text,
        mood: variant?.mood ?? setting.mood,
        themes: [...(variant?.themes ?? setting.themes)],
        xaxosEligible
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// ONE ATTEMPT
// ═══════════════════════════════════════════════════════════════════════════

interface AttemptPlan {
    pools: EntityPools;
    request: NormalizedRequest;
    scope: ResolvedScope;
    requestedSeed: number | null;
    /** Feasible settings to draw from */
    settings: readonly SettingEntry[];
    forced: ForcedSetting | null;
}

/**
 * Full draw sequence from one attempt seed. The order of draws is fixed:
 * setting, variant, roster, mage variants, short opening tier, per-battle
 * nemesis/friend/foe, protect target, reward labels and NEW MAGE targets.
 */
function runAttempt(plan: AttemptPlan, context: AttemptContext): AttemptOutcome<ExpeditionPacket> {
    const { pools, request } = plan;
    const sampler = new SeededSampler(context.attemptSeed);

    const setting = plan.forced?.setting ?? sampler.pick(plan.settings);
    let variant: SettingVariantEntry | null = null;
    if (plan.forced?.variant) {
        variant = plan.forced.variant;
    } else if (setting.variants.length > 0) {
        variant = sampler.pick(setting.variants);
    }

    const candidates = filterPools(pools, plan.scope.waves, setting.wave, request.strictness);

    const rostered = sampler.sample(candidates.mages, request.mageCount);
    const mages = rostered.map(c => toPacketMage(c.mage, sampler.pick(c.variants)));

    const byTier = groupByTier(candidates.nemeses);
    let openingTier: OpeningTier | undefined;
    if (hasOpeningChoice(request.length)) {
        const eligible = OPENING_TIERS.filter(tier => byTier[tier].length > 0);
        openingTier = eligible.length > 1 ? sampler.pick(eligible) : eligible[0];
    }
    const schedule = planBattleSchedule(request.length, { openingTier });

    const usedNemeses = new Set<string>();
    const usedFriends = new Set<string>();
    const usedFoes = new Set<string>();
    const battles: PacketBattle[] = [];

    for (const planned of schedule.battles) {
        const nemesis = sampler.pick(byTier[planned.tier].filter(n => !usedNemeses.has(n.key)));
        usedNemeses.add(nemesis.key);

        let friend: PacketEntity | null = null;
        let foe: PacketEntity | null = null;
        if (candidates.pairsAvailable) {
            const friendEntry = sampler.pick(candidates.friends.filter(f => !usedFriends.has(f.key)));
            usedFriends.add(friendEntry.key);
            const foeEntry = sampler.pick(candidates.foes.filter(f => !usedFoes.has(f.key)));
            usedFoes.add(foeEntry.key);
            friend = toPacketEntity(friendEntry);
            foe = toPacketEntity(foeEntry);
        }

        battles.push({ index: planned.index, tier: planned.tier, nemesis: toPacketEntity(nemesis), friend, foe });
    }

    const xaxosEligible = pools.getWave(setting.wave).xaxosEligible;
    const protectTarget: ProtectTarget = xaxosEligible ? sampler.pick(PROTECT_TARGETS) : 'Gravehold';

    // Reinforcements must be new faces: not rostered, not met in battle, not recruited earlier
    const taken = new Set<string>(mages.map(m => nameKey(m.name)));
    for (const battle of battles) {
        for (const entity of [battle.nemesis, battle.friend, battle.foe]) {
            if (entity) taken.add(nameKey(entity.name));
        }
    }
    const newMageKey = nameKey(NEW_MAGE_LABEL);
    const rewards = schedule.rewardSlots.map(slot => {
        const reinforcements = candidates.mages.filter(c => !taken.has(c.mage.key));
        const labels = pools.rewardLabels[slot.kind].filter(
            label => nameKey(label) !== newMageKey || reinforcements.length > 0
        );
        const label = sampler.pick(labels);
        if (nameKey(label) !== newMageKey) {
            return { label, newMage: null };
        }
        const recruit = sampler.pick(reinforcements);
        taken.add(recruit.mage.key);
        return { label, newMage: toPacketMage(recruit.mage, sampler.pick(recruit.variants)) };
    });

    const packet = assemblePacket(
        {
            setting: toSettingSelection(setting, variant, xaxosEligible),
            mages,
            battles,
            protectTarget,
            rewards
        },
        schedule,
        {
            requestedSeed: plan.requestedSeed,
            rootSeed: context.rootSeed,
            attemptSeed: context.attemptSeed,
            attemptsTaken: context.attemptNumber,
            request,
            scope: { waves: [...plan.scope.waves] }
        }
    );

    const validation = validatePacket(packet);
    return validation.ok ? { ok: true, value: packet } : { ok: false, violations: validation.violations };
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Select a collision-free expedition packet.
 *
 * Pure in (pools, request, seed): the same inputs give a byte-identical packet.
 * Structural problems (empty scope, pools too small, malformed request) throw
 * before the first attempt; only collisions are retried.
 *
 * @throws ScopeError, InsufficientPoolError, CollisionExhaustedError,
 *         InvalidLengthError, InvalidStrictnessError, InvalidRequestError
 */
export function selectExpedition(
    pools: EntityPools,
    input: SelectionRequestInput,
    options: SelectorOptions = {}
): ExpeditionPacket {
    const log = options.logger ?? defaultLog;
    const timer = createTimer(log);

    const normalized = normalizeRequest(input, options);
    const requestedSeed = validateSeed(input.seed);
    const scope = resolveScope(pools, normalized);
    const forced = resolveForcedSetting(pools, scope, normalized);
    const request: NormalizedRequest = {
        ...normalized,
        settingWave: forced?.setting.wave ?? null,
        settingVariant: forced?.variant?.name ?? null
    };

    const candidates = forced ? [forced.setting] : scope.waves.map(wave => pools.settingFor(wave));
    const settings: SettingEntry[] = [];
    let shortfall: PoolShortfall | null = null;
    for (const setting of candidates) {
        const problem = assessFeasibility(pools, scope.waves, setting.wave, request);
        if (problem) {
            shortfall ??= problem;
        } else {
            settings.push(setting);
        }
    }
    if (settings.length === 0) {
        throw new InsufficientPoolError(
            shortfall ?? { category: 'settings', required: 1, available: 0, wave: null }
        );
    }
    log.debug(`Feasible setting waves: ${settings.map(s => s.wave).join(', ')}`);

    const orchestrator = new RetryOrchestrator({
        requestedSeed,
        maxAttempts: request.maxAttempts,
        seedSource: options.seedSource,
        logger: log.child('Retry')
    });
    const result = orchestrator.run(context =>
        runAttempt({ pools, request, scope, requestedSeed, settings, forced }, context)
    );

    log.info(
        `Selected ${request.length} expedition in "${result.value.setting.wave}" ` +
        `(root seed ${result.rootSeed}, ${result.attemptsTaken} attempt(s))`
    );
    timer.done('Expedition selection');
    return result.value;
}
