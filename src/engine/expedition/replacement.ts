import type { PacketMage } from '../../schema/expedition.js';
import { createLogger } from '../../utils/logger.js';
import { deepFreeze, toPacketMage } from './assembler.js';
import { InsufficientPoolError } from './errors.js';
import { nameKey, normalizeSpace } from './names.js';
import { RetryOrchestrator, type AttemptOutcome } from './orchestrator.js';
import type { EntityPools } from './pools.js';
import { resolveMaxAttempts, validateSeed, type SelectorOptions } from './request.js';
import { SeededSampler } from './sampler.js';
import { resolveScope, type ScopeInput } from './scope.js';

const defaultLog = createLogger('Replacement');

export interface ReplacementRequestInput extends ScopeInput {
    /** Current party members; the replacement must differ from all of them */
    existingMageNames: readonly string[];
    seed?: number | null;
    maxAttempts?: number;
}

export interface ReplacementResult {
    mage: PacketMage;
    meta: {
        requestedSeed: number | null;
        rootSeed: number;
        attemptSeed: number;
        attemptsTaken: number;
        existingMageNames: string[];
        scope: { waves: string[] };
    };
}

/**
 * Draw one in-scope mage (with a variant) to replace a fallen party member.
 */
export function selectReplacementMage(
    pools: EntityPools,
    input: ReplacementRequestInput,
    options: SelectorOptions = {}
): ReplacementResult {
    const log = options.logger ?? defaultLog;
    const requestedSeed = validateSeed(input.seed);
    const maxAttempts = resolveMaxAttempts(input.maxAttempts, options);
    const scope = resolveScope(pools, input);

    const existing = input.existingMageNames.map(normalizeSpace).filter(name => name.length > 0);
    const existingKeys = new Set(existing.map(nameKey));
    const candidates = pools.magesIn(new Set(scope.waves)).filter(c => !existingKeys.has(c.mage.key));
    if (candidates.length === 0) {
        throw new InsufficientPoolError({ category: 'replacement-mages', required: 1, available: 0, wave: null });
    }

    const orchestrator = new RetryOrchestrator({
        requestedSeed,
        maxAttempts,
        seedSource: options.seedSource,
        logger: log.child('Retry')
    });
    // Candidates exclude the party, so attempt 1 always succeeds. The orchestrator
    // still supplies the seeds recorded in meta.
    const result = orchestrator.run((context): AttemptOutcome<PacketMage> => {
        const sampler = new SeededSampler(context.attemptSeed);
        const chosen = sampler.pick(candidates);
        return { ok: true, value: toPacketMage(chosen.mage, sampler.pick(chosen.variants)) };
    });

    log.info(`Replacement mage: ${result.value.name} (${result.value.sourceBox})`);
    return deepFreeze({
        mage: result.value,
        meta: {
            requestedSeed,
            rootSeed: result.rootSeed,
            attemptSeed: result.attemptSeed,
            attemptsTaken: result.attemptsTaken,
            existingMageNames: existing,
            scope: { waves: [...scope.waves] }
        }
    });
}
