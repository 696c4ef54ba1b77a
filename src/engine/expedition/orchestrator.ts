import { randomInt } from 'node:crypto';
import { createLogger, type Logger } from '../../utils/logger.js';
import { CollisionExhaustedError, InvalidRequestError } from './errors.js';
import { deriveAttemptSeed } from './sampler.js';
import type { CollisionViolation } from './validator.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type OrchestratorState = 'attempting' | 'succeeded' | 'exhausted';

export type AttemptOutcome<T> =
    | { ok: true; value: T }
    | { ok: false; violations: readonly CollisionViolation[] };

export interface AttemptContext {
    rootSeed: number;
    attemptSeed: number;
    /** 1-based */
    attemptNumber: number;
}

export interface RetryOptions {
    requestedSeed: number | null;
    maxAttempts: number;
    /** Source of root seeds when none was requested */
    seedSource?: () => number;
    logger?: Logger;
}

export interface RetryResult<T> {
    value: T;
    rootSeed: number;
    attemptSeed: number;
    attemptsTaken: number;
}

export const DEFAULT_MAX_ATTEMPTS = 200;

/** Fresh uint32 root seed */
export function freshSeed(): number {
    return randomInt(0, 2 ** 32);
}

// ═══════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Bounded retry loop: attempting -> succeeded | exhausted.
 *
 * Each iteration derives the next attempt seed from the previous one (the
 * first from the root seed) and re-runs the whole attempt. Only collision
 * outcomes consume the budget; anything thrown by the attempt propagates.
 * An orchestrator runs once.
 */
export class RetryOrchestrator {
    readonly rootSeed: number;
    readonly maxAttempts: number;

    private currentState: OrchestratorState = 'attempting';
    private attempts = 0;
    private attemptSeed: number;
    private lastViolations: readonly CollisionViolation[] = [];
    private log: Logger;

    constructor(options: RetryOptions) {
        if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
            throw new InvalidRequestError(
                'maxAttempts',
                `maxAttempts must be a positive integer, got ${options.maxAttempts}`
            );
        }
        this.maxAttempts = options.maxAttempts;
        this.rootSeed = options.requestedSeed ?? (options.seedSource ?? freshSeed)();
        this.attemptSeed = this.rootSeed;
        this.log = options.logger ?? createLogger('Retry');
    }

    get state(): OrchestratorState {
        return this.currentState;
    }

    get attemptsTaken(): number {
        return this.attempts;
    }

    run<T>(attempt: (context: AttemptContext) => AttemptOutcome<T>): RetryResult<T> {
        if (this.currentState !== 'attempting' || this.attempts > 0) {
            throw new Error(`RetryOrchestrator already ran (state: ${this.currentState})`);
        }

        while (this.attempts < this.maxAttempts) {
            this.attemptSeed = deriveAttemptSeed(this.attemptSeed);
            this.attempts += 1;

            const outcome = attempt({
                rootSeed: this.rootSeed,
                attemptSeed: this.attemptSeed,
                attemptNumber: this.attempts
            });

            if (outcome.ok) {
                this.currentState = 'succeeded';
                return {
                    value: outcome.value,
                    rootSeed: this.rootSeed,
                    attemptSeed: this.attemptSeed,
                    attemptsTaken: this.attempts
                };
            }

            this.lastViolations = outcome.violations;
            this.log.debug(
                `Attempt ${this.attempts}/${this.maxAttempts} (seed ${this.attemptSeed}) collided: ` +
                outcome.violations.map(v => v.code).join(', ')
            );
        }

        this.currentState = 'exhausted';
        this.log.warn(`Gave up after ${this.attempts} attempt(s) from root seed ${this.rootSeed}`);
        throw new CollisionExhaustedError(this.attempts, this.lastViolations);
    }
}
