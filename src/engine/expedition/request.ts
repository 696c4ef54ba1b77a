import {
    EXPEDITION_LENGTHS,
    STRICTNESS_MODES,
    type ExpeditionLength,
    type NormalizedRequest,
    type Strictness
} from '../../schema/expedition.js';
import { rankSuggestions } from '../../utils/fuzzy-enum.js';
import type { Logger } from '../../utils/logger.js';
import { InvalidLengthError, InvalidRequestError, InvalidStrictnessError } from './errors.js';
import { nameKey, normalizeSpace } from './names.js';
import { DEFAULT_MAX_ATTEMPTS } from './orchestrator.js';
import { normalizeScopeList } from './scope.js';

export interface SelectionRequestInput {
    mageCount: number;
    length?: string;
    strictness?: string;
    contentWaves?: readonly string[];
    contentBoxes?: readonly string[];
    seed?: number | null;
    maxAttempts?: number;
    settingWave?: string | null;
    settingVariant?: string | null;
}

export interface SelectorOptions {
    /** Budget used when the request names none */
    defaultMaxAttempts?: number;
    /** Root seed source for unseeded requests */
    seedSource?: () => number;
    logger?: Logger;
}

export function parseLength(value: string | undefined): ExpeditionLength {
    const key = nameKey(value ?? '');
    if (key.length === 0) return 'standard';
    const match = EXPEDITION_LENGTHS.find(length => length === key);
    if (match) return match;
    throw new InvalidLengthError(value ?? '', EXPEDITION_LENGTHS, rankSuggestions(key, EXPEDITION_LENGTHS));
}

export function parseStrictness(value: string | undefined): Strictness {
    const key = nameKey(value ?? '');
    if (key.length === 0) return 'open';
    const match = STRICTNESS_MODES.find(mode => mode === key);
    if (match) return match;
    throw new InvalidStrictnessError(value ?? '', STRICTNESS_MODES, rankSuggestions(key, STRICTNESS_MODES));
}

export function validateSeed(seed: number | null | undefined): number | null {
    if (seed === undefined || seed === null) return null;
    if (!Number.isSafeInteger(seed)) {
        throw new InvalidRequestError('seed', `seed must be a safe integer, got ${seed}`);
    }
    return seed;
}

export function resolveMaxAttempts(requested: number | undefined, options: SelectorOptions): number {
    const maxAttempts = requested ?? options.defaultMaxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
        throw new InvalidRequestError('maxAttempts', `maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    return maxAttempts;
}

function optionalName(value: string | null | undefined): string | null {
    if (value === undefined || value === null) return null;
    const name = normalizeSpace(value);
    return name.length > 0 ? name : null;
}

/**
 * Apply defaults and reject malformed fields. Dataset-dependent checks
 * (scope, forced setting) happen in the selector.
 */
export function normalizeRequest(input: SelectionRequestInput, options: SelectorOptions = {}): NormalizedRequest {
    if (!Number.isInteger(input.mageCount) || input.mageCount < 1) {
        throw new InvalidRequestError('mageCount', `mageCount must be a positive integer, got ${input.mageCount}`);
    }

    const settingWave = optionalName(input.settingWave);
    const settingVariant = optionalName(input.settingVariant);
    if (settingVariant !== null && settingWave === null) {
        throw new InvalidRequestError('settingVariant', 'settingVariant requires settingWave');
    }

    return {
        mageCount: input.mageCount,
        length: parseLength(input.length),
        strictness: parseStrictness(input.strictness),
        contentWaves: normalizeScopeList(input.contentWaves),
        contentBoxes: normalizeScopeList(input.contentBoxes),
        settingWave,
        settingVariant,
        maxAttempts: resolveMaxAttempts(input.maxAttempts, options)
    };
}
