import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DEFAULT_MAX_ATTEMPTS } from './engine/expedition/orchestrator.js';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';

/** Bundled sample datasets, next to src/ and dist/ */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));

export interface ExpeditionConfig {
    dataDir: string;
    maxAttempts: number;
    logLevel: LogLevel | null;
}

export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

const blankAsUnset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const EnvSchema = z.object({
    EXPEDITION_DATA_DIR: z.preprocess(blankAsUnset, z.string().trim().optional()),
    EXPEDITION_MAX_ATTEMPTS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().optional()),
    EXPEDITION_LOG_LEVEL: z.preprocess(
        blankAsUnset,
        z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional()
    )
});

/**
 * Read configuration from environment variables.
 *
 * EXPEDITION_DATA_DIR      dataset directory (default: bundled data/)
 * EXPEDITION_MAX_ATTEMPTS  default retry budget (default: 200)
 * EXPEDITION_LOG_LEVEL     debug | info | warn | error | silent
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExpeditionConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }
    return {
        dataDir: result.data.EXPEDITION_DATA_DIR ?? DEFAULT_DATA_DIR,
        maxAttempts: result.data.EXPEDITION_MAX_ATTEMPTS ?? DEFAULT_MAX_ATTEMPTS,
        logLevel: result.data.EXPEDITION_LOG_LEVEL ?? null
    };
}
