import { createLogger } from '../../utils/logger.js';
import { ScopeError } from './errors.js';
import { nameKey, normalizeSpace } from './names.js';
import type { EntityPools } from './pools.js';

const log = createLogger('Scope');

export interface ScopeInput {
    contentWaves?: readonly string[];
    contentBoxes?: readonly string[];
}

export interface ResolvedScope {
    /** Allowed wave ids, in dataset order */
    waves: readonly string[];
    unknownWaves: readonly string[];
    unknownBoxes: readonly string[];
}

/**
 * Trim entries and drop blanks. A list mentioning "all" means no filter.
 */
export function normalizeScopeList(values: readonly string[] | undefined): string[] {
    const cleaned = (values ?? []).map(normalizeSpace).filter(v => v.length > 0);
    if (cleaned.some(v => nameKey(v) === 'all')) {
        return [];
    }
    return cleaned;
}

/**
 * Resolve wave and box filters to the set of allowed waves.
 *
 * Both lists empty (after normalization) means every wave. Boxes expand to
 * their waves and the union with explicit waves is the scope. Unknown names
 * are dropped; if nothing is left a ScopeError names them.
 */
export function resolveScope(pools: EntityPools, input: ScopeInput): ResolvedScope {
    const waveNames = normalizeScopeList(input.contentWaves);
    const boxNames = normalizeScopeList(input.contentBoxes);

    if (waveNames.length === 0 && boxNames.length === 0) {
        return { waves: pools.waves.map(w => w.id), unknownWaves: [], unknownBoxes: [] };
    }

    const allowed = new Set<string>();
    const unknownWaves: string[] = [];
    const unknownBoxes: string[] = [];

    for (const name of waveNames) {
        const wave = pools.findWave(name);
        if (wave) {
            allowed.add(wave.id);
        } else {
            unknownWaves.push(name);
        }
    }

    for (const name of boxNames) {
        const box = pools.findBox(name);
        if (box) {
            allowed.add(box.wave);
        } else {
            unknownBoxes.push(name);
        }
    }

    if (unknownWaves.length > 0 || unknownBoxes.length > 0) {
        log.warn(`Ignoring unknown scope entries: waves=[${unknownWaves.join(', ')}] boxes=[${unknownBoxes.join(', ')}]`);
    }

    const waves = pools.waves.map(w => w.id).filter(id => allowed.has(id));
    if (waves.length === 0) {
        throw new ScopeError(
            'Content scope matches no known wave or box',
            unknownWaves,
            unknownBoxes
        );
    }

    log.debug(`Resolved scope: ${waves.join(', ')}`);
    return { waves, unknownWaves, unknownBoxes };
}
