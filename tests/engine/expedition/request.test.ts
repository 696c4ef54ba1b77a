import { describe, it, expect } from 'vitest';
import {
    InvalidLengthError,
    InvalidRequestError,
    InvalidStrictnessError
} from '../../../src/engine/expedition/errors.js';
import {
    normalizeRequest,
    parseLength,
    parseStrictness,
    resolveMaxAttempts,
    validateSeed
} from '../../../src/engine/expedition/request.js';
import { catchError } from '../../helpers/errors.js';

describe('parseLength', () => {
    it('defaults a missing or blank length to standard', () => {
        expect(parseLength(undefined)).toBe('standard');
        expect(parseLength('   ')).toBe('standard');
    });

    it('matches case-insensitively after trimming', () => {
        expect(parseLength(' LONG ')).toBe('long');
    });

    it('suggests the closest length for a typo', () => {
        const error = catchError(() => parseLength('standrad'), InvalidLengthError);
        expect(error.message).toBe(
            'Unknown expedition length "standrad". Valid values: short, standard, long. Did you mean "standard"?'
        );
        expect(error.suggestions[0]).toBe('standard');
        expect(error.toJSON()).toMatchObject({
            kind: 'InvalidLengthError',
            code: 'INVALID_LENGTH',
            input: 'standrad',
            validValues: ['short', 'standard', 'long']
        });
    });
});

describe('parseStrictness', () => {
    it('defaults to open', () => {
        expect(parseStrictness(undefined)).toBe('open');
    });

    it('accepts any case', () => {
        expect(parseStrictness('Thematic')).toBe('thematic');
    });

    it('rejects unknown modes with a suggestion', () => {
        const error = catchError(() => parseStrictness('thematik'), InvalidStrictnessError);
        expect(error.code).toBe('INVALID_STRICTNESS');
        expect(error.suggestions[0]).toBe('thematic');
    });
});

describe('validateSeed', () => {
    it('passes integers through and maps absence to null', () => {
        expect(validateSeed(12345)).toBe(12345);
        expect(validateSeed(0)).toBe(0);
        expect(validateSeed(undefined)).toBeNull();
        expect(validateSeed(null)).toBeNull();
    });

    it('rejects fractional and unsafe seeds', () => {
        expect(catchError(() => validateSeed(1.5), InvalidRequestError).field).toBe('seed');
        expect(() => validateSeed(2 ** 60)).toThrow(InvalidRequestError);
    });
});

describe('resolveMaxAttempts', () => {
    it('prefers the request, then the configured default, then 200', () => {
        expect(resolveMaxAttempts(10, { defaultMaxAttempts: 50 })).toBe(10);
        expect(resolveMaxAttempts(undefined, { defaultMaxAttempts: 50 })).toBe(50);
        expect(resolveMaxAttempts(undefined, {})).toBe(200);
    });

    it('rejects non-positive budgets', () => {
        const error = catchError(() => resolveMaxAttempts(0, {}), InvalidRequestError);
        expect(error.message).toBe('maxAttempts must be a positive integer, got 0');
    });
});

describe('normalizeRequest', () => {
    it('fills in defaults', () => {
        expect(normalizeRequest({ mageCount: 2 })).toEqual({
            mageCount: 2,
            length: 'standard',
            strictness: 'open',
            contentWaves: [],
            contentBoxes: [],
            settingWave: null,
            settingVariant: null,
            maxAttempts: 200
        });
    });

    it('cleans scope lists and setting names', () => {
        const request = normalizeRequest({
            mageCount: 1,
            contentWaves: [' 1st  Wave ', ''],
            contentBoxes: ['all'],
            settingWave: '  2nd Wave ',
            settingVariant: ' past '
        });
        expect(request.contentWaves).toEqual(['1st Wave']);
        expect(request.contentBoxes).toEqual([]);
        expect(request.settingWave).toBe('2nd Wave');
        expect(request.settingVariant).toBe('past');
    });

    it('treats a blank setting wave as unset', () => {
        expect(normalizeRequest({ mageCount: 1, settingWave: '   ' }).settingWave).toBeNull();
    });

    it('rejects a non-positive mage count', () => {
        const error = catchError(() => normalizeRequest({ mageCount: 0 }), InvalidRequestError);
        expect(error.field).toBe('mageCount');
        expect(error.message).toBe('mageCount must be a positive integer, got 0');
    });

    it('requires a setting wave for a setting variant', () => {
        const error = catchError(() => normalizeRequest({ mageCount: 1, settingVariant: 'past' }), InvalidRequestError);
        expect(error.field).toBe('settingVariant');
        expect(error.message).toBe('settingVariant requires settingWave');
    });
});
