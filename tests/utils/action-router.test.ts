import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import {
    createActionRouter,
    defineAction,
    formatMcpSuccess,
    formatMcpError,
    formatValidationError,
    buildActionDescription,
    type McpResponse
} from '../../src/utils/action-router.js';

function body(response: McpResponse): Record<string, unknown> {
    return z.record(z.unknown()).parse(JSON.parse(response.content[0].text));
}

class DeckEmptyError extends Error {
    constructor(readonly requested: number) {
        super(`Deck has no cards left for ${requested} draw(s)`);
        this.name = 'DeckEmptyError';
    }
}

describe('action-router utilities', () => {
    describe('createActionRouter', () => {
        const ACTIONS = ['draw', 'shuffle', 'peek'] as const;

        const drawHandler = vi.fn((args: { count: number }) => {
            if (args.count > 10) {
                throw new DeckEmptyError(args.count);
            }
            return { drawn: args.count };
        });

        const definitions = {
            draw: defineAction({
                schema: z.object({ action: z.string(), count: z.number().int().min(1) }),
                handler: drawHandler,
                aliases: ['pull'],
                description: 'Draw cards'
            }),
            shuffle: defineAction({
                schema: z.object({ action: z.string() }),
                handler: async () => ({ shuffled: true })
            }),
            peek: defineAction({
                schema: z.object({ action: z.string(), depth: z.number().int().default(1) }),
                handler: args => {
                    if (args.depth > 3) {
                        throw new Error('Cannot look that deep');
                    }
                    return [args.depth];
                },
                aliases: ['look', 'top']
            })
        };

        const router = createActionRouter({
            actions: ACTIONS,
            definitions,
            describeError: error => (error instanceof DeckEmptyError
                ? { kind: error.name, details: { requested: error.requested } }
                : null)
        });

        describe('action matching', () => {
            it('should route an exact action', async () => {
                const result = await router({ action: 'shuffle' });
                expect(result.isError).toBeUndefined();
                expect(body(result)).toEqual({ shuffled: true });
            });

            it('should accept a differently cased action', async () => {
                expect(body(await router({ action: 'SHUFFLE' }))).toEqual({ shuffled: true });
            });

            it('should route an alias and report the resolution', async () => {
                expect(body(await router({ action: 'pull', count: 2 }))).toEqual({
                    drawn: 2,
                    _fuzzyMatch: { requested: 'pull', resolved: 'draw', similarity: 95 }
                });
            });

            it('should auto-correct typos', async () => {
                const parsed = body(await router({ action: 'shufle' }));
                expect(parsed.shuffled).toBe(true);
                expect(parsed._fuzzyMatch).toEqual({ requested: 'shufle', resolved: 'shuffle', similarity: 86 });
            });

            it('should return a guiding error for an unknown action', async () => {
                const result = await router({ action: 'zzzz' });
                expect(result.isError).toBe(true);
                const parsed = body(result);
                expect(parsed.error).toBe('invalid_action');
                expect(parsed.hint).toBe('Try one of the suggested values above');
            });

            it('should reject a missing action', async () => {
                const result = await router({ count: 2 });
                expect(result.isError).toBe(true);
                expect(body(result)).toEqual({
                    error: true,
                    message: 'Missing or invalid "action" parameter',
                    received: 'undefined',
                    expected: 'string',
                    validActions: ['draw', 'shuffle', 'peek']
                });
            });
        });

        describe('parameters', () => {
            it('should pass parsed args to the handler', async () => {
                drawHandler.mockClear();
                await router({ action: 'draw', count: 3 });
                expect(drawHandler).toHaveBeenCalledWith({ action: 'draw', count: 3 });
            });

            it('should apply schema defaults', async () => {
                expect(body(await router({ action: 'peek' }))).toEqual({ result: [1] });
            });

            it('should report validation errors without calling the handler', async () => {
                drawHandler.mockClear();
                const result = await router({ action: 'draw', count: 'three' });

                expect(drawHandler).not.toHaveBeenCalled();
                expect(result.isError).toBe(true);
                const parsed = body(result);
                expect(parsed.error).toBe('validation_error');
                expect(parsed.action).toBe('draw');
                expect(parsed.issues).toEqual([
                    { path: 'count', message: 'Expected number, received string', code: 'invalid_type' }
                ]);
            });
        });

        describe('handler errors', () => {
            it('should describe recognized errors', async () => {
                const result = await router({ action: 'draw', count: 12 });
                expect(result.isError).toBe(true);
                expect(body(result)).toEqual({
                    error: true,
                    message: 'Deck has no cards left for 12 draw(s)',
                    action: 'draw',
                    kind: 'DeckEmptyError',
                    details: { requested: 12 }
                });
            });

            it('should report other errors by message only', async () => {
                expect(body(await router({ action: 'peek', depth: 4 }))).toEqual({
                    error: true,
                    message: 'Cannot look that deep',
                    action: 'peek'
                });
            });
        });
    });

    describe('formatMcpSuccess', () => {
        it('should format an object result', () => {
            const result = formatMcpSuccess({ valid: true });
            expect(result.isError).toBeUndefined();
            expect(result.content[0].type).toBe('text');
            expect(body(result)).toEqual({ valid: true });
        });

        it('should wrap non-object results', () => {
            expect(body(formatMcpSuccess(['a', 'b']))).toEqual({ result: ['a', 'b'] });
            expect(body(formatMcpSuccess(7))).toEqual({ result: 7 });
        });

        it('should not add fuzzy match info for exact matches', () => {
            const parsed = body(formatMcpSuccess({ ok: 1 }, { matched: 'select', exact: true, similarity: 1 }));
            expect(parsed._fuzzyMatch).toBeUndefined();
        });
    });

    describe('formatMcpError', () => {
        it('should format error with message and details', () => {
            const result = formatMcpError('Pool exhausted', { action: 'select' });
            expect(result.isError).toBe(true);
            expect(body(result)).toEqual({ error: true, message: 'Pool exhausted', action: 'select' });
        });
    });

    describe('formatValidationError', () => {
        it('should list each issue with its path', () => {
            const parsed = z.object({ mageCount: z.number(), seed: z.number() }).safeParse({ mageCount: 'x' });
            expect(parsed.success).toBe(false);
            if (parsed.success) return;

            const result = formatValidationError('select', parsed.error);
            expect(result.isError).toBe(true);
            const out = body(result);
            expect(out.message).toBe('Validation failed for action "select"');
            expect(out.issues).toEqual([
                { path: 'mageCount', message: 'Expected number, received string', code: 'invalid_type' },
                { path: 'seed', message: 'Required', code: 'invalid_type' }
            ]);
            expect(out.hint).toBe('Check the parameter types and required fields');
        });

        it('should label root-level issues', () => {
            const parsed = z.string().safeParse(3);
            if (parsed.success) throw new Error('expected failure');
            const out = body(formatValidationError('validate', parsed.error));
            expect(out.issues).toEqual([
                { path: '(root)', message: 'Expected string, received number', code: 'invalid_type' }
            ]);
        });
    });

    describe('buildActionDescription', () => {
        const schema = z.object({});
        const handler = () => ({});

        it('should list actions and their aliases', () => {
            const description = buildActionDescription(['draw', 'shuffle', 'peek'] as const, {
                draw: defineAction({ schema, handler, aliases: ['pull'] }),
                shuffle: defineAction({ schema, handler }),
                peek: defineAction({ schema, handler, aliases: ['look', 'top'] })
            });
            expect(description).toBe('Action to perform: draw, shuffle, peek. Aliases: pull -> draw, look/top -> peek');
        });

        it('should omit the alias section when there are none', () => {
            expect(buildActionDescription(['catalog'] as const, {
                catalog: defineAction({ schema, handler })
            })).toBe('Action to perform: catalog');
        });
    });
});
