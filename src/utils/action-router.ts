/**
 * Action Router - Generic routing for consolidated MCP tools
 *
 * Provides a generic framework for routing action-based tools:
 * - Parses action parameter with fuzzy matching
 * - Routes to appropriate handler based on action
 * - Turns domain errors into structured error responses
 * - Provides consistent response formatting
 *
 * Usage:
 *   const router = createActionRouter({ actions: ACTIONS, definitions });
 *   const result = await router(args);
 */

import { z } from 'zod';
import {
    matchAction,
    isGuidingError,
    formatGuidingError,
    type MatchResult
} from './fuzzy-enum.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Handler function for a specific action
 */
export type ActionHandler<TArgs = unknown, TResult = unknown> = (
    args: TArgs
) => Promise<TResult> | TResult;

/**
 * Definition for a single action within a consolidated tool.
 * Build one with defineAction so the handler sees its schema's output type.
 */
export interface ActionDefinition {
    /** Validates action-specific parameters and binds them to the handler */
    bind(args: Record<string, unknown>):
        | { success: true; run: () => Promise<unknown> }
        | { success: false; error: z.ZodError };
    /** Optional aliases for this action (e.g., 'generate' -> 'select') */
    aliases?: string[];
    /** Description for documentation */
    description?: string;
}

/**
 * Structured view of an error thrown by a handler
 */
export interface ErrorDescription {
    kind: string;
    details: Record<string, unknown>;
}

/**
 * Configuration for the action router
 */
export interface ActionRouterConfig<TActions extends string> {
    /** Valid action names */
    actions: readonly TActions[];
    /** Action definitions with handlers */
    definitions: Record<TActions, ActionDefinition>;
    /** Global alias map (optional, built from definitions if not provided) */
    aliases?: Record<string, TActions>;
    /** Minimum similarity for fuzzy matching (default: 0.6) */
    threshold?: number;
    /** Recognize domain errors; unrecognized errors are reported by message only */
    describeError?: (error: unknown) => ErrorDescription | null;
}

/**
 * MCP-formatted response
 */
export type McpResponse = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};

// ═══════════════════════════════════════════════════════════════════════════
// ACTION DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════

export function defineAction<TSchema extends z.ZodTypeAny>(definition: {
    schema: TSchema;
    handler: ActionHandler<z.output<TSchema>>;
    aliases?: string[];
    description?: string;
}): ActionDefinition {
    return {
        aliases: definition.aliases,
        description: definition.description,
        bind(args) {
            const parsed = definition.schema.safeParse(args);
            if (!parsed.success) {
                return { success: false, error: parsed.error };
            }
            return { success: true, run: async () => definition.handler(parsed.data) };
        }
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTION ROUTER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Create an action router for a consolidated tool
 *
 * @example
 * const router = createActionRouter({
 *     actions: ['select', 'catalog'] as const,
 *     definitions: {
 *         select: defineAction({
 *             schema: z.object({ mageCount: z.number().int() }),
 *             handler: (args) => selectExpedition(pools, args),
 *             aliases: ['generate']
 *         }),
 *         catalog: defineAction({
 *             schema: z.object({}),
 *             handler: () => describeCatalog(pools)
 *         })
 *     }
 * });
 *
 * const result = await router({ action: 'generate', mageCount: 4 });
 */
export function createActionRouter<TActions extends string>(
    config: ActionRouterConfig<TActions>
): (args: Record<string, unknown>) => Promise<McpResponse> {
    const { actions, definitions, threshold = 0.6, describeError } = config;

    // Build alias map from definitions if not provided
    const aliasMap: Record<string, TActions> = config.aliases ?? {};
    if (!config.aliases) {
        for (const action of actions) {
            for (const alias of definitions[action].aliases ?? []) {
                aliasMap[alias.toLowerCase()] = action;
            }
        }
    }

    return async function route(args: Record<string, unknown>): Promise<McpResponse> {
        // ─────────────────────────────────────────────────────────────────────
        // STEP 1: Extract and validate action
        // ─────────────────────────────────────────────────────────────────────
        const rawAction = args.action;
        if (typeof rawAction !== 'string') {
            return formatMcpError('Missing or invalid "action" parameter', {
                received: typeof rawAction,
                expected: 'string',
                validActions: [...actions]
            });
        }

        // ─────────────────────────────────────────────────────────────────────
        // STEP 2: Match action with fuzzy logic
        // ─────────────────────────────────────────────────────────────────────
        const matchResult = matchAction(rawAction, actions, aliasMap, threshold);

        if (isGuidingError(matchResult)) {
            return formatGuidingError(matchResult);
        }

        const action = matchResult.matched;

        // ─────────────────────────────────────────────────────────────────────
        // STEP 3: Parse action-specific args
        // ─────────────────────────────────────────────────────────────────────
        const bound = definitions[action].bind(args);

        if (!bound.success) {
            return formatValidationError(action, bound.error);
        }

        // ─────────────────────────────────────────────────────────────────────
        // STEP 4: Execute handler
        // ─────────────────────────────────────────────────────────────────────
        try {
            const result = await bound.run();
            return formatMcpSuccess(result, matchResult, rawAction);
        } catch (error) {
            const described = describeError?.(error) ?? null;
            if (described) {
                return formatMcpError(
                    error instanceof Error ? error.message : String(error),
                    { action, kind: described.kind, details: described.details }
                );
            }
            return formatMcpError(
                error instanceof Error ? error.message : String(error),
                { action }
            );
        }
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// RESPONSE FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Format a successful result as MCP response
 */
export function formatMcpSuccess(
    result: unknown,
    matchInfo?: MatchResult<string>,
    requested?: string
): McpResponse {
    const output: Record<string, unknown> = typeof result === 'object' && result !== null && !Array.isArray(result)
        ? { ...result }
        : { result };

    // Add fuzzy match info if not exact match
    if (matchInfo && !matchInfo.exact) {
        output._fuzzyMatch = {
            requested: requested ?? matchInfo.matched,
            resolved: matchInfo.matched,
            similarity: Math.round(matchInfo.similarity * 100)
        };
    }

    return {
        content: [{
            type: 'text',
            text: JSON.stringify(output, null, 2)
        }]
    };
}

/**
 * Format an error as MCP response
 */
export function formatMcpError(
    message: string,
    details: Record<string, unknown>
): McpResponse {
    return {
        content: [{
            type: 'text',
            text: JSON.stringify({
                error: true,
                message,
                ...details
            }, null, 2)
        }],
        isError: true
    };
}

/**
 * Format a Zod validation error as MCP response with helpful details
 */
export function formatValidationError(
    action: string,
    error: z.ZodError
): McpResponse {
    const issues = error.issues.map(issue => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
        code: issue.code
    }));

    return {
        content: [{
            type: 'text',
            text: JSON.stringify({
                error: 'validation_error',
                action,
                message: `Validation failed for action "${action}"`,
                issues,
                hint: 'Check the parameter types and required fields'
            }, null, 2)
        }],
        isError: true
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPER: Build action description for tool schema
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Generate description text for the 'action' parameter
 * Includes all valid actions and their aliases
 */
export function buildActionDescription<TActions extends string>(
    actions: readonly TActions[],
    definitions: Record<TActions, ActionDefinition>
): string {
    const parts = [`Action to perform: ${actions.join(', ')}`];

    const aliasLines: string[] = [];
    for (const action of actions) {
        const aliases = definitions[action].aliases ?? [];
        if (aliases.length > 0) {
            aliasLines.push(`${aliases.join('/')} -> ${action}`);
        }
    }

    if (aliasLines.length > 0) {
        parts.push(`Aliases: ${aliasLines.join(', ')}`);
    }

    return parts.join('. ');
}
