/**
 * Consolidated Expedition Management Tool
 * Selection, replacement, validation, discovery and story briefs in one tool.
 */

import { z } from 'zod';
import { loadConfig, ConfigError } from '../../config.js';
import { getExpeditionData } from '../../data/index.js';
import { describeCatalog } from '../../engine/expedition/catalog.js';
import { InvalidRequestError, isExpeditionError } from '../../engine/expedition/errors.js';
import { splitList } from '../../engine/expedition/names.js';
import { extractStoryInputs, resolveEffectiveSeed } from '../../engine/expedition/packet-tools.js';
import { selectReplacementMage } from '../../engine/expedition/replacement.js';
import { selectExpedition } from '../../engine/expedition/selector.js';
import { checkPacket, parsePacket } from '../../engine/expedition/validator.js';
import {
    buildActionDescription,
    createActionRouter,
    defineAction,
    type ActionDefinition,
    type ErrorDescription,
    type McpResponse
} from '../../utils/action-router.js';
import { createLogger } from '../../utils/logger.js';
import type { SessionContext } from '../types.js';
import { RichFormatter } from '../utils/formatter.js';

const log = createLogger('ExpeditionManage');

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const ACTIONS = ['select', 'replace_mage', 'validate', 'catalog', 'story'] as const;
type ExpeditionAction = typeof ACTIONS[number];

const EMBED_TAG = 'EXPEDITION_MANAGE';

// ═══════════════════════════════════════════════════════════════════════════
// ACTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

/** A list of names, or one comma-separated string */
const NameListInput = z.union([z.array(z.string()), z.string()]);
const NameList = NameListInput.transform(value => (typeof value === 'string' ? splitList(value) : value));

const ScopeFields = {
    contentWaves: NameList.optional().describe('Waves to draw from ("all" or empty: every wave)'),
    contentBoxes: NameList.optional().describe('Boxes to draw from; each adds its wave')
};

const SelectSchema = z.object({
    action: z.string(),
    mageCount: z.number().int().min(1).describe('Number of mages in the party'),
    length: z.string().optional().describe('short | standard | long'),
    strictness: z.string().optional().describe('thematic | mixed | open'),
    ...ScopeFields,
    seed: z.number().int().optional(),
    maxAttempts: z.number().int().min(1).optional(),
    settingWave: z.string().optional(),
    settingVariant: z.string().optional()
});

const ReplaceMageSchema = z.object({
    action: z.string(),
    existingMageNames: NameList.refine(names => names.length > 0, 'Name at least one current party member'),
    ...ScopeFields,
    seed: z.number().int().optional(),
    maxAttempts: z.number().int().min(1).optional()
});

const ValidateSchema = z.object({
    action: z.string(),
    packet: z.unknown()
});

const CatalogSchema = z.object({
    action: z.string()
});

const StorySchema = z.object({
    action: z.string(),
    packet: z.unknown()
});

// ═══════════════════════════════════════════════════════════════════════════
// ACTION HANDLERS
// ═══════════════════════════════════════════════════════════════════════════

function loadSelectorContext() {
    const config = loadConfig();
    return {
        pools: getExpeditionData(config.dataDir),
        options: { defaultMaxAttempts: config.maxAttempts }
    };
}

async function handleSelect(args: z.infer<typeof SelectSchema>): Promise<object> {
    const { pools, options } = loadSelectorContext();
    const packet = selectExpedition(pools, args, options);

    return {
        success: true,
        actionType: 'select',
        effectiveSeed: resolveEffectiveSeed(packet.meta),
        packet,
        markdown: RichFormatter.packet(packet)
    };
}

async function handleReplaceMage(args: z.infer<typeof ReplaceMageSchema>): Promise<object> {
    const { pools, options } = loadSelectorContext();
    const result = selectReplacementMage(pools, args, options);

    let markdown = RichFormatter.header('Replacement Mage', '🧙');
    markdown += RichFormatter.keyValue({
        'Mage': RichFormatter.mage(result.mage),
        'Notes': result.mage.storyNotes,
        'Replacing among': result.meta.existingMageNames.join(', '),
        'Seed': result.meta.requestedSeed ?? `${result.meta.rootSeed} (drawn)`
    });

    return {
        success: true,
        actionType: 'replace_mage',
        mage: result.mage,
        meta: result.meta,
        markdown
    };
}

async function handleValidate(args: z.infer<typeof ValidateSchema>): Promise<object> {
    const check = checkPacket(args.packet);
    const violations = check.ok ? [] : check.violations;

    let markdown = RichFormatter.header('Packet Validation', '🔍');
    markdown += check.ok
        ? RichFormatter.success('Packet satisfies every invariant')
        : RichFormatter.error(`${violations.length} violation(s)`) + RichFormatter.violations(violations);

    return {
        success: true,
        actionType: 'validate',
        valid: check.ok,
        violations,
        markdown
    };
}

async function handleCatalog(): Promise<object> {
    const { pools } = loadSelectorContext();
    const catalog = describeCatalog(pools);
    return {
        success: true,
        actionType: 'catalog',
        catalog,
        markdown: RichFormatter.catalog(catalog)
    };
}

async function handleStory(args: z.infer<typeof StorySchema>): Promise<object> {
    const parsed = parsePacket(args.packet);
    if (!parsed.ok) {
        throw new InvalidRequestError(
            'packet',
            `Not an expedition packet: ${parsed.violations.map(v => v.message).join('; ')}`
        );
    }
    const story = extractStoryInputs(parsed.packet);
    return {
        success: true,
        actionType: 'story',
        story,
        markdown: RichFormatter.story(story)
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTION ROUTER
// ═══════════════════════════════════════════════════════════════════════════

const definitions: Record<ExpeditionAction, ActionDefinition> = {
    select: defineAction({
        schema: SelectSchema,
        handler: handleSelect,
        aliases: ['generate', 'new', 'expedition', 'select_expedition'],
        description: 'Select a collision-free expedition packet'
    }),
    replace_mage: defineAction({
        schema: ReplaceMageSchema,
        handler: handleReplaceMage,
        aliases: ['replacement', 'recruit', 'select_replacement_mage'],
        description: 'Draw one mage who is not already in the party'
    }),
    validate: defineAction({
        schema: ValidateSchema,
        handler: handleValidate,
        aliases: ['check', 'verify'],
        description: 'Check a packet against every invariant'
    }),
    catalog: defineAction({
        schema: CatalogSchema,
        handler: handleCatalog,
        aliases: ['list', 'settings', 'discover'],
        description: 'List waves, boxes and setting variants'
    }),
    story: defineAction({
        schema: StorySchema,
        handler: handleStory,
        aliases: ['brief', 'story_inputs'],
        description: 'Compact narration brief for a packet'
    })
};

function describeError(error: unknown): ErrorDescription | null {
    if (isExpeditionError(error)) {
        return { kind: error.name, details: { code: error.code, ...error.details() } };
    }
    if (error instanceof ConfigError) {
        return { kind: error.name, details: { issues: error.issues } };
    }
    return null;
}

const router = createActionRouter({
    actions: ACTIONS,
    definitions,
    threshold: 0.6,
    describeError
});

// ═══════════════════════════════════════════════════════════════════════════
// TOOL DEFINITION & HANDLER
// ═══════════════════════════════════════════════════════════════════════════

export const ExpeditionManageTool = {
    name: 'expedition_manage',
    description: `Expedition packets for a cooperative deck-building campaign.

🗺️ SELECT (select):
Draws a setting, a mage roster, a nemesis per battle with friend/foe pairs,
a protect target and reward labels. No character appears twice.
- mageCount: party size (required)
- length: short (3 battles) | standard (4) | long (8)
- strictness: thematic | mixed | open
- contentWaves / contentBoxes: limit the content ("all" = everything)
- seed: same seed + same request = same packet
- settingWave / settingVariant: force the setting

🧙 REPLACE MAGE (replace_mage):
One new mage for a party; existingMageNames lists the current members.

🔍 VALIDATE (validate): check a packet received from elsewhere.
📚 CATALOG (catalog): waves, boxes and setting variants on offer.
📖 STORY (story): compact brief of a packet for narration.

Actions: ${ACTIONS.join(', ')}`,
    inputSchema: z.object({
        action: z.string().describe(buildActionDescription(ACTIONS, definitions)),
        // Select params
        mageCount: z.number().int().optional(),
        length: z.string().optional(),
        strictness: z.string().optional(),
        settingWave: z.string().optional(),
        settingVariant: z.string().optional(),
        // Scope (select, replace_mage)
        contentWaves: NameListInput.optional(),
        contentBoxes: NameListInput.optional(),
        seed: z.number().int().optional(),
        maxAttempts: z.number().int().optional(),
        // Replace params
        existingMageNames: NameListInput.optional(),
        // Validate / story params
        packet: z.unknown().optional()
    })
};

export type ExpeditionManageArgs = z.infer<typeof ExpeditionManageTool.inputSchema>;

const ResponseEnvelopeSchema = z.object({
    error: z.union([z.boolean(), z.string()]).optional(),
    message: z.string().optional(),
    markdown: z.string().optional(),
    suggestions: z.array(z.object({ value: z.string(), similarity: z.number() })).optional(),
    issues: z.array(z.object({ path: z.string(), message: z.string() })).optional()
}).passthrough();

export async function handleExpeditionManage(args: ExpeditionManageArgs, ctx: SessionContext): Promise<McpResponse> {
    log.debug(`${args.action} (session ${ctx.sessionId})`);

    const result = await router({ ...args });
    const envelope = ResponseEnvelopeSchema.safeParse(JSON.parse(result.content[0].text));
    if (!envelope.success) {
        return result;
    }

    const { markdown, ...data } = envelope.data;
    let output = '';

    if (data.error) {
        output = RichFormatter.header('Error', '❌');
        output += RichFormatter.alert(data.message ?? 'Unknown error', 'error');
        if (data.suggestions && data.suggestions.length > 0) {
            output += '\n**Did you mean:**\n';
            output += RichFormatter.list(data.suggestions.map(s => `${s.value} (${s.similarity}% match)`));
        }
        if (data.issues && data.issues.length > 0) {
            output += RichFormatter.list(data.issues.map(i => `${i.path}: ${i.message}`));
        }
    } else {
        output = markdown ?? '';
    }

    output += RichFormatter.embedJson(data, EMBED_TAG);

    return {
        content: [{ type: 'text', text: output }],
        isError: result.isError
    };
}
