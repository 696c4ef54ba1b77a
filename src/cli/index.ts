/**
 * CLI module index
 * `expedition-select`: packets, replacements, validation and the catalog as JSON on stdout
 */

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'node:fs';
import { createRequire } from 'node:module';
import { z } from 'zod';
import { ConfigError, loadConfig } from '../config.js';
import { loadExpeditionData } from '../data/dataset-loader.js';
import { describeCatalog } from '../engine/expedition/catalog.js';
import { InvalidRequestError, isExpeditionError } from '../engine/expedition/errors.js';
import { splitList } from '../engine/expedition/names.js';
import type { EntityPools } from '../engine/expedition/pools.js';
import { selectReplacementMage } from '../engine/expedition/replacement.js';
import type { SelectorOptions } from '../engine/expedition/request.js';
import { selectExpedition } from '../engine/expedition/selector.js';
import { checkPacket } from '../engine/expedition/validator.js';
import { RichFormatter } from '../server/utils/formatter.js';
import { createLogger, getErrorMessage, logError, setLogLevel } from '../utils/logger.js';

const log = createLogger('CLI');

const require = createRequire(import.meta.url);
const PackageJsonSchema = z.object({ version: z.string() });
export const VERSION: string = PackageJsonSchema.parse(require('../../package.json')).version;

export interface CliIO {
    out: (text: string) => void;
    err: (text: string) => void;
    env?: NodeJS.ProcessEnv;
    readFile?: (path: string) => string;
}

const defaultIO: CliIO = {
    out: text => process.stdout.write(text),
    err: text => process.stderr.write(text)
};

// ═══════════════════════════════════════════════════════════════════════════
// OPTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const GlobalOptionsSchema = z.object({
    dataDir: z.string().optional(),
    maxAttempts: z.coerce.number().int().positive().optional(),
    verbose: z.boolean().optional()
});

const ScopeOptionsSchema = z.object({
    waves: z.string().optional(),
    boxes: z.string().optional(),
    seed: z.coerce.number().int().optional()
});

const SelectOptionsSchema = GlobalOptionsSchema.merge(ScopeOptionsSchema).extend({
    mages: z.coerce.number().int().positive(),
    length: z.string().optional(),
    strictness: z.string().optional(),
    settingWave: z.string().optional(),
    settingVariant: z.string().optional(),
    markdown: z.boolean().optional()
});

const ReplaceOptionsSchema = GlobalOptionsSchema.merge(ScopeOptionsSchema).extend({
    existing: z.string()
});

const CatalogOptionsSchema = GlobalOptionsSchema.extend({
    markdown: z.boolean().optional()
});

/**
 * Validate commander's option bag. Bad values surface as InvalidRequestError
 * so every failure prints the same way.
 */
function parseOptions<T extends z.ZodTypeAny>(schema: T, command: Command): z.output<T> {
    const result = schema.safeParse(command.optsWithGlobals());
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue.path.map(String).join('.') || 'options';
        throw new InvalidRequestError(field, `Invalid --${toFlag(field)}: ${issue.message}`);
    }
    return result.data;
}

function toFlag(field: string): string {
    return field.replace(/[A-Z]/g, letter => `-${letter.toLowerCase()}`);
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

interface CommandContext {
    pools: EntityPools;
    options: SelectorOptions;
}

function prepare(io: CliIO, globals: z.infer<typeof GlobalOptionsSchema>): CommandContext {
    const config = loadConfig(io.env ?? process.env);
    if (globals.verbose) {
        setLogLevel('debug');
    } else if (config.logLevel) {
        setLogLevel(config.logLevel);
    }
    return {
        pools: loadExpeditionData(globals.dataDir ?? config.dataDir),
        options: { defaultMaxAttempts: globals.maxAttempts ?? config.maxAttempts }
    };
}

function printJson(io: CliIO, value: unknown): void {
    io.out(`${JSON.stringify(value, null, 2)}\n`);
}

function optionalList(value: string | undefined): string[] | undefined {
    return value === undefined ? undefined : splitList(value);
}

function createSelectCommand(io: CliIO): Command {
    return new Command('select')
        .description('Select a collision-free expedition packet')
        .requiredOption('-m, --mages <count>', 'Number of mages in the party')
        .option('-l, --length <length>', 'short | standard | long')
        .option('-s, --strictness <mode>', 'thematic | mixed | open')
        .option('-w, --waves <list>', 'Comma-separated waves to draw from ("all" for every wave)')
        .option('-b, --boxes <list>', 'Comma-separated boxes to draw from')
        .option('--seed <seed>', 'Seed for a reproducible packet')
        .option('--setting-wave <wave>', 'Force the setting wave')
        .option('--setting-variant <variant>', 'Force a variant of the setting')
        .option('--markdown', 'Print a readable summary instead of JSON')
        .action((_options: unknown, command: Command) => {
            const options = parseOptions(SelectOptionsSchema, command);
            const { pools, options: selectorOptions } = prepare(io, options);
            const packet = selectExpedition(pools, {
                mageCount: options.mages,
                length: options.length,
                strictness: options.strictness,
                contentWaves: optionalList(options.waves),
                contentBoxes: optionalList(options.boxes),
                seed: options.seed,
                settingWave: options.settingWave,
                settingVariant: options.settingVariant
            }, selectorOptions);

            if (options.markdown) {
                io.out(RichFormatter.packet(packet));
                return;
            }
            printJson(io, packet);
        });
}

function createReplaceMageCommand(io: CliIO): Command {
    return new Command('replace-mage')
        .description('Draw one mage who is not already in the party')
        .requiredOption('-e, --existing <list>', 'Comma-separated names of the current party')
        .option('-w, --waves <list>', 'Comma-separated waves to draw from ("all" for every wave)')
        .option('-b, --boxes <list>', 'Comma-separated boxes to draw from')
        .option('--seed <seed>', 'Seed for a reproducible draw')
        .action((_options: unknown, command: Command) => {
            const options = parseOptions(ReplaceOptionsSchema, command);
            const { pools, options: selectorOptions } = prepare(io, options);
            const result = selectReplacementMage(pools, {
                existingMageNames: splitList(options.existing),
                contentWaves: optionalList(options.waves),
                contentBoxes: optionalList(options.boxes),
                seed: options.seed
            }, selectorOptions);
            printJson(io, result);
        });
}

/** Exit status set by commands that finish without throwing */
interface RunStatus {
    exitCode: number;
}

function createValidateCommand(io: CliIO, status: RunStatus): Command {
    return new Command('validate')
        .description('Check a packet file against every invariant')
        .argument('<file>', 'Packet JSON file')
        .action((file: string) => {
            const readFile = io.readFile ?? ((path: string) => readFileSync(path, 'utf-8'));
            let packet: unknown;
            try {
                packet = JSON.parse(readFile(file));
            } catch (error) {
                throw new InvalidRequestError('file', `Cannot read packet from ${file}: ${getErrorMessage(error)}`);
            }

            const check = checkPacket(packet);
            const violations = check.ok ? [] : check.violations;
            printJson(io, { valid: check.ok, violations });
            if (!check.ok) {
                status.exitCode = 1;
            }
        });
}

function createCatalogCommand(io: CliIO): Command {
    return new Command('catalog')
        .description('List waves, boxes and setting variants')
        .option('--markdown', 'Print a readable summary instead of JSON')
        .action((_options: unknown, command: Command) => {
            const options = parseOptions(CatalogOptionsSchema, command);
            const { pools } = prepare(io, options);
            const catalog = describeCatalog(pools);
            if (options.markdown) {
                io.out(RichFormatter.catalog(catalog));
                return;
            }
            printJson(io, catalog);
        });
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Create the main CLI program
 */
export function createProgram(io: CliIO = defaultIO, status: RunStatus = { exitCode: 0 }): Command {
    const program = new Command();

    program
        .name('expedition-select')
        .description('Deterministic, collision-free expedition packets')
        .version(VERSION)
        .option('-d, --data-dir <dir>', 'Dataset directory (default: EXPEDITION_DATA_DIR or bundled data)')
        .option('--max-attempts <n>', 'Retry budget when a draw collides')
        .option('-v, --verbose', 'Debug logging on stderr')
        .exitOverride()
        .configureOutput({
            writeOut: io.out,
            writeErr: io.err
        });

    for (const command of [
        createSelectCommand(io),
        createReplaceMageCommand(io),
        createValidateCommand(io, status),
        createCatalogCommand(io)
    ]) {
        program.addCommand(command.exitOverride().configureOutput({ writeOut: io.out, writeErr: io.err }));
    }

    return program;
}

function describeFailure(error: unknown): Record<string, unknown> {
    if (isExpeditionError(error)) {
        return { error: true, ...error.toJSON() };
    }
    if (error instanceof ConfigError) {
        return { error: true, kind: error.name, message: error.message, issues: error.issues };
    }
    return { error: true, kind: 'UnexpectedError', message: getErrorMessage(error) };
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function runCLI(argv: string[] = process.argv, io: CliIO = defaultIO): Promise<number> {
    const status: RunStatus = { exitCode: 0 };
    const program = createProgram(io, status);

    try {
        await program.parseAsync(argv);
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        if (!isExpeditionError(error) && !(error instanceof ConfigError)) {
            logError(log, 'Unexpected failure', error);
        }
        io.err(`${JSON.stringify(describeFailure(error), null, 2)}\n`);
        return 1;
    }

    return status.exitCode;
}
