/**
 * @file cli-core.ts
 * @module cli/cli-core
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Lookup CLI implementation. Parses arguments, selects the
 * dataset tier, dispatches to lookup or search and maps errors to exit codes.
 */

import { Command, CommanderError, Option } from 'commander';

import { resolveDataDir } from '../config.js';
import { DatasetLoader } from '../dataset/DatasetLoader.js';
import {
    DatasetUnavailableError,
    EmptyOrInvalidQueryError,
    MarcError,
    NotFoundError,
    errorMessage,
} from '../errors.js';
import { formatResult, OUTPUT_FORMATS, type OutputFormat } from '../formatter/formatters.js';
import { lookup } from '../lookup/LookupEngine.js';
import { classify } from '../query/QueryClassifier.js';
import { search } from '../search/SearchEngine.js';
import { buildHelpText } from './help.js';

export const VERSION = '1.0.0';

/**
 * Where the CLI writes and which environment it reads.
 */
export interface CliIO {
    writeOut(text: string): void;
    writeErr(text: string): void;
    env: NodeJS.ProcessEnv;
}

/**
 * IO bound to the current process.
 */
export const processIO: CliIO = {
    writeOut: text => process.stdout.write(text),
    writeErr: text => process.stderr.write(text),
    env: process.env,
};

/**
 * Parsed command-line options.
 */
interface CliOptions {
    verbose: boolean;
    format: OutputFormat;
    dataDir?: string;
}

const USAGE_HINT = 'Usage: marc [options] <query...>  (run "marc --help" for details)';

/**
 * Build the commander program.
 */
function createProgram(io: CliIO): Command {
    return new Command()
        .name('marc')
        .description('Look up MARC 21 bibliographic field definitions')
        .version(VERSION)
        .argument('<query...>', 'Field code (e.g. 020, 245a) or keyword to search for')
        .option('-v, --verbose', 'Show description, indicators, subfield notes and examples', false)
        .addOption(
            new Option('--format <fmt>', 'Output format').choices(OUTPUT_FORMATS).default('simple')
        )
        .option('--data-dir <dir>', 'Directory containing marc.json and marc-verbose.json')
        .addHelpText('after', buildHelpText())
        .exitOverride()
        .configureOutput({
            writeOut: text => io.writeOut(text),
            writeErr: text => io.writeErr(text),
        });
}

/**
 * Execute one query.
 *
 * @param query - Raw query (positional arguments joined by spaces)
 * @param options - Parsed options
 * @param io - Output sinks
 */
function runQuery(query: string, options: CliOptions, io: CliIO): void {
    const classified = classify(query);

    const loader = new DatasetLoader(resolveDataDir(options.dataDir, io.env));
    const { dataset, warning } = loader.load(options.verbose);
    if (warning) {
        io.writeErr(`Warning: ${warning.message}\n`);
    }

    const formatOptions = {
        format: options.format,
        tier: dataset.tier,
        verbose: options.verbose,
        query,
    };

    if (classified.kind === 'field') {
        const result = lookup(dataset, classified.code, classified.subfield);
        if (result.kind === 'not-found') {
            throw new NotFoundError(result.code);
        }
        io.writeOut(`${formatResult(result, formatOptions)}\n`);
        return;
    }

    const hits = search(dataset, classified.keyword);
    io.writeOut(`${formatResult({ kind: 'search', hits }, formatOptions)}\n`);
}

/**
 * Report an error on stderr and return the exit code for it.
 */
function reportError(error: unknown, io: CliIO): number {
    // Commander has already printed its own message
    if (error instanceof CommanderError) {
        return error.exitCode;
    }

    if (error instanceof MarcError) {
        io.writeErr(`Error: ${error.message}\n`);
        if (error instanceof EmptyOrInvalidQueryError) {
            io.writeErr(`${USAGE_HINT}\n`);
        } else if (error instanceof DatasetUnavailableError) {
            io.writeErr('Run "npm run scrape" to regenerate the dataset files,\n');
            io.writeErr('or use --data-dir <dir> to point at an existing data directory.\n');
        }
        return error.exitCode;
    }

    io.writeErr(`Error: ${errorMessage(error)}\n`);
    return 2;
}

/**
 * Run the lookup CLI.
 *
 * @param argv - Arguments after the executable and script name
 * @param io - Output sinks and environment (defaults to the current process)
 * @returns Process exit code
 */
export function runCli(argv: string[], io: CliIO = processIO): number {
    const program = createProgram(io).action((queryParts: string[], options: CliOptions) => {
        runQuery(queryParts.join(' '), options, io);
    });

    try {
        program.parse(argv, { from: 'user' });
        return 0;
    } catch (error) {
        return reportError(error, io);
    }
}
