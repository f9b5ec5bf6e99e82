#!/usr/bin/env node

/**
 * @file scrape.ts
 * @module scrape
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview CLI entry point for regenerating the dataset files from the
 * Library of Congress MARC 21 documentation.
 */

import { resolve } from 'node:path';

import { Command } from 'commander';

import { resolveDataDir } from './config.js';
import { errorMessage } from './errors.js';
import { DatasetWriter } from './scraper/DatasetWriter.js';
import { FieldScraper } from './scraper/FieldScraper.js';
import { HttpPageFetcher } from './scraper/PageFetcher.js';

/**
 * Command-line options for marc-scrape.
 */
interface ScrapeOptions {
    /** Output directory (default: the lookup data directory) */
    output?: string;
    concurrency: string;
    timeout: string;
    verbose?: boolean;
}

/**
 * Scrape every field and write both dataset files.
 *
 * @param options - Parsed command-line options
 */
async function scrape(options: ScrapeOptions) {
    const concurrency = parseInt(options.concurrency, 10);
    const timeout = parseInt(options.timeout, 10);

    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > 16) {
        console.error('Error: Concurrency must be between 1 and 16');
        process.exitCode = 1;
        return;
    }
    if (!Number.isInteger(timeout) || timeout < 1000) {
        console.error('Error: Timeout must be at least 1000 ms');
        process.exitCode = 1;
        return;
    }

    const outputDir = options.output ? resolve(options.output) : resolveDataDir();
    const writer = new DatasetWriter(outputDir);
    const fetcher = new HttpPageFetcher({ timeout });

    console.log('MARC 21 Field Scraper');
    console.log(`Output directory: ${outputDir}`);

    const onProgress = (current: number, total: number, code: string) => {
        if (options.verbose) return;
        const percent = Math.floor((current / total) * 100);
        process.stdout.write(`\rProgress: ${current}/${total} (${percent}%) - field ${code}    `);
    };

    const scraper = new FieldScraper(fetcher, {
        concurrency,
        verbose: options.verbose,
        onProgress,
    });
    const result = await scraper.scrape();

    if (!options.verbose) {
        process.stdout.write('\n');
    }

    if (result.scraped === 0) {
        console.error('Error: No field pages were scraped; existing dataset files left unchanged');
        process.exitCode = 1;
        return;
    }

    const summary = writer.write(result.records.values());
    const stats = fetcher.getStats();

    console.log('\n=== Scrape Complete ===');
    console.log(`Time: ${(result.elapsedMs / 1000).toFixed(1)}s`);
    console.log(`Fields processed: ${result.processed}`);
    console.log(`Successful: ${result.successful}`);
    console.log(`  From concise pages: ${result.scraped}`);
    console.log(`  Title only: ${result.titleOnly}`);
    console.log(`Failed: ${result.failed}`);
    console.log(`Requests: ${stats.attempted} (${stats.failed} failed)`);
    if (summary.backupPath) {
        console.log(`Backup: ${summary.backupPath}`);
    }
    console.log(`Wrote ${summary.fieldCount} fields to ${summary.verbosePath}`);
    console.log(`Wrote ${summary.fieldCount} fields to ${summary.basicPath}`);
    console.log(`Total size: ${(summary.bytesWritten / 1024).toFixed(1)} KB`);

    if (result.failures.length > 0) {
        console.log('\nSkipped:');
        for (const failure of result.failures) {
            console.log(`  ${failure.code}: ${failure.kind}`);
        }
    }
}

/**
 * CLI entry point.
 */
async function main() {
    const program = new Command();

    program
        .name('marc-scrape')
        .description('Regenerate marc.json and marc-verbose.json from the Library of Congress documentation')
        .version('1.0.0')
        .option('-o, --output <dir>', 'Output directory (default: the marc data directory)')
        .option('-c, --concurrency <n>', 'Concurrent page requests', '4')
        .option('-t, --timeout <ms>', 'Request timeout in milliseconds', '30000')
        .option('-v, --verbose', 'Log every field as it is added')
        .action(scrape);

    await program.parseAsync();
}

main().catch(error => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 2;
});
