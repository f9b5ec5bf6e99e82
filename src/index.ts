#!/usr/bin/env node

/**
 * @file index.ts
 * @module index
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview CLI entry point for looking up MARC 21 field definitions.
 */

/**
 * @example
 * ```bash
 * # Look up a field and its subfields
 * marc 020
 *
 * # Look up one subfield
 * marc 245a
 *
 * # Search descriptions
 * marc isbn
 *
 * # Full definition with indicators and examples
 * marc -v 245
 * ```
 */

import { runCli } from './cli/cli-core.js';

process.exitCode = runCli(process.argv.slice(2));
