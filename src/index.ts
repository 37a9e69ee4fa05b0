#!/usr/bin/env node
/**
 * Main Entry Point
 * Run the timetable import from the command line
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env from project root
dotenv.config({ path: resolve(process.cwd(), '.env') });

import { parseCliArgs, runImport, UsageError, USAGE } from './cli.js';
import type { CliOptions } from './cli.js';
import { Logger } from './utils/logger.js';

async function main(): Promise<void> {
  const logger = new Logger();

  const options = readOptions();

  if (options.help) {
    process.stdout.write(USAGE);
    return;
  }

  try {
    const result = await runImport(options, logger);
    if (result.skipped.length > 0) {
      logger.warn('cli', 'records_skipped', { count: result.skipped.length });
    }
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('cli', 'import_failed', { files: options.files }, err);
    process.exitCode = 1;
  }
}

function readOptions(): CliOptions {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
      process.exit(2);
    }
    throw error;
  }
}

// Run
main().catch((error) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
