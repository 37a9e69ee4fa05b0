/**
 * Timetable Import Command
 * Converts department iCalendar feeds into the timetable's XML import format
 */

import { parseArgs } from 'node:util';
import { readFile, writeFile } from 'fs/promises';
import { ConfigLoader } from './core/config-loader.js';
import { RuleExcluder } from './core/excluder.js';
import { TableSubstitutor } from './core/substitutor.js';
import { TimetablePipeline } from './core/timetable-pipeline.js';
import { TimetableXmlWriter } from './core/timetable-xml-writer.js';
import type { CalendarSource, PipelineResult } from './types/index.js';
import type { Logger } from './utils/logger.js';

export const DEFAULT_TRIPOS = 'engineering';

export const USAGE = `Usage:
  timetable-import [options] <ics_file>...

Options:
  -t, --tripos <name>          Tripos name used in the output (default: engineering,
                               or TIMETABLE_TRIPOS)
  -s, --substitutions <file>   Load part/paper/event type substitutions (.json/.yaml)
  -e, --exclusions <file>      Load exclusion rules (.json/.yaml)
  -o, --output <file>          Write XML here instead of stdout
      --lenient                Skip events with a missing field, malformed summary
                               or invalid timestamp instead of failing
  -h, --help                   Show this message
`;

export interface CliOptions {
  tripos: string;
  substitutionsFile?: string;
  exclusionsFile?: string;
  outputFile?: string;
  lenient: boolean;
  help: boolean;
  files: string[];
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseRawArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        tripos: { type: 'string', short: 't' },
        substitutions: { type: 'string', short: 's' },
        exclusions: { type: 'string', short: 'e' },
        output: { type: 'string', short: 'o' },
        lenient: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse command-line arguments
 */
export function parseCliArgs(args: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const { values, positionals } = parseRawArgs(args);
  const help = values.help === true;

  if (!help && positionals.length === 0) {
    throw new UsageError('At least one <ics_file> is required');
  }

  return {
    tripos: values.tripos || env.TIMETABLE_TRIPOS || DEFAULT_TRIPOS,
    substitutionsFile: values.substitutions,
    exclusionsFile: values.exclusions,
    outputFile: values.output,
    lenient: values.lenient === true,
    help,
    files: positionals,
  };
}

/**
 * Build the pipeline the options describe. Configuration is loaded and
 * validated here, before any feed is read.
 */
export function createPipeline(options: CliOptions, logger: Logger): TimetablePipeline {
  const substitutor = options.substitutionsFile
    ? new TableSubstitutor(ConfigLoader.loadSubstitutions(options.substitutionsFile))
    : undefined;
  const excluder = options.exclusionsFile
    ? new RuleExcluder(ConfigLoader.loadExclusions(options.exclusionsFile))
    : undefined;

  logger.info('cli', 'config_loaded', {
    substitutions: options.substitutionsFile ?? null,
    exclusions: options.exclusionsFile ?? null,
  });

  return new TimetablePipeline(logger, { substitutor, excluder, lenient: options.lenient });
}

/**
 * Read every feed, build the timetable and write the XML
 */
export async function runImport(options: CliOptions, logger: Logger): Promise<PipelineResult> {
  const pipeline = createPipeline(options, logger);

  const sources: CalendarSource[] = await Promise.all(
    options.files.map(async (file) => ({ name: file, content: await readFile(file, 'utf-8') }))
  );

  const result = pipeline.build(options.tripos, sources);
  const xml = new TimetableXmlWriter().render(result.timetable);

  if (options.outputFile) {
    await writeFile(options.outputFile, xml, 'utf-8');
    logger.info('cli', 'output_written', { path: options.outputFile, bytes: Buffer.byteLength(xml) });
  } else {
    process.stdout.write(xml);
  }

  return result;
}
