/**
 * Timetable Pipeline
 * Coordinates decode -> parse -> substitute -> exclude -> assemble
 */

import type {
  CalendarSource,
  Excluder,
  PipelineResult,
  RawCalendarRecord,
  SkippedRecord,
  Substitutor,
  TimetableEvent,
} from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { EventParseError } from './errors.js';
import { parseEventRecord } from './event-parser.js';
import { readIcsCalendar } from './ics-calendar-reader.js';
import { NullExcluder } from './excluder.js';
import { applySubstitutions, NullSubstitutor } from './substitutor.js';
import { TimetableAssembler } from './timetable-assembler.js';

export interface PipelineOptions {
  substitutor?: Substitutor;
  excluder?: Excluder;
  /**
   * Skip records that raise an EventParseError (missing field, malformed
   * summary, invalid timestamp) instead of aborting. Off by default.
   */
  lenient?: boolean;
}

export interface SourceOutcome {
  events: TimetableEvent[];
  parsed: number;
  excluded: number;
  skipped: SkippedRecord[];
}

export class TimetablePipeline {
  private substitutor: Substitutor;
  private excluder: Excluder;
  private lenient: boolean;

  constructor(
    private logger: Logger,
    options: PipelineOptions = {}
  ) {
    this.substitutor = options.substitutor ?? new NullSubstitutor();
    this.excluder = options.excluder ?? new NullExcluder();
    this.lenient = options.lenient ?? false;
  }

  /**
   * Build the timetable for every calendar source.
   * Sources are handled independently; the assembler's sort merges them.
   */
  build(triposName: string, sources: readonly CalendarSource[]): PipelineResult {
    this.logger.info('TimetablePipeline', 'run_started', {
      tripos: triposName,
      sources: sources.length,
      lenient: this.lenient,
    });

    const outcomes = sources.map((source) =>
      this.processRecords(readIcsCalendar(source.content, source.name), source.name)
    );

    const events = outcomes.flatMap((outcome) => outcome.events);
    const result: PipelineResult = {
      timetable: new TimetableAssembler(triposName).assemble(events),
      eventsParsed: sum(outcomes.map((outcome) => outcome.parsed)),
      eventsExcluded: sum(outcomes.map((outcome) => outcome.excluded)),
      skipped: outcomes.flatMap((outcome) => outcome.skipped),
    };

    this.logger.info('TimetablePipeline', 'run_completed', {
      modules: result.timetable.modules.length,
      eventsParsed: result.eventsParsed,
      eventsExcluded: result.eventsExcluded,
      skipped: result.skipped.length,
    });

    return result;
  }

  /**
   * Turn one source's raw records into resolved, surviving events
   */
  processRecords(records: readonly RawCalendarRecord[], sourceName: string = 'records'): SourceOutcome {
    const outcome: SourceOutcome = { events: [], parsed: 0, excluded: 0, skipped: [] };

    for (const record of records) {
      const event = this.parseRecord(record, sourceName, outcome.skipped);
      if (!event) continue;
      outcome.parsed++;

      const resolved = applySubstitutions(event, this.substitutor);
      if (this.excluder.isExcluded(resolved)) {
        outcome.excluded++;
        this.logger.debug('TimetablePipeline', 'event_excluded', {
          source: sourceName,
          uid: resolved.uid,
          part: resolved.part,
          paper: resolved.paper,
          eventType: resolved.eventType,
        });
        continue;
      }

      outcome.events.push(resolved);
    }

    this.logger.debug('TimetablePipeline', 'source_processed', {
      source: sourceName,
      records: records.length,
      kept: outcome.events.length,
      excluded: outcome.excluded,
      skipped: outcome.skipped.length,
    });

    return outcome;
  }

  private parseRecord(
    record: RawCalendarRecord,
    sourceName: string,
    skipped: SkippedRecord[]
  ): TimetableEvent | null {
    try {
      return parseEventRecord(record);
    } catch (error) {
      if (!this.lenient || !(error instanceof EventParseError)) {
        throw error;
      }

      this.logger.warn('TimetablePipeline', 'record_skipped', {
        source: sourceName,
        uid: error.uid,
        kind: error.kind,
        reason: error.message,
      });
      skipped.push({ source: sourceName, uid: error.uid, reason: error.message });
      return null;
    }
  }
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
