/**
 * External ID Utility
 * Derives stable series identifiers from their place in the timetable
 */

import { createHash } from 'crypto';

// Fixed bytes mixed into every hash; changing them changes every id already imported
const EXTERNAL_ID_SEED = Buffer.from('07b8b7bcf1f1fc063bc21b433c2c144c', 'hex');

export class ExternalIdGenerator {
  /**
   * Generate the id for a series
   * Based on: tripos + part + paper + series name
   *
   * No security implications, so MD5 is fine here.
   */
  static forSeries(tripos: string, part: string, paper: string, series: string): string {
    return createHash('md5')
      .update(EXTERNAL_ID_SEED)
      .update(tripos + part + paper + series, 'utf8')
      .digest('hex');
  }
}
