import * as fs from 'fs';
import type { PitchEvent } from '../models/Pitch';
import type { PitchEventSource } from '../models/Sources';
import { DateRange, validateDateRange } from '../utils/dateRange';
import { parseStatcastCsv } from './StatcastCsv';

/**
 * Reads a Statcast CSV export saved to disk. Events are kept when their
 * game_date falls in the range; rows without a game_date are kept as is.
 * Hints are ignored: callers filter.
 */
export class StatcastFileService implements PitchEventSource {
  constructor(private readonly filePath: string) {}

  async fetchEvents(range: DateRange): Promise<PitchEvent[]> {
    validateDateRange(range);
    const csv = await fs.promises.readFile(this.filePath, 'utf-8');
    const { events, skippedRows } = parseStatcastCsv(csv);

    if (skippedRows > 0) {
      console.warn(`⚠️  Skipped ${skippedRows} row(s) without a pitch type or pitcher id in ${this.filePath}`);
    }

    // ISO dates compare correctly as strings
    return events.filter(
      event => event.gameDate === undefined || (event.gameDate >= range.startDate && event.gameDate <= range.endDate)
    );
  }
}
