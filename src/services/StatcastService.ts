import { config } from '../config';
import type { PitchEvent } from '../models/Pitch';
import type { EventFetchHints, PitchEventSource } from '../models/Sources';
import { DateRange, splitDateRange } from '../utils/dateRange';
import { fetchText } from './ApiClient';
import { SAVANT_ROW_LIMIT, parseStatcastCsv } from './StatcastCsv';

// Regular season, postseason and spring training
const GAME_TYPES = 'R|PO|S|';

export interface StatcastServiceOptions {
  baseUrl?: string;
  chunkDays?: number;
}

/**
 * Pitch-by-pitch data from Baseball Savant's Statcast search CSV endpoint.
 * Long ranges are split into chunks fetched one at a time to stay under the
 * per-search row cap.
 */
export class StatcastService implements PitchEventSource {
  private readonly baseUrl: string;
  private readonly chunkDays: number;

  constructor(options: StatcastServiceOptions = {}) {
    this.baseUrl = options.baseUrl ?? config.statcastBaseUrl;
    this.chunkDays = options.chunkDays ?? config.statcastChunkDays;
  }

  async fetchEvents(range: DateRange, hints: EventFetchHints = {}): Promise<PitchEvent[]> {
    const chunks = splitDateRange(range, this.chunkDays);
    const events: PitchEvent[] = [];

    console.log(`📡 Fetching Statcast pitches ${range.startDate} → ${range.endDate} (${chunks.length} request${chunks.length === 1 ? '' : 's'})`);

    for (const chunk of chunks) {
      const csv = await fetchText(this.buildUrl(chunk, hints));
      const { events: chunkEvents, rowCount, skippedRows } = parseStatcastCsv(csv);

      if (rowCount >= SAVANT_ROW_LIMIT) {
        console.warn(`⚠️  ${chunk.startDate} → ${chunk.endDate} hit the ${SAVANT_ROW_LIMIT} row cap; results may be truncated. Lower STATCAST_CHUNK_DAYS.`);
      }
      if (skippedRows > 0) {
        console.warn(`⚠️  Skipped ${skippedRows} row(s) without a pitch type or pitcher id (${chunk.startDate} → ${chunk.endDate})`);
      }

      for (const event of chunkEvents) events.push(event);
    }

    console.log(`✅ Loaded ${events.length} pitches`);
    return events;
  }

  buildUrl(range: DateRange, hints: EventFetchHints = {}): string {
    const params = new URLSearchParams({
      all: 'true',
      type: 'details',
      player_type: 'pitcher',
      hfGT: GAME_TYPES,
      hfPT: hints.pitchType ? `${hints.pitchType}|` : '',
      game_date_gt: range.startDate,
      game_date_lt: range.endDate,
      min_pitches: '0',
      min_results: '0',
      group_by: 'name',
      sort_col: 'pitches',
      sort_order: 'desc',
      min_abs: '0',
    });
    if (hints.pitcherId !== undefined) {
      params.append('pitchers_lookup[]', String(hints.pitcherId));
    }
    return `${this.baseUrl}?${params.toString()}`;
  }
}

export const statcastService = new StatcastService();
