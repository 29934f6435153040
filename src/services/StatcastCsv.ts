import Papa from 'papaparse';
import { FEATURE_COLUMNS, FeatureName, PitchEvent } from '../models/Pitch';

/** Savant returns at most this many rows per search */
export const SAVANT_ROW_LIMIT = 25_000;

const REQUIRED_COLUMNS = ['pitcher', 'pitch_type'] as const;

export interface StatcastParseResult {
  events: PitchEvent[];
  /** Data rows seen, including skipped ones */
  rowCount: number;
  /** Rows without a pitch type or a usable pitcher id */
  skippedRows: number;
}

function toNumberOrNull(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const s = raw.trim();
  if (s === '' || s.toLowerCase() === 'null' || s.toLowerCase() === 'nan') return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

function toEvent(row: Record<string, string | undefined>): PitchEvent | null {
  const pitchType = row['pitch_type']?.trim() ?? '';
  const pitcherId = toNumberOrNull(row['pitcher']);
  if (!pitchType || pitcherId === null || !Number.isInteger(pitcherId)) {
    return null;
  }

  const measure = (feature: FeatureName): number | null => toNumberOrNull(row[FEATURE_COLUMNS[feature]]);
  const gameDate = row['game_date']?.trim();

  return {
    pitcherId,
    pitchType,
    ...(gameDate ? { gameDate } : {}),
    releaseSpeed: measure('releaseSpeed'),
    releaseSpinRate: measure('releaseSpinRate'),
    releasePosX: measure('releasePosX'),
    releasePosZ: measure('releasePosZ'),
    releaseExtension: measure('releaseExtension'),
    pfxX: measure('pfxX'),
    pfxZ: measure('pfxZ'),
    plateX: measure('plateX'),
    plateZ: measure('plateZ'),
  };
}

/**
 * Parse a Statcast "details" CSV export (one row per pitch).
 *
 * @throws Error when the pitcher or pitch_type column is missing
 */
export function parseStatcastCsv(csv: string): StatcastParseResult {
  const text = csv.startsWith('\uFEFF') ? csv.slice(1) : csv;
  if (!text.trim()) {
    return { events: [], rowCount: 0, skippedRows: 0 };
  }

  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const fields = parsed.meta.fields ?? [];
  const missing = REQUIRED_COLUMNS.filter(column => !fields.includes(column));
  if (missing.length > 0) {
    throw new Error(`Statcast CSV is missing required column(s): ${missing.join(', ')}`);
  }

  const events: PitchEvent[] = [];
  let skippedRows = 0;
  for (const row of parsed.data) {
    const event = toEvent(row);
    if (event) {
      events.push(event);
    } else {
      skippedRows++;
    }
  }

  return { events, rowCount: parsed.data.length, skippedRows };
}
