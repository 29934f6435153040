import type { PitchEvent } from './Pitch';
import type { DateRange } from '../utils/dateRange';

/**
 * Optional narrowing a source may apply to reduce the download. Callers
 * still filter the returned events themselves.
 */
export interface EventFetchHints {
  pitcherId?: number;
  pitchType?: string;
}

export interface PitchEventSource {
  fetchEvents(range: DateRange, hints?: EventFetchHints): Promise<PitchEvent[]>;
}

export interface NameResolver {
  /** Ids without a known name are simply absent from the returned map */
  resolveNames(pitcherIds: readonly number[]): Promise<Map<number, string>>;
}
