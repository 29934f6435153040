import { FeatureName, FeatureValue, FeatureVector, GroupBy, PitchEvent, isFeatureName } from '../models/Pitch';
import { EmptyInputError, InvalidQueryError } from '../models/Errors';

export interface AggregateOptions {
  /**
   * Return an empty map for an empty event list instead of throwing.
   * Use when the caller already treats "no pitches" as a normal outcome.
   */
  allowEmpty?: boolean;
}

interface FeatureAccumulator {
  sum: number;
  count: number;
}

interface GroupAccumulator {
  pitcherId: number;
  pitchType: string | null;
  pitchCount: number;
  totals: Map<FeatureName, FeatureAccumulator>;
}

/**
 * Validates a caller-supplied feature list: non-empty, known names, no
 * repeats. Order is preserved.
 */
export function validateFeatures(features: readonly string[]): FeatureName[] {
  if (features.length === 0) {
    throw new InvalidQueryError('At least one feature is required');
  }
  const seen = new Set<FeatureName>();
  for (const feature of features) {
    if (!isFeatureName(feature)) {
      throw new InvalidQueryError(`Unknown feature "${feature}"`);
    }
    if (seen.has(feature)) {
      throw new InvalidQueryError(`Feature "${feature}" listed more than once`);
    }
    seen.add(feature);
  }
  return [...seen];
}

export function groupKey(pitcherId: number, pitchType: string | null): string {
  return pitchType === null ? String(pitcherId) : `${pitcherId}:${pitchType}`;
}

export class FeatureAggregationService {
  /**
   * Mean of each requested feature per group. A missing (null) measurement
   * only drops that event from that feature's mean; a feature no event in
   * the group carries is flagged absent.
   *
   * Keys are `"<pitcherId>"` or `"<pitcherId>:<pitchType>"`, in order of
   * first appearance.
   *
   * @throws EmptyInputError when `events` is empty, unless `allowEmpty` is set
   */
  aggregate(
    events: readonly PitchEvent[],
    groupBy: GroupBy,
    features: readonly FeatureName[],
    options: AggregateOptions = {}
  ): Map<string, FeatureVector> {
    const requested = validateFeatures(features);

    if (events.length === 0) {
      if (options.allowEmpty) return new Map();
      throw new EmptyInputError();
    }

    const groups = new Map<string, GroupAccumulator>();

    for (const event of events) {
      const pitchType = groupBy === 'pitcherAndPitchType' ? event.pitchType : null;
      const key = groupKey(event.pitcherId, pitchType);

      let group = groups.get(key);
      if (!group) {
        group = { pitcherId: event.pitcherId, pitchType, pitchCount: 0, totals: new Map() };
        groups.set(key, group);
      }
      group.pitchCount++;

      for (const feature of requested) {
        const value = event[feature];
        if (value === null || !Number.isFinite(value)) continue;
        const acc = group.totals.get(feature);
        if (acc) {
          acc.sum += value;
          acc.count++;
        } else {
          group.totals.set(feature, { sum: value, count: 1 });
        }
      }
    }

    const result = new Map<string, FeatureVector>();
    for (const [key, group] of groups) {
      result.set(key, this.toVector(group, requested));
    }
    return result;
  }

  /**
   * Pitcher-level aggregation keyed by pitcher id, the shape the ranker takes.
   */
  aggregateByPitcher(
    events: readonly PitchEvent[],
    features: readonly FeatureName[],
    options: AggregateOptions = {}
  ): Map<number, FeatureVector> {
    const table = new Map<number, FeatureVector>();
    for (const vector of this.aggregate(events, 'pitcher', features, options).values()) {
      table.set(vector.pitcherId, vector);
    }
    return table;
  }

  private toVector(group: GroupAccumulator, features: readonly FeatureName[]): FeatureVector {
    const values: Partial<Record<FeatureName, FeatureValue>> = {};
    for (const feature of features) {
      const acc = group.totals.get(feature);
      values[feature] = acc
        ? { present: true, mean: acc.sum / acc.count, sampleSize: acc.count }
        : { present: false };
    }
    return {
      pitcherId: group.pitcherId,
      pitchType: group.pitchType,
      pitchCount: group.pitchCount,
      features: values,
    };
  }
}

export const featureAggregationService = new FeatureAggregationService();
