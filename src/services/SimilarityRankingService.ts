import { FeatureName, FeatureVector, RankedMatch, getFeatureMean } from '../models/Pitch';
import {
  IncompleteTargetError,
  InvalidQueryError,
  NoCandidatesError,
  TargetNotFoundError,
} from '../models/Errors';
import { validateFeatures } from './FeatureAggregationService';

/**
 * `none` compares raw physical units, so spin rate (hundreds of rpm apart)
 * outweighs release position (fractions of a foot). `zscore` rescales every
 * axis to unit variance over the compared population.
 */
export type Normalization = 'none' | 'zscore';

export interface RankOptions {
  normalization?: Normalization;
}

interface Candidate {
  pitcherId: number;
  pitchCount: number;
  coords: number[];
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let sumSquares = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sumSquares += diff * diff;
  }
  return Math.sqrt(sumSquares);
}

/**
 * Coordinates of a vector along `features`, or null if any is absent.
 */
function extractCoords(vector: FeatureVector, features: readonly FeatureName[]): number[] | null {
  const coords: number[] = [];
  for (const feature of features) {
    const mean = getFeatureMean(vector, feature);
    if (mean === null) return null;
    coords.push(mean);
  }
  return coords;
}

function zscoreScalers(points: readonly number[][], dims: number): { mean: number; std: number }[] {
  const scalers: { mean: number; std: number }[] = [];
  for (let d = 0; d < dims; d++) {
    let sum = 0;
    for (const p of points) sum += p[d];
    const mean = sum / points.length;
    let variance = 0;
    for (const p of points) variance += (p[d] - mean) ** 2;
    scalers.push({ mean, std: Math.sqrt(variance / points.length) });
  }
  return scalers;
}

function applyScalers(coords: readonly number[], scalers: readonly { mean: number; std: number }[]): number[] {
  // A zero-deviation axis has the same value everywhere; it contributes 0.
  return coords.map((value, d) => (scalers[d].std === 0 ? 0 : (value - scalers[d].mean) / scalers[d].std));
}

export class SimilarityRankingService {
  /**
   * Rank every other pitcher by Euclidean distance to the target over
   * `features`, nearest first. Ties go to the lower pitcher id. Pitchers
   * missing any of the features are left out rather than scored.
   */
  rank(
    table: ReadonlyMap<number, FeatureVector>,
    targetId: number,
    features: readonly FeatureName[],
    topN: number,
    options: RankOptions = {}
  ): RankedMatch[] {
    const axes = validateFeatures(features);
    if (!Number.isInteger(topN) || topN < 1) {
      throw new InvalidQueryError(`topN must be a positive integer, got ${topN}`);
    }

    const target = table.get(targetId);
    if (!target) {
      throw new TargetNotFoundError(targetId);
    }

    const targetCoords = extractCoords(target, axes);
    if (!targetCoords) {
      const missing = axes.filter(f => getFeatureMean(target, f) === null);
      throw new IncompleteTargetError(targetId, missing);
    }

    const candidates: Candidate[] = [];
    let excluded = 0;
    for (const [pitcherId, vector] of table) {
      if (pitcherId === targetId) continue;
      const coords = extractCoords(vector, axes);
      if (!coords) {
        excluded++;
        continue;
      }
      candidates.push({ pitcherId, pitchCount: vector.pitchCount, coords });
    }

    if (candidates.length === 0) {
      throw new NoCandidatesError(targetId, excluded);
    }

    let origin = targetCoords;
    let points = candidates.map(c => c.coords);
    if ((options.normalization ?? 'none') === 'zscore') {
      const scalers = zscoreScalers([targetCoords, ...points], axes.length);
      origin = applyScalers(targetCoords, scalers);
      points = points.map(p => applyScalers(p, scalers));
    }

    const scored = candidates.map((candidate, i) => ({
      pitcherId: candidate.pitcherId,
      pitchCount: candidate.pitchCount,
      distance: euclideanDistance(origin, points[i]),
    }));

    scored.sort((a, b) => a.distance - b.distance || a.pitcherId - b.pitcherId);

    return scored.slice(0, topN).map((entry, rank) => ({
      rank,
      pitcherId: entry.pitcherId,
      name: null,
      distance: entry.distance,
      pitchCount: entry.pitchCount,
    }));
  }
}

export const similarityRankingService = new SimilarityRankingService();
