import { z } from 'zod';
import {
  FeatureName,
  FeatureVector,
  PROFILE_FEATURES,
  PitchEvent,
  RankedMatch,
  SIMILARITY_FEATURES,
} from '../models/Pitch';
import { InvalidQueryError, UpstreamContext, UpstreamError } from '../models/Errors';
import type { EventFetchHints, NameResolver, PitchEventSource } from '../models/Sources';
import { DateRange, validateDateRange } from '../utils/dateRange';
import { FeatureAggregationService, featureAggregationService, validateFeatures } from './FeatureAggregationService';
import { Normalization, SimilarityRankingService, similarityRankingService } from './SimilarityRankingService';
import { statcastService } from './StatcastService';
import { playerNameService } from './PlayerNameService';

export const DEFAULT_TOP_N = 5;

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const pitcherId = z.number().int().positive();
const pitchType = z.string().trim().min(1).max(3).transform(s => s.toUpperCase());

const similarityQuerySchema = z.object({
  startDate: isoDate,
  endDate: isoDate,
  pitcherId,
  pitchType,
  topN: z.number().int().positive().default(DEFAULT_TOP_N),
  features: z.array(z.string()).optional(),
  normalization: z.enum(['none', 'zscore']).default('none'),
});

export type SimilarityQueryInput = z.input<typeof similarityQuerySchema>;

export interface SimilarityQuery extends DateRange {
  pitcherId: number;
  pitchType: string;
  topN: number;
  features: FeatureName[];
  normalization: Normalization;
}

/**
 * `no-events-returned`: the source had nothing for the range (it may already
 * have narrowed to the pitch type). `no-events-for-pitch-type`: it returned
 * pitches, none of the requested type.
 */
export type EmptyReason = 'no-events-returned' | 'no-events-for-pitch-type';

export type SimilarityResult =
  | {
      status: 'ranked';
      query: SimilarityQuery;
      matches: RankedMatch[];
      /** Pitchers with the pitch type in range, target included */
      pitchersWithPitchType: number;
    }
  | {
      status: 'empty';
      query: SimilarityQuery;
      reason: EmptyReason;
    };

function parseQuery<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
    throw new InvalidQueryError(`Invalid query (${where}${issue?.message ?? 'invalid input'})`);
  }
  return parsed.data;
}

const rangeQuerySchema = z.object({ startDate: isoDate, endDate: isoDate });

/**
 * Fetches pitches, averages them per pitcher and ranks pitchers by
 * similarity to a target for one pitch type.
 */
export class PitchSimilarityService {
  constructor(
    private readonly eventSource: PitchEventSource,
    private readonly nameResolver: NameResolver,
    private readonly aggregator: FeatureAggregationService = featureAggregationService,
    private readonly ranker: SimilarityRankingService = similarityRankingService
  ) {}

  async findSimilar(input: SimilarityQueryInput): Promise<SimilarityResult> {
    const parsed = parseQuery(similarityQuerySchema, input);
    const query: SimilarityQuery = { ...parsed, features: validateFeatures(parsed.features ?? SIMILARITY_FEATURES) };
    validateDateRange(query);

    const context: UpstreamContext = {
      startDate: query.startDate,
      endDate: query.endDate,
      pitcherId: query.pitcherId,
      pitchType: query.pitchType,
    };

    const events = await this.loadEvents(query, { pitchType: query.pitchType }, context);
    if (events.length === 0) {
      return { status: 'empty', query, reason: 'no-events-returned' };
    }

    const filtered = events.filter(event => event.pitchType === query.pitchType);
    if (filtered.length === 0) {
      return { status: 'empty', query, reason: 'no-events-for-pitch-type' };
    }

    const table = this.aggregator.aggregateByPitcher(filtered, query.features);
    const ranked = this.ranker.rank(table, query.pitcherId, query.features, query.topN, {
      normalization: query.normalization,
    });

    const names = await this.lookupNames(ranked.map(match => match.pitcherId), context);
    const matches: RankedMatch[] = ranked.map(match => ({ ...match, name: names.get(match.pitcherId) ?? null }));

    return { status: 'ranked', query, matches, pitchersWithPitchType: table.size };
  }

  /**
   * Ids of every pitcher who threw `pitchType` in the range, ascending.
   */
  async getCandidates(startDate: string, endDate: string, pitchTypeCode: string): Promise<number[]> {
    const range = validateDateRange(parseQuery(rangeQuerySchema, { startDate, endDate }));
    const code = parseQuery(pitchType, pitchTypeCode);
    const events = await this.loadEvents(range, { pitchType: code }, { ...range, pitchType: code });

    const ids = new Set<number>();
    for (const event of events) {
      if (event.pitchType === code) ids.add(event.pitcherId);
    }
    return [...ids].sort((a, b) => a - b);
  }

  /**
   * Per-pitch-type averages of every profile feature for one pitcher, most
   * thrown pitch first. Empty when the pitcher has no pitches in the range.
   */
  async getPitchProfile(startDate: string, endDate: string, id: number): Promise<FeatureVector[]> {
    const range = validateDateRange(parseQuery(rangeQuerySchema, { startDate, endDate }));
    const target = parseQuery(pitcherId, id);
    const events = await this.loadEvents(range, { pitcherId: target }, { ...range, pitcherId: target });

    const own = events.filter(event => event.pitcherId === target);
    const groups = this.aggregator.aggregate(own, 'pitcherAndPitchType', PROFILE_FEATURES, { allowEmpty: true });
    return [...groups.values()].sort(
      (a, b) => b.pitchCount - a.pitchCount || (a.pitchType ?? '').localeCompare(b.pitchType ?? '')
    );
  }

  private async loadEvents(range: DateRange, hints: EventFetchHints, context: UpstreamContext): Promise<PitchEvent[]> {
    try {
      return await this.eventSource.fetchEvents({ startDate: range.startDate, endDate: range.endDate }, hints);
    } catch (error) {
      throw new UpstreamError('fetch-events', context, error);
    }
  }

  private async lookupNames(ids: number[], context: UpstreamContext): Promise<Map<number, string>> {
    if (ids.length === 0) return new Map();
    try {
      return await this.nameResolver.resolveNames(ids);
    } catch (error) {
      throw new UpstreamError('resolve-names', context, error);
    }
  }
}

export const pitchSimilarityService = new PitchSimilarityService(statcastService, playerNameService);
