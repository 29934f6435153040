#!/usr/bin/env npx tsx
/**
 * Find pitchers whose average pitch of one type most resembles a target's.
 *
 * USAGE:
 *   npx tsx tools/find-similar-pitchers.ts --pitcher=<mlbam_id> --pitch=<code> [options]
 *
 * OPTIONS:
 *   --start=<YYYY-MM-DD>     Range start (default: 2024-04-01)
 *   --end=<YYYY-MM-DD>       Range end (default: 2024-07-07)
 *   --top=<n>                Matches to return (default: 5)
 *   --features=<a,b,...>     Distance axes (default: releaseSpeed,releaseSpinRate,
 *                            releasePosX,releasePosZ,pfxX,pfxZ)
 *   --normalize=zscore       Scale each axis to unit variance before comparing
 *   --file=<csv>             Read pitches from a Statcast CSV export
 *   --register=<csv>         Resolve names from a Chadwick register people.csv
 *
 * EXAMPLES:
 *   npx tsx tools/find-similar-pitchers.ts --pitcher=543037 --pitch=FF
 *   npx tsx tools/find-similar-pitchers.ts --pitcher=543037 --pitch=SL --top=10 --normalize=zscore
 */

import { FEATURE_LABELS, getPitchTypeLabel } from '../src/models/Pitch';
import { DEFAULT_TOP_N } from '../src/services/PitchSimilarityService';
import { Normalization } from '../src/services/SimilarityRankingService';
import { getInt, getList, getString, parseArgs, requireInt, requireString } from '../src/utils/cliArgs';
import { InvalidQueryError } from '../src/models/Errors';
import { DEFAULT_END_DATE, DEFAULT_START_DATE, buildService, run } from './lib/cli';

function readNormalization(raw: string | undefined): Normalization {
  if (raw === undefined || raw === 'none') return 'none';
  if (raw === 'zscore') return 'zscore';
  throw new InvalidQueryError(`--normalize must be "none" or "zscore", got "${raw}"`);
}

run(async () => {
  const args = parseArgs(process.argv.slice(2));
  const service = buildService(args);

  const result = await service.findSimilar({
    startDate: getString(args, 'start') ?? DEFAULT_START_DATE,
    endDate: getString(args, 'end') ?? DEFAULT_END_DATE,
    pitcherId: requireInt(args, 'pitcher'),
    pitchType: requireString(args, 'pitch'),
    topN: getInt(args, 'top', DEFAULT_TOP_N),
    features: getList(args, 'features'),
    normalization: readNormalization(getString(args, 'normalize')),
  });

  const { query } = result;
  const label = getPitchTypeLabel(query.pitchType);

  if (result.status === 'empty') {
    console.log(
      result.reason === 'no-events-for-pitch-type'
        ? `No pitchers threw ${label} (${query.pitchType}) between ${query.startDate} and ${query.endDate}.`
        : `No pitch data returned for ${query.pitchType} between ${query.startDate} and ${query.endDate}.`
    );
    return;
  }

  console.log('');
  console.log(`Pitchers most similar to ${query.pitcherId} - ${label} (${query.pitchType}), ${query.startDate} → ${query.endDate}`);
  console.log(`Axes: ${query.features.map(f => FEATURE_LABELS[f]).join(', ')}${query.normalization === 'zscore' ? ' (z-scored)' : ''}`);
  console.log(`Compared against ${result.pitchersWithPitchType - 1} pitcher(s)`);
  console.log('');
  console.log(`${'#'.padStart(3)}  ${'ID'.padEnd(8)}  ${'Name'.padEnd(24)}  ${'Pitches'.padStart(7)}  ${'Distance'.padStart(9)}`);
  for (const match of result.matches) {
    console.log(
      `${String(match.rank + 1).padStart(3)}  ${String(match.pitcherId).padEnd(8)}  ${(match.name ?? '(unknown)').padEnd(24)}  ` +
        `${String(match.pitchCount).padStart(7)}  ${match.distance.toFixed(3).padStart(9)}`
    );
  }
});
