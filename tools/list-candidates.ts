#!/usr/bin/env npx tsx
/**
 * List the MLBAM ids of every pitcher who threw a pitch type in a date range.
 *
 * USAGE:
 *   npx tsx tools/list-candidates.ts --pitch=<code> [--start=YYYY-MM-DD] [--end=YYYY-MM-DD] [--file=<csv>]
 */

import { getPitchTypeLabel } from '../src/models/Pitch';
import { getString, parseArgs, requireString } from '../src/utils/cliArgs';
import { DEFAULT_END_DATE, DEFAULT_START_DATE, buildService, run } from './lib/cli';

run(async () => {
  const args = parseArgs(process.argv.slice(2));
  const service = buildService(args);
  const pitchType = requireString(args, 'pitch');
  const startDate = getString(args, 'start') ?? DEFAULT_START_DATE;
  const endDate = getString(args, 'end') ?? DEFAULT_END_DATE;

  const candidates = await service.getCandidates(startDate, endDate, pitchType);
  if (candidates.length === 0) {
    console.log(`No pitchers threw ${getPitchTypeLabel(pitchType.toUpperCase())} between ${startDate} and ${endDate}.`);
    return;
  }

  console.log(`Found ${candidates.length} pitchers who threw ${pitchType.toUpperCase()}`);
  console.log(candidates.join('\n'));
});
