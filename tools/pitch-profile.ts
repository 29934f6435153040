#!/usr/bin/env npx tsx
/**
 * Average velocity, spin, release point, extension, break and location for
 * each pitch type one pitcher threw in a date range.
 *
 * USAGE:
 *   npx tsx tools/pitch-profile.ts --pitcher=<mlbam_id> [--start=YYYY-MM-DD] [--end=YYYY-MM-DD] [--file=<csv>]
 */

import { FEATURE_LABELS, PROFILE_FEATURES, getFeatureMean, getPitchTypeLabel } from '../src/models/Pitch';
import { getString, parseArgs, requireInt } from '../src/utils/cliArgs';
import { DEFAULT_END_DATE, DEFAULT_START_DATE, buildService, fmt, run } from './lib/cli';

run(async () => {
  const args = parseArgs(process.argv.slice(2));
  const service = buildService(args);
  const pitcherId = requireInt(args, 'pitcher');
  const startDate = getString(args, 'start') ?? DEFAULT_START_DATE;
  const endDate = getString(args, 'end') ?? DEFAULT_END_DATE;

  const profile = await service.getPitchProfile(startDate, endDate, pitcherId);
  if (profile.length === 0) {
    console.log(`No pitches found for ${pitcherId} between ${startDate} and ${endDate}.`);
    return;
  }

  console.log('');
  console.log(`Arsenal for ${pitcherId}, ${startDate} → ${endDate}`);
  console.log('');
  console.log(['Pitch'.padEnd(18), 'N'.padStart(5), ...PROFILE_FEATURES.map(f => FEATURE_LABELS[f].padStart(8))].join(' '));

  for (const vector of profile) {
    const code = vector.pitchType ?? '';
    const cells = PROFILE_FEATURES.map(f => fmt(getFeatureMean(vector, f), f === 'releaseSpinRate' ? 0 : 2).padStart(8));
    console.log([`${getPitchTypeLabel(code)} (${code})`.padEnd(18), String(vector.pitchCount).padStart(5), ...cells].join(' '));
  }
});
