import { config } from '../../src/config';
import { isPitchSimilarityError } from '../../src/models/Errors';
import type { NameResolver, PitchEventSource } from '../../src/models/Sources';
import { ChadwickRegisterService } from '../../src/services/ChadwickRegisterService';
import { PitchSimilarityService } from '../../src/services/PitchSimilarityService';
import { playerNameService } from '../../src/services/PlayerNameService';
import { StatcastFileService } from '../../src/services/StatcastFileService';
import { statcastService } from '../../src/services/StatcastService';
import { ParsedArgs, getString } from '../../src/utils/cliArgs';

export const DEFAULT_START_DATE = '2024-04-01';
export const DEFAULT_END_DATE = '2024-07-07';

/**
 * --file=<statcast.csv> reads pitches from disk instead of Savant.
 * --register=<people.csv> (or CHADWICK_REGISTER_PATH) resolves names locally
 * instead of through the MLB Stats API.
 */
export function buildService(args: ParsedArgs): PitchSimilarityService {
  const file = getString(args, 'file');
  const register = getString(args, 'register') ?? config.chadwickRegisterPath ?? undefined;

  const source: PitchEventSource = file ? new StatcastFileService(file) : statcastService;
  const resolver: NameResolver = register ? new ChadwickRegisterService(register) : playerNameService;
  return new PitchSimilarityService(source, resolver);
}

export function run(main: () => Promise<void>): void {
  main().catch((error: unknown) => {
    if (isPitchSimilarityError(error)) {
      console.error(`❌ [${error.code}] ${error.message}`);
    } else {
      console.error('❌ Unexpected error:', error);
    }
    process.exit(1);
  });
}

export function fmt(value: number | null, digits: number): string {
  return value === null ? '-' : value.toFixed(digits);
}
