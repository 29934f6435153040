import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import type { NameResolver } from '../models/Sources';

/**
 * Resolves names from a local copy of the Chadwick Bureau person register
 * (`people.csv`, or any CSV with key_mlbam, name_first and name_last columns).
 * The file is read on every call.
 */
export class ChadwickRegisterService implements NameResolver {
  constructor(private readonly registerPath: string) {}

  async resolveNames(pitcherIds: readonly number[]): Promise<Map<number, string>> {
    const wanted = new Set(pitcherIds);
    const names = new Map<number, string>();
    if (wanted.size === 0) return names;

    const csvContent = await fs.promises.readFile(this.registerPath, 'utf-8');
    const records: Record<string, string>[] = parse(csvContent, {
      columns: true,
      skip_empty_lines: true,
      bom: true,
      relax_column_count: true,
    });

    for (const row of records) {
      const id = parseInt(row['key_mlbam'] ?? '', 10);
      if (!wanted.has(id)) continue;
      const name = [row['name_first'], row['name_last']]
        .map(part => part?.trim())
        .filter(Boolean)
        .join(' ');
      if (name) names.set(id, name);
    }

    return names;
  }
}
