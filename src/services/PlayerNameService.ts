import { z } from 'zod';
import { config } from '../config';
import type { NameResolver } from '../models/Sources';
import { fetchJson } from './ApiClient';

const BATCH_SIZE = 100;

const peopleResponseSchema = z.object({
  people: z
    .array(
      z.object({
        id: z.number().int(),
        fullName: z.string().optional(),
        firstName: z.string().optional(),
        lastName: z.string().optional(),
      })
    )
    .default([]),
});

type Person = z.infer<typeof peopleResponseSchema>['people'][number];

function displayName(person: Person): string | null {
  if (person.fullName) return person.fullName;
  const parts = [person.firstName, person.lastName].filter((p): p is string => Boolean(p));
  return parts.length > 0 ? parts.join(' ') : null;
}

/**
 * Looks up player names through the MLB Stats API `/people` endpoint.
 */
export class PlayerNameService implements NameResolver {
  private readonly baseUrl: string;

  constructor(baseUrl: string = config.mlbStatsApiBaseUrl) {
    this.baseUrl = baseUrl;
  }

  async resolveNames(pitcherIds: readonly number[]): Promise<Map<number, string>> {
    const names = new Map<number, string>();
    const unique = [...new Set(pitcherIds)];

    for (let i = 0; i < unique.length; i += BATCH_SIZE) {
      const batch = unique.slice(i, i + BATCH_SIZE);
      const url = `${this.baseUrl}/people?personIds=${batch.join(',')}`;
      const parsed = peopleResponseSchema.safeParse(await fetchJson(url));
      if (!parsed.success) {
        throw new Error(`Unexpected response from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
      }
      for (const person of parsed.data.people) {
        const name = displayName(person);
        if (name) names.set(person.id, name);
      }
    }

    return names;
  }
}

export const playerNameService = new PlayerNameService();
