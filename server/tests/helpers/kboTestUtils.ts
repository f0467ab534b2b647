/**
 * Shared helpers for the ingest tests:
 * - Load KBO HTML fixtures from disk instead of a live browser
 * - A scripted navigator and profile manager standing in for Chromium
 * - Row builders for dataset fixtures
 */

import { readFileSync } from 'node:fs';
import type { GameRecord } from '@shared/schema';
import type { FetchDocumentOptions, IDocumentNavigator, ProfileManager } from '@server/utils/scraping/navigator';

export function loadKboFixture(name: string): string {
  return readFileSync(new URL(`../fixtures/kbo/${name}`, import.meta.url), 'utf8');
}

type ScriptedPage = string | Error | Array<string | Error>;

/**
 * Navigator that serves pages from a URL map. A list of responses is
 * consumed one per request, the last one repeating.
 */
export class FakeNavigator implements IDocumentNavigator {
  readonly requests: Array<{ url: string; options: FetchDocumentOptions }> = [];
  closed = 0;
  private served = new Map<string, number>();

  constructor(private readonly pages: Record<string, ScriptedPage> = {}) {}

  async fetchDocument(url: string, options: FetchDocumentOptions): Promise<string> {
    this.requests.push({ url, options });
    const page = this.pages[url];
    if (page === undefined) {
      throw new Error(`no scripted page for ${url}`);
    }
    const sequence = Array.isArray(page) ? page : [page];
    const index = this.served.get(url) ?? 0;
    this.served.set(url, index + 1);
    const next = sequence[Math.min(index, sequence.length - 1)];
    if (next instanceof Error) throw next;
    return next;
  }

  async close(): Promise<void> {
    this.closed++;
  }

  urls(): string[] {
    return this.requests.map((r) => r.url);
  }
}

/**
 * Profile manager that only records what it was asked to do
 */
export class FakeProfiles implements ProfileManager {
  readonly created: string[] = [];
  readonly removed: string[] = [];

  async create(): Promise<string> {
    const dir = `/tmp/test-profile-${this.created.length + 1}`;
    this.created.push(dir);
    return dir;
  }

  async remove(profileDir: string): Promise<void> {
    this.removed.push(profileDir);
  }
}

export function makeRecord(overrides: Partial<GameRecord> = {}): GameRecord {
  return {
    date: '2025-03-22',
    venue: 'Jamsil',
    away_team: 'LT',
    home_team: 'LG',
    away_score: 2,
    home_score: 12,
    away_result: 'loss',
    home_result: 'win',
    away_hit: 7,
    home_hit: 10,
    away_hr: 2,
    home_hr: 1,
    away_ab: 30,
    home_ab: 33,
    away_avg: 0.2333,
    home_avg: 0.303,
    ...overrides,
  };
}

export function pendingRecord(overrides: Partial<GameRecord> = {}): GameRecord {
  return makeRecord({
    away_score: 0,
    home_score: 0,
    away_result: 'pending',
    home_result: 'pending',
    away_hit: 0,
    home_hit: 0,
    away_hr: 0,
    home_hr: 0,
    away_ab: 0,
    home_ab: 0,
    away_avg: 0,
    home_avg: 0,
    ...overrides,
  });
}
