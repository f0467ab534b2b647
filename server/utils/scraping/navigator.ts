/**
 * Document Navigator
 *
 * Loads rendered pages one at a time through a headless Chromium session and
 * hands back their HTML once a readiness marker is present. Each fetch is
 * preceded by the politeness delay, bounded by a readiness timeout plus a short
 * settle delay, and retried a fixed number of times before it gives up with a
 * TransientNavigationError.
 *
 * Sessions run on a throw-away browser profile. Opening one retries with a
 * fresh profile on failure, and the profile directory is removed on every exit
 * path.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { chromium, type BrowserContext, type Page } from 'playwright-core';
import { withSource } from '../../logger';
import { metrics } from '../../metrics';
import { FatalSessionError, TransientNavigationError, toError } from '../../types/errors';
import { RateLimiter, sleep, type Sleep } from './rateLimiter';

const log = withSource('navigator');

export type DocumentKind = 'schedule' | 'review';

export interface FetchDocumentOptions {
  /** CSS selector that must be attached before the page counts as rendered */
  readySelector: string;
  kind: DocumentKind;
}

export interface IDocumentNavigator {
  fetchDocument(url: string, options: FetchDocumentOptions): Promise<string>;
  close(): Promise<void>;
}

export interface NavigatorOptions {
  readyTimeoutMs: number;
  settleMs: number;
  maxRetries: number;
  politenessDelayMs: number;
  /** Base pause between retries of one URL; grows linearly with the attempt */
  retryBackoffMs?: number;
}

/**
 * Retry, politeness and timing shared by every navigator; subclasses only load pages.
 */
export abstract class BaseNavigator implements IDocumentNavigator {
  private readonly rateLimiter: RateLimiter;

  constructor(
    protected readonly options: NavigatorOptions,
    private readonly wait: Sleep = sleep,
    now: () => number = Date.now
  ) {
    this.rateLimiter = new RateLimiter(options.politenessDelayMs, now, wait);
  }

  protected abstract loadDocument(url: string, readySelector: string): Promise<string>;

  abstract close(): Promise<void>;

  async fetchDocument(url: string, { readySelector, kind }: FetchDocumentOptions): Promise<string> {
    const host = new URL(url).hostname;
    const maxRetries = Math.max(1, this.options.maxRetries);
    const backoffMs = this.options.retryBackoffMs ?? 2_000;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        return await this.loadPolitely(host, url, readySelector, kind);
      } catch (err) {
        lastError = err;
        log.warn({ url, attempt, maxRetries, err: toError(err).message }, 'document not ready');
        if (attempt < maxRetries) {
          await this.wait(backoffMs * attempt);
        }
      }
    }

    throw new TransientNavigationError(url, maxRetries, lastError);
  }

  // The politeness gap runs from the end of one load to the start of the next
  private async loadPolitely(host: string, url: string, readySelector: string, kind: DocumentKind): Promise<string> {
    await this.rateLimiter.waitIfNeeded(host);
    const t0 = performance.now();
    try {
      const html = await this.loadDocument(url, readySelector);
      metrics.observeFetch(kind, performance.now() - t0);
      return html;
    } finally {
      this.rateLimiter.markDone(host);
    }
  }
}

export interface PlaywrightNavigatorOptions extends NavigatorOptions {
  pageTimeoutMs: number;
  userAgent: string;
  headless: boolean;
}

export class PlaywrightNavigator extends BaseNavigator {
  private constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly playwrightOptions: PlaywrightNavigatorOptions
  ) {
    super(playwrightOptions);
  }

  /**
   * Launch Chromium on the given profile directory
   */
  static async launch(profileDir: string, options: PlaywrightNavigatorOptions): Promise<PlaywrightNavigator> {
    const context = await chromium.launchPersistentContext(profileDir, {
      headless: options.headless,
      userAgent: options.userAgent,
      viewport: { width: 1920, height: 1080 },
      args: [
        '--no-sandbox',
        '--disable-dev-shm-usage',
        '--disable-gpu',
        '--disable-blink-features=AutomationControlled',
      ],
    });
    try {
      const page = context.pages()[0] ?? (await context.newPage());
      page.setDefaultNavigationTimeout(options.pageTimeoutMs);
      return new PlaywrightNavigator(context, page, options);
    } catch (err) {
      await context.close();
      throw err;
    }
  }

  protected async loadDocument(url: string, readySelector: string): Promise<string> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.playwrightOptions.pageTimeoutMs });
    await this.page.waitForSelector(readySelector, {
      state: 'attached',
      timeout: this.playwrightOptions.readyTimeoutMs,
    });
    if (this.playwrightOptions.settleMs > 0) {
      await this.page.waitForTimeout(this.playwrightOptions.settleMs);
    }
    return await this.page.content();
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

export type NavigatorLauncher = (profileDir: string) => Promise<IDocumentNavigator>;

export function createPlaywrightLauncher(options: PlaywrightNavigatorOptions): NavigatorLauncher {
  return (profileDir) => PlaywrightNavigator.launch(profileDir, options);
}

export interface ProfileManager {
  create(): Promise<string>;
  remove(profileDir: string): Promise<void>;
}

export const tempProfiles: ProfileManager = {
  create: () => mkdtemp(path.join(os.tmpdir(), 'kbo-profile-')),
  remove: (profileDir) => rm(profileDir, { recursive: true, force: true }),
};

export interface SessionOptions {
  maxAttempts: number;
  profiles?: ProfileManager;
}

interface OpenSession {
  navigator: IDocumentNavigator;
  profileDir: string;
}

async function discardProfile(profiles: ProfileManager, profileDir: string): Promise<void> {
  try {
    await profiles.remove(profileDir);
  } catch (err) {
    log.error({ profileDir, err: toError(err).message }, 'failed to remove browser profile');
  }
}

/**
 * Start a session, retrying with a fresh profile each time.
 * @throws FatalSessionError once every attempt has failed
 */
export async function openNavigatorSession(
  launch: NavigatorLauncher,
  { maxAttempts, profiles = tempProfiles }: SessionOptions
): Promise<OpenSession> {
  const attempts = Math.max(1, maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    let profileDir: string | undefined;
    try {
      profileDir = await profiles.create();
      const navigator = await launch(profileDir);
      log.info({ attempt, profileDir }, 'navigator session started');
      return { navigator, profileDir };
    } catch (err) {
      lastError = err;
      metrics.sessionStartFailuresTotal.inc();
      log.warn({ attempt, attempts, err: toError(err).message }, 'navigator session failed to start');
      if (profileDir) {
        await discardProfile(profiles, profileDir);
      }
    }
  }

  throw new FatalSessionError(attempts, lastError);
}

/**
 * A session that is only launched when a page is first needed.
 */
export class LazyNavigatorSession {
  private session: OpenSession | null = null;

  constructor(
    private readonly launch: NavigatorLauncher,
    private readonly options: SessionOptions
  ) {}

  async navigator(): Promise<IDocumentNavigator> {
    if (!this.session) {
      this.session = await openNavigatorSession(this.launch, this.options);
    }
    return this.session.navigator;
  }

  async release(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.session = null;
    try {
      await session.navigator.close();
    } catch (err) {
      log.error({ err: toError(err).message }, 'failed to close navigator session');
    } finally {
      await discardProfile(this.options.profiles ?? tempProfiles, session.profileDir);
    }
    log.info({ profileDir: session.profileDir }, 'navigator session released');
  }
}

/**
 * Run `fn` with a lazily opened session that is always released afterwards,
 * whether `fn` resolves or throws.
 */
export async function withNavigatorSession<T>(
  launch: NavigatorLauncher,
  options: SessionOptions,
  fn: (session: LazyNavigatorSession) => Promise<T>
): Promise<T> {
  const session = new LazyNavigatorSession(launch, options);
  try {
    return await fn(session);
  } finally {
    await session.release();
  }
}
