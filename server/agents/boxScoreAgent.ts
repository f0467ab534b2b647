import { isoFromDate } from "@shared/dates";
import type { GameRecord } from "@shared/schema";
import type { DiscoveredEvent, IBoxScoreExtractor, IScheduleSource, RunOptions, RunSummary } from "./types";
import { planTargetDates } from "./rangePlanner";
import { upsertRows } from "./upsertMerger";
import type { IDatasetStorage } from "../storage";
import type { DatasetState } from "../datasetState";
import { hasPendingRows, type ICheckpointStore } from "../checkpointStore";
import {
  withNavigatorSession,
  type LazyNavigatorSession,
  type NavigatorLauncher,
  type SessionOptions,
} from "../utils/scraping/navigator";
import { FatalSessionError, TransientNavigationError, logError } from "../types/errors";
import { metrics } from "../metrics";
import { withSource } from "../logger";

const log = withSource("boxscore-agent");

export interface BoxScoreAgentDeps {
  schedule: IScheduleSource;
  extractor: IBoxScoreExtractor;
  storage: IDatasetStorage;
  state: DatasetState;
  checkpoints: ICheckpointStore;
  launch: NavigatorLauncher;
  session: SessionOptions;
  recheckDays: number;
  bootstrapSince: string;
  /** Current date as YYYY-MM-DD; injectable for tests */
  today?: () => string;
}

interface DateOutcome {
  rows: GameRecord[];
  fromCheckpoint: boolean;
  complete: boolean;
  failures: number;
}

function describeEvent(event: DiscoveredEvent): string {
  return event.kind === "id" ? event.gameId : `${event.away}@${event.home}`;
}

/**
 * BoxScoreAgent
 *
 * One ingest run: plan the dates, crawl each through a single browser
 * session (or reuse its checkpoint), then merge everything into the dataset
 * in one write. Per-event failures are logged and skipped; only a browser
 * session that cannot be started aborts the run, and it does so before the
 * dataset is touched.
 */
export class BoxScoreAgent {
  private readonly today: () => string;

  constructor(private readonly deps: BoxScoreAgentDeps) {
    this.today = deps.today ?? (() => isoFromDate(new Date()));
  }

  async runOnce(options: RunOptions = {}): Promise<RunSummary> {
    const t0 = performance.now();
    const force = options.force ?? false;
    let outcome = "error";

    try {
      const existing = await this.deps.state.get();
      const incomplete = await this.deps.checkpoints.incompleteDates();
      const plan = planTargetDates({
        since: options.since,
        until: options.until,
        existing,
        recheckDays: this.deps.recheckDays,
        bootstrapSince: this.deps.bootstrapSince,
        today: this.today(),
        incomplete,
      });
      log.info(
        { primary: plan.primary, rechecks: plan.rechecks, resumes: plan.resumes, dates: plan.dates.length, force },
        "target dates planned"
      );

      const batch: GameRecord[] = [];
      const completeDates: string[] = [];
      let datesFromCheckpoint = 0;
      let datesIncomplete = 0;
      let eventsFailed = 0;

      // A date marked incomplete may still hold an older checkpoint; crawl it regardless
      const resumes = new Set(plan.resumes);

      await withNavigatorSession(this.deps.launch, this.deps.session, async (session) => {
        for (const date of plan.dates) {
          const result = await this.processDate(date, session, force || resumes.has(date));
          batch.push(...result.rows);
          eventsFailed += result.failures;
          if (result.fromCheckpoint) datesFromCheckpoint++;
          if (result.complete) completeDates.push(date);
          else datesIncomplete++;
        }
      });

      const merge = upsertRows(existing, batch, completeDates);
      if (merge.dropped > 0) {
        metrics.rowsDroppedTotal.inc(merge.dropped);
        for (const rejection of merge.rejections) {
          log.warn({ reason: rejection.message, context: rejection.context }, "row dropped");
        }
      }

      let written = false;
      if (merge.accepted === 0) {
        log.info({ dates: plan.dates.length }, "no new data");
        outcome = "no_data";
      } else {
        await this.deps.storage.save(merge.rows);
        this.deps.state.invalidate();
        metrics.rowsUpsertedTotal.inc(merge.inserted + merge.replaced);
        written = true;
        outcome = "success";
      }

      const summary: RunSummary = {
        targetDates: plan.dates,
        datesCrawled: plan.dates.length - datesFromCheckpoint,
        datesFromCheckpoint,
        datesIncomplete,
        eventsExtracted: batch.length,
        eventsFailed,
        inserted: merge.inserted,
        replaced: merge.replaced,
        dropped: merge.dropped,
        written,
        durationMs: Math.round(performance.now() - t0),
      };
      log.info({ ...summary, targetDates: undefined, dataset: this.deps.storage.describe() }, "run complete");
      return summary;
    } catch (err) {
      if (err instanceof FatalSessionError) outcome = "fatal";
      throw err;
    } finally {
      metrics.pipelineRunDurationMs.labels(outcome).observe(performance.now() - t0);
    }
  }

  private async processDate(date: string, session: LazyNavigatorSession, force: boolean): Promise<DateOutcome> {
    if (!force) {
      const cached = await this.deps.checkpoints.read(date);
      if (cached && !hasPendingRows(cached)) {
        metrics.checkpointHitsTotal.inc();
        log.info({ date, rows: cached.length }, "checkpoint reused");
        return { rows: cached, fromCheckpoint: true, complete: true, failures: 0 };
      }
    }

    const navigator = await session.navigator();
    let events: DiscoveredEvent[];
    try {
      const html = await navigator.fetchDocument(this.deps.schedule.scheduleUrl(date), {
        readySelector: this.deps.schedule.readySelector,
        kind: "schedule",
      });
      events = this.deps.schedule.discover(date, html);
    } catch (err) {
      metrics.recordEventFailure("discovery");
      logError(log, err, { date, stage: "discovery" });
      await this.markIncomplete(date);
      return { rows: [], fromCheckpoint: false, complete: false, failures: 1 };
    }
    log.info({ date, events: events.length }, "events discovered");

    const rows: GameRecord[] = [];
    let failures = 0;
    for (const event of events) {
      const row = await this.processEvent(date, event, session);
      if (row) rows.push(row);
      else failures++;
    }

    if (failures === 0) {
      try {
        await this.deps.checkpoints.write(date, rows);
      } catch (err) {
        logError(log, err, { date, stage: "checkpoint" });
      }
    } else {
      log.warn({ date, failures }, "date incomplete, checkpoint not written");
      await this.markIncomplete(date);
    }

    return { rows, fromCheckpoint: false, complete: failures === 0, failures };
  }

  private async markIncomplete(date: string): Promise<void> {
    try {
      await this.deps.checkpoints.markIncomplete(date);
    } catch (err) {
      logError(log, err, { date, stage: "checkpoint" });
    }
  }

  private async processEvent(
    date: string,
    event: DiscoveredEvent,
    session: LazyNavigatorSession
  ): Promise<GameRecord | null> {
    const gameId = this.deps.schedule.resolveGameId(date, event);
    if (!gameId) {
      metrics.recordEventFailure("discovery");
      log.warn({ date, event: describeEvent(event) }, "no game id for matchup, skipped");
      return null;
    }

    try {
      const navigator = await session.navigator();
      const html = await navigator.fetchDocument(this.deps.extractor.reviewUrl(gameId), {
        readySelector: this.deps.extractor.readySelector,
        kind: "review",
      });
      const row = this.deps.extractor.extract(html, {
        date,
        gameId,
        venue: event.kind === "matchup" ? event.venue : undefined,
      });
      const status = row.away_result === "pending" ? "pending" : "final";
      metrics.eventsExtractedTotal.labels(status).inc();
      log.info(
        { date, gameId, status, away: row.away_team, home: row.home_team, score: `${row.away_score}-${row.home_score}` },
        "event extracted"
      );
      return row;
    } catch (err) {
      if (err instanceof FatalSessionError) throw err;
      metrics.recordEventFailure(err instanceof TransientNavigationError ? "navigation" : "extraction");
      logError(log, err, { date, gameId, stage: "review" });
      return null;
    }
  }
}
