import { config } from "./config";
import { logger, withSource } from "./logger";
import { metrics } from "./metrics";
import { BoxScoreAgent } from "./agents/boxScoreAgent";
import { KboScheduleAdapter } from "./agents/adapters/kboScheduleAdapter";
import { KboReviewAdapter } from "./agents/adapters/kboReviewAdapter";
import { CsvDatasetStorage } from "./storage";
import { CsvCheckpointStore } from "./checkpointStore";
import { DatasetState } from "./datasetState";
import { createPlaywrightLauncher } from "./utils/scraping/navigator";
import { writeFileAtomic } from "./utils/csvTable";
import { USAGE, parseCliOptions, type CliOptions } from "./cli";
import { FatalSessionError, InvalidOptionsError, logError } from "./types/errors";

const log = withSource("ingest");

function createAgent(options: Pick<CliOptions, "out">): BoxScoreAgent {
  const storage = new CsvDatasetStorage(options.out ?? config.datasetPath);
  return new BoxScoreAgent({
    schedule: new KboScheduleAdapter(config.sources.scheduleUrl),
    extractor: new KboReviewAdapter(config.sources.reviewUrl),
    storage,
    state: new DatasetState(storage),
    checkpoints: new CsvCheckpointStore(config.checkpointDir),
    launch: createPlaywrightLauncher(config.navigator),
    session: { maxAttempts: config.navigator.sessionMaxAttempts },
    recheckDays: config.recheckDays,
    bootstrapSince: config.bootstrapSince,
  });
}

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliOptions(process.argv.slice(2));
  } catch (err) {
    if (err instanceof InvalidOptionsError) {
      log.error({ error: err.message }, USAGE);
      return 1;
    }
    throw err;
  }

  try {
    const summary = await createAgent(options).runOnce(options);
    log.info(
      { inserted: summary.inserted, replaced: summary.replaced, dropped: summary.dropped, written: summary.written },
      summary.written ? `upserted ${summary.inserted + summary.replaced} row(s)` : "no new data"
    );
    return 0;
  } catch (err) {
    logError(log, err, { options });
    if (err instanceof FatalSessionError) return 1;
    throw err;
  } finally {
    if (config.metricsFile) {
      await writeFileAtomic(config.metricsFile, await metrics.getMetricsContent());
    }
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, "ingest crashed");
    process.exitCode = 1;
  });
