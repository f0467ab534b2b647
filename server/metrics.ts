import client, { Registry, Counter, Histogram } from 'prom-client';

// Dedicated registry to avoid default global pollution
const register = new Registry();
client.collectDefaultMetrics({ register, prefix: 'kbo_ingest_' });

// Runs are dominated by page loads, so buckets reach into minutes
const RUN_BUCKETS = [1_000, 5_000, 15_000, 30_000, 60_000, 120_000, 300_000, 600_000, 1_800_000];
const FETCH_BUCKETS = [100, 250, 500, 1_000, 2_000, 5_000, 10_000, 20_000, 60_000];

const pipelineRunDurationMs = new Histogram({
  name: 'pipeline_run_duration_ms',
  help: 'Duration of BoxScoreAgent runOnce executions in ms',
  labelNames: ['outcome'],
  buckets: RUN_BUCKETS,
  registers: [register],
});

const documentFetchDurationMs = new Histogram({
  name: 'document_fetch_duration_ms',
  help: 'Latency of rendered document fetches in ms',
  labelNames: ['kind'],
  buckets: FETCH_BUCKETS,
  registers: [register],
});

const eventsExtractedTotal = new Counter({
  name: 'events_extracted_total',
  help: 'Events extracted from review pages by outcome status',
  labelNames: ['status'], // final | pending
  registers: [register],
});

const eventFailuresTotal = new Counter({
  name: 'event_failures_total',
  help: 'Per-event and per-date failures by pipeline stage',
  labelNames: ['stage'], // discovery | navigation | extraction
  registers: [register],
});

const checkpointHitsTotal = new Counter({
  name: 'checkpoint_hits_total',
  help: 'Target dates served from a stored checkpoint',
  registers: [register],
});

const rowsDroppedTotal = new Counter({
  name: 'rows_dropped_total',
  help: 'Malformed rows dropped during upsert validation',
  registers: [register],
});

const rowsUpsertedTotal = new Counter({
  name: 'rows_upserted_total',
  help: 'Rows written into the durable dataset',
  registers: [register],
});

const sessionStartFailuresTotal = new Counter({
  name: 'session_start_failures_total',
  help: 'Navigator session launch attempts that failed',
  registers: [register],
});

function observeFetch(kind: 'schedule' | 'review', durationMs: number): void {
  documentFetchDurationMs.labels(kind).observe(durationMs);
}

function recordEventFailure(stage: 'discovery' | 'navigation' | 'extraction'): void {
  eventFailuresTotal.labels(stage).inc();
}

async function getMetricsContent(): Promise<string> {
  return await register.metrics();
}

export const metrics = {
  register,
  pipelineRunDurationMs,
  documentFetchDurationMs,
  eventsExtractedTotal,
  eventFailuresTotal,
  checkpointHitsTotal,
  rowsDroppedTotal,
  rowsUpsertedTotal,
  sessionStartFailuresTotal,
  observeFetch,
  recordEventFailure,
  getMetricsContent,
} as const;
