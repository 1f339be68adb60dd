import { GaugeDescriptor } from "./gauges";
import { GaugeFetchResult, GaugeReader, NOT_AVAILABLE, RateLimitObservation, Reading } from "./usgs-client";
import { runWithWorkerPool } from "./worker-pool";

export interface GaugeReadingEntry {
  gaugeId: string;
  friendlyName: string;
  locationName: string;
  reading: Reading;
}

export interface RateLimitState {
  remaining?: number;
  limit?: number;
  used?: number;
}

export interface ScrapeSnapshot {
  /** One entry per distinct gauge id, in input order. */
  readings: ReadonlyMap<string, GaugeReadingEntry>;
  successCount: number;
  failureCount: number;
  gaugesTotal: number;
  durationSeconds: number;
  rateLimits: Record<string, RateLimitState>;
}

export interface ScrapeOptions {
  maxWorkers: number;
  reader: GaugeReader;
  now?: () => number;
}

interface TaskResult {
  descriptor: GaugeDescriptor;
  reading: Reading;
  succeeded: boolean;
  observations: RateLimitObservation[];
}

function friendlyNameOf(g: GaugeDescriptor): string {
  return g.friendly_name ?? g.name ?? g.id;
}

function locationNameOf(g: GaugeDescriptor): string {
  return g.name ?? g.id;
}

// Field-wise last-writer-wins; callers merge in descriptor order.
function mergeRateLimits(results: readonly TaskResult[]): Record<string, RateLimitState> {
  const merged: Record<string, RateLimitState> = {};
  for (const { observations } of results) {
    for (const { credentialLabel, remaining, limit, used } of observations) {
      const state = merged[credentialLabel] ?? (merged[credentialLabel] = {});
      if (remaining !== undefined) state.remaining = remaining;
      if (limit !== undefined) state.limit = limit;
      if (used !== undefined) state.used = used;
    }
  }
  return merged;
}

async function runTask(descriptor: GaugeDescriptor, reader: GaugeReader): Promise<TaskResult> {
  let result: GaugeFetchResult;
  try {
    result = await reader(descriptor.id);
  } catch (err) {
    console.error(`[scrape] error processing ${descriptor.id}: ${err instanceof Error ? err.message : String(err)}`);
    return { descriptor, reading: NOT_AVAILABLE, succeeded: false, observations: [] };
  }
  return {
    descriptor,
    reading: result.outcome.reading,
    succeeded: result.outcome.reading.kind === "value",
    observations: result.observations,
  };
}

/**
 * Run one full scrape cycle: read every gauge through a bounded worker pool
 * and fold the outcomes into a fresh snapshot. Per-gauge failures are
 * counted, never thrown.
 */
export async function scrapeGauges(
  descriptors: readonly GaugeDescriptor[],
  options: ScrapeOptions,
): Promise<ScrapeSnapshot> {
  const now = options.now ?? Date.now;
  const startMs = now();

  const results = await runWithWorkerPool(descriptors, options.maxWorkers, (descriptor) =>
    runTask(descriptor, options.reader),
  );

  const byId = new Map<string, GaugeReadingEntry>();
  let successCount = 0;
  let failureCount = 0;

  for (const { descriptor, reading, succeeded } of results) {
    if (succeeded) successCount++;
    else failureCount++;

    byId.set(descriptor.id, {
      gaugeId:      descriptor.id,
      friendlyName: friendlyNameOf(descriptor),
      locationName: locationNameOf(descriptor),
      reading,
    });
  }

  const snapshot: ScrapeSnapshot = {
    readings:        byId,
    successCount,
    failureCount,
    gaugesTotal:     descriptors.length,
    durationSeconds: (now() - startMs) / 1000,
    rateLimits:      mergeRateLimits(results),
  };

  console.log(
    `[scrape] ${snapshot.gaugesTotal} gauges — ${successCount} ok, ${failureCount} failed` +
    ` [${snapshot.durationSeconds.toFixed(2)}s]`,
  );
  return snapshot;
}
