import { Gauge, Registry } from "prom-client";
import { ScrapeSnapshot } from "./scrape";

export interface ExporterMetrics {
  registry: Registry;
  publish(snapshot: ScrapeSnapshot): void;
}

/** Prometheus view of the latest snapshot. The registry lives as long as the process. */
export function createExporterMetrics(registry: Registry = new Registry()): ExporterMetrics {
  const streamflow = new Gauge({
    name: "usgs_streamflow_cfs",
    help: "USGS streamflow in cubic feet per second",
    labelNames: ["gauge_id", "friendly_name", "location_name"] as const,
    registers: [registry],
  });

  const scrapeSuccess = new Gauge({
    name: "usgs_exporter_scrape_success_total",
    help: "Number of successful gauge fetches",
    registers: [registry],
  });

  const scrapeFailure = new Gauge({
    name: "usgs_exporter_scrape_failure_total",
    help: "Total number of failed gauge fetches",
    registers: [registry],
  });

  const gaugesTotal = new Gauge({
    name: "usgs_exporter_gauges_total",
    help: "Total number of gauges configured for polling",
    registers: [registry],
  });

  const scrapeDuration = new Gauge({
    name: "usgs_exporter_scrape_duration_seconds",
    help: "Time spent scraping all gauges",
    registers: [registry],
  });

  const rateLimitRemaining = new Gauge({
    name: "usgs_api_ratelimit_remaining",
    help: "Remaining allowed requests per hour for each USGS API key",
    labelNames: ["api_key_label"] as const,
    registers: [registry],
  });

  const rateLimitLimit = new Gauge({
    name: "usgs_api_ratelimit_limit",
    help: "Limit of allowed requests per hour.",
    labelNames: ["api_key_label"] as const,
    registers: [registry],
  });

  const requestsPerHour = new Gauge({
    name: "usgs_api_requests_per_hour",
    help: "Number of USGS API requests used in the current hour",
    labelNames: ["api_key_label"] as const,
    registers: [registry],
  });

  function publish(snapshot: ScrapeSnapshot): void {
    // Gauges removed from the list must not linger
    streamflow.reset();
    for (const entry of snapshot.readings.values()) {
      streamflow.set(
        { gauge_id: entry.gaugeId, friendly_name: entry.friendlyName, location_name: entry.locationName },
        entry.reading.kind === "value" ? entry.reading.value : NaN,
      );
    }

    scrapeSuccess.set(snapshot.successCount);
    scrapeFailure.set(snapshot.failureCount);
    gaugesTotal.set(snapshot.gaugesTotal);
    scrapeDuration.set(snapshot.durationSeconds);

    // Rate-limit gauges keep the last known state for labels not seen this scrape
    for (const [label, state] of Object.entries(snapshot.rateLimits)) {
      if (state.remaining !== undefined) rateLimitRemaining.set({ api_key_label: label }, state.remaining);
      if (state.limit !== undefined) rateLimitLimit.set({ api_key_label: label }, state.limit);
      if (state.used !== undefined) requestsPerHour.set({ api_key_label: label }, state.used);
    }
  }

  return { registry, publish };
}
