import express, { Express } from "express";
import { Server } from "http";
import { GaugeDescriptor } from "./gauges";
import { ExporterMetrics } from "./metrics";
import { scrapeGauges } from "./scrape";
import { GaugeReader } from "./usgs-client";

export interface ServerDeps {
  metrics: ExporterMetrics;
  loadGauges: () => Promise<GaugeDescriptor[]>;
  reader: GaugeReader;
  maxWorkers: number;
  probeUpstream: () => Promise<boolean>;
}

export function createApp(deps: ServerDeps): Express {
  const app = express();

  // Every scrape recomputes all gauges; nothing is cached between requests
  app.get("/metrics", async (_req, res) => {
    try {
      const gauges = await deps.loadGauges();
      const snapshot = await scrapeGauges(gauges, { maxWorkers: deps.maxWorkers, reader: deps.reader });
      deps.metrics.publish(snapshot);

      res.set("Content-Type", deps.metrics.registry.contentType);
      res.send(await deps.metrics.registry.metrics());
    } catch (err) {
      console.error("[server] /metrics failed:", err);
      res.status(500).send("scrape failed\n");
    }
  });

  // Health check: verifies the upstream API is reachable
  app.get("/healthz", async (_req, res) => {
    const apiOk = await deps.probeUpstream();

    res.status(apiOk ? 200 : 503).json({
      status:    apiOk ? "ok" : "degraded",
      api:       apiOk ? "reachable" : "unreachable",
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

export function startServer(deps: ServerDeps, port: number): Server {
  return createApp(deps).listen(port, () => {
    console.log(`[server] /metrics and /healthz listening on port ${port}`);
  });
}
