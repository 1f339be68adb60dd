import { loadConfig } from "./config";
import { buildCredentialSet } from "./credentials";
import { loadGauges } from "./gauges";
import { createHttpClient } from "./http-client";
import { createExporterMetrics } from "./metrics";
import { mockFetchGaugeReading } from "./mock-streamflow";
import { startServer } from "./server";
import { GaugeReader, fetchGaugeReading, probeUsgs } from "./usgs-client";

async function main() {
  const config = loadConfig();
  const httpClient = createHttpClient();
  const credentials = buildCredentialSet(config.apiKeyPrimary, config.apiKeyBackup);

  // USE_MOCK=true skips real HTTP calls (quota exhausted, offline dev, CI)
  const reader: GaugeReader = config.useMock
    ? (gaugeId) => mockFetchGaugeReading(gaugeId)
    : (gaugeId) => fetchGaugeReading(gaugeId, credentials, httpClient);

  const server = startServer({
    metrics:       createExporterMetrics(),
    loadGauges:    () => loadGauges(config.gaugesFile),
    reader,
    maxWorkers:    config.maxWorkers,
    probeUpstream: config.useMock ? async () => true : () => probeUsgs(httpClient),
  }, config.port);

  const keys = credentials.filter(c => c.secret).map(c => c.label);
  console.log(
    `[main] exporter running — gauges: ${config.gaugesFile}, workers: ${config.maxWorkers}, ` +
    `keys: ${keys.length > 0 ? keys.join(", ") : "none"}${config.useMock ? ", mock mode" : ""}`,
  );

  const shutdown = () => {
    console.log("[main] shutting down...");
    server.close(() => process.exit(0));
  };

  process.on("SIGINT",  shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("[main] fatal:", err);
  process.exit(1);
});
