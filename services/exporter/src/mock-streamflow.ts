import { GaugeFetchResult } from "./usgs-client";

export const MOCK_LABEL = "mock";

// Stable per-gauge seed so repeated scrapes report the same discharge
function hashId(gaugeId: string): number {
  let h = 2166136261;
  for (let i = 0; i < gaugeId.length; i++) {
    h ^= gaugeId.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/** Synthetic discharge between 1 and 5000 cfs, rounded to 0.1. */
export function mockDischarge(gaugeId: string): number {
  const fraction = hashId(gaugeId) / 0xffffffff;
  return Math.round((1 + fraction * 4999) * 10) / 10;
}

// Drop-in replacement for fetchGaugeReading(): no HTTP calls, no rate-limit headers
export async function mockFetchGaugeReading(
  gaugeId: string,
  latencyMs: number = 20 + Math.random() * 80,
): Promise<GaugeFetchResult> {
  await sleep(latencyMs); // simulate network latency

  return {
    outcome: {
      gaugeId,
      reading: { kind: "value", value: mockDischarge(gaugeId) },
      succeeded: true,
      credentialLabel: MOCK_LABEL,
    },
    observations: [],
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
