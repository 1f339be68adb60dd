import axios, { AxiosHeaders, AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";
import { Credential } from "./credentials";

export const USGS_API_URL =
  "https://api.waterdata.usgs.gov/ogcapi/v0/collections/latest-continuous/items";

const PARAMETER_CODE_DISCHARGE = "00060"; // discharge, cubic feet per second
const STATISTIC_INSTANTANEOUS  = "00011";

export type Reading =
  | { kind: "value"; value: number }
  | { kind: "not_available" };

export const NOT_AVAILABLE: Reading = { kind: "not_available" };

export interface ReadingOutcome {
  gaugeId: string;
  reading: Reading;
  succeeded: boolean;
  /** Credential whose response was used; null when every credential failed. */
  credentialLabel: string | null;
}

export interface RateLimitObservation {
  credentialLabel: string;
  remaining?: number;
  limit?: number;
  used?: number;
}

export interface GaugeFetchResult {
  outcome: ReadingOutcome;
  observations: RateLimitObservation[];
}

/** Resolves one station ID to one reading. */
export type GaugeReader = (gaugeId: string) => Promise<GaugeFetchResult>;

export class UpstreamParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UpstreamParseError";
  }
}

// Only the first feature is ever read, so later ones are not validated
const FeatureCollectionSchema = z.object({
  features: z.array(z.unknown()).nullish(),
}).passthrough();

const FeatureSchema = z.object({
  properties: z.object({ value: z.unknown() }).passthrough(),
}).passthrough();

const INTEGER = /^\s*[+-]?\d+\s*$/;

function readHeader(headers: AxiosResponse["headers"], name: string): string | undefined {
  const raw = headers instanceof AxiosHeaders ? headers.get(name) : headers[name.toLowerCase()];
  if (typeof raw === "number") return String(raw);
  return typeof raw === "string" ? raw : undefined;
}

function parseIntHeader(value: string | undefined): number | undefined {
  if (value === undefined || !INTEGER.test(value)) return undefined;
  return parseInt(value, 10);
}

/** Rate-limit state from response headers, or null when neither header is usable. */
export function extractRateLimit(
  credentialLabel: string,
  headers: AxiosResponse["headers"],
): RateLimitObservation | null {
  const remaining = parseIntHeader(readHeader(headers, "X-RateLimit-Remaining"));
  const limit     = parseIntHeader(readHeader(headers, "X-RateLimit-Limit"));
  if (remaining === undefined && limit === undefined) return null;

  const observation: RateLimitObservation = { credentialLabel };
  if (remaining !== undefined) observation.remaining = remaining;
  if (limit !== undefined) observation.limit = limit;
  if (remaining !== undefined && limit !== undefined) observation.used = limit - remaining;
  return observation;
}

function toFloat(raw: unknown): number {
  if (typeof raw === "number") return raw;
  if (typeof raw === "string" && raw.trim() !== "") {
    const value = Number(raw.trim());
    if (!Number.isNaN(value) || raw.trim().toLowerCase() === "nan") return value;
  }
  throw new UpstreamParseError(`cannot convert ${JSON.stringify(raw)} to a number`);
}

/**
 * Extract the latest discharge value from a collection-items body.
 * An empty, null or missing `features` list is a valid "no recent reading" answer.
 */
export function parseReading(body: unknown): Reading {
  const parsed = FeatureCollectionSchema.safeParse(body);
  if (!parsed.success) {
    throw new UpstreamParseError(`unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  const features = parsed.data.features ?? [];
  if (features.length === 0) return NOT_AVAILABLE;

  const first = FeatureSchema.safeParse(features[0]);
  if (!first.success) {
    throw new UpstreamParseError(`unexpected feature shape: ${first.error.issues[0]?.message ?? "invalid"}`);
  }

  let raw = first.data.properties.value;
  if (typeof raw === "object" && raw !== null && !Array.isArray(raw)) {
    // Qualified values arrive as { value, qualifiers }
    const inner: unknown = Reflect.get(raw, "value");
    if (inner === undefined) return NOT_AVAILABLE;
    raw = inner;
  }

  const value = toFloat(raw);
  return Number.isNaN(value) ? NOT_AVAILABLE : { kind: "value", value };
}

function outcomeOf(gaugeId: string, reading: Reading, credentialLabel: string | null): ReadingOutcome {
  return { gaugeId, reading, succeeded: reading.kind === "value", credentialLabel };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Fetch the latest discharge for one gauge, trying each credential in order.
 * A 429 or any other failure moves on to the next credential; the first
 * response that parses is returned. Never throws for upstream conditions.
 */
export async function fetchGaugeReading(
  gaugeId: string,
  credentials: readonly Credential[],
  httpClient: AxiosInstance,
  apiUrl: string = USGS_API_URL,
): Promise<GaugeFetchResult> {
  const observations: RateLimitObservation[] = [];
  const params = {
    monitoring_location_id: `USGS-${gaugeId}`,
    parameter_code:         PARAMETER_CODE_DISCHARGE,
    statistic_id:           STATISTIC_INSTANTANEOUS,
    properties:             "value,time",
  };

  for (const credential of credentials) {
    const headers: Record<string, string> = credential.secret ? { "X-Api-Key": credential.secret } : {};

    try {
      const response = await httpClient.get<unknown>(apiUrl, { params, headers });

      const observation = extractRateLimit(credential.label, response.headers);
      if (observation) observations.push(observation);

      const reading = parseReading(response.data);
      return { outcome: outcomeOf(gaugeId, reading, credential.label), observations };
    } catch (err) {
      if (axios.isAxiosError(err) && err.response?.status === 429) {
        console.warn(`[usgs] rate limited for ${gaugeId} with key ${credential.label}, trying next key`);
        continue;
      }
      if (axios.isAxiosError(err) && err.response) {
        console.warn(`[usgs] HTTP error for ${gaugeId} with key ${credential.label}: ${errorMessage(err)}`);
        continue;
      }
      console.warn(`[usgs] error fetching ${gaugeId} with key ${credential.label}: ${errorMessage(err)}`);
    }
  }

  return { outcome: outcomeOf(gaugeId, NOT_AVAILABLE, null), observations };
}

/** Lightweight probe used by /healthz to verify the USGS API is reachable. */
export async function probeUsgs(httpClient: AxiosInstance, apiUrl: string = USGS_API_URL): Promise<boolean> {
  try {
    const { status } = await httpClient.get(apiUrl, { params: { limit: 1 }, timeout: 5000 });
    return status === 200;
  } catch {
    return false;
  }
}
