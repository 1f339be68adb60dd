import { AxiosAdapter, AxiosError, AxiosResponse } from "axios";

/**
 * In-process stand-in for the USGS collection endpoint, plugged in as an
 * axios adapter so the real retry policy runs on top of it.
 */

export interface FakeRequest {
  url: string;
  params: Record<string, unknown>;
  apiKey: string | undefined;
}

export interface FakeReply {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Return a reply, or an Error to simulate a connection failure. An AxiosError
 * keeps its code (e.g. ECONNABORTED for a timeout); any other Error becomes ECONNRESET.
 */
export type FakeHandler = (req: FakeRequest, callIndex: number) => FakeReply | Error;

export interface FakeUsgs {
  adapter: AxiosAdapter;
  requests: FakeRequest[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function fakeUsgs(handler: FakeHandler): FakeUsgs {
  const requests: FakeRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const key = config.headers.get("X-Api-Key");
    const req: FakeRequest = {
      url: config.url ?? "",
      params: isRecord(config.params) ? config.params : {},
      apiKey: typeof key === "string" ? key : undefined,
    };
    const callIndex = requests.length;
    requests.push(req);

    const reply = handler(req, callIndex);
    if (reply instanceof Error) {
      const code = reply instanceof AxiosError && reply.code ? reply.code : "ECONNRESET";
      throw new AxiosError(reply.message, code, config);
    }

    const response: AxiosResponse = {
      data: reply.body ?? {},
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
    };

    const validate = config.validateStatus;
    if (!validate || validate(reply.status)) return response;

    throw new AxiosError(
      `Request failed with status code ${reply.status}`,
      reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      null,
      response,
    );
  };

  return { adapter, requests };
}

/** A collection-items body holding one feature with the given value. */
export function featureBody(value: unknown): unknown {
  return {
    type: "FeatureCollection",
    features: [{ type: "Feature", properties: { value, time: "2026-10-19T12:00:00+00:00" } }],
  };
}

export const EMPTY_BODY = { type: "FeatureCollection", features: [] };

/** Gauge id from the monitoring_location_id parameter ("USGS-01646500" → "01646500"). */
export function gaugeOf(req: FakeRequest): string {
  const location = req.params.monitoring_location_id;
  return typeof location === "string" ? location.replace(/^USGS-/, "") : "";
}
