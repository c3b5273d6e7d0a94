import { logger } from "../logger";
import { ChmsApiError } from "./errors";

export interface ApiClientConfig {
  baseUrl: string;
  apiKey: string;
}

export type ParamValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly (string | number)[]
  | Record<string, unknown>;

export type QueryParams = Record<string, ParamValue>;

const FETCH_TIMEOUT_MS = 30_000;

/**
 * Query-string form of one parameter. Empty values are dropped, `*_json`
 * parameters and objects are JSON-encoded, lists are joined with "-".
 */
export function encodeParam(key: string, value: ParamValue): string | null {
  if (value === null || value === undefined || value === "") return null;
  if (typeof value === "boolean") return value ? "1" : "0";
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (key.endsWith("_json")) return JSON.stringify(value);
  if (Array.isArray(value)) {
    const joined = value.filter((v) => v !== "" && v !== 0).join("-");
    return joined || null;
  }
  return JSON.stringify(value);
}

export function buildQuery(params: QueryParams): string {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    const encoded = encodeParam(key, value);
    if (encoded !== null) query.set(key, encoded);
  }
  return query.toString();
}

function isErrorPayload(body: unknown): boolean {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return false;
  return Boolean("errors" in body && body.errors) || Boolean("errorCode" in body && body.errorCode);
}

export class ApiClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;

  constructor(config: ApiClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
  }

  async get(path: string, params: QueryParams = {}): Promise<unknown> {
    const query = buildQuery(params);
    const url = `${this.baseUrl}/api/${path}${query ? `?${query}` : ""}`;
    const start = Date.now();

    logger.debug({ tag: "API", path, params }, "API request");

    const res = await fetch(url, {
      method: "GET",
      headers: {
        "Api-Key": this.apiKey,
        "Content-Type": "application/json",
      },
      signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
    });

    const durationMs = Date.now() - start;
    let body: unknown;
    const contentType = res.headers.get("content-type") ?? "";
    if (contentType.includes("application/json")) {
      body = await res.json();
    } else {
      body = await res.text();
    }

    if (!res.ok) {
      logger.error(
        { tag: "API", path, status: res.status, durationMs },
        `GET ${path} → ${res.status} (${durationMs}ms)`
      );
      logger.debug({ tag: "API", path, responseBody: body }, "API error response body");
      throw new ChmsApiError(`API call failed: GET ${path} → ${res.status}`, res.status, body);
    }

    if (isErrorPayload(body)) {
      logger.error(
        { tag: "API", path, status: res.status, durationMs },
        `GET ${path} returned an error payload (${durationMs}ms)`
      );
      throw new ChmsApiError(`API call failed: GET ${path} returned errors`, res.status, body);
    }

    logger.info(
      { tag: "API", path, status: res.status, durationMs },
      `GET ${path} → ${res.status} (${durationMs}ms)`
    );
    logger.debug({ tag: "API", responseBody: body }, "API response body");

    return body;
  }
}
