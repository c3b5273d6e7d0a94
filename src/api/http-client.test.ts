import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { ApiClient, buildQuery, encodeParam } from "./http-client";
import { ChmsApiError } from "./errors";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("encodeParam", () => {
  it("drops empty values", () => {
    expect(encodeParam("limit", undefined)).toBeNull();
    expect(encodeParam("limit", null)).toBeNull();
    expect(encodeParam("name", "")).toBeNull();
  });

  it("encodes booleans as 1 and 0", () => {
    expect(encodeParam("details", true)).toBe("1");
    expect(encodeParam("details", false)).toBe("0");
  });

  it("JSON-encodes *_json parameters", () => {
    expect(encodeParam("filter_json", { tag_contains: "y_1" })).toBe('{"tag_contains":"y_1"}');
    expect(encodeParam("fields_json", [1, 2])).toBe("[1,2]");
  });

  it("joins lists with dashes", () => {
    expect(encodeParam("fund_ids", [12, 0, 34])).toBe("12-34");
  });
});

describe("buildQuery", () => {
  it("keeps only parameters with a value", () => {
    expect(buildQuery({ details: true, limit: 10, offset: undefined })).toBe(
      "details=1&limit=10"
    );
  });
});

describe("ApiClient", () => {
  const fetchMock = vi.fn();
  let client: ApiClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    client = new ApiClient({
      baseUrl: "https://demo.breezechms.com/",
      apiKey: "test-key",
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends the api key and builds the url", async () => {
    fetchMock.mockResolvedValue(jsonResponse([{ id: "1" }]));

    const body = await client.get("people", { details: true });

    expect(body).toEqual([{ id: "1" }]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://demo.breezechms.com/api/people?details=1");
    expect(init.method).toBe("GET");
    expect(init.headers).toEqual({
      "Api-Key": "test-key",
      "Content-Type": "application/json",
    });
  });

  it("omits the query string when there are no parameters", async () => {
    fetchMock.mockResolvedValue(jsonResponse({}));

    await client.get("account/summary");

    expect(fetchMock.mock.calls[0][0]).toBe("https://demo.breezechms.com/api/account/summary");
  });

  it("throws ChmsApiError on a non-2xx status", async () => {
    fetchMock.mockResolvedValue(new Response("nope", { status: 500 }));

    await expect(client.get("profile")).rejects.toThrow(
      "API call failed: GET profile → 500"
    );
  });

  it("throws ChmsApiError when the body carries errors", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ errorCode: "403", errorMessage: "Bad key" }));

    const err = await client.get("profile").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ChmsApiError);
    expect(err).toMatchObject({ status: 200, body: { errorCode: "403" } });
  });

  it("returns text bodies as strings", async () => {
    fetchMock.mockResolvedValue(new Response("plain", { status: 200 }));

    await expect(client.get("people/1")).resolves.toBe("plain");
  });
});
