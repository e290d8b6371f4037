import { afterEach, describe, expect, it, vi } from "vitest";
import { RateLimited, RemoteUnavailable } from "../src/errors.js";
import { getBinary, getJson, getText, httpClient } from "../src/utils/http.js";
import { httpError, okResponse } from "./helpers.js";

const TARGET = "https://example.test/data";

describe("getJson", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it("pauses and retries while rate limited", async () => {
    vi.useFakeTimers();
    const spy = vi.spyOn(httpClient, "get");
    spy.mockRejectedValueOnce(httpError(TARGET, 429));
    spy.mockResolvedValueOnce(okResponse(TARGET, { value: "ok" }));

    const promise = getJson<{ readonly value: string }>(TARGET, { pauseMs: 250 });
    await vi.runAllTimersAsync();
    const response = await promise;

    expect(response.data.value).toBe("ok");
    expect(response.rateLimitPauses).toBe(1);
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it("gives up with RateLimited when aborted during a pause", async () => {
    vi.useFakeTimers();
    const spy = vi.spyOn(httpClient, "get").mockRejectedValueOnce(httpError(TARGET, 429));
    const controller = new AbortController();

    const assertion = expect(getJson(TARGET, { pauseMs: 1000, signal: controller.signal })).rejects.toBeInstanceOf(
      RateLimited
    );
    controller.abort();
    await vi.runAllTimersAsync();
    await assertion;

    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("does not retry server errors", async () => {
    const spy = vi.spyOn(httpClient, "get").mockRejectedValueOnce(httpError(TARGET, 502));

    await expect(getJson(TARGET)).rejects.toBeInstanceOf(RemoteUnavailable);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("maps transport failures without a response to RemoteUnavailable", async () => {
    vi.spyOn(httpClient, "get").mockRejectedValueOnce(new Error("socket hang up"));

    await expect(getJson(TARGET)).rejects.toMatchObject({ name: "RemoteUnavailable", status: undefined });
  });
});

describe("getText", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the body as text", async () => {
    vi.spyOn(httpClient, "get").mockResolvedValueOnce(okResponse(TARGET, "1.0.0,abc,1.14.0\n"));
    const response = await getText(TARGET);
    expect(response.data).toBe("1.0.0,abc,1.14.0\n");
  });
});

describe("getBinary", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns a buffer and surfaces failures to the caller", async () => {
    const spy = vi.spyOn(httpClient, "get");
    spy.mockResolvedValueOnce(okResponse(TARGET, Buffer.from("tar")));
    spy.mockRejectedValueOnce(httpError(TARGET, 429));

    const response = await getBinary(TARGET);
    expect(response.data.toString("utf8")).toBe("tar");
    await expect(getBinary(TARGET)).rejects.toMatchObject({ response: { status: 429 } });
    expect(spy).toHaveBeenCalledTimes(2);
  });
});
