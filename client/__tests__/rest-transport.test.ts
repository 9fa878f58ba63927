import { afterEach, describe, expect, test, vi } from "vitest";

import { resolveConfiguration } from "../configuration";
import {
  AlreadyFriendsError,
  NotAuthenticatedError,
  NotFoundError,
  NotFriendsError,
  RateLimitedError,
  UnavailableError,
  UnexpectedResponseError,
} from "../errors";
import { FetchRestTransport, buildQueryString, raiseForStatus, readErrorMessage } from "../rest-transport";

const configuration = resolveConfiguration({
  authToken: "test-token",
  apiBaseUrl: "https://api.test/api/1/",
  apiKey: "test-key",
  userAgent: "test-agent",
});

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

describe("raiseForStatus", () => {
  test("accepts successful responses", () => {
    expect(() => raiseForStatus("/auth/user", 200, { id: "usr_me" })).not.toThrow();
  });

  test.each([
    [401, NotAuthenticatedError],
    [404, NotFoundError],
    [429, RateLimitedError],
    [502, UnavailableError],
    [503, UnavailableError],
    [504, UnavailableError],
    [500, UnexpectedResponseError],
    [400, UnexpectedResponseError],
  ])("maps status %i", (status, errorType) => {
    expect(() => raiseForStatus("/users/usr_a", status, null)).toThrow(errorType);
  });

  test("recognizes friendship errors, with or without extra quotes", () => {
    expect(() =>
      raiseForStatus("/auth/user/friends/usr_a", 400, { error: { message: '"These users are not friends"' } }),
    ).toThrow(NotFriendsError);
    expect(() => raiseForStatus("/user/usr_a/friendRequest", 400, { error: "Users are already friends!" })).toThrow(
      AlreadyFriendsError,
    );
  });

  test("keeps the server message on unexpected statuses", () => {
    expect(() => raiseForStatus("/worlds", 500, "oops")).toThrow("Request to /worlds failed with status 500: oops");
  });

  test("treats a two-factor challenge as unauthenticated", () => {
    expect(() => raiseForStatus("/auth/user", 200, { requiresTwoFactorAuth: ["totp"] })).toThrow(
      "Account requires two-factor authentication.",
    );
  });

  test("reads error messages from either body form", () => {
    expect(readErrorMessage({ error: { message: "nested" } })).toBe("nested");
    expect(readErrorMessage({ error: "flat" })).toBe("flat");
    expect(readErrorMessage("")).toBeNull();
    expect(readErrorMessage({})).toBeNull();
  });
});

describe("buildQueryString", () => {
  test("skips empty values and repeats array entries", () => {
    expect(buildQueryString({ a: 1, b: null, c: ["x", "y"], d: true, e: undefined })).toBe("a=1&c=x&c=y&d=true");
  });
});

describe("FetchRestTransport", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("sends the session cookie and api key", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ id: "usr_a" }));
    const transport = new FetchRestTransport(configuration);

    const response = await transport.request("/users/usr_a", "GET", { n: 5 });

    expect(response).toEqual({ status: 200, body: { id: "usr_a" } });
    expect(fetchSpy).toHaveBeenCalledWith("https://api.test/api/1/users/usr_a?n=5&apiKey=test-key", {
      method: "GET",
      headers: {
        "User-Agent": "test-agent",
        Cookie: "auth=test-token",
        Accept: "application/json",
      },
      body: undefined,
    });
  });

  test("serializes request bodies as JSON", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response("", { status: 200 }));
    const transport = new FetchRestTransport(configuration);

    const response = await transport.request("/joins", "PUT", {}, { worldId: "wrld_home:10001" });

    expect(response.body).toBeNull();
    const [, init] = fetchSpy.mock.calls[0];
    expect(init?.body).toBe('{"worldId":"wrld_home:10001"}');
    expect(init?.headers).toMatchObject({ "Content-Type": "application/json" });
  });

  test("rejects with a typed error on failure statuses", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ error: { message: "User not found" } }, 404));
    const transport = new FetchRestTransport(configuration);

    await expect(transport.request("/users/usr_missing")).rejects.toThrow(NotFoundError);
  });

  test("reports unreachable servers as unavailable", async () => {
    vi.spyOn(globalThis, "fetch").mockRejectedValue(new TypeError("fetch failed"));
    const transport = new FetchRestTransport(configuration);

    const failure = await transport.request("/users/usr_a").catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(UnavailableError);
    if (failure instanceof UnavailableError) {
      expect(failure.status).toBeNull();
      expect(failure.message).toBe("Request to /users/usr_a could not be sent.");
    }
  });
});
