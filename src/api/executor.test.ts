import { describe, expect, it } from "vitest";
import { ApiStepExecutor, type FetchFn } from "./executor";
import type { ApiDescriptor, ApiStep } from "../types";
import { fakeSessions, silentLogger } from "../test-utils/fakes";

type Captured = { url: string; init: RequestInit | undefined };

function apiStep(api: Partial<ApiDescriptor> = {}): ApiStep {
  return {
    kind: "api",
    id: "call",
    prompt: null,
    storeResponse: false,
    choices: null,
    expectedAnswers: null,
    responses: new Map(),
    goto: new Map(),
    isFinal: true,
    api: { method: "GET", url: "http://backend.test/clients", headers: {}, payload: {}, ...api },
    format: {
      slots: {},
      successTemplate: "ok",
      errorText: "The backend is unavailable.",
      fallbackText: "No data returned.",
    },
  };
}

function recordingFetch(respond: () => Promise<Response> | Response) {
  const requests: Captured[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    requests.push({ url: String(input), init });
    return respond();
  };
  return { fetchFn, requests };
}

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

const stored = new Map([
  ["client", "Al Smith"],
  ["id", "a b"],
]);

describe("ApiStepExecutor", () => {
  it("sends GET payloads as query parameters with the session cookies", async () => {
    const sessions = fakeSessions({ cookies: { "XSRF-TOKEN": "x1", laravel_session: "s1" }, token: "t1" });
    const { fetchFn, requests } = recordingFetch(() => json({ data: [] }));
    const executor = new ApiStepExecutor({ sessions: sessions.provider, logger: silentLogger, timeoutMs: 1000, fetchFn });

    const outcome = await executor.execute(
      apiStep({ payload: { name: "{client}", per_page: 20, skip: null } }),
      stored,
      "u1"
    );

    expect(outcome).toEqual({ kind: "success", body: { data: [] } });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe("http://backend.test/clients?name=Al+Smith&per_page=20");
    expect(requests[0].init?.method).toBe("GET");
    expect(requests[0].init?.body).toBeUndefined();
    const headers = new Headers(requests[0].init?.headers);
    expect(headers.get("Cookie")).toBe("XSRF-TOKEN=x1; laravel_session=s1");
    expect(headers.get("Accept")).toBe("application/json");
  });

  it("sends other methods as JSON with the session token injected", async () => {
    const sessions = fakeSessions();
    const { fetchFn, requests } = recordingFetch(() => json({ data: { id: 1 } }));
    const executor = new ApiStepExecutor({ sessions: sessions.provider, logger: silentLogger, timeoutMs: 1000, fetchFn });

    await executor.execute(
      apiStep({
        method: "POST",
        url: "http://backend.test/clients/{id}",
        headers: { "X-Client": "{client}" },
        payload: { name: "{client}", active: true },
      }),
      stored,
      "u1"
    );

    expect(requests[0].url).toBe("http://backend.test/clients/a%20b");
    expect(requests[0].init?.method).toBe("POST");
    const body = requests[0].init?.body;
    expect(typeof body === "string" ? JSON.parse(body) : null).toEqual({
      name: "Al Smith",
      active: true,
      _token: "csrf-token",
    });
    const headers = new Headers(requests[0].init?.headers);
    expect(headers.get("Content-Type")).toBe("application/json");
    expect(headers.get("X-Client")).toBe("Al Smith");
  });

  it("invalidates the session on 419", async () => {
    const sessions = fakeSessions();
    const { fetchFn } = recordingFetch(() => json({ message: "CSRF token mismatch." }, 419));
    const executor = new ApiStepExecutor({ sessions: sessions.provider, logger: silentLogger, timeoutMs: 1000, fetchFn });

    expect(await executor.execute(apiStep(), stored, "u1")).toEqual({ kind: "session_expired" });
    expect(sessions.invalidate).toHaveBeenCalledWith("u1");
  });

  it("reports a missing session without calling the backend", async () => {
    const sessions = fakeSessions(null);
    const { fetchFn, requests } = recordingFetch(() => json({}));
    const executor = new ApiStepExecutor({ sessions: sessions.provider, logger: silentLogger, timeoutMs: 1000, fetchFn });

    expect(await executor.execute(apiStep(), stored, "u1")).toEqual({ kind: "session_expired" });
    expect(requests).toHaveLength(0);
  });

  it.each([
    ["an error status", () => json({ message: "boom" }, 500)],
    ["a non-JSON success body", () => new Response("<html>", { status: 200 })],
    [
      "a transport error",
      () => {
        throw new TypeError("fetch failed");
      },
    ],
  ])("maps %s to the step's error text", async (_label, respond) => {
    const sessions = fakeSessions();
    const { fetchFn } = recordingFetch(respond);
    const executor = new ApiStepExecutor({ sessions: sessions.provider, logger: silentLogger, timeoutMs: 1000, fetchFn });

    expect(await executor.execute(apiStep(), stored, "u1")).toEqual({
      kind: "failure",
      message: "The backend is unavailable.",
    });
    expect(sessions.invalidate).not.toHaveBeenCalled();
  });

  it("gives up after the timeout", async () => {
    const sessions = fakeSessions();
    const fetchFn: FetchFn = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const executor = new ApiStepExecutor({ sessions: sessions.provider, logger: silentLogger, timeoutMs: 20, fetchFn });

    expect(await executor.execute(apiStep(), stored, "u1")).toEqual({
      kind: "failure",
      message: "The backend is unavailable.",
    });
  });

  it("treats a missing placeholder as a formatting failure", async () => {
    const sessions = fakeSessions();
    const { fetchFn, requests } = recordingFetch(() => json({}));
    const executor = new ApiStepExecutor({ sessions: sessions.provider, logger: silentLogger, timeoutMs: 1000, fetchFn });

    const outcome = await executor.execute(apiStep({ payload: { email: "{email}" } }), stored, "u1");
    expect(outcome).toEqual({ kind: "failure", message: "The backend is unavailable." });
    expect(requests).toHaveLength(0);
  });
});
