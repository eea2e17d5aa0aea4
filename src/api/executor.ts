import type { ApiOutcome, ApiStep, Session, SessionProvider } from "../types";
import type { Logger } from "../utils/logger";
import { TemplateError } from "../utils/errors";
import { renderTemplate } from "./template";

export const SESSION_EXPIRED_STATUS = 419;
export const TOKEN_FIELD = "_token";

export type FetchFn = typeof fetch;

export type ApiStepExecutorOptions = {
  sessions: SessionProvider;
  logger: Logger;
  timeoutMs: number;
  fetchFn?: FetchFn;
};

type PreparedRequest = {
  url: string;
  init: RequestInit;
};

function cookieHeader(cookies: Session["cookies"]): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}

export class ApiStepExecutor {
  private sessions: SessionProvider;
  private logger: Logger;
  private timeoutMs: number;
  private fetchFn: FetchFn;

  constructor(options: ApiStepExecutorOptions) {
    this.sessions = options.sessions;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  /** One attempt, no retries. Never throws. */
  async execute(
    step: ApiStep,
    stored: ReadonlyMap<string, string>,
    userId: string
  ): Promise<ApiOutcome> {
    const failure: ApiOutcome = { kind: "failure", message: step.format.errorText };
    const session = this.sessions.getSession(userId);
    if (!session) {
      this.logger.info("API step without session", { step: step.id, userId });
      return { kind: "session_expired" };
    }

    let request: PreparedRequest;
    try {
      request = this.prepare(step, stored, session, this.sessions.getToken(userId));
    } catch (err) {
      this.logger.error("API request templating failed", {
        step: step.id,
        field: err instanceof TemplateError ? err.field : undefined,
        message: String(err),
      });
      return failure;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const startedAt = Date.now();
    try {
      const res = await this.fetchFn(request.url, { ...request.init, signal: controller.signal });
      this.logger.info("API step response", {
        step: step.id,
        method: step.api.method,
        status: res.status,
        durationMs: Date.now() - startedAt,
      });

      if (res.status === 200) {
        return { kind: "success", body: await res.json() };
      }
      if (res.status === SESSION_EXPIRED_STATUS) {
        this.sessions.invalidate(userId);
        return { kind: "session_expired" };
      }
      this.logger.error("API step error status", {
        step: step.id,
        status: res.status,
        body: (await res.text()).slice(0, 500),
      });
      return failure;
    } catch (err) {
      if (controller.signal.aborted) {
        this.logger.error("API step timed out", { step: step.id, timeoutMs: this.timeoutMs });
      } else {
        this.logger.error("API step request failed", { step: step.id, message: String(err) });
      }
      return failure;
    } finally {
      clearTimeout(timer);
    }
  }

  private prepare(
    step: ApiStep,
    stored: ReadonlyMap<string, string>,
    session: Session,
    token: string | null
  ): PreparedRequest {
    const { api } = step;
    const payload: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(api.payload)) {
      payload[key] = typeof value === "string" ? renderTemplate(value, stored) : value;
    }

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(api.headers)) {
      headers[name] = renderTemplate(value, stored);
    }
    headers["Accept"] = "application/json";
    const cookies = cookieHeader(session.cookies);
    if (cookies) headers["Cookie"] = cookies;

    const url = new URL(renderTemplate(api.url, stored, encodeURIComponent));
    if (api.method === "GET") {
      for (const [key, value] of Object.entries(payload)) {
        if (value === null || value === undefined) continue;
        url.searchParams.set(key, typeof value === "object" ? JSON.stringify(value) : String(value));
      }
      return { url: url.toString(), init: { method: "GET", headers } };
    }

    if (token) payload[TOKEN_FIELD] = token;
    headers["Content-Type"] = "application/json";
    return {
      url: url.toString(),
      init: { method: api.method, headers, body: JSON.stringify(payload) },
    };
  }
}
