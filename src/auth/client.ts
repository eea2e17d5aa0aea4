import type { Session, SessionProvider } from "../types";
import type { Logger } from "../utils/logger";
import type { FetchFn } from "../api/executor";
import { isRecord } from "../utils/errors";

export type AuthClientOptions = {
  loginUrl?: string;
  requiredCookies: string[];
  timeoutMs: number;
  logger: Logger;
  fetchFn?: FetchFn;
};

export type LoginResult = {
  ok: boolean;
  message: string;
};

type StoredLogin = Session & {
  username: string;
  loggedInAt: string;
};

/** `name=value; Path=/; HttpOnly` -> { name: value } */
export function parseSetCookies(headers: string[]): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const header of headers) {
    const pair = header.split(";")[0] ?? "";
    const eq = pair.indexOf("=");
    if (eq <= 0) continue;
    cookies[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return cookies;
}

export class AuthClient implements SessionProvider {
  private sessions = new Map<string, StoredLogin>();
  private options: AuthClientOptions;
  private logger: Logger;
  private fetchFn: FetchFn;

  constructor(options: AuthClientOptions) {
    this.options = options;
    this.logger = options.logger;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  isLoggedIn(userId: string): boolean {
    return this.sessions.has(userId);
  }

  getSession(userId: string): Session | null {
    const stored = this.sessions.get(userId);
    return stored ? { cookies: { ...stored.cookies }, token: stored.token } : null;
  }

  getToken(userId: string): string | null {
    return this.sessions.get(userId)?.token ?? null;
  }

  invalidate(userId: string): void {
    if (this.sessions.delete(userId)) {
      this.logger.info("Session invalidated", { userId });
    }
  }

  logout(userId: string): boolean {
    return this.sessions.delete(userId);
  }

  async login(userId: string, username: string, password: string): Promise<LoginResult> {
    if (this.isLoggedIn(userId)) {
      return { ok: true, message: "You are already logged in! You can start using the bot." };
    }
    if (!this.options.loginUrl) {
      return { ok: false, message: "Login is not configured on this bot." };
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const res = await this.fetchFn(this.options.loginUrl, {
        method: "POST",
        headers: { Accept: "application/json" },
        body: new URLSearchParams({ email: username, password }),
        signal: controller.signal,
      });
      const body: unknown = await res.json().catch((err: unknown) => {
        this.logger.debug("Login response is not JSON", { message: String(err) });
        return null;
      });
      const success = isRecord(body) && body.success === true;
      const token = isRecord(body) && typeof body._token === "string" ? body._token : null;
      const cookies = parseSetCookies(res.headers.getSetCookie());
      const missing = this.options.requiredCookies.filter((name) => !(name in cookies));

      if (res.status !== 200 || !success || missing.length > 0) {
        this.logger.warn("Login rejected", { userId, status: res.status, success, missing });
        return { ok: false, message: "Login failed. Please try again." };
      }

      this.sessions.set(userId, {
        username,
        cookies,
        token,
        loggedInAt: new Date().toISOString(),
      });
      this.logger.info("User logged in", { userId });
      return {
        ok: true,
        message: "Login successful! You can now chat with me and use all available commands.",
      };
    } catch (err) {
      this.logger.error("Login failed", { userId, message: String(err) });
      return { ok: false, message: "Sorry, I couldn't log you in. Please try again later." };
    } finally {
      clearTimeout(timer);
    }
  }
}
