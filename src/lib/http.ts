import { cfg } from "./config";
import { RequestError, UnsupportedMethodError } from "./errors";
import { log, redactParams } from "./log";

export type HttpMethod = "GET" | "POST";

// The subset of the fetch Response the client reads.
export type FetchResponse = {
  status: number;
  statusText: string;
  ok: boolean;
  headers: {
    get(name: string): string | null;
    getSetCookie?(): string[];
  };
  body?: { cancel(): Promise<void> } | null;
  json(): Promise<unknown>;
  text(): Promise<string>;
};

export type FetchLike = (url: string, init: RequestInit) => Promise<FetchResponse>;

export type HttpSessionOptions = {
  fetch?: FetchLike;
  timeoutMs?: number;
};

export type JsonRequestOptions = {
  method?: HttpMethod;
  query?: Record<string, string | number | undefined>;
  body?: unknown;
  bearer?: string;
};

type Params = Record<string, string>;

/**
 * Thin wrapper over fetch holding the per-client transport state: a cookie jar
 * keyed by host and the request timeout. Login steps go through
 * {@link sendFormRequest}, which never follows redirects so the caller can read
 * the Location header.
 */
export class HttpSession {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly cookies = new Map<string, Map<string, string>>();

  constructor(opts: HttpSessionOptions = {}) {
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = opts.timeoutMs ?? cfg.requestTimeoutMs;
  }

  async sendFormRequest(url: string, method: string, params: Params = {}): Promise<FetchResponse> {
    const target = new URL(url);
    const headers: Record<string, string> = {};
    const init: RequestInit = { method, redirect: "manual" };

    log.debug(`Making ${method} request to ${target.href} with params:`, redactParams(params));

    switch (method) {
      case "GET":
        for (const [k, v] of Object.entries(params)) target.searchParams.set(k, v);
        break;
      case "POST":
        headers["Content-Type"] = "application/x-www-form-urlencoded";
        headers["Cache-Control"] = "no-cache";
        init.body = new URLSearchParams(params).toString();
        break;
      default:
        throw new UnsupportedMethodError(method);
    }

    return await this.send(target, init, headers);
  }

  async requestJson(url: string, opts: JsonRequestOptions = {}): Promise<FetchResponse> {
    const method = opts.method ?? "GET";
    const target = new URL(url);
    for (const [k, v] of Object.entries(opts.query ?? {})) {
      if (v === undefined) continue;
      target.searchParams.append(k, String(v));
    }

    const headers: Record<string, string> = { Accept: "application/json" };
    if (opts.bearer) headers["Authorization"] = `Bearer ${opts.bearer}`;

    const init: RequestInit = { method };
    if (opts.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(opts.body);
    }

    log.debug(`Making ${method} request to ${target.href}`);
    return await this.send(target, init, headers);
  }

  cookieHeader(host: string): string | undefined {
    const jar = this.cookies.get(host);
    if (!jar || jar.size === 0) return undefined;
    return Array.from(jar.entries()).map(([k, v]) => `${k}=${v}`).join("; ");
  }

  close() {
    this.cookies.clear();
  }

  private async send(url: URL, init: RequestInit, headers: Record<string, string>): Promise<FetchResponse> {
    const cookie = this.cookieHeader(url.host);
    if (cookie) headers["Cookie"] = cookie;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const start = Date.now();
      const res = await this.fetchImpl(url.href, { ...init, headers, signal: controller.signal });
      const elapsed = Date.now() - start;

      log.debug(`${init.method} ${url.href} -> ${res.status} ${res.statusText} (took ${elapsed}ms)`);
      this.storeCookies(url.host, res);
      return res;
    } catch (e) {
      log.debug(`${init.method} request to ${url.href} failed: ${String(e)}`);
      throw new RequestError(`${init.method} ${url.origin}${url.pathname} failed: ${String(e)}`, undefined, url.href);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private storeCookies(host: string, res: FetchResponse) {
    const setCookies = [...(res.headers.getSetCookie?.() ?? [])];
    if (setCookies.length === 0) {
      const single = res.headers.get("set-cookie");
      if (single) setCookies.push(single);
    }
    if (setCookies.length === 0) return;

    const jar = this.cookies.get(host) ?? new Map<string, string>();
    for (const setCookie of setCookies) {
      const pair = setCookie.split(";")[0] ?? "";
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      jar.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
    this.cookies.set(host, jar);
  }
}
