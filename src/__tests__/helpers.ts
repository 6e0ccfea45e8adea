import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import type { Logger, LogLevel } from "../log.js";

export type FakeRequest = {
  method: string;
  // absolute URL without query string parameters passed through `params`
  url: string;
  params: Record<string, string>;
  body: unknown;
  authorization: string;
  contentType: string;
};

export type FakeReply = { status?: number; body?: unknown } | { networkError: string };

function fullUrl(config: InternalAxiosRequestConfig) {
  const url = config.url ?? "";
  if (/^https?:\/\//i.test(url)) return url;
  return `${(config.baseURL ?? "").replace(/\/+$/, "")}/${url.replace(/^\/+/, "")}`;
}

function toRequest(config: InternalAxiosRequestConfig): FakeRequest {
  const params: Record<string, string> = {};
  if (config.params && typeof config.params === "object") {
    for (const [k, v] of Object.entries(config.params)) if (v !== undefined) params[k] = String(v);
  }
  const body = typeof config.data === "string" ? JSON.parse(config.data) : config.data;
  return {
    method: (config.method ?? "get").toUpperCase(),
    url: fullUrl(config),
    params,
    body,
    authorization: String(config.headers.get("Authorization") ?? ""),
    contentType: String(config.headers.get("Content-Type") ?? ""),
  };
}

function responseData(body: unknown, responseType: InternalAxiosRequestConfig["responseType"]) {
  let data: unknown = body ?? "";
  if (typeof data !== "string" && !(data instanceof Uint8Array)) data = JSON.stringify(data);
  if (responseType === "arraybuffer") return typeof data === "string" ? Buffer.from(data, "utf8") : data;
  return data instanceof Uint8Array ? Buffer.from(data).toString("utf8") : data;
}

/** In-process axios transport: every request is recorded and answered by `handler`. */
export function fakeAdapter(handler: (req: FakeRequest) => FakeReply) {
  const calls: FakeRequest[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const req = toRequest(config);
    calls.push(req);
    const reply = handler(req);
    if ("networkError" in reply) throw new AxiosError(reply.networkError, "ECONNREFUSED", config);
    return {
      data: responseData(reply.body, config.responseType),
      status: reply.status ?? 200,
      statusText: "",
      headers: {},
      config,
      request: {},
    };
  };
  return { adapter, calls };
}

export function requestKey(req: FakeRequest) {
  const qs = new URLSearchParams(req.params).toString();
  return `${req.method} ${req.url}${qs ? `?${qs}` : ""}`;
}

/** Routes keyed by `METHOD url[?query]`; anything else answers 404. */
export function routes(table: Record<string, FakeReply>) {
  return fakeAdapter((req) => table[requestKey(req)] ?? { status: 404, body: { error: { message: "not found" } } });
}

export function memoryLogger() {
  const lines: { level: LogLevel; message: string }[] = [];
  const at = (level: LogLevel) => (message: string) => {
    lines.push({ level, message });
  };
  const logger: Logger = { debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") };
  return { logger, lines, messages: (level: LogLevel) => lines.filter(l => l.level === level).map(l => l.message) };
}
