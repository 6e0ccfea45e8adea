import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import type { z } from "zod";
import type { Logger } from "./log.js";

export type HttpFailure = {
  ok: false;
  kind: "transport" | "status" | "decode";
  status?: number;
  message: string;
};

export type HttpResult<T> = { ok: true; status: number; data: T } | HttpFailure;

export type HttpRequest = {
  method: "GET" | "POST";
  // relative to the client's base URL, or absolute (pagination links)
  url: string;
  params?: Record<string, string>;
  body?: unknown;
  expectedStatus?: number;
};

export type HttpClientOptions = {
  baseURL: string;
  token: string;
  logger: Logger;
  timeoutMs?: number;
  // replaces axios' transport; tests plug an in-process one here
  adapter?: AxiosAdapter;
};

export function bodyText(data: unknown): string {
  if (data == null) return "";
  if (typeof data === "string") return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  if (data instanceof Uint8Array) return Buffer.from(data).toString("utf8");
  return JSON.stringify(data);
}

function describeBody(data: unknown): string {
  const text = bodyText(data);
  try {
    return JSON.stringify(JSON.parse(text));
  } catch {
    return text;
  }
}

/**
 * One authenticated REST service. Every call resolves to an {@link HttpResult};
 * transport errors, unexpected statuses and undecodable bodies are logged
 * here and come back as failures, never as exceptions.
 */
export class HttpClient {
  private readonly http: AxiosInstance;
  private readonly log: Logger;

  constructor(opts: HttpClientOptions) {
    this.log = opts.logger;
    this.http = axios.create({
      baseURL: opts.baseURL,
      timeout: opts.timeoutMs ?? 0,
      adapter: opts.adapter,
      headers: {
        Authorization: `Bearer ${opts.token}`,
        Accept: "application/json",
      },
    });
  }

  describe(req: HttpRequest): string {
    return `${req.method} ${this.http.getUri({ url: req.url, params: req.params })}`;
  }

  async requestJson<T>(req: HttpRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<HttpResult<T>> {
    const res = await this.send(req, "text");
    if (!res.ok) return res;

    const text = bodyText(res.data);
    let parsed: unknown = null;
    if (text.trim()) {
      try {
        parsed = JSON.parse(text);
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        this.log.error(`Failed to decode JSON response from ${this.describe(req)}: ${message}`);
        this.log.error(`Response Text: ${text}`);
        return { ok: false, kind: "decode", status: res.status, message };
      }
    }

    const checked = schema.safeParse(parsed);
    if (!checked.success) {
      const message = checked.error.issues
        .map(i => `${i.path.length ? i.path.join(".") : "(body)"}: ${i.message}`)
        .join("; ");
      this.log.error(`Unexpected response from ${this.describe(req)}: ${message}`);
      return { ok: false, kind: "decode", status: res.status, message };
    }
    return { ok: true, status: res.status, data: checked.data };
  }

  async requestBytes(req: HttpRequest): Promise<HttpResult<Uint8Array>> {
    const res = await this.send(req, "arraybuffer");
    if (!res.ok) return res;
    const { data } = res;
    if (data instanceof Uint8Array) return { ok: true, status: res.status, data };
    if (data instanceof ArrayBuffer) return { ok: true, status: res.status, data: new Uint8Array(data) };
    if (typeof data === "string") return { ok: true, status: res.status, data: Buffer.from(data, "utf8") };
    if (data == null) return { ok: true, status: res.status, data: new Uint8Array(0) };
    const message = `expected a binary body, got ${typeof data}`;
    this.log.error(`Failed to read response from ${this.describe(req)}: ${message}`);
    return { ok: false, kind: "decode", status: res.status, message };
  }

  private async send(req: HttpRequest, responseType: "text" | "arraybuffer"): Promise<HttpResult<unknown>> {
    let res: AxiosResponse<unknown>;
    try {
      res = await this.http.request<unknown>({
        method: req.method,
        url: req.url,
        params: req.params,
        data: req.body,
        headers: req.body === undefined ? undefined : { "Content-Type": "application/json" },
        responseType,
        // bodies are decoded by the caller
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
      });
    } catch (e) {
      const message = axios.isAxiosError(e)
        ? `${e.code ?? "ERR_NETWORK"}: ${e.message}`
        : e instanceof Error ? e.message : String(e);
      this.log.error(`API Request Error (${this.describe(req)}): ${message}`);
      return { ok: false, kind: "transport", message };
    }

    const expected = req.expectedStatus ?? 200;
    if (res.status !== expected) {
      this.log.error(
        `API Request Error (${this.describe(req)}): Unexpected status code. Status: ${res.status}. Body: ${describeBody(res.data)}`,
      );
      return { ok: false, kind: "status", status: res.status, message: `unexpected status ${res.status}` };
    }
    return { ok: true, status: res.status, data: res.data };
  }
}
