import { setTimeout as sleep } from "timers/promises";
import { z } from "zod";

import { logger } from "../utils/logger.js";

export class ServiceHttpError extends Error {
  constructor(
    message: string,
    public readonly service: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ServiceHttpError";
  }

  get retryable(): boolean {
    return this.status === undefined || this.status >= 500;
  }
}

export interface HttpServiceOptions {
  name: string;
  baseUrl: string;
  timeoutMs: number;
  maxRetries?: number;
  /** Linear backoff step between retries. */
  retryDelayMs?: number;
  apiKey?: string;
}

const HEALTH_TIMEOUT_MS = 5000;

/**
 * JSON-over-HTTP access to one remediation service. POSTs are retried on
 * network errors and 5xx responses; 4xx responses and caller aborts are not.
 */
export class HttpService {
  readonly name: string;
  private readonly baseUrl: string;

  constructor(private readonly options: HttpServiceOptions) {
    this.name = options.name;
    this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl.slice(0, -1) : options.baseUrl;
  }

  get url(): string {
    return this.baseUrl;
  }

  async postJson<T>(
    path: string,
    body: unknown,
    schema: z.ZodType<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const maxRetries = this.options.maxRetries ?? 0;
    const retryDelayMs = this.options.retryDelayMs ?? 600;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.request(path, { method: "POST", body }, schema, signal);
      } catch (err) {
        const retryable = err instanceof ServiceHttpError && err.retryable && !signal?.aborted;
        if (!retryable || attempt >= maxRetries) throw err;
        logger.debug(
          `${this.name} POST ${path} failed (${err.message}), retry ${String(attempt + 1)}/${String(maxRetries)}`
        );
        await sleep(retryDelayMs * (attempt + 1), undefined, { signal });
      }
    }
  }

  async getJson<T>(path: string, schema: z.ZodType<T>, signal?: AbortSignal): Promise<T> {
    return this.request(path, { method: "GET" }, schema, signal);
  }

  /** True when `GET /health` answers 2xx within five seconds. */
  async ping(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`, {
        headers: this.headers(),
        signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS),
      });
      return response.ok;
    } catch (err) {
      logger.debug(`${this.name} health check failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    if (this.options.apiKey) {
      headers["X-API-Key"] = this.options.apiKey;
    }
    return headers;
  }

  private async request<T>(
    path: string,
    init: { method: "GET" | "POST"; body?: unknown },
    schema: z.ZodType<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await fetch(url, {
        method: init.method,
        headers: this.headers(),
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: combined,
      });
    } catch (err) {
      if (signal?.aborted) {
        throw new ServiceHttpError(`${this.name} request to ${path} was cancelled`, this.name, 499, {
          cause: signal.reason,
        });
      }
      if (timeout.aborted) {
        throw new ServiceHttpError(
          `${this.name} request to ${path} timed out after ${String(this.options.timeoutMs)}ms`,
          this.name,
          undefined,
          { cause: err }
        );
      }
      throw new ServiceHttpError(
        `${this.name} request to ${path} failed: ${err instanceof Error ? err.message : String(err)}`,
        this.name,
        undefined,
        { cause: err }
      );
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new ServiceHttpError(
        `${this.name} responded ${String(response.status)}: ${text.slice(0, 200)}`,
        this.name,
        response.status
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new ServiceHttpError(`${this.name} returned malformed JSON`, this.name, response.status, {
        cause: err,
      });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ServiceHttpError(
        `${this.name} returned an unexpected payload: ${parsed.error.issues
          .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
          .join("; ")}`,
        this.name,
        response.status
      );
    }
    return parsed.data;
  }
}
