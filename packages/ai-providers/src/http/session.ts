/**
 * @module http/session
 * @description JSON-over-HTTPS session shared by the backend adapters.
 *
 * A session carries the adapter's auth headers and applies one retry policy:
 * HTTP 429 and transport failures back off for `2^attempt` seconds (or the
 * `Retry-After` value where the backend sends one) up to `maxRetries` times;
 * 400, 401 and 402 fail at once.
 */

import {
  BackendError,
  InvalidRequestError,
  JobNotFoundError,
  NetworkError,
  RateLimitError,
  createLogger,
  errorMessage,
  type Logger,
} from "@clipmesh/core";
import { defaultSleep, type Sleep } from "../interface/helpers.js";
import { asObject, type JsonObject } from "./json.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface HttpSessionOptions {
  baseUrl: string;
  headers: Record<string, string>;
  /** Per-request timeout in seconds */
  timeoutSeconds: number;
  maxRetries: number;
  /** Prefer the `Retry-After` header over exponential backoff on 429 */
  honorRetryAfter?: boolean;
  fetch?: FetchLike;
  sleep?: Sleep;
  logger?: Logger;
}

const MAX_ERROR_BODY = 500;

export class HttpSession {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly honorRetryAfter: boolean;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly inFlight = new Set<AbortController>();
  private isClosed = false;

  constructor(options: HttpSessionOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.headers = { ...options.headers };
    this.timeoutMs = options.timeoutSeconds * 1000;
    this.maxRetries = options.maxRetries;
    this.honorRetryAfter = options.honorRetryAfter ?? false;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger("http");
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Send one request and decode the JSON body of a 2xx response.
   */
  async request(method: HttpMethod, endpoint: string, body?: JsonObject): Promise<JsonObject> {
    const url = `${this.baseUrl}${endpoint}`;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (this.isClosed) throw new NetworkError("Session is closed");

      let response: Response;
      try {
        response = await this.send(method, url, body);
      } catch (error) {
        if (this.isClosed) throw new NetworkError("Session is closed", { cause: error });
        if (attempt < this.maxRetries) {
          const delay = 2 ** attempt * 1000;
          this.logger.warn("Network error, retrying", { url, attempt, delayMs: delay, error: errorMessage(error) });
          await this.sleep(delay);
          continue;
        }
        throw new NetworkError(`Network error after ${this.maxRetries} retries: ${errorMessage(error)}`, {
          cause: error,
          details: { url },
        });
      }

      if (response.ok) return this.decode(response);

      const text = (await response.text()).slice(0, MAX_ERROR_BODY);
      switch (response.status) {
        case 429:
          if (attempt < this.maxRetries) {
            const delay = this.retryDelay(response, attempt);
            this.logger.warn("Rate limited, retrying", { url, attempt, delayMs: delay });
            await this.sleep(delay);
            continue;
          }
          throw new RateLimitError(`Rate limit exceeded: ${text}`, { details: { url } });
        case 400:
          throw new InvalidRequestError(`Invalid request: ${text}`, { details: { url } });
        case 401:
          throw new BackendError(`Authentication failed: ${text}`, 401, { details: { url } });
        case 402:
          throw new BackendError(`Insufficient credits: ${text}`, 402, { details: { url } });
        case 404:
          throw new JobNotFoundError(`Not found: ${text}`, { details: { url } });
        default:
          throw new BackendError(`API error ${response.status}: ${text}`, response.status, { details: { url } });
      }
    }

    // Unreachable: the last attempt always returns or throws.
    throw new NetworkError(`Request to ${url} was not attempted`);
  }

  /** Abort requests in flight and refuse new ones */
  async close(): Promise<void> {
    this.isClosed = true;
    for (const controller of this.inFlight) controller.abort();
    this.inFlight.clear();
  }

  private async send(method: HttpMethod, url: string, body?: JsonObject): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    this.inFlight.add(controller);
    try {
      return await this.fetchImpl(url, {
        method,
        headers: this.headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }

  private async decode(response: Response): Promise<JsonObject> {
    const text = await response.text();
    if (text.trim() === "") return {};
    try {
      return asObject(JSON.parse(text));
    } catch (error) {
      throw new BackendError(`Invalid JSON response: ${errorMessage(error)}`, response.status, { cause: error });
    }
  }

  private retryDelay(response: Response, attempt: number): number {
    if (this.honorRetryAfter) {
      const header = response.headers.get("retry-after");
      const seconds = header === null ? NaN : Number(header);
      if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
    }
    return 2 ** attempt * 1000;
  }
}
