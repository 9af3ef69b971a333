// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import type { z } from "zod";
import { SourceUnavailableError, errorMessage } from "../errors.js";
import { moduleLogger } from "../logger.js";
import {
  SearchResponseSchema,
  SprintListResponseSchema,
  SprintReportResponseSchema,
  type RawAbridgedSprint,
  type RawIssue,
  type RawSprintReport,
} from "./schemas.js";

const log = moduleLogger("tracker-client");

const DEFAULT_MAX_RETRIES = 3;
const RETRY_BASE_DELAY_MS = 1000;
const DEFAULT_MAX_RESULTS = 500;

/**
 * The issue tracker as seen by the fetch pipeline. Every call may fail with
 * {@link SourceUnavailableError}.
 */
export interface TrackerClient {
  /** All sprints that ever touched the board, including other teams' sprints. */
  listSprints(boardId: number): Promise<RawAbridgedSprint[]>;
  /** Sprint report for one sprint, or null when the board does not know it. */
  getSprintReport(boardId: number, sprintId: number): Promise<RawSprintReport | null>;
  executeQuery(query: string): Promise<RawIssue[]>;
}

export interface RestTrackerClientOptions {
  baseUrl: string;
  user?: string;
  token?: string;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  maxResults?: number;
}

/** Non-2xx response from the tracker. */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpStatusError";
  }
}

const RETRYABLE_STATUSES = new Set([429, 502, 503, 504]);

/** Check if an error is retryable (network/rate-limit, not auth/not-found). */
export function isRetryable(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return RETRYABLE_STATUSES.has(error.status);
  }
  const cause = error instanceof Error && error.cause instanceof Error ? error.cause.message : "";
  const message = `${errorMessage(error)} ${cause}`;
  return (
    message.includes("ETIMEDOUT") ||
    message.includes("ECONNRESET") ||
    message.includes("ECONNREFUSED") ||
    message.includes("fetch failed") ||
    message.includes("timeout")
  );
}

/**
 * Tracker client over the REST API, using Node's global `fetch`.
 * Transient failures are retried with exponential backoff.
 */
export class RestTrackerClient implements TrackerClient {
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly maxResults: number;
  private readonly headers: Record<string, string>;

  constructor(options: RestTrackerClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? RETRY_BASE_DELAY_MS;
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.headers = { Accept: "application/json" };

    if (options.user && options.token) {
      const encoded = Buffer.from(`${options.user}:${options.token}`).toString("base64");
      this.headers["Authorization"] = `Basic ${encoded}`;
    } else if (options.token) {
      this.headers["Authorization"] = `Bearer ${options.token}`;
    }
  }

  async listSprints(boardId: number): Promise<RawAbridgedSprint[]> {
    const path =
      `/rest/greenhopper/1.0/sprintquery/${boardId}` +
      "?includeHistoricSprints=true&includeFutureSprints=true";
    const json = await this.request("GET", path);
    return this.parse(SprintListResponseSchema, json, `sprint list for board ${boardId}`).sprints;
  }

  async getSprintReport(boardId: number, sprintId: number): Promise<RawSprintReport | null> {
    const path =
      `/rest/greenhopper/1.0/rapid/charts/sprintreport` +
      `?rapidViewId=${boardId}&sprintId=${sprintId}`;
    let json: unknown;
    try {
      json = await this.request("GET", path);
    } catch (err: unknown) {
      if (err instanceof SourceUnavailableError && err.cause instanceof HttpStatusError && err.cause.status === 404) {
        log.debug({ boardId, sprintId }, "Sprint report not found");
        return null;
      }
      throw err;
    }
    return this.parse(SprintReportResponseSchema, json, `sprint report ${sprintId}`);
  }

  async executeQuery(query: string): Promise<RawIssue[]> {
    const json = await this.request("POST", "/rest/api/2/search", {
      jql: query,
      maxResults: this.maxResults,
    });
    return this.parse(SearchResponseSchema, json, "issue search").issues;
  }

  /** Run one HTTP request with retry for transient failures. */
  private async request(method: "GET" | "POST", path: string, body?: unknown): Promise<unknown> {
    log.debug({ method, path }, "tracker %s %s", method, path);

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.send(method, path, body);
      } catch (error: unknown) {
        if (attempt < this.maxRetries && isRetryable(error)) {
          const delay = this.retryBaseDelayMs * Math.pow(2, attempt);
          log.warn(
            { method, path, attempt: attempt + 1, maxRetries: this.maxRetries, delay },
            "Tracker request failed, retrying",
          );
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        const message = errorMessage(error);
        log.error({ method, path, error: message }, "Tracker request failed");
        throw new SourceUnavailableError(`${method} ${path} failed: ${message}`, error);
      }
    }
  }

  private async send(method: "GET" | "POST", path: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { ...this.headers };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (!response.ok) {
      throw new HttpStatusError(response.status, `HTTP ${response.status} ${response.statusText}`.trim());
    }

    const text = await response.text();
    try {
      const json: unknown = JSON.parse(text);
      return json;
    } catch {
      throw new SourceUnavailableError(`Failed to parse tracker response for ${path}: ${text.slice(0, 200)}`);
    }
  }

  private parse<S extends z.ZodTypeAny>(schema: S, json: unknown, what: string): z.output<S> {
    const result = schema.safeParse(json);
    if (!result.success) {
      const detail = result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new SourceUnavailableError(`Malformed ${what} response: ${detail}`, result.error);
    }
    return result.data;
  }
}
