/**
 * GitHub REST client with rate-limit tracking and retry logic.
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { ApiResponse, LimitClass, UNKNOWN_LOCATION } from './types';
import { RateBudget } from './rateBudget';
import { userSchema } from './githubSchemas';
import { QuotaExhaustedError, TransientNetworkError } from './errors';
import { TimeSource, systemClock, withRetry } from './utils';

const GITHUB_API_URL = 'https://api.github.com';

const LONG_WAIT_MS = 5 * 60 * 1000;
const WAIT_SLICE_MS = 60 * 1000;

const LAST_PAGE_PATTERN = /[?&]page=(\d+)>;\s*rel="last"/;

export type QueryParams = Record<string, string | number>;

export interface GitHubClientConfig {
  token?: string;
  baseUrl?: string;
  timeoutMs?: number;
  rateLimitMarginMs?: number;
  maxNetworkRetries?: number;
  networkRetryDelayMs?: number;
  maxQuotaWaits?: number;
  budget?: RateBudget;
  timeSource?: TimeSource;
  /** Replaces the HTTP transport, e.g. with an in-process fake. */
  adapter?: AxiosAdapter;
}

/**
 * A request failed before any HTTP response arrived (DNS, connect, timeout).
 */
function isNetworkFailure(error: unknown): boolean {
  return axios.isAxiosError(error) && error.response === undefined;
}

function normalizeHeaders(raw: AxiosResponse['headers']): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'number') {
      headers[name.toLowerCase()] = String(value);
    }
  }
  return headers;
}

function bodyExcerpt(data: unknown): string {
  const text = typeof data === 'string' ? data : String(JSON.stringify(data));
  return text.slice(0, 200);
}

/**
 * Parse the "last page" hint from a Link header.
 */
export function parseLastPage(linkHeader: string | undefined): number | null {
  if (!linkHeader) return null;
  const match = LAST_PAGE_PATTERN.exec(linkHeader);
  return match ? parseInt(match[1], 10) : null;
}

export class GitHubClient {
  private axiosInstance: AxiosInstance;
  private budget: RateBudget;
  private clock: TimeSource;
  private rateLimitMarginMs: number;
  private maxNetworkRetries: number;
  private networkRetryDelayMs: number;
  private maxQuotaWaits: number;

  constructor(config: GitHubClientConfig = {}) {
    this.budget = config.budget ?? new RateBudget();
    this.clock = config.timeSource ?? systemClock;
    this.rateLimitMarginMs = config.rateLimitMarginMs ?? 10_000;
    this.maxNetworkRetries = config.maxNetworkRetries ?? 5;
    this.networkRetryDelayMs = config.networkRetryDelayMs ?? 5_000;
    this.maxQuotaWaits = config.maxQuotaWaits ?? 10;

    const headers: Record<string, string> = {
      Accept: 'application/vnd.github.v3+json',
      'User-Agent': 'repo-harvester',
    };
    if (config.token) {
      headers.Authorization = `Bearer ${config.token}`;
    }

    this.axiosInstance = axios.create({
      baseURL: config.baseUrl ?? GITHUB_API_URL,
      timeout: config.timeoutMs ?? 30_000,
      headers,
      // Every status is handled by request(); only transport failures throw
      validateStatus: () => true,
      adapter: config.adapter,
    });
  }

  get rateBudget(): RateBudget {
    return this.budget;
  }

  get timeSource(): TimeSource {
    return this.clock;
  }

  /**
   * GET a path, waiting out rate limits and retrying network failures.
   *
   * Statuses other than a quota-exhausted 403 are returned as-is for the
   * caller to interpret.
   */
  async request<T = unknown>(path: string, params: QueryParams = {}, limitClass: LimitClass = 'core'): Promise<ApiResponse<T>> {
    for (let waits = 0; ; waits++) {
      if (this.budget.isDepleted(limitClass, this.clock.nowMs())) {
        const snapshot = this.budget.get(limitClass);
        if (snapshot && snapshot.resetAt !== null) {
          console.log(`${this.limitLabel(limitClass)} budget is spent, waiting for reset before ${path}`);
          await this.waitForReset(snapshot.resetAt);
        }
      }

      const response = await this.send<T>(path, params);
      this.recordBudget(limitClass, response.headers);

      if (response.status === 200) {
        return response;
      }

      if (response.status === 403) {
        const remaining = response.headers['x-ratelimit-remaining'];
        const reset = response.headers['x-ratelimit-reset'];

        if (remaining === '0' && reset) {
          if (waits >= this.maxQuotaWaits) {
            throw new QuotaExhaustedError(path, waits);
          }
          console.warn(`${this.limitLabel(limitClass)} limit exceeded! Remaining requests: ${remaining}`);
          await this.waitForReset(parseInt(reset, 10));
          continue;
        }

        // Forbidden for another reason, e.g. no access
        console.warn(`Error 403: access denied to ${path}`);
        console.warn(`   Response: ${bodyExcerpt(response.data)}...`);
        return response;
      }

      if (response.status === 422) {
        console.warn(`Error 422 (Unprocessable Entity) for ${path}`);
        return response;
      }

      console.warn(`Error ${response.status} for ${path}`);
      console.warn(`   Response: ${bodyExcerpt(response.data)}...`);
      return response;
    }
  }

  /**
   * Total commit count of a repository, derived from the last-page hint of a
   * one-item page.
   */
  async getCommitCount(owner: string, repo: string): Promise<number> {
    const response = await this.request(`/repos/${owner}/${repo}/commits`, { per_page: 1 });
    if (response.status !== 200) {
      return 0;
    }

    const lastPage = parseLastPage(response.headers['link']);
    if (lastPage !== null) {
      return lastPage;
    }

    // No pagination hint: only the returned page can be counted
    return Array.isArray(response.data) ? response.data.length : 0;
  }

  /**
   * Profile location of a user. Null when the profile has none; "Unknown"
   * when the profile could not be fetched.
   */
  async getUserLocation(login: string): Promise<string | null> {
    const response = await this.request(`/users/${encodeURIComponent(login)}`);
    if (response.status !== 200) {
      return UNKNOWN_LOCATION;
    }

    const parsed = userSchema.safeParse(response.data);
    if (!parsed.success) {
      return UNKNOWN_LOCATION;
    }
    const location = parsed.data.location?.trim();
    return location ? location : null;
  }

  private async send<T>(path: string, params: QueryParams): Promise<ApiResponse<T>> {
    try {
      return await withRetry(
        async () => {
          const response = await this.axiosInstance.get<T>(path, { params });
          return {
            status: response.status,
            data: response.data,
            headers: normalizeHeaders(response.headers),
          };
        },
        this.maxNetworkRetries,
        this.networkRetryDelayMs,
        {
          shouldRetry: isNetworkFailure,
          sleep: (ms) => this.clock.sleepMs(ms),
          label: path,
        }
      );
    } catch (error) {
      if (isNetworkFailure(error)) {
        throw new TransientNetworkError(path, this.maxNetworkRetries + 1, error);
      }
      throw error;
    }
  }

  private recordBudget(limitClass: LimitClass, headers: Record<string, string>): void {
    const remaining = headers['x-ratelimit-remaining'];
    if (remaining === undefined) return;

    const parsedRemaining = parseInt(remaining, 10);
    if (Number.isNaN(parsedRemaining)) return;

    const reset = headers['x-ratelimit-reset'];
    const parsedReset = reset ? parseInt(reset, 10) : NaN;
    this.budget.record(
      limitClass,
      parsedRemaining,
      Number.isNaN(parsedReset) ? null : parsedReset,
      this.clock.nowMs()
    );
  }

  /**
   * Sleep until the announced reset (Unix seconds) plus the safety margin.
   * Only the calling task waits.
   */
  private async waitForReset(resetAt: number): Promise<void> {
    const waitMs = Math.max(resetAt * 1000 - this.clock.nowMs(), 0) + this.rateLimitMarginMs;

    if (waitMs > LONG_WAIT_MS) {
      console.log(`Long wait: ${(waitMs / 60_000).toFixed(1)} minutes`);
      let remaining = waitMs;
      while (remaining > 0) {
        const slice = Math.min(WAIT_SLICE_MS, remaining);
        await this.clock.sleepMs(slice);
        remaining -= slice;
        if (remaining > 0) {
          console.log(`   Remaining: ${(remaining / 60_000).toFixed(1)} minutes`);
        }
      }
      return;
    }

    console.log(`Waiting: ${Math.round(waitMs / 1000)} seconds`);
    await this.clock.sleepMs(waitMs);
  }

  private limitLabel(limitClass: LimitClass): string {
    return limitClass === 'search' ? 'Search API' : 'Core API';
  }
}
