/**
 * Page-number pagination over GitHub list endpoints.
 */

import { GitHubClient, QueryParams } from '../apiClient';
import { LimitClass } from '../types';

export interface PageQuery {
  path: string;
  params?: QueryParams;
  perPage: number;
  maxItems: number;
  limitClass?: LimitClass;
  /** Courtesy pause between pages, independent of the rate budget. */
  pageDelayMs?: number;
  /** Pick the item array out of a page body. Defaults to the body itself. */
  extractItems?: (body: unknown) => unknown[] | null;
}

/** Returns the accepted item, or null to reject it. */
export type AcceptFn<T> = (raw: unknown) => T | null | Promise<T | null>;

const DEFAULT_PAGE_DELAY_MS = 100;

function bodyAsArray(body: unknown): unknown[] | null {
  return Array.isArray(body) ? body : null;
}

export class Paginator {
  constructor(private client: GitHubClient) {}

  /**
   * Walk pages 1, 2, ... until maxItems items are accepted or the upstream
   * runs out. Items keep upstream order.
   *
   * A non-200 page, an empty page or a short page ends the walk.
   */
  async collect<T>(query: PageQuery, accept: AcceptFn<T>): Promise<T[]> {
    const items: T[] = [];
    if (query.maxItems <= 0) {
      return items;
    }

    const extractItems = query.extractItems ?? bodyAsArray;
    const pageDelayMs = query.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
    let page = 1;

    while (items.length < query.maxItems) {
      const response = await this.client.request(
        query.path,
        { ...query.params, page, per_page: query.perPage },
        query.limitClass ?? 'core'
      );
      if (response.status !== 200) {
        break;
      }

      const pageItems = extractItems(response.data);
      if (!pageItems || pageItems.length === 0) {
        break;
      }

      for (const raw of pageItems) {
        const accepted = await accept(raw);
        if (accepted !== null) {
          items.push(accepted);
          if (items.length >= query.maxItems) {
            break;
          }
        }
      }

      if (pageItems.length < query.perPage || items.length >= query.maxItems) {
        break;
      }

      page++;
      await this.client.timeSource.sleepMs(pageDelayMs);
    }

    return items;
  }
}
