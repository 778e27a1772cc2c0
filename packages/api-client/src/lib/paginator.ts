/**
 * Flattens a page-numbered listing endpoint into one ordered array.
 *
 * Pages are fetched one after another until the last fetched page reports
 * `current_page >= total_pages`; a missing pagination block counts as 1 of 1.
 * There is no page cap and no retry: a failure on any page rejects the whole
 * call and the pages gathered so far are dropped.
 */
import type { JsonObject, QueryParams } from '@hostpanel/shared';
import { asObject, getNumber, getObject, getObjects } from './document.js';
import type { PanelTransport } from './transport.js';

export const PAGE_SIZE = 100;

export class Paginator {
  constructor(
    private readonly transport: PanelTransport,
    private readonly pageSize = PAGE_SIZE,
  ) {}

  /**
   * Caller params are merged over `per_page`; `page` is always driven here.
   */
  async listAll(path: string, extraParams: QueryParams = {}): Promise<JsonObject[]> {
    const results: JsonObject[] = [];
    let page = 1;

    for (;;) {
      const query: QueryParams = { per_page: this.pageSize, ...extraParams, page };
      const body = asObject(await this.transport.get(path, query));

      results.push(...getObjects(body, 'data'));

      const pagination = getObject(getObject(body, 'meta'), 'pagination');
      const current = getNumber(pagination, 'current_page') ?? 1;
      const total = getNumber(pagination, 'total_pages') ?? 1;
      if (current >= total) break;

      page += 1;
    }

    return results;
  }
}
