/**
 * Pagination Engine
 *
 * Materializes a result set that the server splits into numbered pages.
 * Pages are requested one at a time in increasing order; the first empty
 * page ends the loop.
 */

import { createLogger, LOG_NAMESPACES } from '../utils/index.js';
import { API } from '../utils/constants.js';

const logger = createLogger(LOG_NAMESPACES.PAGINATION);

/**
 * Fetches one page; resolves to the records of that page
 */
export type PageFetcher<T> = (page: number) => Promise<T[]>;

/**
 * Outcome of a pagination run
 */
export interface PaginationResult<T> {
  /** Records of every page fetched, in page order */
  records: T[];
  /** Number of requests issued, including the terminating empty page */
  pagesFetched: number;
  /** True when the signal aborted the loop before an empty page was seen */
  cancelled: boolean;
}

export interface PaginationOptions {
  /** Checked between pages; an aborted signal stops the loop without an error */
  signal?: AbortSignal;
  /** Page number to start from */
  firstPage?: number;
}

/**
 * Service for walking numbered pages until the server runs out of records
 */
export class PaginationEngine {
  /**
   * Collect all pages
   *
   * A rejected page fetch rejects the whole run; records gathered so far are dropped.
   *
   * @param fetchPage - Issues the request for one page
   * @param context - Context string for logging
   */
  async collect<T>(
    fetchPage: PageFetcher<T>,
    context: string,
    options: PaginationOptions = {},
  ): Promise<PaginationResult<T>> {
    const records: T[] = [];
    let page = options.firstPage ?? API.FIRST_PAGE;
    let pagesFetched = 0;

    for (;;) {
      if (options.signal?.aborted) {
        logger.info(`Pagination of ${context} cancelled after ${pagesFetched} page(s)`);
        return { records, pagesFetched, cancelled: true };
      }

      const batch = await fetchPage(page);
      pagesFetched += 1;

      if (batch.length === 0) {
        break;
      }

      records.push(...batch);
      logger.debug(`Page ${page} of ${context} returned ${batch.length} record(s)`);
      page += 1;
    }

    logger.debug(`Collected ${records.length} record(s) of ${context} over ${pagesFetched} page(s)`);

    return { records, pagesFetched, cancelled: false };
  }
}
