import { HarvestOptions, HarvestSource, HarvestStats, RecordSink } from '../types/index.js';
import { Deduplicator } from './deduplicator.js';
import { withRetry, sleep } from '../utils/retry.js';
import { RunFailureError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Drives one source through the pipeline:
 * list page -> per item (retry around visit + extract) -> dedup -> sink
 *
 * Strictly sequential; one item is in flight at a time.
 */
export class ScraperOrchestrator {
  async run<TItem, F extends string>(
    source: HarvestSource<TItem, F>,
    sink: RecordSink<F>,
    options: HarvestOptions
  ): Promise<HarvestStats> {
    const startTime = Date.now();
    const deduplicator = new Deduplicator<F>(source.schema.identity);
    const stats: HarvestStats = {
      source: source.name,
      pagesVisited: 0,
      itemsDiscovered: 0,
      recordsKept: 0,
      duplicatesSkipped: 0,
      itemsFailed: 0,
      durationMs: 0,
    };
    let visited = 0;

    logger.info('Harvest started', { source: source.name, ...options });

    for (let pageNumber = 1; pageNumber <= options.pages; pageNumber++) {
      if (visited >= options.maxResults) {
        logger.info('Result limit reached', { maxResults: options.maxResults });
        break;
      }

      let items: TItem[];
      try {
        items = await source.listItems(pageNumber);
      } catch (error) {
        if (pageNumber === 1) {
          throw new RunFailureError(`Could not load the first listing page: ${errorMessage(error)}`, {
            cause: error,
          });
        }
        logger.warn('Listing page failed, stopping pagination', {
          pageNumber,
          error: errorMessage(error),
        });
        break;
      }

      stats.pagesVisited++;
      stats.itemsDiscovered += items.length;
      logger.info('Listing page loaded', { pageNumber, items: items.length });

      for (const item of items) {
        if (visited >= options.maxResults) {
          break;
        }
        visited++;

        const result = await withRetry(attempt => source.visit(item, attempt), {
          limit: options.retryLimit,
          delayMs: options.retryDelayMs,
          label: source.describe(item),
        });

        if (!result.ok) {
          stats.itemsFailed++;
        } else if (deduplicator.admit(result.value)) {
          sink.add(result.value);
          stats.recordsKept++;
          logger.info('Collected record', {
            count: sink.size,
            item: source.describe(item),
          });
        } else {
          stats.duplicatesSkipped++;
          logger.debug('Skipped duplicate record', { item: source.describe(item) });
        }

        if (options.itemDelayMs) {
          await sleep(options.itemDelayMs);
        }
      }

      if (options.pageDelayMs && pageNumber < options.pages) {
        await sleep(options.pageDelayMs);
      }
    }

    if (stats.itemsDiscovered === 0) {
      throw new RunFailureError(`No listings found for source ${source.name}`);
    }

    stats.durationMs = Date.now() - startTime;

    logger.info('Harvest completed', { ...stats });

    return stats;
  }
}

export const scraperOrchestrator = new ScraperOrchestrator();
