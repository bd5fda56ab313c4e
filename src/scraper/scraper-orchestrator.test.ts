import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ScraperOrchestrator } from './scraper-orchestrator.js';
import { ExtractedRecord, HarvestOptions, HarvestSource, RecordSchema, RecordSink } from '../types/index.js';
import { RunFailureError } from '../utils/errors.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

type Field = 'name' | 'address';
type Listing = { name: string; address: string };

const schema: RecordSchema<Field> = {
  fields: ['name', 'address'],
  labels: { name: 'Name', address: 'Address' },
  identity: ['name', 'address'],
  blank: { name: '', address: '' },
};

class MemorySink implements RecordSink<Field> {
  readonly records: Array<ExtractedRecord<Field>> = [];

  add(record: ExtractedRecord<Field>): void {
    this.records.push(record);
  }

  get size(): number {
    return this.records.length;
  }
}

function pagedSource(
  pages: Listing[][],
  visit: (item: Listing, attempt: number) => Promise<ExtractedRecord<Field>> = async item => ({ ...item })
): HarvestSource<Listing, Field> {
  return {
    name: 'fake',
    schema,
    listItems: async pageNumber => pages[pageNumber - 1] ?? [],
    visit,
    describe: item => item.name,
  };
}

const options: HarvestOptions = { pages: 2, maxResults: 50, retryLimit: 3, retryDelayMs: 0 };

const a = { name: 'Anchor Grill', address: '1 Bay Rd' };
const b = { name: 'Blue Door Cafe', address: '2 Bay Rd' };
const c = { name: 'Corner Deli', address: '3 Bay Rd' };
const d = { name: 'Dockside Diner', address: '4 Bay Rd' };

describe('ScraperOrchestrator', () => {
  let orchestrator: ScraperOrchestrator;
  let sink: MemorySink;

  beforeEach(() => {
    vi.clearAllMocks();
    orchestrator = new ScraperOrchestrator();
    sink = new MemorySink();
  });

  it('should keep 4 records when page 2 repeats page 1 plus one new item', async () => {
    const stats = await orchestrator.run(pagedSource([[a, b, c], [a, b, c, d]]), sink, options);

    expect(sink.records.map(record => record.name)).toEqual([a.name, b.name, c.name, d.name]);
    expect(stats).toMatchObject({
      source: 'fake',
      pagesVisited: 2,
      itemsDiscovered: 7,
      recordsKept: 4,
      duplicatesSkipped: 3,
      itemsFailed: 0,
    });
  });

  it('should skip an item after the retry limit and carry on', async () => {
    const visit = vi.fn(async (item: Listing) => {
      if (item === b) {
        throw new Error('place panel never opened');
      }
      return { ...item };
    });

    const stats = await orchestrator.run(pagedSource([[a, b, c]], visit), sink, options);

    expect(visit.mock.calls.filter(call => call[0] === b)).toHaveLength(3);
    expect(sink.records.map(record => record.name)).toEqual([a.name, c.name]);
    expect(stats.itemsFailed).toBe(1);
  });

  it('should pass the attempt number so a retry can re-query the page', async () => {
    const attempts: number[] = [];
    const visit = async (item: Listing, attempt: number) => {
      attempts.push(attempt);
      if (attempt < 2) {
        throw new Error('stale element');
      }
      return { ...item };
    };

    await orchestrator.run(pagedSource([[a]], visit), sink, options);

    expect(attempts).toEqual([1, 2]);
    expect(sink.size).toBe(1);
  });

  it('should stop visiting at maxResults', async () => {
    const stats = await orchestrator.run(pagedSource([[a, b, c], [d]]), sink, { ...options, maxResults: 2 });

    expect(sink.records.map(record => record.name)).toEqual([a.name, b.name]);
    expect(stats.pagesVisited).toBe(1);
  });

  it('should keep records whose identity fields are all empty', async () => {
    const blank = { name: '', address: '' };

    await orchestrator.run(pagedSource([[blank, blank]]), sink, options);

    expect(sink.size).toBe(2);
  });

  it('should fail the run when the first page cannot be loaded', async () => {
    const source = pagedSource([]);
    source.listItems = async () => {
      throw new Error('net::ERR_NAME_NOT_RESOLVED');
    };

    await expect(orchestrator.run(source, sink, options)).rejects.toBeInstanceOf(RunFailureError);
  });

  it('should stop paginating when a later page fails', async () => {
    const source = pagedSource([[a]]);
    source.listItems = async pageNumber => {
      if (pageNumber === 2) {
        throw new Error('timeout');
      }
      return [a];
    };

    const stats = await orchestrator.run(source, sink, { ...options, pages: 3 });

    expect(stats.pagesVisited).toBe(1);
    expect(sink.size).toBe(1);
  });

  it('should fail the run when no listings are found at all', async () => {
    await expect(orchestrator.run(pagedSource([[], []]), sink, options)).rejects.toThrow(
      'No listings found for source fake'
    );
  });

  it('should continue past an empty page', async () => {
    const stats = await orchestrator.run(pagedSource([[], [a]]), sink, options);

    expect(stats.pagesVisited).toBe(2);
    expect(sink.size).toBe(1);
  });
});
