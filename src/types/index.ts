// Extraction model

/**
 * One place to look for a field value.
 * Without `attribute` or `html` the element's visible text is used.
 */
export interface SelectorCandidate {
  selector: string;
  attribute?: string;
  /** Read the element's outer HTML instead of its text */
  html?: boolean;
}

export interface FieldSpec {
  /** Tried in order, first non-empty cleaned value wins */
  candidates: SelectorCandidate[];
  /** Applied to the cleaned value; capture group 1 is used when present */
  pattern?: RegExp;
  normalize?: (value: string) => string;
  reject?: (value: string) => boolean;
}

export type FieldSpecs<F extends string> = Record<F, FieldSpec>;

export type ExtractedRecord<F extends string = string> = Record<F, string>;

export interface RecordSchema<F extends string> {
  /** Column order of the output file */
  fields: readonly F[];
  /** CSV header label per field */
  labels: Record<F, string>;
  /** Fields forming the dedup key */
  identity: readonly F[];
  /** A record with every field empty */
  blank: ExtractedRecord<F>;
}

export interface PageLink {
  text: string;
  href: string;
}

/**
 * Anything the extractor can read values from: a parsed HTML document
 * or a live browser page.
 */
export interface ExtractionSource {
  values(candidate: SelectorCandidate): Promise<string[]>;
  links(selector: string): Promise<PageLink[]>;
}

// Pipeline

export interface HarvestSource<TItem, F extends string> {
  readonly name: string;
  readonly schema: RecordSchema<F>;
  /** Discover the items of one results page (1-based) */
  listItems(pageNumber: number): Promise<TItem[]>;
  /** Visit one item and extract its record; attempt is 1-based */
  visit(item: TItem, attempt: number): Promise<ExtractedRecord<F>>;
  describe(item: TItem): string;
}

export interface RecordSink<F extends string> {
  add(record: ExtractedRecord<F>): void;
  readonly size: number;
}

export interface HarvestOptions {
  pages: number;
  maxResults: number;
  retryLimit: number;
  retryDelayMs: number;
  /** Pause after each item */
  itemDelayMs?: number;
  /** Pause after each results page */
  pageDelayMs?: number;
}

export interface HarvestStats {
  source: string;
  pagesVisited: number;
  itemsDiscovered: number;
  recordsKept: number;
  duplicatesSkipped: number;
  itemsFailed: number;
  durationMs: number;
}

// CLI / configuration

export type SourceName = 'maps' | 'directory';

export type DirectoryStrategy = 'browser' | 'http' | 'capture' | 'api';

export interface DirectorySearch {
  city: string;
  state: string;
  /** "lat,lng" */
  point: string;
  distance: string;
  query: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  browser: {
    headless: boolean;
    executablePath?: string;
    wsEndpoint?: string;
    userAgent: string;
  };
  scrape: {
    maxResults: number;
    retryLimit: number;
    retryDelayMs: number;
    waitTimeoutMs: number;
    scrollPauseMs: number;
    maxScrolls: number;
    httpTimeoutMs: number;
  };
  output: {
    dir: string;
  };
  selectorsFile?: string;
  app: {
    logLevel: LogLevel;
    logFormat: 'text' | 'json';
  };
}
