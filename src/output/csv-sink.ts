import { promises as fs } from 'fs';
import * as path from 'path';
import { Parser } from 'json2csv';
import { ExtractedRecord, RecordSchema, RecordSink } from '../types/index.js';
import { logger } from '../utils/logger.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Header row from the schema labels, one row per record, BOM first so
 * spreadsheet tools pick UTF-8.
 */
export function renderCsv<F extends string>(
  schema: RecordSchema<F>,
  records: ReadonlyArray<ExtractedRecord<F>>
): string {
  const parser = new Parser<ExtractedRecord<F>>({
    fields: schema.fields.map(field => ({ label: schema.labels[field], value: field })),
    withBOM: true,
    eol: '\n',
  });
  return parser.parse(records);
}

/**
 * Accumulates records in memory and writes them once at the end of a run
 */
export class CsvSink<F extends string> implements RecordSink<F> {
  private readonly records: Array<ExtractedRecord<F>> = [];

  constructor(
    private readonly schema: RecordSchema<F>,
    private readonly filePath: string
  ) {}

  add(record: ExtractedRecord<F>): void {
    this.records.push(record);
  }

  get size(): number {
    return this.records.length;
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Write the file. Returns its path, or null when there is nothing to write.
   */
  async flush(): Promise<string | null> {
    if (this.records.length === 0) {
      logger.warn('No records collected, no output written', { path: this.filePath });
      return null;
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, renderCsv(this.schema, this.records), 'utf8');

    logger.info('Saved records', { count: this.records.length, path: this.filePath });
    return this.filePath;
  }
}
