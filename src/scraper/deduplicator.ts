import { ExtractedRecord } from '../types/index.js';
import { normalizeKeyPart } from '../utils/text.js';

/**
 * Remembers the identity keys of records already collected in this run.
 * Keys are never persisted.
 */
export class Deduplicator<F extends string> {
  private readonly keys = new Set<string>();

  constructor(private readonly identity: readonly F[]) {}

  /**
   * Normalized identity key, or null when every identity field is empty
   */
  keyOf(record: ExtractedRecord<F>): string | null {
    const parts = this.identity.map(field => normalizeKeyPart(record[field]));
    if (parts.every(part => part === '')) {
      return null;
    }
    return JSON.stringify(parts);
  }

  seen(key: string): boolean {
    return this.keys.has(key);
  }

  remember(key: string): void {
    this.keys.add(key);
  }

  /**
   * True when the record should be kept. Records without identity are
   * always kept since they carry nothing to compare.
   */
  admit(record: ExtractedRecord<F>): boolean {
    const key = this.keyOf(record);
    if (key === null) {
      return true;
    }
    if (this.seen(key)) {
      return false;
    }
    this.remember(key);
    return true;
  }

  get size(): number {
    return this.keys.size;
  }
}
