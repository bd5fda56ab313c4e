import {
  ExtractedRecord,
  ExtractionSource,
  FieldSpec,
  FieldSpecs,
  RecordSchema,
  SelectorCandidate,
} from '../types/index.js';
import { cleanText, firstMatch } from '../utils/text.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Clean a raw value and run it through the field's pattern, normalizer and
 * rejection rule. Returns '' when the value does not qualify.
 */
export function refineValue(raw: string, spec: FieldSpec): string {
  let value = cleanText(raw);
  if (!value) {
    return '';
  }
  if (spec.pattern) {
    value = firstMatch(value, spec.pattern);
  }
  if (value && spec.normalize) {
    value = spec.normalize(value);
  }
  if (value && spec.reject?.(value)) {
    return '';
  }
  return value;
}

/**
 * Pulls a fixed set of fields out of a page using ordered candidate lists.
 * Never fails: a lookup or refinement error only skips the candidate it
 * happened in.
 */
export class FieldExtractor<F extends string> {
  constructor(
    private readonly schema: RecordSchema<F>,
    private readonly specs: FieldSpecs<F>
  ) {}

  async extract(source: ExtractionSource): Promise<ExtractedRecord<F>> {
    const record: ExtractedRecord<F> = { ...this.schema.blank };

    for (const field of this.schema.fields) {
      record[field] = await this.extractField(source, field);
    }

    return record;
  }

  async extractField(source: ExtractionSource, field: F): Promise<string> {
    const spec = this.specs[field];

    for (const candidate of spec.candidates) {
      try {
        const value = await this.firstQualifying(source, candidate, spec);
        if (value) {
          return value;
        }
      } catch (error) {
        logger.debug('Selector lookup failed', {
          field,
          selector: candidate.selector,
          error: errorMessage(error),
        });
      }
    }

    return '';
  }

  private async firstQualifying(source: ExtractionSource, candidate: SelectorCandidate, spec: FieldSpec): Promise<string> {
    const values = await source.values(candidate);
    for (const raw of values) {
      const value = refineValue(raw, spec);
      if (value) {
        return value;
      }
    }
    return '';
  }
}
