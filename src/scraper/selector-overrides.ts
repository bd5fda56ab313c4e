/**
 * Selector sets are configuration: a JSON file can replace the candidate
 * list of any field and the listing / profile-link selector lists.
 *
 * {
 *   "maps": { "fields": { "phone": [{ "selector": "a[href^='tel:']", "attribute": "href" }] } },
 *   "directory": { "profileLinks": [".card a.profile"] }
 * }
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { FieldSpecs } from '../types/index.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const CandidateSchema = z.object({
  selector: z.string().min(1),
  attribute: z.string().min(1).optional(),
  html: z.boolean().optional(),
});

const FieldOverridesSchema = z.record(z.array(CandidateSchema).min(1));

export const SelectorOverridesSchema = z
  .object({
    maps: z
      .object({
        fields: FieldOverridesSchema.optional(),
        listings: z.array(z.string().min(1)).min(1).optional(),
      })
      .strict()
      .optional(),
    directory: z
      .object({
        fields: FieldOverridesSchema.optional(),
        profileLinks: z.array(z.string().min(1)).min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type SelectorOverrides = z.infer<typeof SelectorOverridesSchema>;
export type FieldOverrides = z.infer<typeof FieldOverridesSchema>;

export function parseSelectorOverrides(raw: unknown): SelectorOverrides {
  const parsed = SelectorOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      `Invalid selector overrides at ${issue ? issue.path.join('.') || '(root)' : '(root)'}: ${issue?.message ?? 'unknown error'}`
    );
  }
  return parsed.data;
}

export async function loadSelectorOverrides(filePath: string | undefined): Promise<SelectorOverrides> {
  if (!filePath) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read selector overrides from ${filePath}: ${errorMessage(error)}`);
  }

  const overrides = parseSelectorOverrides(raw);
  logger.info('Loaded selector overrides', { filePath });
  return overrides;
}

/**
 * Copy of the specs with overridden candidate lists. Patterns, normalizers
 * and rejection rules of the built-in specs are kept.
 */
export function applyFieldOverrides<F extends string>(
  specs: FieldSpecs<F>,
  fields: readonly F[],
  overrides: FieldOverrides | undefined
): FieldSpecs<F> {
  const result: FieldSpecs<F> = { ...specs };
  if (!overrides) {
    return result;
  }

  for (const [name, candidates] of Object.entries(overrides)) {
    const field = fields.find(known => known === name);
    if (!field) {
      throw new ConfigError(`Unknown field "${name}" in selector overrides; expected one of ${fields.join(', ')}`);
    }
    result[field] = { ...specs[field], candidates };
  }

  return result;
}
