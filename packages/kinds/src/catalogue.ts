/**
 * Platform error-code catalogue (Linux errno numbering), read from
 * `data/errno.json`
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

import { TaxonomyError } from '@scopeguard/errors';
import { z } from 'zod';

import { FAULT_CATEGORIES } from './kind.js';

export const CatalogueEntrySchema = z.object({
  name: z.string().regex(/^E[A-Z0-9]+$/, 'platform codes look like ENOENT'),
  errno: z.number().int().positive(),
  category: z.enum(FAULT_CATEGORIES),
  description: z.string().min(1),
});

export const CatalogueSchema = z.array(CatalogueEntrySchema);

export type CatalogueEntry = z.infer<typeof CatalogueEntrySchema>;

export const DEFAULT_CATALOGUE_PATH = fileURLToPath(new URL('../data/errno.json', import.meta.url));

/**
 * Parse and validate catalogue entries
 */
export function parseCatalogue(raw: unknown, source = 'catalogue'): CatalogueEntry[] {
  const result = CatalogueSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new TaxonomyError(`Invalid error-code catalogue in ${source}`, {
      code: 'INVALID_CATALOGUE',
      data: { issues },
    });
  }

  return result.data;
}

let cached: readonly CatalogueEntry[] | undefined;

/**
 * Read a catalogue file. The bundled catalogue is read once and cached.
 */
export function loadCatalogue(path: string = DEFAULT_CATALOGUE_PATH): readonly CatalogueEntry[] {
  if (path === DEFAULT_CATALOGUE_PATH && cached) {
    return cached;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new TaxonomyError(`Cannot read error-code catalogue: ${path}`, {
      code: 'CATALOGUE_UNREADABLE',
      ...(error instanceof Error && { cause: error }),
    });
  }

  const entries = parseCatalogue(raw, path);
  if (path === DEFAULT_CATALOGUE_PATH) {
    cached = entries;
  }
  return entries;
}
