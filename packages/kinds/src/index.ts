/**
 * Error-kind taxonomy
 *
 * - `NoError` and `EarlyReturn` sentinels, distinct variants of `Kind`
 * - Named fault kinds with category, description and numeric value
 * - The platform errno catalogue, loaded from `data/errno.json`
 * - Application-defined kinds through `Taxonomy.define`
 */

import { Taxonomy } from './taxonomy.js';

export {
  FAULT_CATEGORIES,
  NO_ERROR_VALUE,
  EARLY_RETURN_VALUE,
  RESERVED_KIND_NAMES,
  NoError,
  EarlyReturn,
  isNoError,
  isEarlyReturn,
  isFault,
  isFaultCategory,
  kindEquals,
  compareKinds,
  matchKind,
  formatKind,
  type Kind,
  type NoErrorKind,
  type EarlyReturnKind,
  type FaultKind,
  type FaultCategory,
  type KindCategory,
} from './kind.js';

export {
  Taxonomy,
  APPLICATION_VALUE_BASE,
  BUILTIN_KINDS,
  NullRef,
  EnsureViolated,
  Unrecoverable,
  type DefineKindOptions,
  type PlatformErrorLike,
} from './taxonomy.js';

export {
  CatalogueEntrySchema,
  CatalogueSchema,
  DEFAULT_CATALOGUE_PATH,
  loadCatalogue,
  parseCatalogue,
  type CatalogueEntry,
} from './catalogue.js';

/**
 * Built-in kinds plus the platform catalogue. Sealed: applications add their
 * own kinds to `defaultTaxonomy.extend()`.
 */
export const defaultTaxonomy: Taxonomy = Taxonomy.withPlatformCatalogue('default').seal();
