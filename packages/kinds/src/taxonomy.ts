/**
 * Kind registry: built-in protocol kinds, platform codes and application kinds
 */

import { TaxonomyError } from '@scopeguard/errors';

import { loadCatalogue, type CatalogueEntry } from './catalogue.js';
import {
  EARLY_RETURN_VALUE,
  NO_ERROR_VALUE,
  RESERVED_KIND_NAMES,
  compareKinds,
  type FaultCategory,
  type FaultKind,
  type Kind,
} from './kind.js';

/**
 * First value handed to kinds defined without one. Sits above every
 * platform errno number.
 */
export const APPLICATION_VALUE_BASE = 4096;

export interface DefineKindOptions {
  category?: FaultCategory;
  description?: string;
  /** Explicit numeric value; shared values are reported by `fromErrno` */
  value?: number;
  /** Platform error code this kind classifies */
  code?: string;
}

function fault<N extends string>(
  name: N,
  value: number,
  ordinal: number,
  category: FaultCategory,
  description: string,
  code?: string
): FaultKind<N> {
  return Object.freeze({
    tag: 'fault' as const,
    name,
    value,
    category,
    description,
    ordinal,
    ...(code !== undefined && { code }),
  });
}

/** A binding found an empty (null or undefined) value */
export const NullRef = fault('NullRef', APPLICATION_VALUE_BASE, 0, 'protocol', 'Empty value where one was required');
/** An `ensure` condition was false */
export const EnsureViolated = fault(
  'EnsureViolated',
  APPLICATION_VALUE_BASE + 1,
  1,
  'protocol',
  'Ensured condition was false'
);
/** A failure with no more specific kind */
export const Unrecoverable = fault(
  'Unrecoverable',
  APPLICATION_VALUE_BASE + 2,
  2,
  'application',
  'Unrecoverable failure'
);

export const BUILTIN_KINDS: readonly FaultKind[] = [NullRef, EnsureViolated, Unrecoverable];

/**
 * Shape of the platform errors Node raises (`fs`, `net`, `child_process`)
 */
export interface PlatformErrorLike {
  code?: unknown;
  errno?: unknown;
}

const isPlatformErrorLike = (value: unknown): value is PlatformErrorLike =>
  typeof value === 'object' && value !== null && ('code' in value || 'errno' in value);

/**
 * A closed, application-extensible set of fault kinds. Faults are identified
 * by name; platform numbers that coincide (`EAGAIN`/`EWOULDBLOCK`) keep
 * separate kinds and show up as ambiguous on number lookup.
 */
export class Taxonomy {
  private readonly byName = new Map<string, FaultKind>();
  private readonly byCode = new Map<string, FaultKind>();
  private readonly byValue = new Map<number, FaultKind[]>();
  private nextValue = APPLICATION_VALUE_BASE + BUILTIN_KINDS.length;
  private sealed = false;

  constructor(readonly label = 'taxonomy') {
    for (const kind of BUILTIN_KINDS) {
      this.register(kind);
    }
  }

  /**
   * Taxonomy with the built-in kinds and the bundled platform catalogue
   */
  static withPlatformCatalogue(label = 'platform', entries = loadCatalogue()): Taxonomy {
    const taxonomy = new Taxonomy(label);
    taxonomy.defineCatalogue(entries);
    return taxonomy;
  }

  /**
   * Define a new fault kind
   */
  define<N extends string>(name: N, options: DefineKindOptions = {}): FaultKind<N> {
    this.assertWritable();
    this.assertName(name);

    if (options.code !== undefined && this.byCode.has(options.code)) {
      throw new TaxonomyError(`Platform code already classified: ${options.code}`, {
        code: 'DUPLICATE_CODE',
        data: { code: options.code, existing: this.byCode.get(options.code)?.name },
      });
    }

    const value = options.value ?? this.nextValue++;
    if (value === NO_ERROR_VALUE || value === EARLY_RETURN_VALUE) {
      throw new TaxonomyError(`Kind ${name} cannot take a sentinel value (${value})`, {
        code: 'RESERVED_VALUE',
        data: { name, value },
      });
    }
    // platform errors report errno negated; lookups go by magnitude
    if (value < 0 || !Number.isInteger(value)) {
      throw new TaxonomyError(`Kind ${name} needs a positive integer value, got ${value}`, {
        code: 'INVALID_VALUE',
        data: { name, value },
      });
    }

    const kind = fault(
      name,
      value,
      this.byName.size,
      options.category ?? 'application',
      options.description ?? name,
      options.code
    );
    this.register(kind);
    return kind;
  }

  /**
   * Define one platform kind per catalogue entry, named after its code
   */
  defineCatalogue(entries: readonly CatalogueEntry[]): void {
    for (const entry of entries) {
      this.define(entry.name, {
        category: entry.category,
        description: entry.description,
        value: entry.errno,
        code: entry.name,
      });
    }
  }

  get(name: string): FaultKind | undefined {
    return this.byName.get(name);
  }

  /**
   * Like `get`, but an unknown name is an error
   */
  require(name: string): FaultKind {
    const kind = this.byName.get(name);
    if (!kind) {
      throw new TaxonomyError(`Unknown kind: ${name}`, {
        code: 'UNKNOWN_KIND',
        data: { name, taxonomy: this.label },
      });
    }
    return kind;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Kind classifying a platform error code such as `ENOENT`
   */
  fromCode(code: string): FaultKind | undefined {
    return this.byCode.get(code);
  }

  /**
   * Every kind carrying this number, in declaration order. More than one
   * result means the number alone cannot tell them apart.
   */
  fromErrno(value: number): readonly FaultKind[] {
    return this.byValue.get(Math.abs(value)) ?? [];
  }

  isAmbiguous(value: number): boolean {
    return this.fromErrno(value).length > 1;
  }

  /**
   * Classify a thrown platform error. The string code is authoritative; the
   * number is used only when it names exactly one kind.
   */
  classify(error: unknown): FaultKind | undefined {
    if (!isPlatformErrorLike(error)) {
      return undefined;
    }

    if (typeof error.code === 'string') {
      const byCode = this.fromCode(error.code);
      if (byCode) {
        return byCode;
      }
    }

    if (typeof error.errno === 'number') {
      const candidates = this.fromErrno(error.errno);
      if (candidates.length === 1) {
        return candidates[0];
      }
    }

    return undefined;
  }

  kinds(): readonly FaultKind[] {
    return [...this.byName.values()];
  }

  compare(a: Kind, b: Kind): number {
    return compareKinds(a, b);
  }

  /**
   * Copy of this taxonomy that accepts new definitions
   */
  extend(label = `${this.label}+`): Taxonomy {
    const copy = new Taxonomy(label);
    for (const kind of this.byName.values()) {
      if (!copy.byName.has(kind.name)) {
        copy.register(kind);
      }
    }
    copy.nextValue = this.nextValue;
    return copy;
  }

  /**
   * Reject further definitions
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  private register(kind: FaultKind): void {
    this.byName.set(kind.name, kind);
    if (kind.code !== undefined) {
      this.byCode.set(kind.code, kind);
    }
    const sameValue = this.byValue.get(kind.value);
    if (sameValue) {
      sameValue.push(kind);
    } else {
      this.byValue.set(kind.value, [kind]);
    }
  }

  private assertWritable(): void {
    if (this.sealed) {
      throw new TaxonomyError(`Taxonomy ${this.label} is sealed; call extend() first`, {
        code: 'TAXONOMY_SEALED',
      });
    }
  }

  private assertName(name: string): void {
    if (name.trim().length === 0) {
      throw new TaxonomyError('Kind names cannot be empty', { code: 'INVALID_KIND_NAME' });
    }
    if (RESERVED_KIND_NAMES.includes(name)) {
      throw new TaxonomyError(`Kind name is reserved for a sentinel: ${name}`, {
        code: 'RESERVED_KIND_NAME',
        data: { name },
      });
    }
    if (this.byName.has(name)) {
      throw new TaxonomyError(`Kind already defined: ${name}`, {
        code: 'DUPLICATE_KIND',
        data: { name, taxonomy: this.label },
      });
    }
  }
}
