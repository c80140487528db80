/**
 * Error kinds: two control sentinels and named faults
 */

/**
 * Categories of fault. Sentinels sit in the separate `control` category.
 */
export const FAULT_CATEGORIES = [
  'resource',
  'io',
  'network',
  'concurrency',
  'filesystem',
  'protocol',
  'application',
] as const;
export type FaultCategory = (typeof FAULT_CATEGORIES)[number];
export type KindCategory = FaultCategory | 'control';

/** Value of the `NoError` sentinel */
export const NO_ERROR_VALUE = 0;
/** Value of the `EarlyReturn` sentinel */
export const EARLY_RETURN_VALUE = -1;

/**
 * No failure
 */
export interface NoErrorKind {
  readonly tag: 'no_error';
  readonly name: 'NoError';
  readonly value: typeof NO_ERROR_VALUE;
  readonly category: 'control';
}

/**
 * Control left a scope through an explicit return; never a failure
 */
export interface EarlyReturnKind {
  readonly tag: 'early_return';
  readonly name: 'EarlyReturn';
  readonly value: typeof EARLY_RETURN_VALUE;
  readonly category: 'control';
}

/**
 * A named failure condition. Two faults are the same kind when their names
 * match, whatever their numeric values.
 */
export interface FaultKind<N extends string = string> {
  readonly tag: 'fault';
  readonly name: N;
  /** Platform errno number, or a value assigned by the taxonomy */
  readonly value: number;
  readonly category: FaultCategory;
  readonly description: string;
  /** Platform error code such as `ENOENT` */
  readonly code?: string;
  /** Declaration order within the owning taxonomy */
  readonly ordinal: number;
}

export type Kind = NoErrorKind | EarlyReturnKind | FaultKind;

export const NoError: NoErrorKind = Object.freeze({
  tag: 'no_error',
  name: 'NoError',
  value: NO_ERROR_VALUE,
  category: 'control',
});

export const EarlyReturn: EarlyReturnKind = Object.freeze({
  tag: 'early_return',
  name: 'EarlyReturn',
  value: EARLY_RETURN_VALUE,
  category: 'control',
});

export const RESERVED_KIND_NAMES: readonly string[] = [NoError.name, EarlyReturn.name];

export const isNoError = (kind: Kind): kind is NoErrorKind => kind.tag === 'no_error';

export const isEarlyReturn = (kind: Kind): kind is EarlyReturnKind => kind.tag === 'early_return';

export const isFault = (kind: Kind): kind is FaultKind => kind.tag === 'fault';

/**
 * Kind equality: sentinels by variant, faults by name
 */
export function kindEquals(a: Kind, b: Kind): boolean {
  if (a.tag !== b.tag) {
    return false;
  }
  return a.name === b.name;
}

function rank(kind: Kind): number {
  switch (kind.tag) {
    case 'no_error':
      return 0;
    case 'early_return':
      return 1;
    case 'fault':
      return 2;
  }
}

/**
 * Total order over kinds: `NoError`, `EarlyReturn`, then faults by
 * declaration order, with the name breaking ties between taxonomies
 */
export function compareKinds(a: Kind, b: Kind): number {
  const byRank = rank(a) - rank(b);
  if (byRank !== 0 || !isFault(a) || !isFault(b)) {
    return byRank;
  }
  if (a.ordinal !== b.ordinal) {
    return a.ordinal - b.ordinal;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Exhaustive match over the three kind variants
 */
export function matchKind<R>(
  kind: Kind,
  cases: {
    noError: (kind: NoErrorKind) => R;
    earlyReturn: (kind: EarlyReturnKind) => R;
    fault: (kind: FaultKind) => R;
  }
): R {
  switch (kind.tag) {
    case 'no_error':
      return cases.noError(kind);
    case 'early_return':
      return cases.earlyReturn(kind);
    case 'fault':
      return cases.fault(kind);
  }
}

/**
 * `Name(value)`, e.g. `ENOMEM(12)` or `NoError(0)`
 */
export function formatKind(kind: Kind): string {
  return `${kind.name}(${kind.value})`;
}

export function isFaultCategory(value: string): value is FaultCategory {
  return FAULT_CATEGORIES.some(category => category === value);
}
