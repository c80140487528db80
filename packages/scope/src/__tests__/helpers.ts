/**
 * Kinds and helpers shared by the scope tests
 */

import { ProtocolError } from '@scopeguard/errors';
import { defaultTaxonomy } from '@scopeguard/kinds';

export const testTaxonomy = defaultTaxonomy.extend('test');
export const Timeout = testTaxonomy.define('Timeout', {
  category: 'network',
  description: 'Peer did not answer in time',
});
export const BadInput = testTaxonomy.define('BadInput', { description: 'Input was rejected' });
export const ENOMEM = defaultTaxonomy.require('ENOMEM');
export const ENOENT = defaultTaxonomy.require('ENOENT');

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

/**
 * Code of the `ProtocolError` thrown by `fn`
 */
export function protocolCode(fn: () => unknown): string {
  const error = captureError(fn);
  if (!(error instanceof ProtocolError)) {
    throw new Error(`expected a ProtocolError, got ${String(error)}`);
  }
  return error.code;
}
