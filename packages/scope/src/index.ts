/**
 * Structured error propagation for synchronous code
 *
 * - `throws`/`guarded`/`protect` open a per-call error context
 * - `ctx.try(...).in(...).catch(...).otherwise(...).finally(...)` nests
 *   protected blocks whose finalizers run exactly once
 * - `ctx.bind`/`maybe`/`ensure`/`check`/`inherit` turn values and platform
 *   errors into raised kinds
 */

export { throws, guarded, protect, type ProtectedBody } from './boundary.js';
export { FunctionErrorContext } from './context.js';
export {
  FRAME_PHASES,
  FrameBuilder,
  catching,
  otherwise,
  type FramePhase,
  type FrameState,
  type Handler,
  type HandlerClause,
} from './frame.js';
export { KindError, toError, unwrap } from './interop.js';
export {
  LOGGER_COMPONENT,
  ProtocolConfigSchema,
  loadProtocolOptions,
  toProtocolOptions,
  type ProtocolConfig,
  type ProtocolOptions,
} from './options.js';
export { succeeded, failed, type Outcome } from './outcome.js';

export * from '@scopeguard/kinds';
