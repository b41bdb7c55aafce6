import type { HTTPClient } from '../types/request.js';
import { mergeSignals } from '../utils/signals.js';
import { defaultClient } from './client.js';

/**
 * Request-scoped execution context passed to every send.
 *
 * Carries the cancellation signal for the exchange and, optionally, the client to send
 * with. Contexts are treated as immutable; the helpers below return new ones.
 */
export interface RequestContext {
  /** Aborting it cancels the send, and the body read of a result request. */
  readonly signal?: AbortSignal;
  /** Client used for sends in this context, {@link defaultClient} when absent. */
  readonly client?: HTTPClient;
}

/** An empty context: no cancellation, default client. */
export function background(): RequestContext {
  return {};
}

/** Returns a copy of `ctx` that sends through `client`. */
export function attachClientToContext(ctx: RequestContext, client: HTTPClient): RequestContext {
  return { ...ctx, client };
}

/** The client attached to `ctx`, or the default client. */
export function clientFromContext(ctx: RequestContext): HTTPClient {
  return ctx.client ?? defaultClient;
}

/** Returns a copy of `ctx` that is also cancelled when `signal` aborts. */
export function withSignal(ctx: RequestContext, signal: AbortSignal): RequestContext {
  const merged = mergeSignals([ctx.signal, signal]);
  return merged ? { ...ctx, signal: merged } : { ...ctx };
}
