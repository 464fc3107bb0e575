// =============================================================================
// Envelope — Immutable unit of data flowing along an edge
// =============================================================================

/** Source tag carried by the envelope that starts a run. */
export const WORKFLOW_INPUT_SOURCE = "$input";

export type ExecutorId = string;

export interface Envelope<P> {
  readonly source: ExecutorId;
  readonly payload: P;
}

export function createEnvelope<P>(source: ExecutorId, payload: P): Envelope<P> {
  return Object.freeze({ source, payload });
}

/**
 * Envelope carrying a deep copy of the payload. Every delivery gets its own, so
 * a handler mutating its payload is never seen by siblings or joins.
 * Payloads must be structured-cloneable.
 */
export function copyEnvelope<P>(envelope: Envelope<P>): Envelope<P> {
  return createEnvelope(envelope.source, structuredClone(envelope.payload));
}
