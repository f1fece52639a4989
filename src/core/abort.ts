/**
 * AbortSignal Utilities
 *
 * Composes AbortSignals with timeouts and distinguishes external abort
 * from deadline exceeded. Uses Node 20 native AbortSignal.timeout() and
 * AbortSignal.any().
 */

/**
 * Composes an optional parent AbortSignal with a timeout deadline.
 *
 * The returned signal aborts when either the parent aborts or the
 * timeout expires.
 */
export function composeWithTimeout(
  parent: AbortSignal | undefined,
  timeoutMs: number
): AbortSignal {
  const deadline = AbortSignal.timeout(timeoutMs);

  if (!parent) {
    return deadline;
  }

  return AbortSignal.any([parent, deadline]);
}

/**
 * Checks if an abort reason indicates a timeout (deadline exceeded)
 * rather than external cancellation.
 *
 * AbortSignal.timeout() aborts with a DOMException named "TimeoutError".
 */
export function isTimeoutAbortReason(reason: unknown): boolean {
  return reason instanceof Error && reason.name === 'TimeoutError';
}
