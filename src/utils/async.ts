/**
 * Async Utility Functions
 *
 * @module
 */

// =============================================================================
// Sleep
// =============================================================================

/**
 * Returns a promise that resolves after the specified duration.
 *
 * @param ms - Duration in milliseconds
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Timeout
// =============================================================================

/**
 * Runs `fn` with an AbortSignal that fires after `ms` milliseconds.
 * The timer is always cleared, whether `fn` settles or throws.
 */
export async function withAbortTimeout<T>(
  ms: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), ms);

  try {
    return await fn(controller.signal);
  } finally {
    clearTimeout(timeoutId);
  }
}
