/**
 * Observer invocation guard
 *
 * @module resilience/observers
 */

/**
 * Invoke an optional observer hook
 *
 * A hook that throws is reported and otherwise ignored; it must never change
 * the outcome of the execution that triggered it.
 */
export function notify<A extends unknown[]>(
  hookName: string,
  hook: ((...args: A) => void) | undefined,
  ...args: A
): void {
  if (!hook) {
    return;
  }

  try {
    hook(...args);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[resilience] Observer ${hookName} threw:`, message);
  }
}
