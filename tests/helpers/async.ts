/**
 * Resolves after every queued microtask has run
 */
export function flushMicrotasks(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
