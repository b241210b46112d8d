/**
 * Internal diagnostics for ctxterm, written with a `[DEBUG]` prefix. Off unless
 * NODE_ENV is `debug`; the variable is read on every call so tests can flip it.
 */
export function isDebugEnabled(): boolean {
  return process.env.NODE_ENV === 'debug';
}

export function debugLog(...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.log('[DEBUG]', ...args);
  }
}

export function debugError(...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.error('[DEBUG]', ...args);
  }
}
