/**
 * Debug output for layout tracing.
 * Silent unless LINEFOLD_DEBUG is set in the environment.
 */

export function isDebugEnabled(): boolean {
  const flag = process.env.LINEFOLD_DEBUG;
  return flag !== undefined && flag !== '' && flag !== '0' && flag !== 'false';
}

export function debugLog(...args: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.error('[linefold]', ...args);
}
