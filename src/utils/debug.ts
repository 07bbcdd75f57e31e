/**
 * Debug utilities
 * Console logging helpers. Debug output is enabled with ISOBOX_DEBUG=true.
 */

export const DEBUG = process.env.ISOBOX_DEBUG === 'true';

export function debug(message: string, data?: unknown): void {
  if (DEBUG) {
    console.log(`[DEBUG] ${message}`, data ?? '');
  }
}

export function warn(message: string, data?: unknown): void {
  console.warn(`[WARN] ${message}`, data ?? '');
}
