/**
 * Pass-level debug logging.
 *
 * Activated by setting BCASTIR_DEBUG=1. When disabled, debugLog is a no-op.
 */

import { config } from "./config";

let enabled = config.debug;

export function isDebugEnabled(): boolean {
  return enabled;
}

export function setDebugEnabled(value: boolean): void {
  enabled = value;
}

export function debugLog(scope: string, message: string): void {
  if (!enabled) return;
  console.debug(`[bcastir:${scope}] ${message}`);
}
