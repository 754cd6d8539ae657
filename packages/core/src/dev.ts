/**
 * packages/core/src/dev.ts — Development-only diagnostics.
 *
 * Uses globalThis.process/console so core stays free of Node.js imports.
 */

const DEV_MODE =
  ((globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
    "development") !== "production";

export function warnDev(message: string): void {
  if (!DEV_MODE) return;
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}
