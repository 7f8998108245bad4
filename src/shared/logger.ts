// src/shared/logger.ts — Injected logger shape shared by all components.
// Messages carry a bracketed component tag: "[verification] ...".

export interface Logger {
  info(msg: string, meta?: Record<string, unknown>): void
  warn(msg: string, meta?: Record<string, unknown>): void
  error(msg: string, meta?: Record<string, unknown>): void
}

export const consoleLogger: Logger = console

/** Error message for log metadata. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
