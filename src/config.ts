/**
 * cuekit Runtime Configuration
 * ============================
 *
 * Process-wide options for the property model. The host application calls
 * `configure` once at start-up; tests call `resetConfig` between cases.
 */

import type { ErrorHandler } from './errors'

export interface CuekitConfig {
  /**
   * Receives subscriber failures. Defaults to logging through `console.error`.
   */
  onError: ErrorHandler | undefined
  /**
   * Log skipped keys during deserialization and registry changes made after
   * class definition.
   */
  devMode: boolean
}

const defaults: CuekitConfig = {
  onError: undefined,
  devMode: false
}

let current: CuekitConfig = { ...defaults }

/**
 * Merge the given options into the active configuration.
 *
 * @example
 * ```ts
 * configure({
 *   devMode: process.env.NODE_ENV !== 'production',
 *   onError: (error, { signal }) => showErrorDialog(signal, error)
 * })
 * ```
 */
export function configure(options: Partial<CuekitConfig>): void {
  current = { ...current, ...options }
}

export function getConfig(): Readonly<CuekitConfig> {
  return current
}

export function resetConfig(): void {
  current = { ...defaults }
}

/**
 * Dev-mode logging. Silent unless `devMode` is on.
 */
export const devLog = {
  warn(message: string, ...details: unknown[]): void {
    if (current.devMode) console.warn(`[cuekit] ${message}`, ...details)
  },
  debug(message: string, ...details: unknown[]): void {
    if (current.devMode) console.debug(`[cuekit] ${message}`, ...details)
  }
}
