/**
 * cuekit Errors
 * =============
 *
 * Error types raised by the property system, and the error channel that
 * signal deliveries report to instead of throwing into the emitter.
 */

import { getConfig } from './config'
import type { ConnectionKind } from './signal'

// =============================================================================
// ERROR TYPES
// =============================================================================

/**
 * Base class for every error thrown by cuekit.
 */
export class CuekitError extends Error {
  readonly code: string

  constructor(code: string, message: string) {
    super(`[cuekit] ${message}`)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * Raised when an operation names a property the target does not have.
 */
export class PropertyNotFoundError extends CuekitError {
  readonly owner: string
  readonly property: string

  constructor(owner: string, property: string) {
    super('PROPERTY_NOT_FOUND', `'${owner}' has no property '${property}'`)
    this.owner = owner
    this.property = property
  }
}

// =============================================================================
// ERROR CHANNEL
// =============================================================================

/**
 * Describes the delivery that failed.
 */
export interface SignalErrorContext {
  /** Name given to the signal, if any. */
  readonly signal: string | undefined
  /** How the failing subscriber was connected. */
  readonly mode: ConnectionKind
}

export type ErrorHandler = (error: unknown, context: SignalErrorContext) => void

/**
 * Pass a subscriber failure to the configured handler, or log it.
 * A handler that throws is itself logged; nothing propagates back into the
 * emission loop.
 */
export function reportSignalError(error: unknown, context: SignalErrorContext): void {
  const { onError } = getConfig()
  if (onError) {
    try {
      onError(error, context)
      return
    } catch (handlerError) {
      console.error('[cuekit] Error handler failed:', handlerError)
    }
  }
  const label = context.signal ? `"${context.signal}"` : '(anonymous)'
  console.error(`[cuekit] Subscriber of signal ${label} failed during ${context.mode} delivery:`, error)
}
