/**
 * cuekit Value Helpers
 * ====================
 *
 * Structural equality and default-value copying shared by the property
 * descriptors and the serializer. Sparse exports compare values the way a
 * show file would: two arrays or plain records are equal when their contents
 * are.
 */

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * True for any non-null, non-array object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * True for objects created by a literal, `Object.create(null)` or `structuredClone`.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

// =============================================================================
// EQUALITY
// =============================================================================

/**
 * A deep equality check for arrays, records, dates, maps and sets.
 * Objects with different prototypes are never equal.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false
  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false
    }
    return true
  }

  if (a instanceof Date && b instanceof Date) {
    return Object.is(a.getTime(), b.getTime())
  }

  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false
    for (const [key, value] of a) {
      if (!b.has(key) || !deepEqual(value, b.get(key))) return false
    }
    return true
  }

  // Set members are compared by identity
  if (a instanceof Set && b instanceof Set) {
    if (a.size !== b.size) return false
    for (const value of a) {
      if (!b.has(value)) return false
    }
    return true
  }

  if (isRecord(a) && isRecord(b)) {
    const keysA = Object.keys(a)
    const keysB = Object.keys(b)
    if (keysA.length !== keysB.length) return false
    for (const key of keysA) {
      if (!(key in b) || !deepEqual(a[key], b[key])) return false
    }
    return true
  }

  return false
}

// =============================================================================
// COPYING
// =============================================================================

/**
 * Copy a declared default before handing it out.
 * Plain data (arrays, literal objects, dates, maps, sets) is cloned so
 * nobody shares a mutable default; anything else is returned as is.
 */
export function cloneValue<T>(value: T): T {
  if (
    Array.isArray(value) ||
    isPlainObject(value) ||
    value instanceof Date ||
    value instanceof Map ||
    value instanceof Set
  ) {
    return structuredClone(value)
  }
  return value
}
