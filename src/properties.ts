/**
 * cuekit Property Descriptors
 * ===========================
 *
 * `Property` declares a class-level attribute with a default value.
 * `InstanceProperty` carries a value for exactly one object, so a single cue
 * can gain an attribute its class never declared.
 *
 * Descriptors hold no per-instance state: values live on the objects.
 */

import { cloneValue, deepEqual } from './equality'

// =============================================================================
// CLASS-LEVEL PROPERTIES
// =============================================================================

/**
 * Free-form hints for editors (label, unit, range...). Never read by the core.
 */
export type PropertyMeta = Readonly<Record<string, unknown>>

/**
 * A class-declared property.
 * @template T The value type.
 */
export class Property<T = unknown> {
  readonly default: T
  readonly meta: PropertyMeta

  constructor(defaultValue: T, meta: PropertyMeta = {}) {
    this.default = defaultValue
    this.meta = meta
  }

  /**
   * The value an instance reads before its first write.
   */
  initial(): T {
    return cloneValue(this.default)
  }

  /**
   * Whether a write of `value` over `current` should be stored.
   */
  accepts(_current: T, _value: T): boolean {
    return true
  }
}

/**
 * A property that ignores writes once it holds something other than its
 * default. Ignored writes emit nothing.
 */
export class WriteOnceProperty<T = unknown> extends Property<T> {
  override accepts(current: T, _value: T): boolean {
    return deepEqual(current, this.default)
  }
}

/**
 * Declare a property.
 *
 * @example
 * ```ts
 * defineProperties(Fade, {
 *   duration: property(3000, { label: 'Duration', unit: 'ms' }),
 *   curve: property<'linear' | 'quadratic'>('linear')
 * })
 * ```
 */
export function property<T>(defaultValue: T, meta?: PropertyMeta): Property<T> {
  return new Property(defaultValue, meta)
}

export function writeOnce<T>(defaultValue: T, meta?: PropertyMeta): WriteOnceProperty<T> {
  return new WriteOnceProperty(defaultValue, meta)
}

// =============================================================================
// INSTANCE-LOCAL PROPERTIES
// =============================================================================

/**
 * A property owned by a single object. Attach it with
 * `HasInstanceProperties.attachProperty`.
 * @template T The value type.
 */
export class InstanceProperty<T = unknown> {
  readonly default: T
  value: T

  constructor(defaultValue: T) {
    this.default = defaultValue
    this.value = cloneValue(defaultValue)
  }

  get(): T {
    return this.value
  }

  set(value: T): void {
    this.value = value
  }
}

export function instanceProperty<T>(defaultValue: T): InstanceProperty<T> {
  return new InstanceProperty(defaultValue)
}
