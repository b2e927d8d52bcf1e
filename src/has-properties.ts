/**
 * cuekit Property Objects
 * =======================
 *
 * `HasProperties` is the base class for every object whose attributes must be
 * observable and saved to a show file. Subclasses declare their properties
 * once, right after the class body, with `defineProperties`:
 *
 * ```ts
 * class Light extends HasProperties {
 *   declare intensity: number
 *   declare color: string
 * }
 *
 * defineProperties(Light, {
 *   intensity: property(0),
 *   color: property('white')
 * })
 *
 * const light = new Light()
 * light.changed('intensity').connect(value => console.log('intensity', value))
 * light.intensity = 50
 * light.properties(false) // { intensity: 50 }
 * ```
 *
 * Use `declare` for property fields: a field initializer would define an own
 * value on the instance and bypass change notification. Nested property
 * objects are assigned in the constructor (`this.fade = new Fade()`).
 *
 * `HasInstanceProperties` also accepts properties attached to a single
 * object at runtime.
 */

import { devLog } from './config'
import { cloneValue, deepEqual, isRecord } from './equality'
import { CuekitError, PropertyNotFoundError } from './errors'
import { InstanceProperty, type Property } from './properties'
import { propertyRegistry, type PropertyFilter, type PropertyOwnerType } from './registry'
import { Signal } from './signal'

// =============================================================================
// TYPES
// =============================================================================

/**
 * The serialized form of a property object: values are primitives, opaque
 * values, or nested maps for nested property objects.
 */
export type PropertyMap = Record<string, unknown>

/**
 * Any `HasProperties` subclass.
 */
export type HasPropertiesType = (abstract new (...args: never[]) => HasProperties) & {
  readonly prototype: HasProperties
}

/**
 * Anything carrying a declared default: a `Property` or an `InstanceProperty`.
 */
interface DefaultCarrier {
  readonly default: unknown
}

// =============================================================================
// HAS PROPERTIES
// =============================================================================

export class HasProperties {
  /**
   * Emitted after every property write with `(object, name, value)`.
   */
  readonly propertyChanged = new Signal<[HasProperties, string, unknown]>('propertyChanged')

  /** Per-property signals, created on first request. */
  private readonly changedSignals = new Map<string, Signal<[unknown]>>()
  private readonly values = new Map<string, unknown>()
  private readonly ownerType: PropertyOwnerType

  constructor() {
    this.ownerType = new.target
  }

  /**
   * Names of the properties declared on this class and its ancestors.
   */
  static propertyNames(this: PropertyOwnerType, filter?: PropertyFilter): Set<string> {
    return propertyRegistry.names(this, filter)
  }

  /**
   * Declared defaults, without descending into nested objects.
   */
  static classDefaults(this: PropertyOwnerType, filter?: PropertyFilter): PropertyMap {
    return propertyRegistry.defaults(this, filter)
  }

  /**
   * The property names of this object. The returned set is a copy and may be
   * modified freely; `filter` receives it and returns the set to use.
   */
  propertyNames(filter?: PropertyFilter): Set<string> {
    const names = this.collectPropertyNames()
    return filter ? filter(names) : names
  }

  classDefaults(filter?: PropertyFilter): PropertyMap {
    return propertyRegistry.defaults(this.ownerType, filter)
  }

  /**
   * Defaults of this object. Unlike `classDefaults`, defaults that are
   * property objects are replaced by their own `instanceDefaults()`.
   */
  instanceDefaults(filter?: PropertyFilter): PropertyMap {
    const defaults: PropertyMap = {}

    for (const name of this.propertyNames(filter)) {
      const value = this.descriptor(name).default
      defaults[name] = value instanceof HasProperties ? value.instanceDefaults() : cloneValue(value)
    }

    return defaults
  }

  /**
   * Serialize the current state.
   *
   * @param includeDefaults When false, only values that differ from their
   *   default are exported, and nested objects with nothing to export are
   *   left out.
   * @param filter Restricts the exported names, at every nesting level.
   */
  properties(includeDefaults = true, filter?: PropertyFilter): PropertyMap {
    const properties: PropertyMap = {}

    for (const name of this.propertyNames(filter)) {
      const value = this.get(name)

      if (value instanceof HasProperties) {
        const nested = value.properties(includeDefaults, filter)
        if (includeDefaults || Object.keys(nested).length > 0) {
          properties[name] = nested
        }
      } else if (includeDefaults || !deepEqual(value, this.descriptor(name).default)) {
        properties[name] = value
      }
    }

    return properties
  }

  /**
   * Apply a serialized map. Nested maps are merged into the existing nested
   * objects, which are never replaced; unknown names are skipped so older and
   * newer show files load.
   */
  updateProperties(properties: PropertyMap): void {
    const names = this.propertyNames()

    for (const [name, value] of Object.entries(properties)) {
      if (!names.has(name)) {
        devLog.warn(`Skipping unknown property "${name}" of ${this.typeName}`)
        continue
      }

      const current = this.get(name)
      if (!(current instanceof HasProperties)) {
        this.set(name, value)
      } else if (isRecord(value) && !(value instanceof HasProperties)) {
        current.updateProperties(value)
      } else {
        devLog.warn(`Skipping non-map value for nested property "${name}" of ${this.typeName}`)
      }
    }
  }

  /**
   * The signal emitted with `(value)` after `name` is written.
   * Signals are created on first request and cached.
   */
  changed(name: string): Signal<[unknown]> {
    if (!this.isProperty(name)) {
      throw new PropertyNotFoundError(this.typeName, name)
    }

    let signal = this.changedSignals.get(name)
    if (!signal) {
      signal = new Signal<[unknown]>(`${name}Changed`)
      this.changedSignals.set(name, signal)
    }
    return signal
  }

  /**
   * Read an attribute. A property never written reads as a copy of its
   * default; an unknown name reads as whatever was last set, or undefined.
   */
  get(name: string): unknown {
    if (this.values.has(name)) return this.values.get(name)

    const property = propertyRegistry.property(this.ownerType, name)
    if (!property) return undefined

    const value = property.initial()
    this.values.set(name, value)
    return value
  }

  /**
   * Write an attribute. Writes to properties notify `propertyChanged`, then
   * the property's own signal, every time (even for an unchanged value).
   * Other names are stored as plain attributes, without notification.
   */
  set(name: string, value: unknown): void {
    if (!propertyRegistry.has(this.ownerType, name)) {
      this.values.set(name, value)
      return
    }

    const property = propertyRegistry.property(this.ownerType, name)
    if (property && !property.accepts(this.get(name), value)) return

    this.values.set(name, value)
    this.emitChanged(name, value)
  }

  isProperty(name: string): boolean {
    return propertyRegistry.has(this.ownerType, name)
  }

  toJSON(): PropertyMap {
    return this.properties(true)
  }

  protected get typeName(): string {
    return this.ownerType.name || '(anonymous class)'
  }

  protected collectPropertyNames(): Set<string> {
    return propertyRegistry.names(this.ownerType)
  }

  protected descriptor(name: string): DefaultCarrier {
    const property = propertyRegistry.property(this.ownerType, name)
    if (!property) throw new PropertyNotFoundError(this.typeName, name)
    return property
  }

  protected emitChanged(name: string, value: unknown): void {
    this.propertyChanged.emit(this, name, value)
    this.changedSignals.get(name)?.emit(value)
  }
}

// =============================================================================
// HAS INSTANCE PROPERTIES
// =============================================================================

/**
 * A property object that also accepts properties attached to itself only.
 * Attached properties take part in serialization and notification like
 * declared ones, and win over a declared property with the same name.
 *
 * @example
 * ```ts
 * const cue = new MediaCue()
 * cue.attachProperty('osc_address', instanceProperty('/cue/1'))
 * cue.set('osc_address', '/cue/2')   // notifies like a declared property
 * cue.properties(false)              // { ..., osc_address: '/cue/2' }
 * ```
 */
export class HasInstanceProperties extends HasProperties {
  private readonly localProperties = new Map<string, InstanceProperty>()

  /**
   * Attach `property` under `name` and give this object an accessor for it.
   * Attaching is silent; replacing an attached property is allowed.
   */
  attachProperty(name: string, property: InstanceProperty): void {
    assertPropertyName(this.typeName, name)
    this.localProperties.set(name, property)
    installAccessor(this, name)
  }

  detachProperty(name: string): void {
    if (!this.localProperties.delete(name)) {
      throw new PropertyNotFoundError(this.typeName, name)
    }
    Reflect.deleteProperty(this, name)
  }

  instanceProperty(name: string): InstanceProperty | undefined {
    return this.localProperties.get(name)
  }

  override get(name: string): unknown {
    const local = this.localProperties.get(name)
    return local ? local.get() : super.get(name)
  }

  /**
   * Writing an `InstanceProperty` attaches it. Writing a plain value to an
   * attached name goes through the attached property and notifies.
   */
  override set(name: string, value: unknown): void {
    if (value instanceof InstanceProperty) {
      this.attachProperty(name, value)
      return
    }

    const local = this.localProperties.get(name)
    if (local) {
      local.set(value)
      this.emitChanged(name, value)
      return
    }

    super.set(name, value)
  }

  override isProperty(name: string): boolean {
    return this.localProperties.has(name) || super.isProperty(name)
  }

  protected override collectPropertyNames(): Set<string> {
    const names = super.collectPropertyNames()
    for (const name of this.localProperties.keys()) names.add(name)
    return names
  }

  protected override descriptor(name: string): DefaultCarrier {
    return this.localProperties.get(name) ?? super.descriptor(name)
  }
}

// =============================================================================
// DEFINITION
// =============================================================================

/** Instance fields of the base classes. */
const RESERVED_FIELDS = new Set(['propertyChanged', 'changedSignals', 'values', 'ownerType', 'localProperties'])

function assertPropertyName(owner: string, name: string): void {
  if (RESERVED_FIELDS.has(name) || name in HasInstanceProperties.prototype) {
    throw new CuekitError('RESERVED_PROPERTY_NAME', `'${name}' cannot be a property of '${owner}': the name is used by the object itself`)
  }
}

/**
 * Reject names the class (or an ancestor) already uses for a method or field.
 * Accessors are allowed: they are the ones `addProperty` installs.
 */
function assertNotMember(type: HasPropertiesType, name: string): void {
  let target: object | null = type.prototype
  while (target) {
    const descriptor = Object.getOwnPropertyDescriptor(target, name)
    if (descriptor) {
      if ('value' in descriptor) {
        throw new CuekitError('RESERVED_PROPERTY_NAME', `'${name}' cannot be a property of '${type.name}': the name is used by the object itself`)
      }
      return
    }
    target = Object.getPrototypeOf(target)
  }
}

function installAccessor(target: HasProperties, name: string): void {
  Object.defineProperty(target, name, {
    configurable: true,
    enumerable: false,
    get(this: HasProperties): unknown {
      return this.get(name)
    },
    set(this: HasProperties, value: unknown): void {
      this.set(name, value)
    }
  })
}

/**
 * Register the properties of `type`. Call once, right after the class body.
 * Each property also gets an accessor on the class prototype, so plain
 * assignment notifies.
 */
export function defineProperties(type: HasPropertiesType, properties: Record<string, Property>): void {
  for (const [name, property] of Object.entries(properties)) {
    addProperty(type, name, property)
  }
}

/**
 * Add a property to an already defined class. Existing and future subclasses
 * see it too.
 */
export function addProperty(type: HasPropertiesType, name: string, property: Property): void {
  assertPropertyName(type.name, name)
  assertNotMember(type, name)
  propertyRegistry.register(type, name, property)
  installAccessor(type.prototype, name)
}

/**
 * Remove a property declared on `type`, from it and from its subclasses
 * that do not declare it themselves.
 */
export function removeProperty(type: HasPropertiesType, name: string): void {
  propertyRegistry.unregister(type, name)
  Reflect.deleteProperty(type.prototype, name)
}
