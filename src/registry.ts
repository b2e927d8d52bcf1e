/**
 * cuekit Property Registry
 * ========================
 *
 * Tracks which names are properties for each class. Every class gets an
 * entry linked to its parent's entry; an entry's name set always contains
 * its parent's, and additions or removals made after definition cascade down
 * the live child lists.
 *
 * Entries are created the first time a class is touched (defined, queried or
 * instantiated). A new entry copies its parent's current names, so a subclass
 * first seen after a cascade still inherits the result.
 *
 * The registry is process-wide and unsynchronised: define classes from one
 * context only.
 */

import { devLog } from './config'
import { cloneValue } from './equality'
import { PropertyNotFoundError } from './errors'
import type { Property } from './properties'

// =============================================================================
// TYPES
// =============================================================================

/**
 * Any class. The registry is keyed by constructor identity.
 */
export type PropertyOwnerType = abstract new (...args: never[]) => unknown

/**
 * Receives a copy of the full name set and returns the names to keep (or a
 * set it builds).
 */
export type PropertyFilter = (names: Set<string>) => Set<string>

interface RegistryEntry {
  readonly type: PropertyOwnerType
  readonly parent: RegistryEntry | undefined
  readonly children: Set<RegistryEntry>
  /** Names declared on this class or inherited. */
  readonly names: Set<string>
  /** Descriptors declared on this class itself. */
  readonly declared: Map<string, Property>
}

function isOwnerType(value: unknown): value is PropertyOwnerType {
  return typeof value === 'function' && value !== Function.prototype
}

function typeName(type: PropertyOwnerType): string {
  return type.name || '(anonymous class)'
}

// =============================================================================
// REGISTRY
// =============================================================================

export class PropertyRegistry {
  private entries = new Map<PropertyOwnerType, RegistryEntry>()

  /**
   * Declare `name` on `type` and add it to every live subclass.
   * A second declaration on the same class replaces the descriptor.
   */
  register(type: PropertyOwnerType, name: string, property: Property): void {
    const entry = this.entry(type)
    entry.declared.set(name, property)
    this.cascadeAdd(entry, name)
  }

  /**
   * Remove a name declared on `type` from it and from its live subclasses.
   * Subclasses that declare the name themselves keep it.
   */
  unregister(type: PropertyOwnerType, name: string): void {
    const entry = this.entry(type)
    if (!entry.declared.delete(name)) {
      throw new PropertyNotFoundError(typeName(type), name)
    }

    // Still inherited from an ancestor
    if (this.resolve(entry, name)) return

    this.cascadeDelete(entry, name)
  }

  /**
   * A copy of the names recognised by `type`.
   */
  names(type: PropertyOwnerType, filter?: PropertyFilter): Set<string> {
    const names = new Set(this.entry(type).names)
    return filter ? filter(names) : names
  }

  has(type: PropertyOwnerType, name: string): boolean {
    return this.entry(type).names.has(name)
  }

  /**
   * The nearest declaration of `name`, walking up from `type`.
   */
  property(type: PropertyOwnerType, name: string): Property | undefined {
    return this.resolve(this.entry(type), name)
  }

  /**
   * Declared defaults of every name, without descending into nested objects.
   * Plain-data defaults are copies.
   */
  defaults(type: PropertyOwnerType, filter?: PropertyFilter): Record<string, unknown> {
    const defaults: Record<string, unknown> = {}
    for (const name of this.names(type, filter)) {
      const property = this.property(type, name)
      if (property) defaults[name] = cloneValue(property.default)
    }
    return defaults
  }

  /**
   * Live direct subclasses known to the registry.
   */
  subtypes(type: PropertyOwnerType): PropertyOwnerType[] {
    return [...this.entry(type).children].map(child => child.type)
  }

  private entry(type: PropertyOwnerType): RegistryEntry {
    const existing = this.entries.get(type)
    if (existing) return existing

    const parentType: unknown = Object.getPrototypeOf(type)
    const parent = isOwnerType(parentType) ? this.entry(parentType) : undefined

    const entry: RegistryEntry = {
      type,
      parent,
      children: new Set(),
      names: new Set(parent?.names),
      declared: new Map()
    }
    parent?.children.add(entry)
    this.entries.set(type, entry)
    return entry
  }

  private resolve(entry: RegistryEntry | undefined, name: string): Property | undefined {
    for (let current = entry; current; current = current.parent) {
      const property = current.declared.get(name)
      if (property) return property
    }
    return undefined
  }

  private cascadeAdd(entry: RegistryEntry, name: string): void {
    entry.names.add(name)
    for (const child of entry.children) {
      devLog.debug(`Property "${name}" propagated to ${typeName(child.type)}`)
      this.cascadeAdd(child, name)
    }
  }

  private cascadeDelete(entry: RegistryEntry, name: string): void {
    entry.names.delete(name)
    for (const child of entry.children) {
      if (child.declared.has(name)) continue
      devLog.debug(`Property "${name}" removed from ${typeName(child.type)}`)
      this.cascadeDelete(child, name)
    }
  }
}

/**
 * The registry used by `HasProperties` and `defineProperties`.
 */
export const propertyRegistry = new PropertyRegistry()
