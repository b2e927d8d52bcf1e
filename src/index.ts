/**
 * cuekit: Reactive Property Model for Show Control
 * ================================================
 *
 * The object model cues and their settings are built on:
 *
 * - Class-declared properties with defaults, tracked per class and inherited
 *   by every subclass
 * - Properties attached to a single object at runtime
 * - Change notification through typed signals, delivered directly, on the
 *   microtask queue, or on a dispatch queue owned by the consumer
 * - Full and sparse serialization to plain maps, and merging loads
 *
 * @license MIT
 */

// =============================================================================
// EXPORTS - PUBLIC API
// =============================================================================

export {
  // Property objects
  HasProperties,
  HasInstanceProperties,
  defineProperties,
  addProperty,
  removeProperty,

  type PropertyMap,
  type HasPropertiesType
} from './has-properties'

export {
  // Descriptors
  Property,
  WriteOnceProperty,
  InstanceProperty,
  property,
  writeOnce,
  instanceProperty,

  type PropertyMeta
} from './properties'

export {
  // Registry
  PropertyRegistry,
  propertyRegistry,

  type PropertyFilter,
  type PropertyOwnerType
} from './registry'

export {
  // Signals
  Signal,
  Connection,
  TaskQueue,
  microtaskContext,
  currentDispatchContext,

  type Slot,
  type Subscription,
  type DispatchContext,
  type ConnectionMode,
  type ConnectionKind
} from './signal'

export {
  // Errors
  CuekitError,
  PropertyNotFoundError,

  type ErrorHandler,
  type SignalErrorContext
} from './errors'

export {
  // Configuration
  configure,
  getConfig,
  resetConfig,

  type CuekitConfig
} from './config'

export { deepEqual } from './equality'
