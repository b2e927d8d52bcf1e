import { describe, it, expect, vi } from 'vitest'
import { HasInstanceProperties, defineProperties } from '../src/has-properties'
import { InstanceProperty, instanceProperty, property } from '../src/properties'
import { CuekitError, PropertyNotFoundError } from '../src/errors'

class MediaCue extends HasInstanceProperties {
  declare volume: number
}

defineProperties(MediaCue, {
  volume: property(1)
})

describe('HasInstanceProperties', () => {
  describe('attachProperty', () => {
    it('should add the name to this object only', () => {
      const cue = new MediaCue()
      const other = new MediaCue()

      cue.attachProperty('oscAddress', instanceProperty('/cue/1'))

      expect(cue.propertyNames()).toEqual(new Set(['volume', 'oscAddress']))
      expect(other.propertyNames()).toEqual(new Set(['volume']))
      expect(MediaCue.propertyNames()).toEqual(new Set(['volume']))
    })

    it('should read through to the attached value', () => {
      const cue = new MediaCue()

      cue.attachProperty('oscAddress', instanceProperty('/cue/1'))

      expect(cue.get('oscAddress')).toBe('/cue/1')
      expect(Reflect.get(cue, 'oscAddress')).toBe('/cue/1')
    })

    it('should attach silently', () => {
      const cue = new MediaCue()
      const listener = vi.fn()
      cue.propertyChanged.connect(listener)

      cue.set('oscAddress', new InstanceProperty('/cue/1'))

      expect(cue.isProperty('oscAddress')).toBe(true)
      expect(listener).not.toHaveBeenCalled()
    })

    it('should refuse names the object itself uses', () => {
      const cue = new MediaCue()

      expect(() => cue.attachProperty('localProperties', instanceProperty(0))).toThrow(CuekitError)
      expect(() => cue.attachProperty('properties', instanceProperty(0))).toThrow(CuekitError)
    })
  })

  describe('Writes', () => {
    it('should write through the attached property and notify', () => {
      const cue = new MediaCue()
      const attached = instanceProperty('/cue/1')
      cue.attachProperty('oscAddress', attached)
      const any = vi.fn()
      const specific = vi.fn()
      cue.propertyChanged.connect(any)
      cue.changed('oscAddress').connect(specific)

      cue.set('oscAddress', '/cue/2')

      expect(attached.get()).toBe('/cue/2')
      expect(any).toHaveBeenCalledTimes(1)
      expect(any).toHaveBeenCalledWith(cue, 'oscAddress', '/cue/2')
      expect(specific).toHaveBeenCalledWith('/cue/2')
    })

    it('should route attribute assignment through the attached property', () => {
      const cue = new MediaCue()
      const attached = instanceProperty(0)
      cue.attachProperty('loops', attached)

      Reflect.set(cue, 'loops', 3)

      expect(attached.value).toBe(3)
      expect(cue.instanceProperty('loops')).toBe(attached)
    })

    it('should leave declared properties to the class behavior', () => {
      const cue = new MediaCue()
      const any = vi.fn()
      cue.propertyChanged.connect(any)

      cue.volume = 0.5

      expect(cue.get('volume')).toBe(0.5)
      expect(any).toHaveBeenCalledWith(cue, 'volume', 0.5)
    })
  })

  describe('Serialization', () => {
    it('should export attached properties that differ from their default', () => {
      const cue = new MediaCue()
      cue.attachProperty('oscAddress', instanceProperty('/cue/1'))

      expect(cue.properties(false)).toEqual({})

      cue.set('oscAddress', '/cue/9')
      expect(cue.properties(false)).toEqual({ oscAddress: '/cue/9' })
      expect(cue.properties(true)).toEqual({ volume: 1, oscAddress: '/cue/9' })
    })

    it('should include attached defaults in instance defaults', () => {
      const cue = new MediaCue()
      cue.attachProperty('oscAddress', instanceProperty('/cue/1'))
      cue.set('oscAddress', '/cue/9')

      expect(cue.instanceDefaults()).toEqual({ volume: 1, oscAddress: '/cue/1' })
      expect(cue.classDefaults()).toEqual({ volume: 1 })
    })

    it('should load values into attached properties', () => {
      const saved = new MediaCue()
      saved.attachProperty('oscAddress', instanceProperty('/cue/1'))
      saved.set('oscAddress', '/cue/5')
      saved.volume = 0.25

      const loaded = new MediaCue()
      loaded.attachProperty('oscAddress', instanceProperty('/cue/1'))
      loaded.updateProperties(saved.properties(false))

      expect(loaded.get('oscAddress')).toBe('/cue/5')
      expect(loaded.volume).toBe(0.25)
    })

    it('should skip values for properties the object has not attached', () => {
      const loaded = new MediaCue()

      loaded.updateProperties({ oscAddress: '/cue/5' })

      expect(loaded.isProperty('oscAddress')).toBe(false)
      expect(loaded.get('oscAddress')).toBeUndefined()
    })
  })

  describe('detachProperty', () => {
    it('should remove the name, its value and its accessor', () => {
      const cue = new MediaCue()
      cue.attachProperty('oscAddress', instanceProperty('/cue/1'))

      cue.detachProperty('oscAddress')

      expect(cue.propertyNames()).toEqual(new Set(['volume']))
      expect(cue.get('oscAddress')).toBeUndefined()
      expect('oscAddress' in cue).toBe(false)
      expect(() => cue.changed('oscAddress')).toThrow(PropertyNotFoundError)
    })

    it('should reject names that are not attached', () => {
      const cue = new MediaCue()

      expect(() => cue.detachProperty('volume')).toThrow(PropertyNotFoundError)
    })
  })

  describe('Name collisions', () => {
    it('should let the attached property win over the declared one', () => {
      const cue = new MediaCue()
      const attached = instanceProperty(0.5)
      cue.attachProperty('volume', attached)

      expect(cue.volume).toBe(0.5)

      cue.volume = 0.2

      expect(attached.value).toBe(0.2)
      expect(cue.instanceDefaults()).toEqual({ volume: 0.5 })
      expect(cue.properties(false)).toEqual({ volume: 0.2 })
      expect(MediaCue.classDefaults()).toEqual({ volume: 1 })
    })

    it('should reveal the declared property again once detached', () => {
      const cue = new MediaCue()
      cue.attachProperty('volume', instanceProperty(0.5))

      cue.detachProperty('volume')

      expect(cue.volume).toBe(1)
      expect(cue.propertyNames()).toEqual(new Set(['volume']))
    })
  })
})
