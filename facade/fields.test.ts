import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { GraphArray, GraphObject } from '../core/GraphObject.js'
import { asFacade } from './cast.js'
import { defineFacade } from './defineFacade.js'
import { FacadeList } from './FacadeList.js'
import { encodeGraphInput, field, isFieldCodec } from './fields.js'

describe('field codecs', () => {
  describe('scalars', () => {
    it('should decode matching values and drop the rest', () => {
      const codec = field.string()

      expect(codec.kind).toBe('string')
      expect(codec.decode('a')).toBe('a')
      expect(codec.decode(1)).toBeUndefined()
      expect(field.number().decode(1.5)).toBe(1.5)
      expect(field.boolean().decode('true')).toBeUndefined()
    })

    it('should encode null as null and reject off-kind values', () => {
      expect(field.string().encode(null)).toBeNull()
      expect(field.string().encode(1)).toBeUndefined()
      expect(field.number().encode(2)).toBe(2)
    })

    it('should accept non-empty strings and finite numbers as ids', () => {
      const codec = field.id()

      expect(codec.decode('abc')).toBe('abc')
      expect(codec.decode(5)).toBe(5)
      expect(codec.decode('')).toBeUndefined()
      expect(codec.decode(Number.POSITIVE_INFINITY)).toBeUndefined()
    })

    it('should accept only absolute urls', () => {
      expect(field.url().decode('https://example.com/page')).toBe('https://example.com/page')
      expect(field.url().decode('not a url')).toBeUndefined()
    })

    it('should take any scalar zod schema', () => {
      const codec = field.scalar('place kind', z.enum(['city', 'venue']))

      expect(codec.kind).toBe('place kind')
      expect(codec.decode('city')).toBe('city')
      expect(codec.decode('lake')).toBeUndefined()
    })
  })

  describe('object', () => {
    it('should decode graph objects only', () => {
      const node = GraphObject.create()

      expect(field.object().decode(node)).toBe(node)
      expect(field.object().decode('x')).toBeUndefined()
      expect(field.object().decode(GraphArray.create())).toBeUndefined()
    })

    it('should encode nodes, views and plain documents', () => {
      const node = GraphObject.create()
      const raw = { a: 1 }

      expect(field.object().encode(raw)).toBe(raw)
      expect(field.object().encode(asFacade<{ a?: number }>(node))).toBe(node)
      expect(field.object().encode(new Date(0))).toBeUndefined()
      expect(field.object().encode([1])).toBeUndefined()
    })
  })

  describe('value', () => {
    it('should pass stored values through', () => {
      const list = GraphArray.create()

      expect(field.value().decode(list)).toBe(list)
      expect(field.value().decode(7)).toBe(7)
      expect(field.value().encode(() => 1)).toBeUndefined()
    })
  })

  describe('facade', () => {
    const Location = defineFacade('FieldsLocation', { city: field.string() })

    it('should decode nodes as views of the facade', () => {
      const node = GraphObject.wrap({ city: 'Paris' })
      const codec = field.facade(Location)

      expect(codec.kind).toBe('FieldsLocation')
      expect(codec.decode(node)).toBe(Location.view(node))
      expect(codec.decode('Paris')).toBeUndefined()
    })

    it('should encode views of any facade as their node', () => {
      const node = GraphObject.create()

      expect(field.facade(Location).encode(asFacade<{ city?: string }>(node))).toBe(node)
      expect(field.facade(Location).encode(GraphArray.create())).toBeUndefined()
    })

    it('should build a node from a plain init object', () => {
      const encoded = field.facade(Location).encode({ city: 'Lyon' })

      expect(encoded).toBeInstanceOf(GraphObject)
      if (encoded instanceof GraphObject) {
        expect(encoded.toJSON()).toEqual({ city: 'Lyon' })
      }
    })
  })

  describe('list', () => {
    it('should decode arrays as one FacadeList per array', () => {
      const codec = field.list(field.number())
      const array = GraphArray.wrap([1, 2])

      const list = codec.decode(array)
      expect(codec.kind).toBe('list<number>')
      expect(list).toBeInstanceOf(FacadeList)
      expect(codec.decode(array)).toBe(list)
      expect(codec.decode('x')).toBeUndefined()
    })

    it('should encode plain arrays element by element', () => {
      const codec = field.list(field.number())

      expect(codec.encode([1, 2])).toEqual([1, 2])
      expect(codec.encode([1, 'x'])).toBeUndefined()
      expect(codec.encode('x')).toBeUndefined()
    })

    it('should encode a FacadeList as its array', () => {
      const array = GraphArray.wrap([1])
      const list = new FacadeList(array, field.number())

      expect(field.list(field.number()).encode(list)).toBe(array)
    })
  })

  it('should recognize codecs', () => {
    expect(isFieldCodec(field.string())).toBe(true)
    expect(isFieldCodec({ kind: 'string' })).toBe(false)
    expect(isFieldCodec('string')).toBe(false)
  })
})

describe('encodeGraphInput', () => {
  it('should accept everything a graph object stores', () => {
    const array = [1]
    const node = GraphObject.create()

    expect(encodeGraphInput('a')).toBe('a')
    expect(encodeGraphInput(null)).toBeNull()
    expect(encodeGraphInput(array)).toBe(array)
    expect(encodeGraphInput(node)).toBe(node)
    expect(encodeGraphInput(asFacade<{ a?: string }>(node))).toBe(node)
  })

  it('should reject other values', () => {
    expect(encodeGraphInput(undefined)).toBeUndefined()
    expect(encodeGraphInput(new Map())).toBeUndefined()
    expect(encodeGraphInput(() => 1)).toBeUndefined()
  })
})
