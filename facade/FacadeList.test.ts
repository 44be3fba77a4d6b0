import { describe, it, expect } from 'vitest'
import { GraphArray, unwrapView } from '../core/GraphObject.js'
import { defineFacade } from './defineFacade.js'
import { FacadeList } from './FacadeList.js'
import { field } from './fields.js'

describe('FacadeList', () => {
  it('should decode elements and keep off-kind ones as undefined', () => {
    const list = new FacadeList(GraphArray.wrap([1, 'two', 3]), field.number())

    expect(list.length).toBe(3)
    expect(list.at(0)).toBe(1)
    expect(list.at(1)).toBeUndefined()
    expect(list.at(-1)).toBe(3)
    expect(list.toArray()).toEqual([1, undefined, 3])
    expect(list.map((value) => value ?? 0)).toEqual([1, 0, 3])
  })

  it('should write through to the backing array', () => {
    const array = GraphArray.wrap([1, 2])
    const list = new FacadeList(array, field.number())

    list.set(1, 20)
    expect(list.push(30, 40)).toBe(4)
    list.remove(0)

    expect(array.toJSON()).toEqual([20, 30, 40])
    expect(list.toJSON()).toEqual([20, 30, 40])
  })

  it('should store off-kind elements as given', () => {
    const array = GraphArray.wrap([1])
    const list = new FacadeList(array, field.number())

    list.set(0, JSON.parse('"x"'))
    list.push(2, JSON.parse('"y"'))

    expect(array.toJSON()).toEqual(['x', 2, 'y'])
    expect(list.toArray()).toEqual([undefined, 2, undefined])
  })

  it('should reject elements a graph array cannot store, with their index', () => {
    const list = new FacadeList<number, unknown>(GraphArray.wrap([1]), field.number())

    expect(() => list.set(0, new Date(0))).toThrow('Cannot write FacadeList.[0]: expected number')
    expect(() => list.push(2, () => 3)).toThrow('Cannot write FacadeList.[2]: expected number')
    expect(list.length).toBe(1)
  })

  it('should view and create facade elements', () => {
    const City = defineFacade('ListCity', { name: field.string() })
    const list = new FacadeList(GraphArray.wrap([{ name: 'Paris' }]), field.facade(City))

    list.push({ name: 'Lyon' })

    expect(list.at(0)?.name).toBe('Paris')
    expect(list.map((city) => city?.name)).toEqual(['Paris', 'Lyon'])
  })

  it('should be registered as a view of its array', () => {
    const array = GraphArray.create()
    const list = new FacadeList(array, field.string())

    expect(list.graphArray).toBe(array)
    expect(unwrapView(list)).toBe(array)
  })
})
