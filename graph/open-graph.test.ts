import { describe, it, expect } from 'vitest'
import { GraphObject } from '../core/GraphObject.js'
import { nodeOf } from '../facade/cast.js'
import { GraphPlace } from './facades.js'
import { createOpenGraphAction, createOpenGraphObject } from './open-graph.js'

describe('createOpenGraphObject', () => {
  it('should set the type and an empty data object', () => {
    const recipe = createOpenGraphObject('cookbook:recipe', {
      title: 'Tarte Tatin',
      url: 'https://example.com/recipes/tatin',
    })

    expect(recipe.type).toBe('cookbook:recipe')
    expect(recipe.data).toBeInstanceOf(GraphObject)
    expect(nodeOf(recipe)?.toJSON()).toEqual({
      title: 'Tarte Tatin',
      url: 'https://example.com/recipes/tatin',
      type: 'cookbook:recipe',
      data: {},
    })
  })

  it('should keep given data', () => {
    const recipe = createOpenGraphObject('cookbook:recipe', { data: { servings: 6 } })

    expect(recipe.data?.get('servings')).toBe(6)
    recipe.data?.set('minutes', 45)
    expect(nodeOf(recipe)?.toJSON()).toEqual({
      type: 'cookbook:recipe',
      data: { servings: 6, minutes: 45 },
    })
  })

  it('should keep the type passed as the first argument', () => {
    const recipe = createOpenGraphObject('cookbook:recipe', JSON.parse('{"type":"other"}'))

    expect(recipe.type).toBe('cookbook:recipe')
  })

  it('should store off-kind fields as given', () => {
    const recipe = createOpenGraphObject('cookbook:recipe', { url: 'tatin' })

    expect(recipe.url).toBeUndefined()
    expect(nodeOf(recipe)?.get('url')).toBe('tatin')
  })
})

describe('createOpenGraphAction', () => {
  it('should build nested places and tagged users', () => {
    const action = createOpenGraphAction({
      message: 'Baked it',
      place: { id: '110', name: 'Cafe' },
      tags: [{ id: 'u1', name: 'Ann' }],
    })

    expect(action.place?.name).toBe('Cafe')
    expect(action.tags?.at(0)?.name).toBe('Ann')
    expect(JSON.stringify(nodeOf(action))).toBe(
      '{"message":"Baked it","place":{"id":"110","name":"Cafe"},"tags":[{"id":"u1","name":"Ann"}]}'
    )
  })

  it('should store an existing place by reference', () => {
    const placeNode = GraphObject.wrap({ id: '110', name: 'Cafe' })
    const action = createOpenGraphAction()

    action.place = GraphPlace.view(placeNode)
    placeNode.set('name', 'Bistro')

    expect(nodeOf(action.place)).toBe(placeNode)
    expect(action.place?.name).toBe('Bistro')
  })

  it('should store off-kind fields as given', () => {
    const action = createOpenGraphAction(JSON.parse('{"message": 5}'))

    expect(action.message).toBeUndefined()
    expect(nodeOf(action)?.get('message')).toBe(5)
  })
})
