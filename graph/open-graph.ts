/**
 * Open graph factories
 *
 * Build new open graph objects and actions on the client, to be handed to
 * the transport layer for posting.
 *
 * @module graph/open-graph
 *
 * @example
 * ```typescript
 * const recipe = createOpenGraphObject('cookbook:recipe', {
 *   title: 'Tarte Tatin',
 *   url: 'https://example.com/recipes/tatin',
 * })
 * recipe.data?.set('servings', 6)
 *
 * const action = createOpenGraphAction({ message: 'Baked it' })
 * action.place = GraphPlace.view(placeNode)
 * ```
 */

import { GraphObject } from '../core/GraphObject.js'
import type { FacadeInitOf } from '../facade/defineFacade.js'
import { OpenGraphAction, OpenGraphObject } from './facades.js'

export type OpenGraphObjectInit = Omit<FacadeInitOf<typeof OpenGraphObject>, 'type'>
export type OpenGraphActionInit = FacadeInitOf<typeof OpenGraphAction>

/**
 * New open graph object of `type`, with an empty `data` object unless one is
 * given
 *
 * @throws FacadeWriteError when a field in `init` holds a value a graph
 *   object cannot store
 */
export function createOpenGraphObject(type: string, init: OpenGraphObjectInit = {}): OpenGraphObject {
  const object = OpenGraphObject.create({ ...init, type })
  if (object.data === undefined) {
    object.data = GraphObject.create()
  }
  return object
}

/**
 * New open graph action
 *
 * @throws FacadeWriteError when a field in `init` holds a value a graph
 *   object cannot store
 */
export function createOpenGraphAction(init: OpenGraphActionInit = {}): OpenGraphAction {
  return OpenGraphAction.create(init)
}
