/**
 * Stock facades for common social graph and open graph nodes
 *
 * These are conveniences, not a schema: graph objects carrying fields not
 * listed here keep them, and any of these facades can view any node.
 *
 * @module graph/facades
 */

import { defineFacade, type Facade } from '../facade/defineFacade.js'
import { field } from '../facade/fields.js'

/** Fields every graph node may carry */
export const GraphNode = defineFacade('GraphNode', {
  id: field.id(),
})

export const GraphLocation = defineFacade('GraphLocation', {
  street: field.string(),
  city: field.string(),
  state: field.string(),
  country: field.string(),
  zip: field.string(),
  latitude: field.number(),
  longitude: field.number(),
})

export const GraphPlace = GraphNode.extend('GraphPlace', {
  name: field.string(),
  category: field.string(),
  location: field.facade(GraphLocation),
})

export const GraphUser = GraphNode.extend('GraphUser', {
  name: field.string(),
  first_name: field.string(),
  middle_name: field.string(),
  last_name: field.string(),
  link: field.url(),
  username: field.string(),
  birthday: field.string(),
  location: field.facade(GraphPlace),
})

/**
 * An open graph object. `data` holds the type-specific properties.
 */
export const OpenGraphObject = GraphNode.extend('OpenGraphObject', {
  type: field.string(),
  title: field.string(),
  image: field.value(),
  url: field.url(),
  description: field.string(),
  data: field.object(),
})

/**
 * An open graph action (a user doing something to an object)
 */
export const OpenGraphAction = GraphNode.extend('OpenGraphAction', {
  start_time: field.string(),
  end_time: field.string(),
  publish_time: field.string(),
  created_time: field.string(),
  expires_time: field.string(),
  ref: field.string(),
  message: field.string(),
  place: field.facade(GraphPlace),
  tags: field.list(field.facade(GraphUser)),
  image: field.value(),
  from: field.facade(GraphUser),
  likes: field.list(field.value()),
  application: field.object(),
  comments: field.list(field.value()),
})

export type GraphNode = Facade<typeof GraphNode>
export type GraphLocation = Facade<typeof GraphLocation>
export type GraphPlace = Facade<typeof GraphPlace>
export type GraphUser = Facade<typeof GraphUser>
export type OpenGraphObject = Facade<typeof OpenGraphObject>
export type OpenGraphAction = Facade<typeof OpenGraphAction>
