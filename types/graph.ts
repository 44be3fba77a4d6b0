/**
 * Graph value types
 *
 * A graph node stores JSON-shaped data. Values read back out of a node are
 * always one of the `GraphValue` kinds; values written in may also be raw
 * documents and arrays, which become graph values the first time they are
 * read.
 *
 * @module types/graph
 */

import type { GraphArray, GraphObject } from '../core/GraphObject.js'

/** JSON scalar kinds */
export type GraphPrimitive = string | number | boolean | null

/** Every kind `get()` can return */
export type GraphValue = GraphPrimitive | GraphObject | GraphArray

/**
 * A raw key/value document, as produced by the JSON layer
 */
export interface RawDocument {
  [key: string]: unknown
}

/** A raw sequence, as produced by the JSON layer */
export type RawArray = unknown[]

/** Every kind `set()` accepts */
export type GraphInput = GraphValue | RawDocument | RawArray

/**
 * The interchange protocol for graph nodes.
 *
 * This is all the identity helpers and transport layers rely on: any object
 * implementing these five operations can stand in for a GraphObject at the
 * boundary.
 */
export interface GraphObjectLike {
  size(): number
  get(key: string): GraphValue | undefined
  keys(): Iterable<string>
  remove(key: string): void
  set(key: string, value: GraphInput): void
}

/** Any stored value other than null can identify a node */
export type GraphIdentifier = Exclude<GraphValue, null>
