/**
 * Identity - "is this the same graph object?"
 *
 * Graph nodes are the same object when they carry the same domain identifier,
 * regardless of whether they are the same instance or hold the same fields.
 * The identifier lives under a conventional key (`id` unless configured
 * otherwise) whose presence is never guaranteed.
 *
 * @module core/identity
 */

import { getConfig } from '../lib/config.js'
import type { GraphIdentifier, GraphObjectLike } from '../types/graph.js'

/**
 * The node's identifier, or undefined when it has none.
 *
 * Any value stored under the identifier key counts, `""` included; an absent
 * key and a stored `null` do not.
 */
export function identifierOf(node: GraphObjectLike | null | undefined): GraphIdentifier | undefined {
  if (!node) return undefined

  const value = node.get(getConfig().identifierKey)
  return value === null ? undefined : value
}

/**
 * Compare two nodes by identifier.
 *
 * False whenever either side lacks an identifier, even if every other field
 * matches and even for the same instance. Identifiers compare with `===`, so
 * `123` and `"123"` are different ids.
 */
export function identityEquals(
  a: GraphObjectLike | null | undefined,
  b: GraphObjectLike | null | undefined
): boolean {
  const left = identifierOf(a)
  if (left === undefined) return false

  const right = identifierOf(b)
  if (right === undefined) return false

  return left === right
}
