/**
 * Field codecs for declared facades
 *
 * A codec gives a facade field its runtime kind. Decoding narrows a stored
 * graph value to the field's type and yields undefined for anything off-kind,
 * so a document that drifted from its schema still reads without throwing.
 * Encoding turns a written value into something a GraphObject stores.
 *
 * Scalar kinds are zod schemas; `field.scalar()` takes any zod schema whose
 * output is a JSON scalar.
 *
 * @module facade/fields
 *
 * @example
 * ```typescript
 * const GraphLocation = defineFacade('GraphLocation', {
 *   city: field.string(),
 *   latitude: field.number(),
 * })
 *
 * const GraphPlace = defineFacade('GraphPlace', {
 *   name: field.string(),
 *   location: field.facade(GraphLocation),
 *   tags: field.list(field.string()),
 *   kind: field.scalar('place kind', z.enum(['city', 'venue'])),
 * })
 * ```
 */

import { z } from 'zod'
import { encodeGraphInput, GraphArray, GraphObject, unwrapView } from '../core/GraphObject.js'
import { isPlainRecord, isRecord } from '../lib/type-guards.js'
import type { GraphInput, GraphPrimitive, GraphValue, RawDocument } from '../types/graph.js'
import type { FacadeDefinition, FacadeInit, FacadeShape, FacadeView } from './defineFacade.js'
import { FacadeList } from './FacadeList.js'

// =============================================================================
// Codec contract
// =============================================================================

/**
 * Runtime kind of a facade field
 *
 * @typeParam T - What reads produce
 * @typeParam I - What writes accept besides T (plain init objects, arrays)
 */
export interface FieldCodec<T, I = T> {
  /** Kind name used in log lines and errors */
  readonly kind: string
  /** Narrow a stored value, or undefined when it is off-kind */
  decode(value: GraphValue): T | undefined
  /** Convert a written value for storage, or undefined when it is off-kind */
  encode(value: unknown): GraphInput | undefined
  /** Type-level only */
  readonly _input?: I
}

export function isFieldCodec(value: unknown): value is FieldCodec<unknown, unknown> {
  return (
    isRecord(value) &&
    typeof value.kind === 'string' &&
    typeof value.decode === 'function' &&
    typeof value.encode === 'function'
  )
}

export { encodeGraphInput }

// =============================================================================
// Codecs
// =============================================================================

function scalar<T extends GraphPrimitive>(kind: string, schema: z.ZodType<T>): FieldCodec<T> {
  return {
    kind,
    decode(value) {
      const result = schema.safeParse(value)
      return result.success ? result.data : undefined
    },
    encode(value) {
      if (value === null) return null
      const result = schema.safeParse(value)
      return result.success ? result.data : undefined
    },
  }
}

function facade<S extends FacadeShape>(
  definition: FacadeDefinition<S>
): FieldCodec<FacadeView<S>, FacadeView<S> | FacadeInit<S>> {
  return {
    kind: definition.name,
    decode(value) {
      return value instanceof GraphObject ? definition.view(value) : undefined
    },
    encode(value) {
      if (value === null) return null
      if (value instanceof GraphObject) return value

      const viewed = unwrapView(value)
      if (viewed) return viewed instanceof GraphObject ? viewed : undefined

      // A plain init object becomes a new node populated through the facade
      if (isPlainRecord(value)) return definition.createNode(value)
      return undefined
    },
  }
}

function list<T, I>(
  element: FieldCodec<T, I>
): FieldCodec<FacadeList<T, I>, FacadeList<T, I> | ReadonlyArray<T | I>> {
  const lists = new WeakMap<GraphArray, FacadeList<T, I>>()

  return {
    kind: `list<${element.kind}>`,
    decode(value) {
      if (!(value instanceof GraphArray)) return undefined

      let view = lists.get(value)
      if (!view) {
        view = new FacadeList(value, element)
        lists.set(value, view)
      }
      return view
    },
    encode(value) {
      if (value === null) return null
      if (value instanceof GraphArray) return value

      const viewed = unwrapView(value)
      if (viewed) return viewed instanceof GraphArray ? viewed : undefined

      if (!Array.isArray(value)) return undefined
      const out: GraphInput[] = []
      for (const item of value) {
        const encoded = element.encode(item)
        if (encoded === undefined) return undefined
        out.push(encoded)
      }
      return out
    },
  }
}

function object(): FieldCodec<GraphObject, GraphObject | RawDocument> {
  return {
    kind: 'object',
    decode(value) {
      return value instanceof GraphObject ? value : undefined
    },
    encode(value) {
      if (value === null) return null
      if (value instanceof GraphObject) return value

      const viewed = unwrapView(value)
      if (viewed) return viewed instanceof GraphObject ? viewed : undefined

      return isPlainRecord(value) ? value : undefined
    },
  }
}

function value(): FieldCodec<GraphValue, GraphInput> {
  return {
    kind: 'value',
    decode: (stored) => stored,
    encode: encodeGraphInput,
  }
}

export const field = {
  string: () => scalar('string', z.string()),
  number: () => scalar('number', z.number()),
  boolean: () => scalar('boolean', z.boolean()),
  /** Non-empty string or finite number */
  id: () => scalar('id', z.union([z.string().min(1), z.number().finite()])),
  url: () => scalar('url', z.string().url()),
  scalar,
  facade,
  list,
  /** An untyped nested GraphObject */
  object,
  /** Any graph value, unchecked */
  value,
}
