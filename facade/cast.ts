/**
 * Interface casts
 *
 * The lightest facade: a TypeScript interface and nothing else. Any graph
 * object can be cast to any interface whose fields are JSON scalars, nested
 * facade interfaces, or FacadeLists of those. Nothing is checked at runtime:
 * a field reads whatever `get()` returns, nested objects come back as casts
 * themselves, nested arrays as FacadeLists.
 *
 * @module facade/cast
 *
 * @example
 * ```typescript
 * interface MyGraphThing {
 *   id?: string
 *   name?: string
 *   owner?: MyGraphOwner
 * }
 *
 * const thing = asFacade<MyGraphThing>(node)
 * thing.name = 'Renamed'          // node.set('name', 'Renamed')
 * thing.owner?.id
 * ```
 */

import { GraphArray, GraphObject, registerView, unwrapView } from '../core/GraphObject.js'
import { FacadeWriteError } from '../lib/errors.js'
import { isObjectPrototypeKey } from '../lib/type-guards.js'
import { asProxyInterface, computedDescriptor, createObjectProxy } from '../lib/typed-proxy.js'
import type { GraphValue, RawDocument } from '../types/graph.js'
import { FacadeList } from './FacadeList.js'
import { encodeGraphInput, type FieldCodec } from './fields.js'

// =============================================================================
// Types
// =============================================================================

type CastScalar = string | number | boolean | null | undefined

/**
 * What a field of a cast facade may be declared as
 */
export type CastField<V> = V extends CastScalar
  ? V
  : V extends FacadeList<infer E>
    ? FacadeList<CastField<E>>
    : V extends readonly unknown[]
      ? never
      : V extends (...args: never[]) => unknown
        ? never
        : V extends object
          ? CastFacade<V>
          : never

/**
 * Constraint satisfied by every interface that can be used as a cast facade
 */
export type CastFacade<F> = { [K in keyof F]: CastField<F[K]> }

// =============================================================================
// Runtime
// =============================================================================

const casts = new WeakMap<GraphObject, object>()
const castLists = new WeakMap<GraphArray, FacadeList<unknown>>()

const castCodec: FieldCodec<unknown> = {
  kind: 'value',
  decode: castValue,
  encode: encodeGraphInput,
}

function castValue(value: GraphValue): unknown {
  if (value instanceof GraphObject) return castView(value)
  if (value instanceof GraphArray) return castList(value)
  return value
}

function castList(array: GraphArray): FacadeList<unknown> {
  let list = castLists.get(array)
  if (!list) {
    list = new FacadeList(array, castCodec)
    castLists.set(array, list)
  }
  return list
}

function castView(node: GraphObject): object {
  const cached = casts.get(node)
  if (cached) return cached

  const view = createObjectProxy<object>(
    {
      get(target, prop) {
        if (typeof prop !== 'string') return Reflect.get(target, prop)
        if (!node.has(prop) && isObjectPrototypeKey(prop)) return Reflect.get(target, prop)
        const value = node.get(prop)
        return value === undefined ? undefined : castValue(value)
      },
      set(_target, prop, value: unknown) {
        if (typeof prop !== 'string') return false
        if (value === undefined) {
          node.remove(prop)
          return true
        }

        const encoded = encodeGraphInput(value)
        if (encoded === undefined) {
          throw new FacadeWriteError('cast', prop, 'a graph value')
        }
        node.set(prop, encoded)
        return true
      },
      deleteProperty(_target, prop) {
        if (typeof prop === 'string') node.remove(prop)
        return true
      },
      has(target, prop) {
        return typeof prop === 'string' ? node.has(prop) : Reflect.has(target, prop)
      },
      ownKeys() {
        return Array.from(node.keys())
      },
      getOwnPropertyDescriptor(target, prop) {
        if (typeof prop !== 'string') return Reflect.getOwnPropertyDescriptor(target, prop)
        if (!node.has(prop)) return undefined
        const value = node.get(prop)
        return computedDescriptor(value === undefined ? undefined : castValue(value))
      },
    },
    'GraphObjectCast'
  )

  registerView(view, node)
  casts.set(node, view)
  return view
}

/**
 * View a graph object (or a raw document, wrapped in place) as `F`.
 *
 * Always succeeds. Every cast of one node is the same object, whatever `F`
 * is, so casts to unrelated interfaces share storage and identity.
 */
export function asFacade<F extends CastFacade<F>>(source: GraphObject | RawDocument): F {
  return asProxyInterface<F>(castView(GraphObject.wrap(source)))
}

/**
 * The graph object behind a facade view (cast or declared), or undefined
 */
export function nodeOf(view: unknown): GraphObject | undefined {
  const target = unwrapView(view)
  return target instanceof GraphObject ? target : undefined
}
