/**
 * Declared facades
 *
 * A declared facade is a named set of typed fields imposed on a graph object
 * after the fact. The object never knows which facades will view it; any
 * object can be viewed through any facade, and the view always succeeds.
 *
 * Views are Proxies over the object's own storage: reading `view.name` is
 * `node.get('name')` decoded through the field's codec, writing it is
 * `node.set('name', value)`. Missing and off-kind values read as undefined.
 * Fields the facade does not declare stay reachable through `node.get()`.
 *
 * @module facade/defineFacade
 *
 * @example
 * ```typescript
 * const GraphLocation = defineFacade('GraphLocation', { city: field.string() })
 * const GraphPlace = defineFacade('GraphPlace', {
 *   name: field.string(),
 *   location: field.facade(GraphLocation),
 * })
 *
 * const place = GraphPlace.view(GraphObject.wrap(json))
 * place.location?.city   // 'Paris'
 * ```
 */

import { GraphObject, registerView, unwrapView } from '../core/GraphObject.js'
import { moduleLogger } from '../lib/config.js'
import { FacadeDefinitionError, FacadeWriteError, GraphObjectError } from '../lib/errors.js'
import { describeKind, hasOwn, isObjectPrototypeKey } from '../lib/type-guards.js'
import { computedDescriptor, createObjectProxy } from '../lib/typed-proxy.js'
import type { RawDocument } from '../types/graph.js'
import { encodeGraphInput, isFieldCodec, type FieldCodec } from './fields.js'

const log = moduleLogger('facade')

// =============================================================================
// Types
// =============================================================================

export type FacadeShape = Record<string, FieldCodec<unknown, unknown>>

/** What reads of a field produce */
export type DecodedType<C> = C extends FieldCodec<infer T, unknown> ? T : never

/** What writes of a field accept besides the decoded type */
export type InitType<C> = C extends FieldCodec<unknown, infer I> ? I : never

/**
 * The typed view of a facade: every declared field, optional
 */
export type FacadeView<S extends FacadeShape> = {
  -readonly [K in keyof S]?: DecodedType<S[K]>
}

/**
 * Plain initial values for `create()` and `assign()`. `null` stores a JSON
 * null; `undefined` removes the key.
 */
export type FacadeInit<S extends FacadeShape> = {
  [K in keyof S]?: DecodedType<S[K]> | InitType<S[K]> | null
}

/** The view type of a facade definition */
export type Facade<D> = D extends FacadeDefinition<infer S> ? FacadeView<S> : never

/** The init type of a facade definition */
export type FacadeInitOf<D> = D extends FacadeDefinition<infer S> ? FacadeInit<S> : never

// =============================================================================
// FacadeDefinition
// =============================================================================

export class FacadeDefinition<S extends FacadeShape> {
  private readonly views = new WeakMap<GraphObject, FacadeView<S>>()

  constructor(
    readonly name: string,
    readonly fields: S
  ) {
    if (typeof name !== 'string' || name.trim() === '') {
      throw new FacadeDefinitionError(String(name), 'Facade name must be a non-empty string')
    }
    for (const [key, codec] of Object.entries(fields)) {
      if (!isFieldCodec(codec)) {
        throw new FacadeDefinitionError(name, `Field "${key}" of ${name} is not a field codec`, {
          details: { field: key, received: describeKind(codec) },
          hint: 'Declare fields with field.string(), field.facade(...), field.list(...) and friends.',
        })
      }
    }
  }

  /**
   * Whether the facade declares `key`
   */
  declares(key: string): key is keyof S & string {
    return hasOwn(this.fields, key)
  }

  /**
   * View a graph object (or a raw document, wrapped in place) through this
   * facade. The same node always gets the same view.
   */
  view(source: GraphObject | RawDocument): FacadeView<S> {
    const node = GraphObject.wrap(source)

    const cached = this.views.get(node)
    if (cached) return cached

    const view = createObjectProxy<FacadeView<S>>(this.handlerFor(node), this.name)
    registerView(view, node)
    this.views.set(node, view)
    return view
  }

  /**
   * Typed read without going through a view
   */
  read<K extends keyof S & string>(source: GraphObject | RawDocument, key: K): FacadeView<S>[K] {
    return this.view(source)[key]
  }

  /**
   * Typed write without going through a view. `undefined` removes the key.
   *
   * @throws FacadeWriteError when the value is not one a graph object stores
   */
  write<K extends keyof S & string>(
    source: GraphObject | RawDocument,
    key: K,
    value: FacadeInit<S>[K]
  ): void {
    this.writeField(GraphObject.wrap(source), key, value)
  }

  /**
   * New graph object populated through this facade, ready to post
   */
  create(init: FacadeInit<S> = {}): FacadeView<S> {
    return this.view(this.createNode(init))
  }

  /**
   * Untyped form of `create()`, returning the node. Every key must be a
   * declared field.
   *
   * @throws FacadeWriteError for undeclared fields and values a graph object cannot store
   */
  createNode(init: object): GraphObject {
    const node = GraphObject.create()
    this.assignFields(node, init)
    return node
  }

  /**
   * Write every field present in `init`
   *
   * @throws FacadeWriteError for undeclared fields and values a graph object cannot store
   */
  assign(target: FacadeView<S> | GraphObject, init: FacadeInit<S>): FacadeView<S> {
    const node = target instanceof GraphObject ? target : unwrapView(target)
    if (!(node instanceof GraphObject)) {
      throw GraphObjectError.invalidDocument(describeKind(target))
    }
    this.assignFields(node, init)
    return this.view(node)
  }

  /**
   * A new facade with this facade's fields plus `fields`
   *
   * @throws FacadeDefinitionError when `fields` redeclares an inherited field
   */
  extend<E extends FacadeShape>(name: string, fields: E): FacadeDefinition<S & E> {
    for (const key of Object.keys(fields)) {
      if (this.declares(key)) {
        throw new FacadeDefinitionError(name, `Field "${key}" is already declared by ${this.name}`, {
          details: { field: key, parent: this.name },
        })
      }
    }
    return new FacadeDefinition(name, { ...this.fields, ...fields })
  }

  // ---------------------------------------------------------------------------
  // Field access
  // ---------------------------------------------------------------------------

  private readField(node: GraphObject, key: keyof S & string): unknown {
    const stored = node.get(key)
    if (stored === undefined) return undefined

    const codec = this.fields[key]
    const decoded = codec.decode(stored)
    if (decoded === undefined && stored !== null) {
      log.debug('off-kind field read as absent', {
        facade: this.name,
        field: key,
        expected: codec.kind,
        received: describeKind(stored),
      })
    }
    return decoded
  }

  private writeField(node: GraphObject, key: string, value: unknown): void {
    if (!this.declares(key)) {
      throw new FacadeWriteError(this.name, key, 'a declared field')
    }

    if (value === undefined) {
      node.remove(key)
      return
    }

    const codec = this.fields[key]
    const encoded = codec.encode(value)
    if (encoded !== undefined) {
      node.set(key, encoded)
      return
    }

    // Off-kind but storable: stored as given, and reads back as absent
    const stored = encodeGraphInput(value)
    if (stored === undefined) {
      throw new FacadeWriteError(this.name, key, codec.kind)
    }
    log.debug('off-kind field written as given', {
      facade: this.name,
      field: key,
      expected: codec.kind,
      received: describeKind(value),
    })
    node.set(key, stored)
  }

  private assignFields(node: GraphObject, init: object): void {
    for (const [key, value] of Object.entries(init)) {
      this.writeField(node, key, value)
    }
  }

  private handlerFor(node: GraphObject): ProxyHandler<object> {
    return {
      get: (target, prop) => {
        if (typeof prop !== 'string') return Reflect.get(target, prop)
        if (this.declares(prop)) return this.readField(node, prop)
        return isObjectPrototypeKey(prop) ? Reflect.get(target, prop) : undefined
      },
      set: (_target, prop, value: unknown) => {
        if (typeof prop !== 'string') return false
        this.writeField(node, prop, value)
        return true
      },
      deleteProperty: (_target, prop) => {
        if (typeof prop === 'string' && this.declares(prop)) {
          node.remove(prop)
        }
        return true
      },
      has: (target, prop) => {
        if (typeof prop !== 'string') return Reflect.has(target, prop)
        return this.declares(prop) && node.has(prop)
      },
      ownKeys: () => Object.keys(this.fields).filter((key) => node.has(key)),
      getOwnPropertyDescriptor: (target, prop) => {
        if (typeof prop !== 'string') return Reflect.getOwnPropertyDescriptor(target, prop)
        if (!this.declares(prop) || !node.has(prop)) return undefined
        return computedDescriptor(this.readField(node, prop))
      },
    }
  }
}

/**
 * Declare a facade: a named set of typed fields
 *
 * @throws FacadeDefinitionError for an empty name or a field that is not a codec
 */
export function defineFacade<S extends FacadeShape>(name: string, fields: S): FacadeDefinition<S> {
  return new FacadeDefinition(name, fields)
}
