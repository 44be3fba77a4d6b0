/**
 * GraphObject and GraphArray - containers backing every graph node
 *
 * A GraphObject wraps one raw key/value document in place. Nothing is copied
 * at wrap time and nested documents are left raw: the first read of a nested
 * document or array wraps it, stores the wrapper back under the same key,
 * and every later read returns that same wrapper. Reading therefore mutates
 * the backing storage, which is why a wrapped document belongs to its
 * wrapper from then on.
 *
 * @module core/GraphObject
 *
 * @example
 * ```typescript
 * const place = GraphObject.wrap(JSON.parse(body))
 * place.get('name')                              // 'Cafe'
 * const location = place.get('location')         // GraphObject, wrapped now
 * location === place.get('location')             // true
 * place.set('checkins', 12)
 * ```
 */

import { getConfig, moduleLogger } from '../lib/config.js'
import { ErrorCode, GraphObjectError, SerializationError } from '../lib/errors.js'
import { describeKind, hasOwn, isGraphPrimitive, isPlainRecord, isRecord } from '../lib/type-guards.js'
import type { GraphInput, GraphObjectLike, GraphValue, RawArray, RawDocument } from '../types/graph.js'

const log = moduleLogger('core')

// =============================================================================
// Registries
// =============================================================================

/** Backing document -> its wrapper, so wrapping twice never duplicates */
const objectWrappers = new WeakMap<object, GraphObject>()
const arrayWrappers = new WeakMap<object, GraphArray>()

/** Facade view -> the container it views */
const viewTargets = new WeakMap<object, GraphObject | GraphArray>()

/**
 * Record that `view` reads and writes `target`.
 *
 * Views registered here are stored as their target when written into a
 * container, and resolve to it in `wrap()`.
 */
export function registerView(view: object, target: GraphObject | GraphArray): void {
  viewTargets.set(view, target)
}

/**
 * The container behind a registered view, or undefined for anything else
 */
export function unwrapView(value: unknown): GraphObject | GraphArray | undefined {
  if (typeof value !== 'object' || value === null) return undefined
  return viewTargets.get(value)
}

// =============================================================================
// Lazy conversion
// =============================================================================

/**
 * Convert a stored value to its graph form, or undefined when it is not one
 * of the supported kinds
 */
function adopt(raw: unknown): GraphValue | undefined {
  if (isGraphPrimitive(raw)) return raw
  if (raw instanceof GraphObject || raw instanceof GraphArray) return raw

  const viewed = unwrapView(raw)
  if (viewed) return viewed

  if (Array.isArray(raw)) return GraphArray.wrap(raw)
  if (isPlainRecord(raw)) return GraphObject.wrap(raw)
  return undefined
}

/**
 * Write an own data property. `"__proto__"` and other inherited names are
 * ordinary keys here, never prototype setters.
 */
function writeOwn(target: RawDocument, key: string, value: unknown): void {
  if (hasOwn(target, key)) {
    target[key] = value
    return
  }
  Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true })
}

/**
 * Accept anything a GraphObject can store, or undefined for anything else.
 * Views become their container.
 */
export function encodeGraphInput(value: unknown): GraphInput | undefined {
  if (isGraphPrimitive(value)) return value
  if (value instanceof GraphObject || value instanceof GraphArray) return value

  const viewed = unwrapView(value)
  if (viewed) return viewed

  if (Array.isArray(value)) return value
  if (isPlainRecord(value)) return value
  return undefined
}

function toStored(value: GraphInput): unknown {
  return unwrapView(value) ?? value
}

// =============================================================================
// Plain export
// =============================================================================

/** @internal */
export interface ExportState {
  readonly maxDepth: number
  /** Backing containers on the current path, for cycle detection */
  readonly ancestors: Set<object>
  readonly path: string[]
}

function newExportState(): ExportState {
  return { maxDepth: getConfig().maxDepth, ancestors: new Set(), path: [] }
}

function enter<T>(container: object, state: ExportState, body: () => T): T {
  if (state.ancestors.has(container)) {
    throw new SerializationError(ErrorCode.CYCLE_DETECTED, state.path)
  }
  if (state.ancestors.size >= state.maxDepth) {
    throw new SerializationError(ErrorCode.MAX_DEPTH_EXCEEDED, state.path, state.maxDepth)
  }

  state.ancestors.add(container)
  try {
    return body()
  } finally {
    state.ancestors.delete(container)
  }
}

function exportRecord(store: RawDocument, state: ExportState): RawDocument {
  return enter(store, state, () => {
    const out: RawDocument = {}
    for (const key of Object.keys(store)) {
      state.path.push(key)
      writeOwn(out, key, exportValue(store[key], state))
      state.path.pop()
    }
    return out
  })
}

function exportArray(items: RawArray, state: ExportState): unknown[] {
  return enter(items, state, () =>
    items.map((item, index) => {
      state.path.push(String(index))
      const out = exportValue(item, state)
      state.path.pop()
      return out
    }),
  )
}

function exportValue(value: unknown, state: ExportState): unknown {
  if (value instanceof GraphObject || value instanceof GraphArray) return value.exportPlain(state)

  const viewed = unwrapView(value)
  if (viewed) return viewed.exportPlain(state)

  if (Array.isArray(value)) return exportArray(value, state)
  if (isPlainRecord(value)) return exportRecord(value, state)

  // Scalars, and values the JSON layer gets to decide about
  return value
}

// =============================================================================
// GraphObject
// =============================================================================

export class GraphObject implements GraphObjectLike, Iterable<[string, GraphValue]> {
  private constructor(private readonly store: RawDocument) {}

  /**
   * Create an empty graph object, usually to post a new object or action
   */
  static create(): GraphObject {
    const store: RawDocument = {}
    const node = new GraphObject(store)
    objectWrappers.set(store, node)
    return node
  }

  /**
   * Wrap an existing document without copying it.
   *
   * Wrapping a GraphObject (or a facade view of one) returns that object, and
   * wrapping the same document twice returns the same wrapper. A document
   * that cannot be extended (frozen, sealed) is shallow-copied once, since it
   * cannot serve as mutable storage.
   *
   * Callers should use the returned object from here on rather than the
   * original document.
   *
   * @throws GraphObjectError `invalid_document` for arrays and primitives
   */
  static wrap(document: RawDocument | GraphObject): GraphObject {
    if (document instanceof GraphObject) return document

    const viewed = unwrapView(document)
    if (viewed instanceof GraphObject) return viewed

    if (!isRecord(document)) {
      throw GraphObjectError.invalidDocument(describeKind(document))
    }

    const existing = objectWrappers.get(document)
    if (existing) return existing

    let store = document
    if (!Object.isExtensible(document)) {
      store = { ...document }
      log.debug('copied non-extensible document', { keys: Object.keys(document).length })
    }

    const node = new GraphObject(store)
    objectWrappers.set(document, node)
    objectWrappers.set(store, node)
    return node
  }

  static isGraphObject(value: unknown): value is GraphObject {
    return value instanceof GraphObject
  }

  size(): number {
    return Object.keys(this.store).length
  }

  has(key: string): boolean {
    return hasOwn(this.store, key)
  }

  /**
   * Read a value. Missing keys and unsupported stored kinds give undefined.
   *
   * Nested documents and arrays are wrapped on first read and the wrapper
   * replaces the raw value in storage.
   */
  get(key: string): GraphValue | undefined {
    if (!hasOwn(this.store, key)) return undefined

    const raw = this.store[key]
    const value = adopt(raw)
    if (value === undefined) {
      log.debug('unsupported value kind read as absent', { key, kind: describeKind(raw) })
      return undefined
    }

    if (value !== raw) {
      writeOwn(this.store, key, value)
    }
    return value
  }

  /**
   * Keys currently stored. Each iteration takes a fresh snapshot, so the
   * iterable can be reused after the object changes.
   */
  keys(): Iterable<string> {
    const store = this.store
    return {
      [Symbol.iterator]: () => Object.keys(store)[Symbol.iterator](),
    }
  }

  *entries(): IterableIterator<[string, GraphValue]> {
    for (const key of Object.keys(this.store)) {
      const value = this.get(key)
      if (value !== undefined) yield [key, value]
    }
  }

  *values(): IterableIterator<GraphValue> {
    for (const [, value] of this.entries()) yield value
  }

  [Symbol.iterator](): IterableIterator<[string, GraphValue]> {
    return this.entries()
  }

  remove(key: string): void {
    if (hasOwn(this.store, key)) {
      delete this.store[key]
    }
  }

  /**
   * Insert or overwrite a value. Raw documents and arrays are stored as
   * given and wrapped on first read; a facade view is stored as its node.
   */
  set(key: string, value: GraphInput): void {
    writeOwn(this.store, key, toStored(value))
  }

  /**
   * Deep plain copy for the JSON layer. Storage is read, never converted.
   *
   * @throws SerializationError on reference cycles or nesting deeper than
   *   the configured maxDepth
   */
  toJSON(): RawDocument {
    return this.exportPlain(newExportState())
  }

  /** @internal */
  exportPlain(state: ExportState): RawDocument {
    return exportRecord(this.store, state)
  }
}

// =============================================================================
// GraphArray
// =============================================================================

export class GraphArray implements Iterable<GraphValue | undefined> {
  private constructor(private readonly items: RawArray) {}

  static create(): GraphArray {
    const items: RawArray = []
    const list = new GraphArray(items)
    arrayWrappers.set(items, list)
    return list
  }

  /**
   * Wrap an existing array without copying it. Same rules as GraphObject.wrap.
   *
   * @throws GraphObjectError `invalid_document` for anything but an array
   */
  static wrap(items: RawArray | GraphArray): GraphArray {
    if (items instanceof GraphArray) return items

    const viewed = unwrapView(items)
    if (viewed instanceof GraphArray) return viewed

    if (!Array.isArray(items)) {
      throw GraphObjectError.invalidDocument(describeKind(items))
    }

    const existing = arrayWrappers.get(items)
    if (existing) return existing

    let store = items
    if (!Object.isExtensible(items)) {
      store = [...items]
      log.debug('copied non-extensible array', { length: items.length })
    }

    const list = new GraphArray(store)
    arrayWrappers.set(items, list)
    arrayWrappers.set(store, list)
    return list
  }

  static isGraphArray(value: unknown): value is GraphArray {
    return value instanceof GraphArray
  }

  get length(): number {
    return this.items.length
  }

  /**
   * Read an element; negative indexes count back from the end.
   * Out-of-range indexes and unsupported kinds give undefined.
   */
  at(index: number): GraphValue | undefined {
    const i = index < 0 ? this.items.length + index : index
    if (!Number.isInteger(i) || i < 0 || i >= this.items.length) return undefined

    const raw = this.items[i]
    const value = adopt(raw)
    if (value === undefined) {
      log.debug('unsupported value kind read as absent', { index: i, kind: describeKind(raw) })
      return undefined
    }

    if (value !== raw) {
      this.items[i] = value
    }
    return value
  }

  /**
   * Overwrite an element, or append when `index === length`
   *
   * @throws GraphObjectError `index_out_of_range`
   */
  set(index: number, value: GraphInput): void {
    if (!Number.isInteger(index) || index < 0 || index > this.items.length) {
      throw GraphObjectError.indexOutOfRange(index, this.items.length)
    }
    this.items[index] = toStored(value)
  }

  push(...values: GraphInput[]): number {
    return this.items.push(...values.map(toStored))
  }

  /**
   * Remove the element at `index`; no-op when out of range
   */
  remove(index: number): void {
    if (Number.isInteger(index) && index >= 0 && index < this.items.length) {
      this.items.splice(index, 1)
    }
  }

  *values(): IterableIterator<GraphValue | undefined> {
    for (let i = 0; i < this.items.length; i++) {
      yield this.at(i)
    }
  }

  [Symbol.iterator](): IterableIterator<GraphValue | undefined> {
    return this.values()
  }

  map<U>(fn: (value: GraphValue | undefined, index: number) => U): U[] {
    const out: U[] = []
    for (let i = 0; i < this.items.length; i++) {
      out.push(fn(this.at(i), i))
    }
    return out
  }

  toJSON(): unknown[] {
    return this.exportPlain(newExportState())
  }

  /** @internal */
  exportPlain(state: ExportState): unknown[] {
    return exportArray(this.items, state)
  }
}
