/**
 * FacadeList - typed view over a GraphArray
 *
 * Elements are decoded through the list's field codec on every read, so an
 * element of the wrong kind reads as undefined and keeps its index.
 *
 * @module facade/FacadeList
 */

import { encodeGraphInput, registerView, type GraphArray } from '../core/GraphObject.js'
import { FacadeWriteError } from '../lib/errors.js'
import type { GraphInput } from '../types/graph.js'
import type { FieldCodec } from './fields.js'

export class FacadeList<T, I = T> implements Iterable<T | undefined> {
  /**
   * Prefer reading lists through a `field.list()` field, which keeps one
   * FacadeList per array.
   */
  constructor(
    readonly graphArray: GraphArray,
    private readonly codec: FieldCodec<T, I>
  ) {
    registerView(this, graphArray)
  }

  get length(): number {
    return this.graphArray.length
  }

  /**
   * Read an element; negative indexes count back from the end
   */
  at(index: number): T | undefined {
    const stored = this.graphArray.at(index)
    return stored === undefined ? undefined : this.codec.decode(stored)
  }

  /**
   * Off-kind elements a graph array can store are stored as given and read
   * back as undefined.
   *
   * @throws FacadeWriteError when the value is not one a graph array stores
   */
  set(index: number, value: T | I): void {
    this.graphArray.set(index, this.encode(value, index))
  }

  push(...values: Array<T | I>): number {
    const start = this.graphArray.length
    const encoded = values.map((value, offset) => this.encode(value, start + offset))
    return this.graphArray.push(...encoded)
  }

  remove(index: number): void {
    this.graphArray.remove(index)
  }

  *[Symbol.iterator](): IterableIterator<T | undefined> {
    for (let i = 0; i < this.graphArray.length; i++) {
      yield this.at(i)
    }
  }

  map<U>(fn: (value: T | undefined, index: number) => U): U[] {
    const out: U[] = []
    for (let i = 0; i < this.graphArray.length; i++) {
      out.push(fn(this.at(i), i))
    }
    return out
  }

  toArray(): Array<T | undefined> {
    return Array.from(this)
  }

  toJSON(): unknown[] {
    return this.graphArray.toJSON()
  }

  private encode(value: T | I, index: number): GraphInput {
    const encoded = this.codec.encode(value) ?? encodeGraphInput(value)
    if (encoded === undefined) {
      throw new FacadeWriteError('FacadeList', `[${index}]`, this.codec.kind)
    }
    return encoded
  }
}
