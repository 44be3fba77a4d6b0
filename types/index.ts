/**
 * types/index.ts - shared type definitions
 *
 * @module types
 */

export type {
  GraphIdentifier,
  GraphInput,
  GraphObjectLike,
  GraphPrimitive,
  GraphValue,
  RawArray,
  RawDocument,
} from './graph.js'
