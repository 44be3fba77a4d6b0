/**
 * graph-facade - a dual-view object model for social graph nodes
 *
 * One key/value store per node, viewed at once as an untyped mutable
 * container and as any number of typed facades chosen at the point of use:
 *
 * - GraphObject / GraphArray: lazy, in-place wrapping of raw JSON documents
 * - asFacade<T>(): cast a node to any interface, no runtime checks
 * - defineFacade(): named field sets with runtime kinds
 * - identityEquals(): "same graph object" by identifier
 *
 * @example
 * ```typescript
 * import { GraphObject, GraphPlace, identityEquals } from 'graph-facade'
 *
 * const node = GraphObject.wrap(JSON.parse(body))
 * const place = GraphPlace.view(node)
 * place.location?.city        // 'Paris'
 * node.get('checkins')        // fields outside the facade stay reachable
 * ```
 *
 * @module graph-facade
 */

// =============================================================================
// Core
// =============================================================================

export { GraphArray, GraphObject, identifierOf, identityEquals } from './core/index.js'

// =============================================================================
// Facades
// =============================================================================

export { asFacade, defineFacade, FacadeDefinition, FacadeList, field, nodeOf } from './facade/index.js'
export type {
  CastFacade,
  CastField,
  Facade,
  FacadeInit,
  FacadeInitOf,
  FacadeShape,
  FacadeView,
  FieldCodec,
} from './facade/index.js'

export {
  createOpenGraphAction,
  createOpenGraphObject,
  GraphLocation,
  GraphNode,
  GraphPlace,
  GraphUser,
  OpenGraphAction,
  OpenGraphObject,
} from './graph/index.js'
export type { OpenGraphActionInit, OpenGraphObjectInit } from './graph/index.js'

// =============================================================================
// Configuration, logging, errors
// =============================================================================

export { configure, getConfig, GraphObjectConfigSchema, resetConfig } from './lib/config.js'
export type { GraphObjectConfig } from './lib/config.js'
export { createLogger, Logger, logger } from './lib/logger.js'
export type { LogLevel, LoggerOptions } from './lib/logger.js'
export {
  ConfigError,
  ErrorCode,
  FacadeDefinitionError,
  FacadeWriteError,
  GraphObjectError,
  isGraphObjectError,
  SerializationError,
} from './lib/errors.js'
export type { ErrorCodeValue, StructuredError } from './lib/errors.js'

export type * from './types/index.js'
