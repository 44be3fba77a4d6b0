/**
 * Facades: interface casts and declared field sets over graph objects
 *
 * @module facade
 */

export { asFacade, nodeOf } from './cast.js'
export type { CastFacade, CastField } from './cast.js'
export { defineFacade, FacadeDefinition } from './defineFacade.js'
export type {
  DecodedType,
  Facade,
  FacadeInit,
  FacadeInitOf,
  FacadeShape,
  FacadeView,
  InitType,
} from './defineFacade.js'
export { FacadeList } from './FacadeList.js'
export { encodeGraphInput, field, isFieldCodec } from './fields.js'
export type { FieldCodec } from './fields.js'
