/**
 * Core containers and identity
 *
 * @module core
 */

export { encodeGraphInput, GraphArray, GraphObject, registerView, unwrapView } from './GraphObject.js'
export { identifierOf, identityEquals } from './identity.js'
