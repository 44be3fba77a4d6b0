/**
 * Stock social graph and open graph facades
 *
 * @module graph
 */

export { GraphLocation, GraphNode, GraphPlace, GraphUser, OpenGraphAction, OpenGraphObject } from './facades.js'
export { createOpenGraphAction, createOpenGraphObject } from './open-graph.js'
export type { OpenGraphActionInit, OpenGraphObjectInit } from './open-graph.js'
