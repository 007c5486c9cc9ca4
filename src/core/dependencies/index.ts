/**
 * Dependencies module exports
 */

export { DependencyGraph } from './graph.js';
export { DependencyResolver } from './resolver.js';
