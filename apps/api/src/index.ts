/**
 * flowgraph - API
 *
 * @module @flowgraph/api
 */

export * from './server.js';
