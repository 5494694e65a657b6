/**
 * @fileoverview Utility module exports.
 *
 * @module utils
 */

export { LRUMap, type LRUMapOptions } from './lru-map.js';
