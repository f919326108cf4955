/**
 * Execution and timing.
 *
 * @module execution
 */

export type { ResponseFields } from './response.js';
export { Metrics, Response } from './response.js';

export type { RequestLoader } from './loader.js';
export { loadResponse } from './loader.js';
