/**
 * Health checker factories
 */

export { makeFsHealthChecker, type FsHealthCheckerOptions } from './fs-checker.js';
export { makeRunHealthChecker } from './run-checker.js';
