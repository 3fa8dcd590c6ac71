/**
 * Domain Types - Unified exports
 */

export { Success, Failure, isFail, type Result } from './result';
export * from './cluster';
