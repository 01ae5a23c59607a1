/**
 * @module io
 * @description Job log input exports
 */

export { openLogLines } from './line-reader';
