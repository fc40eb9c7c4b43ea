export * from './tags.js';
export { emitTag } from './emit.js';
export type { TraceMeta } from './emit.js';
export { flush, resetTraceForTest } from './log.js';
