export * from './machine/instruction.js';
export * from './machine/trap.js';
export { Machine, STACK_CAPACITY } from './machine/machine.js';
export { dump } from './machine/dump.js';
export { DEFAULT_MAX_STEPS, assertStepBudget, run } from './driver/run.js';
export type { Fault, RunOptions, RunReport } from './driver/run.js';
export * as check from './check/index.js';
export * as programs from './programs/index.js';
export * as trace from './trace/index.js';
export { canonicalProgramJson, blake3hex, programHash } from './canon/index.js';
export { envFlags, resetEnvCacheForTests } from './util/env.js';
export type { EnvFlags } from './util/env.js';
