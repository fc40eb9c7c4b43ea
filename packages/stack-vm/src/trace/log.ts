import type { TraceTag } from './tags.js';
import { resetEnvCacheForTests } from '../util/env.js';

// Gated by emitTag; anything recorded here is kept until the next flush.
const log: TraceTag[] = [];

export function record(tag: TraceTag): void {
  log.push(tag);
}

export function flush(): TraceTag[] {
  const out = log.slice();
  log.length = 0;
  return out;
}

export function resetTraceForTest(): void {
  resetEnvCacheForTests();
  log.length = 0;
}
