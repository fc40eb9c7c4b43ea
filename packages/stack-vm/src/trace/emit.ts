import type { TraceTag } from './tags.js';
import { envFlags } from '../util/env.js';
import { record } from './log.js';

export type TraceMeta = {
  runtime: 'stack-vm';
  ts: number;
  program?: string;
};

export function emitTag(tag: TraceTag, meta: TraceMeta): void {
  const flags = envFlags();
  if (!flags.trace) return;
  if (flags.traceStdout) {
    const line = JSON.stringify({ ...meta, tag }) + '\n';
    process.stdout.write(line);
  }
  record(tag);
}
