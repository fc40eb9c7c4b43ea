// Centralized, cached environment feature flags for the VM runtime.
export interface EnvFlags {
  /** STACK_VM_TRACE: collect a trace tag for every executed step. */
  trace: boolean;
  /** STACK_VM_TRACE_STDOUT: also write each tag to stdout as one JSON line. */
  traceStdout: boolean;
}

function enabled(name: string): boolean {
  const v = (process.env[name] || '').toLowerCase();
  return v === '1' || v === 'true';
}

let cached: EnvFlags | undefined;

export function envFlags(): EnvFlags {
  if (cached === undefined) {
    cached = {
      trace: enabled('STACK_VM_TRACE'),
      traceStdout: enabled('STACK_VM_TRACE_STDOUT'),
    };
  }
  return cached;
}

// For tests only: reset the cached flags.
export function resetEnvCacheForTests(): void {
  cached = undefined;
}
