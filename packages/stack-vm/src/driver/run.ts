import type { Instruction, Word } from '../machine/instruction.js';
import type { Machine } from '../machine/machine.js';
import type { FaultTrap } from '../machine/trap.js';
import { isFault } from '../machine/trap.js';
import { emitTag } from '../trace/emit.js';
import type { TraceMeta } from '../trace/emit.js';

export const DEFAULT_MAX_STEPS = 69;

export interface RunOptions {
  /** Step budget; the loop stops once this many instructions have been executed. */
  maxSteps?: number;
  /** Called after every step that returned NoTrap. */
  onStep?: (machine: Machine) => void;
  /** Label attached to trace output. */
  label?: string;
}

export interface Fault {
  trap: FaultTrap;
  /** Index of the instruction that trapped; `instruction` is null when the fetch failed. */
  index: Word;
  instruction: Instruction | null;
}

export type RunReport =
  | { outcome: 'halted' | 'budget-exhausted'; trap: 'NoTrap'; steps: number; ip: Word }
  | { outcome: 'trapped'; trap: FaultTrap; steps: number; ip: Word; fault: Fault };

export function assertStepBudget(maxSteps: number): number {
  if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
    throw new Error(`E_STEP_BUDGET: step budget must be a positive integer, got ${maxSteps}`);
  }
  return maxSteps;
}

/**
 * Drives `machine` until it halts, traps, or spends its step budget. A machine
 * that is already halted is not stepped at all.
 */
export function run(machine: Machine, options: RunOptions = {}): RunReport {
  const maxSteps = assertStepBudget(options.maxSteps ?? DEFAULT_MAX_STEPS);
  const meta = (): TraceMeta => ({ runtime: 'stack-vm', ts: Date.now(), program: options.label });

  let steps = 0;
  let fault: Fault | undefined;

  while (!machine.halted && steps < maxSteps) {
    const ip = machine.ip;
    const ins = machine.fetch() ?? null;
    const trap = machine.execute();
    steps += 1;
    emitTag({
      kind: 'Step',
      step: steps,
      ip,
      op: ins?.op ?? null,
      operand: ins?.operand ?? null,
      trap,
      size: machine.size,
    }, meta());
    if (isFault(trap)) {
      fault = { trap, index: ip, instruction: ins };
      break;
    }
    options.onStep?.(machine);
  }

  const report: RunReport = fault
    ? { outcome: 'trapped', trap: fault.trap, steps, ip: machine.ip, fault }
    : { outcome: machine.halted ? 'halted' : 'budget-exhausted', trap: 'NoTrap', steps, ip: machine.ip };
  emitTag({ kind: 'Stop', outcome: report.outcome, steps, trap: report.trap, program: options.label }, meta());
  return report;
}
