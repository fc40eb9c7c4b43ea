import type { Opcode, Word } from '../machine/instruction.js';
import type { Trap } from '../machine/trap.js';

export type RunOutcome = 'halted' | 'trapped' | 'budget-exhausted';

export interface Step {
  kind: 'Step';
  step: number;
  ip: Word;
  /** null when the fetch itself failed. */
  op: Opcode | null;
  operand: Word | null;
  trap: Trap;
  /** Stack size after the step. */
  size: number;
}

export interface Stop {
  kind: 'Stop';
  outcome: RunOutcome;
  steps: number;
  trap: Trap;
  program?: string;
}

export type TraceTag = Step | Stop;
