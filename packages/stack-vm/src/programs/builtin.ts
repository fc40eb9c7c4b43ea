import type { Program } from '../machine/instruction.js';
import { Inst } from '../machine/instruction.js';

export interface BuiltinProgram {
  name: string;
  description: string;
  program: Program;
}

const BUILTINS: readonly BuiltinProgram[] = [
  {
    name: 'fib',
    description: 'Fibonacci terms pushed forever; runs until the step budget or overflow',
    program: [
      Inst.push(0),
      Inst.push(1),
      Inst.dup(1),
      Inst.dup(1),
      Inst.plus(),
      Inst.jump(2),
    ],
  },
  {
    name: 'countdown',
    description: 'counts 5 down to 0, then halts',
    program: [
      Inst.push(5),
      Inst.push(-1),
      Inst.plus(),
      Inst.dup(0),
      Inst.jumpIfNonzero(1),
      Inst.halt(),
    ],
  },
  {
    name: 'divzero',
    description: 'divides 5 by 0 (the divisor is second from the top)',
    program: [Inst.push(0), Inst.push(5), Inst.div()],
  },
  {
    name: 'underflow',
    description: 'pops an empty stack',
    program: [Inst.pop()],
  },
  {
    name: 'halt',
    description: 'halts immediately',
    program: [Inst.halt()],
  },
];

export const DEFAULT_PROGRAM = 'fib';

export function listBuiltins(): readonly BuiltinProgram[] {
  return BUILTINS;
}

export function getBuiltin(name: string): BuiltinProgram {
  const found = BUILTINS.find(p => p.name === name);
  if (!found) {
    const known = BUILTINS.map(p => p.name).join(', ');
    throw new Error(`E_UNKNOWN_PROGRAM: ${name} (known: ${known})`);
  }
  return found;
}
