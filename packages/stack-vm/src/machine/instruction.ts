/** A signed 32-bit integer: stack values, operands and the instruction pointer. */
export type Word = number;

export const WORD_MIN: Word = -0x80000000;
export const WORD_MAX: Word = 0x7fffffff;

/** Truncates to a signed 32-bit integer, wrapping on overflow. */
export function toWord(n: number): Word {
  return n | 0;
}

export function isWord(n: unknown): n is Word {
  return typeof n === 'number' && Number.isInteger(n) && n >= WORD_MIN && n <= WORD_MAX;
}

export const OPCODES = [
  'Push',
  'Pop',
  'Dup',
  'Plus',
  'Minus',
  'Mult',
  'Div',
  'Jump',
  'JumpIfNonzero',
  'JumpIfEqual',
  'Halt',
] as const;

export type Opcode = typeof OPCODES[number];

export function isOpcode(s: unknown): s is Opcode {
  return OPCODES.some(op => op === s);
}

// Every instruction carries an operand; opcodes that ignore it hold 0.
export interface Instruction {
  readonly op: Opcode;
  readonly operand: Word;
}

export type Program = readonly Instruction[];

export function instruction(op: Opcode, operand: Word = 0): Instruction {
  return Object.freeze({ op, operand: toWord(operand) });
}

export const Inst = {
  push: (value: Word) => instruction('Push', value),
  pop: () => instruction('Pop'),
  dup: (depth: Word) => instruction('Dup', depth),
  plus: () => instruction('Plus'),
  minus: () => instruction('Minus'),
  mult: () => instruction('Mult'),
  div: () => instruction('Div'),
  jump: (target: Word) => instruction('Jump', target),
  jumpIfNonzero: (target: Word) => instruction('JumpIfNonzero', target),
  jumpIfEqual: (target: Word) => instruction('JumpIfEqual', target),
  halt: () => instruction('Halt'),
};

export function isJump(op: Opcode): op is 'Jump' | 'JumpIfNonzero' | 'JumpIfEqual' {
  return op === 'Jump' || op === 'JumpIfNonzero' || op === 'JumpIfEqual';
}

export function formatInstruction(ins: Instruction): string {
  switch (ins.op) {
    case 'Push':
    case 'Dup':
    case 'Jump':
    case 'JumpIfNonzero':
    case 'JumpIfEqual':
      return `${ins.op} ${ins.operand}`;
    default:
      return ins.op;
  }
}
