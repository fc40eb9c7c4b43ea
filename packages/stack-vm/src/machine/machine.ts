import type { Instruction, Program, Word } from './instruction.js';
import { toWord } from './instruction.js';
import type { Trap } from './trap.js';

export const STACK_CAPACITY = 1024;

type ArithmeticOp = 'Plus' | 'Minus' | 'Mult' | 'Div';

// a is the first value popped (the top), b the second.
function arithmetic(op: ArithmeticOp, a: Word, b: Word): Word | null {
  switch (op) {
    case 'Plus': return toWord(a + b);
    case 'Minus': return toWord(a - b);
    case 'Mult': return Math.imul(a, b);
    case 'Div': return b === 0 ? null : toWord(Math.trunc(a / b));
    default: {
      const _: never = op;
      return null;
    }
  }
}

/**
 * Stack machine over a fixed-capacity Int32Array.
 *
 * `execute` runs exactly one instruction and reports the outcome as a Trap;
 * defined faults are never thrown. The instruction pointer only advances when
 * the step returns NoTrap, so after a fault `ip` names the faulting
 * instruction. Slots at or above `size` keep stale values and are never read.
 */
export class Machine {
  private readonly data: Int32Array;
  private _size = 0;
  private _program: Program = [];
  private _ip: Word = 0;
  private _halted = false;

  constructor(readonly capacity: number = STACK_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`E_CAPACITY: stack capacity must be a positive integer, got ${capacity}`);
    }
    this.data = new Int32Array(capacity);
  }

  get size(): number { return this._size; }
  get ip(): Word { return this._ip; }
  get halted(): boolean { return this._halted; }
  get program(): Program { return this._program; }

  /**
   * Attaches a frozen copy of `program` and rewinds to its first instruction.
   * Later edits to the caller's array or instruction objects do not reach the
   * machine. The stack is kept.
   */
  load(program: Program): void {
    this._program = Object.freeze(program.map(({ op, operand }) => Object.freeze({ op, operand })));
    this._ip = 0;
    this._halted = false;
  }

  push(word: Word): 'NoTrap' | 'StackOverflow' {
    if (this._size === this.capacity) return 'StackOverflow';
    this.data[this._size] = word;
    this._size += 1;
    return 'NoTrap';
  }

  pop(): Word | undefined {
    if (this._size === 0) return undefined;
    this._size -= 1;
    return this.data[this._size];
  }

  /** Element `depth` slots below the top (0 is the top). */
  peek(depth: number): Word | undefined {
    if (!Number.isInteger(depth) || depth < 0 || depth >= this._size) return undefined;
    return this.data[this._size - 1 - depth];
  }

  /** Live slots, bottom first. */
  stack(): Word[] {
    return Array.from(this.data.subarray(0, this._size));
  }

  /** Fetch and run one instruction. A halted machine does nothing and returns NoTrap. */
  execute(): Trap {
    if (this._halted) return 'NoTrap';
    const ins = this.fetch();
    if (ins === undefined) return 'IllegalAccess';
    return this.dispatch(ins, this._ip);
  }

  /** The instruction at `ip`, or undefined when `ip` is outside the program. */
  fetch(): Instruction | undefined {
    const ip = this._ip;
    if (ip < 0 || ip >= this._program.length) return undefined;
    return this._program[ip];
  }

  private dispatch(ins: Instruction, ip: Word): Trap {
    const next = ip + 1;
    switch (ins.op) {
      case 'Push':
        return this.advance(this.push(ins.operand), next);
      case 'Pop':
        return this.advance(this.pop() === undefined ? 'StackUnderflow' : 'NoTrap', next);
      case 'Dup': {
        const value = this.peek(ins.operand);
        if (value === undefined) return 'IllegalAccess';
        return this.advance(this.push(value), next);
      }
      case 'Plus':
      case 'Minus':
      case 'Mult':
      case 'Div': {
        // both operands are consumed before any arithmetic check
        const a = this.pop();
        const b = this.pop();
        if (a === undefined || b === undefined) return 'StackUnderflow';
        const result = arithmetic(ins.op, a, b);
        if (result === null) return 'DivisionByZero';
        return this.advance(this.push(result), next);
      }
      case 'Jump':
        this._ip = ins.operand;
        return 'NoTrap';
      case 'JumpIfNonzero': {
        const condition = this.pop();
        if (condition === undefined) return 'StackUnderflow';
        this._ip = condition !== 0 ? ins.operand : next;
        return 'NoTrap';
      }
      case 'JumpIfEqual': {
        if (this._size < 2) return 'StackUnderflow';
        const top = this.data[this._size - 1];
        const second = this.data[this._size - 2];
        this._ip = top === second ? ins.operand : next;
        this._size -= 1;
        return 'NoTrap';
      }
      case 'Halt':
        this._halted = true;
        return 'NoTrap';
      default: {
        // reachable only from untyped callers; treated like any other bad fetch
        const _: never = ins.op;
        return 'IllegalAccess';
      }
    }
  }

  private advance(trap: Trap, next: Word): Trap {
    if (trap === 'NoTrap') this._ip = next;
    return trap;
  }
}
