import { describe, it, expect } from 'vitest';
import { Machine, STACK_CAPACITY } from '../src/machine/machine.js';
import { Inst, instruction } from '../src/machine/instruction.js';
import type { Instruction, Program } from '../src/machine/instruction.js';
import { dump } from '../src/machine/dump.js';
import type { Trap } from '../src/machine/trap.js';

function loaded(program: Program, capacity?: number): Machine {
  const vm = new Machine(capacity);
  vm.load(program);
  return vm;
}

function stepN(vm: Machine, n: number): Trap[] {
  const traps: Trap[] = [];
  for (let i = 0; i < n; i += 1) traps.push(vm.execute());
  return traps;
}

describe('stack primitives', () => {
  it('pops in LIFO order', () => {
    const vm = new Machine();
    [3, -7, 42, 0].forEach(v => expect(vm.push(v)).toBe('NoTrap'));
    expect([vm.pop(), vm.pop(), vm.pop(), vm.pop()]).toEqual([0, 42, -7, 3]);
    expect(vm.size).toBe(0);
  });

  it('reports overflow at capacity and keeps existing slots', () => {
    const vm = new Machine(3);
    vm.push(1); vm.push(2); vm.push(3);
    expect(vm.push(4)).toBe('StackOverflow');
    expect(vm.size).toBe(3);
    expect(vm.stack()).toEqual([1, 2, 3]);
  });

  it('returns undefined when popping an empty stack', () => {
    const vm = new Machine();
    expect(vm.pop()).toBeUndefined();
    expect(vm.size).toBe(0);
  });

  it('defaults to a 1024-slot stack', () => {
    const vm = new Machine();
    expect(vm.capacity).toBe(STACK_CAPACITY);
    for (let i = 0; i < 1024; i += 1) expect(vm.push(i)).toBe('NoTrap');
    expect(vm.push(0)).toBe('StackOverflow');
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new Machine(0)).toThrow(/E_CAPACITY/);
  });

  it('never exposes slots above size', () => {
    const vm = new Machine();
    vm.push(9); vm.push(8);
    vm.pop();
    expect(vm.stack()).toEqual([9]);
    expect(vm.peek(1)).toBeUndefined();
  });
});

describe('execute', () => {
  it('Push advances ip and pushes the operand', () => {
    const vm = loaded([Inst.push(5)]);
    expect(vm.execute()).toBe('NoTrap');
    expect(vm.ip).toBe(1);
    expect(vm.stack()).toEqual([5]);
  });

  it('Push on a full stack traps without advancing', () => {
    const vm = loaded([Inst.push(1), Inst.push(2)], 1);
    expect(stepN(vm, 2)).toEqual(['NoTrap', 'StackOverflow']);
    expect(vm.ip).toBe(1);
    expect(vm.stack()).toEqual([1]);
  });

  it('Pop on an empty machine traps with ip unchanged', () => {
    const vm = loaded([Inst.pop()]);
    expect(vm.execute()).toBe('StackUnderflow');
    expect(vm.ip).toBe(0);
    expect(vm.size).toBe(0);
  });

  it('Dup copies the element n below the top', () => {
    const vm = loaded([Inst.push(10), Inst.push(20), Inst.push(30), Inst.dup(2)]);
    stepN(vm, 3);
    expect(vm.execute()).toBe('NoTrap');
    expect(vm.size).toBe(4);
    expect(vm.peek(0)).toBe(10);
  });

  it('Dup past the bottom is an illegal access with no mutation', () => {
    const vm = loaded([Inst.push(10), Inst.dup(1)]);
    vm.execute();
    expect(vm.execute()).toBe('IllegalAccess');
    expect(vm.stack()).toEqual([10]);
    expect(vm.ip).toBe(1);
  });

  it('Dup with a negative depth is an illegal access', () => {
    const vm = loaded([Inst.push(10), Inst.dup(-1)]);
    vm.execute();
    expect(vm.execute()).toBe('IllegalAccess');
    expect(vm.size).toBe(1);
  });

  it('Dup overflows a full stack', () => {
    const vm = loaded([Inst.push(1), Inst.dup(0)], 1);
    vm.execute();
    expect(vm.execute()).toBe('StackOverflow');
  });

  it('Plus and Mult combine the top two', () => {
    const vm = loaded([Inst.push(6), Inst.push(7), Inst.mult(), Inst.push(-2), Inst.plus()]);
    expect(stepN(vm, 5)).toEqual(['NoTrap', 'NoTrap', 'NoTrap', 'NoTrap', 'NoTrap']);
    expect(vm.stack()).toEqual([40]);
  });

  it('Minus computes top minus second', () => {
    const vm = loaded([Inst.push(3), Inst.push(10), Inst.minus()]);
    stepN(vm, 3);
    expect(vm.stack()).toEqual([7]);
  });

  it('a zero on top is a valid dividend', () => {
    const vm = loaded([Inst.push(5), Inst.push(0), Inst.div()]);
    expect(stepN(vm, 3)).toEqual(['NoTrap', 'NoTrap', 'NoTrap']);
    expect(vm.stack()).toEqual([0]);
  });

  it('Div divides top by second, truncating toward zero', () => {
    const vm = loaded([Inst.push(2), Inst.push(-7), Inst.div()]);
    stepN(vm, 3);
    expect(vm.stack()).toEqual([-3]);
  });

  it('arithmetic wraps to 32 bits', () => {
    const vm = loaded([
      Inst.push(1), Inst.push(0x7fffffff), Inst.plus(),
      Inst.push(-1), Inst.push(-0x80000000), Inst.div(),
      Inst.push(0x10000), Inst.push(0x10000), Inst.mult(),
    ]);
    stepN(vm, 9);
    expect(vm.stack()).toEqual([-0x80000000, -0x80000000, 0]);
  });

  it('arithmetic on one operand underflows after consuming it', () => {
    const vm = loaded([Inst.push(1), Inst.plus()]);
    vm.execute();
    expect(vm.execute()).toBe('StackUnderflow');
    expect(vm.size).toBe(0);
    expect(vm.ip).toBe(1);
  });

  it('Div by zero consumes both operands', () => {
    const vm = loaded([Inst.push(7), Inst.push(0), Inst.push(4), Inst.div()]);
    stepN(vm, 3);
    expect(vm.execute()).toBe('DivisionByZero');
    expect(vm.stack()).toEqual([7]);
    expect(vm.ip).toBe(3);
  });

  it('Jump sets ip without bounds checking; the next fetch traps', () => {
    const vm = loaded([Inst.jump(7)]);
    expect(vm.execute()).toBe('NoTrap');
    expect(vm.ip).toBe(7);
    expect(vm.execute()).toBe('IllegalAccess');
    expect(vm.ip).toBe(7);
  });

  it('a negative jump target traps on fetch', () => {
    const vm = loaded([Inst.jump(-1)]);
    vm.execute();
    expect(vm.execute()).toBe('IllegalAccess');
  });

  it('JumpIfNonzero pops and branches', () => {
    const taken = loaded([Inst.push(3), Inst.jumpIfNonzero(9)]);
    stepN(taken, 2);
    expect(taken.ip).toBe(9);
    expect(taken.size).toBe(0);

    const fallthrough = loaded([Inst.push(0), Inst.jumpIfNonzero(9)]);
    stepN(fallthrough, 2);
    expect(fallthrough.ip).toBe(2);
    expect(fallthrough.size).toBe(0);
  });

  it('JumpIfNonzero on an empty stack underflows', () => {
    const vm = loaded([Inst.jumpIfNonzero(0)]);
    expect(vm.execute()).toBe('StackUnderflow');
    expect(vm.ip).toBe(0);
  });

  it('JumpIfEqual pops exactly one element whichever way it goes', () => {
    const equal = loaded([Inst.push(4), Inst.push(4), Inst.jumpIfEqual(0)]);
    stepN(equal, 3);
    expect(equal.ip).toBe(0);
    expect(equal.stack()).toEqual([4]);

    const unequal = loaded([Inst.push(4), Inst.push(5), Inst.jumpIfEqual(0)]);
    stepN(unequal, 3);
    expect(unequal.ip).toBe(3);
    expect(unequal.stack()).toEqual([4]);
  });

  it('JumpIfEqual needs two elements', () => {
    const vm = loaded([Inst.push(4), Inst.jumpIfEqual(0)]);
    vm.execute();
    expect(vm.execute()).toBe('StackUnderflow');
    expect(vm.stack()).toEqual([4]);
    expect(vm.ip).toBe(1);
  });

  it('Halt stops the machine and later steps are no-ops', () => {
    const vm = loaded([Inst.halt(), Inst.push(1)]);
    expect(vm.execute()).toBe('NoTrap');
    expect(vm.halted).toBe(true);
    expect(vm.ip).toBe(0);
    expect(vm.execute()).toBe('NoTrap');
    expect(vm.size).toBe(0);
    expect(vm.ip).toBe(0);
  });

  it('an empty program traps on the first fetch', () => {
    expect(new Machine().execute()).toBe('IllegalAccess');
  });

  it('an unknown opcode from an untyped caller is an illegal access', () => {
    const program: Instruction[] = JSON.parse('[{"op":"Nop","operand":0}]');
    const vm = loaded(program);
    expect(vm.execute()).toBe('IllegalAccess');
  });

  it('load rewinds ip and clears halted but keeps the stack', () => {
    const vm = loaded([Inst.push(1), Inst.halt()]);
    stepN(vm, 2);
    vm.load([Inst.push(2)]);
    expect(vm.halted).toBe(false);
    expect(vm.ip).toBe(0);
    vm.execute();
    expect(vm.stack()).toEqual([1, 2]);
  });

  it('load copies the program so edits to the source have no effect', () => {
    const code: Instruction[] = [Inst.push(1), Inst.halt()];
    const literal: Instruction[] = [{ op: 'Push', operand: 2 }];
    const vm = loaded(code);
    code[0] = Inst.pop();
    expect(vm.execute()).toBe('NoTrap');
    expect(vm.stack()).toEqual([1]);
    expect(Object.isFrozen(vm.program)).toBe(true);

    vm.load(literal);
    literal[0] = { op: 'Pop', operand: 0 };
    expect(vm.execute()).toBe('NoTrap');
    expect(vm.stack()).toEqual([1, 2]);
    expect(Object.isFrozen(vm.program[0])).toBe(true);
  });

  it('machines do not share state', () => {
    const a = loaded([Inst.push(1)]);
    const b = loaded([Inst.push(2)]);
    a.execute();
    expect(b.size).toBe(0);
  });

  it('instruction() defaults the operand to zero', () => {
    expect(instruction('Plus')).toEqual({ op: 'Plus', operand: 0 });
  });
});

describe('dump', () => {
  it('renders an empty stack', () => {
    expect(dump(new Machine())).toBe('Stack dump\nEmpty\n');
  });

  it('lists live slots bottom first', () => {
    const vm = new Machine();
    vm.push(5); vm.push(-1);
    expect(dump(vm)).toBe('Stack dump\n0: 5\n1: -1\n');
  });
});
