export type Trap =
  | 'NoTrap'
  | 'StackOverflow'
  | 'StackUnderflow'
  | 'DivisionByZero'
  | 'IllegalAccess';

export type FaultTrap = Exclude<Trap, 'NoTrap'>;

export const TRAPS: readonly Trap[] = [
  'NoTrap',
  'StackOverflow',
  'StackUnderflow',
  'DivisionByZero',
  'IllegalAccess',
];

const MESSAGES: Record<FaultTrap, string> = {
  StackOverflow: 'Stack overflow',
  StackUnderflow: 'Stack underflow',
  DivisionByZero: 'Division by zero',
  IllegalAccess: 'Illegal access',
};

export function isFault(trap: Trap): trap is FaultTrap {
  return trap !== 'NoTrap';
}

export function trapMessage(trap: FaultTrap): string {
  return MESSAGES[trap];
}
