import type { Machine } from './machine.js';

/** Human-readable listing of the live stack, bottom slot first. */
export function dump(machine: Pick<Machine, 'stack'>): string {
  const slots = machine.stack();
  const lines = ['Stack dump'];
  if (slots.length === 0) {
    lines.push('Empty');
  } else {
    slots.forEach((value, index) => lines.push(`${index}: ${value}`));
  }
  return lines.join('\n') + '\n';
}
