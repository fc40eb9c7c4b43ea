import type { Program } from '../machine/instruction.js';
import { isWord } from '../machine/instruction.js';

/**
 * `[{"op":…,"operand":…},…]` with keys in sorted order, whatever the key order
 * or extra fields of the source objects.
 */
export function canonicalProgramJson(program: Program): string {
  const items = program.map(({ op, operand }, index) => {
    if (!isWord(operand)) {
      throw new Error(`E_CANON_OPERAND: instruction ${index} operand ${operand} is not a 32-bit integer`);
    }
    return `{"op":${JSON.stringify(op)},"operand":${operand}}`;
  });
  return `[${items.join(',')}]`;
}
