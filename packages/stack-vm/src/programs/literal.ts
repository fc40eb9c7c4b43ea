import { z } from 'zod';
import type { Program } from '../machine/instruction.js';
import { OPCODES, WORD_MAX, WORD_MIN, instruction } from '../machine/instruction.js';

export const instructionSchema = z.object({
  op: z.enum(OPCODES),
  operand: z.number().int().min(WORD_MIN).max(WORD_MAX).default(0),
}).strict();

export const programSchema = z.array(instructionSchema);

export type InstructionLiteral = z.input<typeof instructionSchema>;

/**
 * Parses an inline JSON program such as `[{"op":"Push","operand":2},{"op":"Halt"}]`.
 * Shape errors throw; jump targets are not checked here.
 */
export function parseProgramLiteral(json: string): Program {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new Error(`E_PROGRAM_SHAPE: invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = programSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new Error(`E_PROGRAM_SHAPE: ${details}`);
  }
  return parsed.data.map(({ op, operand }) => instruction(op, operand));
}
