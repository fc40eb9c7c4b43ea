export { DEFAULT_PROGRAM, getBuiltin, listBuiltins } from './builtin.js';
export type { BuiltinProgram } from './builtin.js';
export { instructionSchema, parseProgramLiteral, programSchema } from './literal.js';
export type { InstructionLiteral } from './literal.js';
