import type { Program } from '../machine/instruction.js';
import { isJump, isWord } from '../machine/instruction.js';

export type IssueCode = 'E_JUMP_TARGET' | 'E_DUP_DEPTH' | 'E_OPERAND';

export interface CheckIssue {
  code: IssueCode;
  index: number;
  message: string;
}

export interface CheckReport {
  ok: boolean;
  issues: CheckIssue[];
}

/**
 * Static pass over a program. Nothing here runs at load time; a jump to
 * `program.length` is accepted since it is the usual way to fall off the end.
 */
export function checkProgram(program: Program): CheckReport {
  const issues: CheckIssue[] = [];
  program.forEach((ins, index) => {
    if (!isWord(ins.operand)) {
      issues.push({ code: 'E_OPERAND', index, message: `${ins.op} operand ${ins.operand} is not a 32-bit integer` });
      return;
    }
    if (isJump(ins.op) && (ins.operand < 0 || ins.operand > program.length)) {
      issues.push({
        code: 'E_JUMP_TARGET',
        index,
        message: `${ins.op} target ${ins.operand} outside 0..${program.length}`,
      });
    }
    if (ins.op === 'Dup' && ins.operand < 0) {
      issues.push({ code: 'E_DUP_DEPTH', index, message: `Dup depth ${ins.operand} is negative` });
    }
  });
  return { ok: issues.length === 0, issues };
}

export function formatIssue(issue: CheckIssue): string {
  return `${issue.index}: ${issue.code} ${issue.message}`;
}
