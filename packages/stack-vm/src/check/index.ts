export { checkProgram, formatIssue } from './program.js';
export type { CheckIssue, CheckReport, IssueCode } from './program.js';
