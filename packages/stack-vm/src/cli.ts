#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { pathToFileURL } from 'node:url';

import { programHash } from './canon/fingerprint.js';
import { checkProgram, formatIssue } from './check/program.js';
import { DEFAULT_MAX_STEPS, assertStepBudget, run } from './driver/run.js';
import type { RunReport } from './driver/run.js';
import { dump } from './machine/dump.js';
import type { Program } from './machine/instruction.js';
import { formatInstruction } from './machine/instruction.js';
import { Machine } from './machine/machine.js';
import { trapMessage } from './machine/trap.js';
import { DEFAULT_PROGRAM, getBuiltin, listBuiltins } from './programs/builtin.js';
import { parseProgramLiteral } from './programs/literal.js';

export interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
}

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_TRAPPED = 2;

interface ProgramOptions {
  programJson?: string;
}

interface RunCommandOptions extends ProgramOptions {
  steps: string;
  dump: boolean;
  check?: boolean;
}

function resolveProgram(name: string, options: ProgramOptions): { label: string; program: Program } {
  if (options.programJson !== undefined) {
    return { label: 'literal', program: parseProgramLiteral(options.programJson) };
  }
  return { label: name, program: getBuiltin(name).program };
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

function describeReport(report: RunReport): string {
  switch (report.outcome) {
    case 'halted':
      return `halted after ${plural(report.steps, 'step')}\n`;
    case 'budget-exhausted':
      return `step budget exhausted after ${plural(report.steps, 'step')}\n`;
    case 'trapped': {
      const { fault } = report;
      const at = fault.instruction ? formatInstruction(fault.instruction) : '<no instruction>';
      return `${trapMessage(fault.trap)}\nat ${fault.index}: ${at}\n`;
    }
    default: {
      const _: never = report;
      return '';
    }
  }
}

export function createCli(io: CliIo, setExitCode: (code: number) => void): Command {
  const program = new Command();
  program
    .name('stack-vm')
    .description('Stack-based bytecode virtual machine')
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  program
    .command('run', { isDefault: true })
    .description('Run a built-in program or an inline JSON program')
    .argument('[name]', 'built-in program name', DEFAULT_PROGRAM)
    .option('--steps <n>', 'step budget', String(DEFAULT_MAX_STEPS))
    .option('--program-json <json>', 'inline program, e.g. [{"op":"Push","operand":1},{"op":"Halt"}]')
    .option('--no-dump', 'do not dump the stack after each step')
    .option('--check', 'refuse to run a program that fails the static check')
    .action((name: string, options: RunCommandOptions) => {
      const maxSteps = assertStepBudget(Number(options.steps));
      const { label, program: code } = resolveProgram(name, options);
      if (options.check) {
        const report = checkProgram(code);
        if (!report.ok) {
          report.issues.forEach(issue => io.err(`${formatIssue(issue)}\n`));
          setExitCode(EXIT_ERROR);
          return;
        }
      }
      const machine = new Machine();
      machine.load(code);
      const report = run(machine, {
        maxSteps,
        label,
        onStep: options.dump ? m => io.out(dump(m) + '\n') : undefined,
      });
      io.out(describeReport(report));
      setExitCode(report.outcome === 'trapped' ? EXIT_TRAPPED : EXIT_OK);
    });

  program
    .command('list')
    .description('List built-in programs')
    .action(() => {
      for (const builtin of listBuiltins()) {
        const hash = programHash(builtin.program).slice(0, 16);
        io.out(`${builtin.name}\t${builtin.program.length}\t${hash}\t${builtin.description}\n`);
      }
      setExitCode(EXIT_OK);
    });

  program
    .command('check')
    .description('Statically check jump targets and operands')
    .argument('[name]', 'built-in program name', DEFAULT_PROGRAM)
    .option('--program-json <json>', 'inline program')
    .action((name: string, options: ProgramOptions) => {
      const { program: code } = resolveProgram(name, options);
      const report = checkProgram(code);
      if (report.ok) {
        io.out('ok\n');
      } else {
        report.issues.forEach(issue => io.out(`${formatIssue(issue)}\n`));
      }
      setExitCode(report.ok ? EXIT_OK : EXIT_ERROR);
    });

  return program;
}

/** Parses `argv` (without the node and script entries) and returns the exit code. */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createCli(io, code => { exitCode = code; });
  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    io.err(`${error instanceof Error ? error.message : String(error)}\n`);
    return EXIT_ERROR;
  }
  return exitCode;
}

const invokedDirectly = (() => {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(entry).href;
  } catch {
    return false;
  }
})();

if (invokedDirectly) {
  const io: CliIo = {
    out: text => { process.stdout.write(text); },
    err: text => { process.stderr.write(text); },
  };
  runCli(process.argv.slice(2), io)
    .then(code => { process.exitCode = code; })
    .catch((error) => {
      process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = EXIT_ERROR;
    });
}
