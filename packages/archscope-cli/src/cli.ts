import { Command } from 'commander';
import { summaryCommand } from './commands/summary.js';
import { processingOrderCommand } from './commands/processing-order.js';
import { analyzeComponentCommand } from './commands/analyze-component.js';
import { analyzeModuleCommand } from './commands/analyze-module.js';
import { detectPatternsCommand } from './commands/detect-patterns.js';
import { doctorCommand } from './commands/doctor.js';
import type { CommandOptions } from './lib/session.js';

// Not-found reports are printed, then flagged through the exit code.
function exitOnMissing(result: { found: boolean }): void {
  if (!result.found) process.exitCode = 1;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('archscope')
    .description('Module hierarchy, dependency direction, cohesion and role analysis over precomputed graphs')
    .version('0.1.0')
    .option('--tree <path>', 'Module tree JSON file')
    .option('--graph <path>', 'Dependency graph JSON file')
    .option('--dir <path>', 'Directory searched for the input files (default: cwd)')
    .option('--json', 'Print the report as JSON');

  const globals = (): CommandOptions => program.opts<CommandOptions>();

  program
    .command('summary')
    .description('Repository-wide module and component counts')
    .action(async () => {
      await summaryCommand(globals());
    });

  program
    .command('order')
    .description('Module batches ordered children before parents')
    .action(async () => {
      await processingOrderCommand(globals());
    });

  program
    .command('component <id>')
    .description('Dependency split and inferred role of one component')
    .action(async (id: string) => {
      exitOnMissing(await analyzeComponentCommand(id, globals()));
    });

  program
    .command('module <path>')
    .description('Dependencies, cohesion, key components and patterns of one module')
    .action(async (modulePath: string) => {
      exitOnMissing(await analyzeModuleCommand(modulePath, globals()));
    });

  program
    .command('patterns <path>')
    .description('Architectural patterns and component roles within one module')
    .action(async (modulePath: string) => {
      exitOnMissing(await detectPatternsCommand(modulePath, globals()));
    });

  program
    .command('doctor')
    .description('Validate the inputs and report graph inconsistencies')
    .action(async () => {
      const report = await doctorCommand(globals());
      if (report.failures > 0) process.exitCode = 1;
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await buildProgram().parseAsync(argv);
}
