import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import { ARCHSCOPE_FILES } from '@archscope/core';
import { ArchitectureEngine, GraphStore } from '@archscope/graph';
import { loadConfig } from '../lib/config.js';
import { logger, setLogLevel } from '../lib/logger.js';
import { resolveInputs } from '../lib/paths.js';
import { emit, type CommandOptions } from '../lib/session.js';

type CheckStatus = 'pass' | 'fail' | 'warn';

export interface CheckResult {
  label: string;
  status: CheckStatus;
  detail?: string;
}

export interface DoctorReport {
  checks: CheckResult[];
  failures: number;
  warnings: number;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function checkSettings(cwd: string): CheckResult {
  const settingsPath = path.join(cwd, ARCHSCOPE_FILES.SETTINGS);
  if (fs.existsSync(settingsPath)) return { label: 'settings', status: 'pass', detail: settingsPath };
  return { label: 'settings', status: 'warn', detail: `${ARCHSCOPE_FILES.SETTINGS} not found, using defaults` };
}

function checkGraphShape(engine: ArchitectureEngine): CheckResult[] {
  const dangling = engine.getDanglingDependencies();
  const reassigned = engine.getReassignedComponents();
  const unmapped = engine.listComponents().filter((c) => c.module === null);

  return [
    dangling.length === 0
      ? { label: 'dangling dependencies', status: 'pass' }
      : {
          label: 'dangling dependencies',
          status: 'warn',
          detail: `${dangling.length} component(s) depend on ids missing from the graph (e.g. ${dangling[0]?.componentId})`,
        },
    reassigned.length === 0
      ? { label: 'component ownership', status: 'pass' }
      : {
          label: 'component ownership',
          status: 'warn',
          detail: `${reassigned.length} component(s) listed under more than one module; last one wins`,
        },
    unmapped.length === 0
      ? { label: 'module coverage', status: 'pass' }
      : { label: 'module coverage', status: 'warn', detail: `${unmapped.length} component(s) belong to no module` },
  ];
}

function statusIcon(status: CheckStatus): string {
  switch (status) {
    case 'pass':
      return chalk.green('✓');
    case 'fail':
      return chalk.red('✗');
    case 'warn':
      return chalk.yellow('⚠');
  }
}

export async function doctorCommand(opts: CommandOptions): Promise<DoctorReport> {
  const cwd = opts.cwd ?? process.cwd();
  if (opts.json) setLogLevel('error', { pin: true });
  const config = loadConfig(cwd);
  if (!opts.json) setLogLevel(config.logLevel);

  const checks: CheckResult[] = [checkSettings(cwd)];
  try {
    const inputs = await resolveInputs(opts, config, cwd);
    checks.push({ label: 'input files', status: 'pass', detail: `${inputs.moduleTreePath}, ${inputs.dependencyGraphPath}` });
    try {
      const store = await GraphStore.fromFiles(inputs.moduleTreePath, inputs.dependencyGraphPath);
      const engine = new ArchitectureEngine(store, { cohesion: config.cohesion, controllerFanOut: config.controllerFanOut });
      const summary = engine.getSummary();
      checks.push({
        label: 'input schema',
        status: 'pass',
        detail: `${summary.totalModules} modules, ${summary.totalComponents} components`,
      });
      checks.push(...checkGraphShape(engine));
    } catch (err) {
      checks.push({ label: 'input schema', status: 'fail', detail: errorText(err) });
    }
  } catch (err) {
    checks.push({ label: 'input files', status: 'fail', detail: errorText(err) });
  }

  const report: DoctorReport = {
    checks,
    failures: checks.filter((c) => c.status === 'fail').length,
    warnings: checks.filter((c) => c.status === 'warn').length,
  };

  return emit(opts, report, (r) => {
    logger.header('archscope doctor');
    const labelWidth = Math.max(...r.checks.map((c) => c.label.length)) + 2;
    for (const check of r.checks) {
      const detail = check.detail ? chalk.dim(` (${check.detail})`) : '';
      logger.info(`${statusIcon(check.status)}  ${check.label.padEnd(labelWidth)}${detail}`);
    }
    if (r.failures > 0) logger.error(`${r.failures} check(s) failed.`);
    else if (r.warnings > 0) logger.warn(`${r.warnings} warning(s).`);
    else logger.success('All checks passed.');
  });
}
