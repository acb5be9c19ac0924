import type { PatternReport } from '@archscope/core';
import { logger } from '../lib/logger.js';
import { emit, openSession, type CommandOptions } from '../lib/session.js';

export async function detectPatternsCommand(modulePath: string, opts: CommandOptions): Promise<PatternReport> {
  const { engine } = await openSession(opts);
  return emit(opts, engine.detectPatterns(modulePath), (report) => {
    if (!report.found) {
      logger.error(report.error ?? `Module not found: ${modulePath}`);
      return;
    }
    logger.header(`Patterns in ${modulePath}`);
    if (report.patterns.length === 0) logger.info('No architectural patterns detected');
    for (const pattern of report.patterns) {
      logger.success(`${pattern.type} (${pattern.confidence.toFixed(1)}): ${pattern.components.join(', ')}`);
      pattern.evidence.forEach((e) => logger.dim(e));
    }

    logger.step('Component roles');
    for (const [id, assignment] of Object.entries(report.componentRoles)) {
      logger.dim(`${id}: ${assignment.role} (${assignment.confidence.toFixed(1)})`);
    }
  });
}
