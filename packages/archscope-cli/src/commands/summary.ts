import type { RepositorySummary } from '@archscope/core';
import { logger } from '../lib/logger.js';
import { emit, openSession, type CommandOptions } from '../lib/session.js';

export async function summaryCommand(opts: CommandOptions): Promise<RepositorySummary> {
  const { engine } = await openSession(opts);
  return emit(opts, engine.getSummary(), (summary) => {
    logger.header('Repository summary');
    logger.info(`Modules:            ${summary.totalModules}`);
    logger.dim(`roots ${summary.rootModules}, parents ${summary.parentModules}, leaves ${summary.leafModules}`);
    logger.info(`Components:         ${summary.totalComponents}`);
    logger.info(`Max depth:          ${summary.maxDepth}`);
    logger.info(`Processing batches: ${summary.processingOrderLevels}`);
  });
}
