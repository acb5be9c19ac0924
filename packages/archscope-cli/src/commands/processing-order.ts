import { logger } from '../lib/logger.js';
import { emit, openSession, type CommandOptions } from '../lib/session.js';

export async function processingOrderCommand(opts: CommandOptions): Promise<string[][]> {
  const { engine } = await openSession(opts);
  return emit(opts, engine.getProcessingOrder(), (batches) => {
    logger.header('Processing order (children before parents)');
    batches.forEach((batch, i) => {
      logger.step(`Batch ${i + 1}: ${batch.length} module(s)`);
      for (const modulePath of batch) logger.dim(modulePath);
    });
  });
}
