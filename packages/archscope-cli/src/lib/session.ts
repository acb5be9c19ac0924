import { ArchitectureEngine, GraphStore } from '@archscope/graph';
import { loadConfig, type ArchscopeConfig } from './config.js';
import { resolveInputs, type InputOptions, type ResolvedInputs } from './paths.js';
import { logger, setLogLevel, spinner } from './logger.js';

export interface CommandOptions extends InputOptions {
  json?: boolean;
  cwd?: string;
}

export interface Session {
  engine: ArchitectureEngine;
  config: ArchscopeConfig;
  inputs: ResolvedInputs;
}

/**
 * Load settings, locate the two input graphs and build the engine.
 * JSON runs drop to error-only logging so stdout carries nothing but the document.
 */
export async function openSession(opts: CommandOptions): Promise<Session> {
  const cwd = opts.cwd ?? process.cwd();
  if (opts.json) setLogLevel('error', { pin: true });
  const config = loadConfig(cwd);
  if (!opts.json) setLogLevel(config.logLevel);

  const inputs = await resolveInputs(opts, config, cwd);
  logger.debug(`module tree: ${inputs.moduleTreePath}`);
  logger.debug(`dependency graph: ${inputs.dependencyGraphPath}`);

  const spin = spinner('Loading module tree and dependency graph...');
  let store: GraphStore;
  try {
    store = await GraphStore.fromFiles(inputs.moduleTreePath, inputs.dependencyGraphPath);
  } catch (err) {
    spin.fail('Failed to load inputs');
    throw err;
  }

  const engine = new ArchitectureEngine(store, {
    cohesion: config.cohesion,
    controllerFanOut: config.controllerFanOut,
  });
  const summary = engine.getSummary();
  spin.succeed(`Loaded ${summary.totalModules} modules and ${summary.totalComponents} components`);

  for (const r of engine.getReassignedComponents()) {
    logger.warn(`${r.componentId} is listed under both ${r.previous} and ${r.current}; using ${r.current}`);
  }

  return { engine, config, inputs };
}

/** Print `data` as JSON, or run the human-readable renderer. */
export function emit<T>(opts: CommandOptions, data: T, render: (data: T) => void): T {
  if (opts.json) console.log(JSON.stringify(data, null, 2));
  else render(data);
  return data;
}
