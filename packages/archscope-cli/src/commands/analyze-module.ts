import type { ModuleDescription, ModuleRelationshipGroup } from '@archscope/core';
import { logger } from '../lib/logger.js';
import { emit, openSession, type CommandOptions } from '../lib/session.js';

export interface ModuleView {
  found: boolean;
  modulePath: string;
  error?: string;
  description?: ModuleDescription;
}

function renderGroups(title: string, groups: ModuleRelationshipGroup[]): void {
  const total = groups.reduce((n, g) => n + g.relationships.length, 0);
  logger.step(`${title} (${total} across ${groups.length} module(s))`);
  for (const group of groups) {
    logger.dim(`${group.module ?? 'unmapped'}: ${group.relationships.map((r) => `${r.from} -> ${r.to}`).join(', ')}`);
  }
}

export async function analyzeModuleCommand(modulePath: string, opts: CommandOptions): Promise<ModuleView> {
  const { engine, config } = await openSession(opts);
  const description = engine.describeModule(modulePath, config.keyComponentLimit);
  const view: ModuleView = description
    ? { found: true, modulePath, description }
    : { found: false, modulePath, error: `Module not found: ${modulePath}` };

  return emit(opts, view, (v) => {
    if (!v.description) {
      logger.error(v.error ?? `Module not found: ${modulePath}`);
      return;
    }
    const { module, dependencies, patterns, keyComponents } = v.description;
    const { complexity } = dependencies;

    logger.header(`Module ${module.path}`);
    logger.info(`Level ${module.level}, ${module.isLeaf ? 'leaf' : `${module.children.length} child module(s)`}`);
    logger.info(
      `Cohesion: ${complexity.cohesion} (${complexity.cohesionScore.toFixed(2)}; ` +
        `${complexity.internalEdgeCount} internal / ${complexity.externalEdgeCount} external edges)`,
    );
    if (keyComponents.length > 0) logger.info(`Key components: ${keyComponents.join(', ')}`);

    logger.step(`Internal dependencies (${dependencies.internalDependencies.length})`);
    dependencies.internalDependencies.forEach((r) => logger.dim(`${r.from} -> ${r.to}`));
    renderGroups('External dependencies', dependencies.externalDependenciesByModule);
    renderGroups('External dependents', dependencies.externalDependentsByModule);

    for (const pattern of patterns) {
      logger.success(`${pattern.type} pattern (${pattern.confidence.toFixed(1)})`);
      pattern.evidence.forEach((e) => logger.dim(e));
    }
  });
}
