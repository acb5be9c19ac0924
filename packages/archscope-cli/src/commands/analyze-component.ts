import type { ComponentDependencyReport, ExternalEndpoint, RoleReport } from '@archscope/core';
import { logger } from '../lib/logger.js';
import { emit, openSession, type CommandOptions } from '../lib/session.js';

export interface ComponentView {
  found: boolean;
  dependencies: ComponentDependencyReport;
  role: RoleReport;
}

function formatExternal(endpoint: ExternalEndpoint): string {
  return `${endpoint.componentId} (${endpoint.module ?? 'unmapped'})`;
}

export async function analyzeComponentCommand(componentId: string, opts: CommandOptions): Promise<ComponentView> {
  const { engine } = await openSession(opts);
  const dependencies = engine.analyzeComponent(componentId);
  const view: ComponentView = { found: dependencies.found, dependencies, role: engine.inferRole(componentId) };

  return emit(opts, view, ({ dependencies: deps, role }) => {
    if (!deps.found) {
      logger.error(deps.error ?? `Component not found: ${componentId}`);
      return;
    }
    logger.header(`Component ${componentId}`);
    logger.info(`Module: ${deps.module ?? 'unmapped'}`);
    logger.info(`Role:   ${role.role} (${role.confidence.toFixed(1)})`);
    logger.dim(role.purpose);
    for (const reason of role.reasoning) logger.dim(`- ${reason}`);

    logger.step(`Internal dependencies (${deps.internalDeps.length})`);
    deps.internalDeps.forEach((id) => logger.dim(id));
    logger.step(`External dependencies (${deps.externalDeps.length})`);
    deps.externalDeps.forEach((e) => logger.dim(formatExternal(e)));
    logger.step(`Internal dependents (${deps.internalDependents.length})`);
    deps.internalDependents.forEach((id) => logger.dim(id));
    logger.step(`External dependents (${deps.externalDependents.length})`);
    deps.externalDependents.forEach((e) => logger.dim(formatExternal(e)));
  });
}
