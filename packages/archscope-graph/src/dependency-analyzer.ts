import {
  DEFAULTS,
  type CohesionLevel,
  type CohesionThresholds,
  type ComponentDependencyReport,
  type ComponentMap,
  type ComponentRelationship,
  type ExternalEndpoint,
  type ModuleComplexity,
  type ModuleDependencyReport,
  type ModuleIndex,
  type ModuleRelationshipGroup,
} from '@archscope/core';

/**
 * Splits a component's or module's edges into internal (same module) and
 * external (cross-module). Only the immediate edge lists are read, so cycles in
 * the dependency graph are harmless.
 */
export class DependencyAnalyzer {
  constructor(
    private readonly modules: ModuleIndex,
    private readonly components: ComponentMap,
    private readonly thresholds: CohesionThresholds = DEFAULTS.cohesion,
  ) {}

  analyze(componentId: string): ComponentDependencyReport {
    const component = this.components.get(componentId);
    if (!component) {
      return {
        found: false,
        componentId,
        module: null,
        error: `Component not found: ${componentId}`,
        internalDeps: [],
        externalDeps: [],
        internalDependents: [],
        externalDependents: [],
        dependencyModules: [],
        dependentModules: [],
      };
    }

    const home = this.moduleOf(componentId);
    const deps = this.partition(home, component.dependsOn);
    const dependents = this.partition(home, component.dependedBy);

    return {
      found: true,
      componentId,
      module: home,
      internalDeps: deps.internal,
      externalDeps: deps.external,
      internalDependents: dependents.internal,
      externalDependents: dependents.external,
      dependencyModules: touchedModules(deps.external),
      dependentModules: touchedModules(dependents.external),
    };
  }

  analyzeModule(modulePath: string): ModuleDependencyReport {
    const record = this.modules.modules.get(modulePath);
    if (!record) {
      return {
        found: false,
        modulePath,
        error: `Module not found: ${modulePath}`,
        internalDependencies: [],
        externalDependenciesByModule: [],
        externalDependentsByModule: [],
        complexity: this.complexity(0, 0, 0, 0, 0),
      };
    }

    const internal: ComponentRelationship[] = [];
    const outgoing = new Map<string | null, ComponentRelationship[]>();
    const incoming = new Map<string | null, ComponentRelationship[]>();
    let componentCount = 0;

    for (const componentId of record.components) {
      const component = this.components.get(componentId);
      // Skip ids absent from the graph and ids a later module took over.
      if (!component || this.moduleOf(componentId) !== modulePath) continue;
      componentCount++;

      for (const depId of component.dependsOn) {
        const target = this.moduleOf(depId);
        if (isInternal(modulePath, target)) {
          internal.push({ from: componentId, to: depId });
        } else {
          appendGroup(outgoing, target, { from: componentId, to: depId });
        }
      }

      // Internal reverse edges are the same edges seen from the other end.
      for (const dependentId of component.dependedBy) {
        const source = this.moduleOf(dependentId);
        if (!isInternal(modulePath, source)) {
          appendGroup(incoming, source, { from: dependentId, to: componentId });
        }
      }
    }

    const externalDependenciesByModule = toGroups(outgoing);
    const externalDependentsByModule = toGroups(incoming);
    const externalCount =
      countRelationships(externalDependenciesByModule) + countRelationships(externalDependentsByModule);

    return {
      found: true,
      modulePath,
      internalDependencies: internal,
      externalDependenciesByModule,
      externalDependentsByModule,
      complexity: this.complexity(
        componentCount,
        internal.length,
        externalCount,
        externalDependenciesByModule.filter((g) => g.module !== null).length,
        externalDependentsByModule.filter((g) => g.module !== null).length,
      ),
    };
  }

  cohesionLevel(score: number): CohesionLevel {
    if (score > this.thresholds.high) return 'high';
    if (score > this.thresholds.moderate) return 'moderate';
    return 'low';
  }

  private complexity(
    componentCount: number,
    internalEdgeCount: number,
    externalEdgeCount: number,
    dependencyModuleCount: number,
    dependentModuleCount: number,
  ): ModuleComplexity {
    const cohesionScore = cohesion(internalEdgeCount, externalEdgeCount);
    return {
      componentCount,
      internalEdgeCount,
      externalEdgeCount,
      cohesionScore,
      cohesion: this.cohesionLevel(cohesionScore),
      dependencyModuleCount,
      dependentModuleCount,
    };
  }

  private moduleOf(componentId: string): string | null {
    return this.modules.componentToModule.get(componentId) ?? null;
  }

  private partition(home: string | null, ids: string[]): { internal: string[]; external: ExternalEndpoint[] } {
    const internal: string[] = [];
    const external: ExternalEndpoint[] = [];
    for (const id of ids) {
      const module = this.moduleOf(id);
      if (isInternal(home, module)) internal.push(id);
      else external.push({ componentId: id, module });
    }
    return { internal, external };
  }
}

/** internal / (internal + external); 0 when there are no edges at all. */
export function cohesion(internalEdges: number, externalEdges: number): number {
  const total = internalEdges + externalEdges;
  return total === 0 ? 0 : internalEdges / total;
}

// An endpoint without a known module is never internal.
function isInternal(home: string | null, other: string | null): boolean {
  return home !== null && other !== null && home === other;
}

function touchedModules(endpoints: ExternalEndpoint[]): string[] {
  const modules = new Set<string>();
  for (const endpoint of endpoints) {
    if (endpoint.module !== null) modules.add(endpoint.module);
  }
  return [...modules];
}

function appendGroup(
  groups: Map<string | null, ComponentRelationship[]>,
  module: string | null,
  relationship: ComponentRelationship,
): void {
  const list = groups.get(module) ?? [];
  list.push(relationship);
  groups.set(module, list);
}

function toGroups(groups: Map<string | null, ComponentRelationship[]>): ModuleRelationshipGroup[] {
  return [...groups].map(([module, relationships]) => ({ module, relationships }));
}

function countRelationships(groups: ModuleRelationshipGroup[]): number {
  return groups.reduce((sum, group) => sum + group.relationships.length, 0);
}
