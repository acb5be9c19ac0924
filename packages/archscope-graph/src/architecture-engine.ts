import {
  DEFAULTS,
  type ComponentMap,
  type ComponentRecord,
  type ComponentDependencyReport,
  type ComponentReassignment,
  type DanglingDependency,
  type EngineOptions,
  type ModuleDependencyReport,
  type ModuleDescription,
  type ModuleIndex,
  type ModuleRecord,
  type PatternReport,
  type RepositorySummary,
  type RoleAssignment,
  type RoleReport,
} from '@archscope/core';
import { GraphStore } from './graph-store.js';
import { buildModuleIndex, getDescendants, getMaxDepth, getProcessingOrder } from './module-tree-index.js';
import {
  assignModules,
  buildComponentMap,
  findDanglingDependencies,
  invertDependencies,
} from './component-index.js';
import { DependencyAnalyzer } from './dependency-analyzer.js';
import { inferRole } from './role-inference.js';
import { detectPatterns } from './pattern-detector.js';

export interface ModuleComponentsOptions {
  /** Include components of every descendant module */
  recursive?: boolean;
}

function copyComponent(record: ComponentRecord): ComponentRecord {
  return { ...record, dependsOn: [...record.dependsOn], dependedBy: [...record.dependedBy] };
}

function copyModule(record: ModuleRecord): ModuleRecord {
  return { ...record, children: [...record.children], components: [...record.components] };
}

/**
 * Query surface over the two input graphs. Both indices are built once in the
 * constructor and never change afterwards; records leave the engine as copies.
 * Every report is computed on demand and nothing is cached.
 */
export class ArchitectureEngine {
  private readonly moduleIndex: ModuleIndex;
  private readonly components: ComponentMap;
  private readonly analyzer: DependencyAnalyzer;
  private readonly options: EngineOptions;

  constructor(store: GraphStore, options: Partial<EngineOptions> = {}) {
    this.options = {
      cohesion: options.cohesion ?? { ...DEFAULTS.cohesion },
      controllerFanOut: options.controllerFanOut ?? DEFAULTS.controllerFanOut,
    };
    this.moduleIndex = buildModuleIndex(store.moduleTree);
    this.components = buildComponentMap(store.dependencyGraph);
    invertDependencies(this.components);
    assignModules(this.components, this.moduleIndex.componentToModule);
    this.analyzer = new DependencyAnalyzer(this.moduleIndex, this.components, this.options.cohesion);
  }

  static fromData(moduleTree: unknown, dependencyGraph: unknown, options?: Partial<EngineOptions>): ArchitectureEngine {
    return new ArchitectureEngine(GraphStore.fromData(moduleTree, dependencyGraph), options);
  }

  getComponent(componentId: string): ComponentRecord | undefined {
    const record = this.components.get(componentId);
    return record ? copyComponent(record) : undefined;
  }

  /** Every component record, in input order. */
  listComponents(): ComponentRecord[] {
    return [...this.components.values()].map(copyComponent);
  }

  getModule(modulePath: string): ModuleRecord | undefined {
    const record = this.moduleIndex.modules.get(modulePath);
    return record ? copyModule(record) : undefined;
  }

  /** Component ids owned by the module (after last-write-wins assignment). */
  getModuleComponents(modulePath: string, opts: ModuleComponentsOptions = {}): string[] {
    const paths = opts.recursive ? [modulePath, ...getDescendants(this.moduleIndex, modulePath)] : [modulePath];
    const ids: string[] = [];
    for (const path of paths) {
      for (const componentId of this.moduleIndex.modules.get(path)?.components ?? []) {
        if (this.moduleIndex.componentToModule.get(componentId) === path) ids.push(componentId);
      }
    }
    return ids;
  }

  analyzeComponent(componentId: string): ComponentDependencyReport {
    return this.analyzer.analyze(componentId);
  }

  analyzeModule(modulePath: string): ModuleDependencyReport {
    return this.analyzer.analyzeModule(modulePath);
  }

  inferRole(componentId: string): RoleReport {
    const component = this.components.get(componentId);
    if (!component) {
      return {
        found: false,
        error: `Component not found: ${componentId}`,
        componentId,
        role: 'unknown',
        confidence: 0,
        reasoning: [],
        purpose: '',
      };
    }
    return { found: true, ...inferRole(component, this.options.controllerFanOut) };
  }

  detectPatterns(modulePath: string): PatternReport {
    if (!this.moduleIndex.modules.has(modulePath)) {
      return { found: false, modulePath, error: `Module not found: ${modulePath}`, patterns: [], componentRoles: {} };
    }

    const components = this.ownedRecords(modulePath);
    const componentRoles: Record<string, RoleAssignment> = {};
    for (const component of components) {
      componentRoles[component.id] = inferRole(component, this.options.controllerFanOut);
    }

    return {
      found: true,
      modulePath,
      patterns: detectPatterns({ components, roles: componentRoles, analyzer: this.analyzer }),
      componentRoles,
    };
  }

  /** Most depended-upon components of a module, ties broken by fan-out then id. */
  getKeyComponents(modulePath: string, limit: number = DEFAULTS.keyComponentLimit): string[] {
    return this.ownedRecords(modulePath)
      .sort(
        (a, b) =>
          b.dependentCount - a.dependentCount ||
          b.dependencyCount - a.dependencyCount ||
          a.id.localeCompare(b.id),
      )
      .slice(0, Math.max(0, limit))
      .map((c) => c.id);
  }

  describeModule(modulePath: string, keyComponentLimit?: number): ModuleDescription | undefined {
    const module = this.getModule(modulePath);
    if (!module) return undefined;
    return {
      module,
      dependencies: this.analyzeModule(modulePath),
      patterns: this.detectPatterns(modulePath).patterns,
      keyComponents: this.getKeyComponents(modulePath, keyComponentLimit),
    };
  }

  getProcessingOrder(): string[][] {
    return getProcessingOrder(this.moduleIndex);
  }

  getSummary(): RepositorySummary {
    return {
      totalModules: this.moduleIndex.modules.size,
      leafModules: this.moduleIndex.leafModules.length,
      parentModules: this.moduleIndex.parentModules.length,
      rootModules: this.moduleIndex.rootModules.length,
      totalComponents: this.components.size,
      maxDepth: getMaxDepth(this.moduleIndex),
      processingOrderLevels: this.getProcessingOrder().length,
    };
  }

  getDanglingDependencies(): DanglingDependency[] {
    return findDanglingDependencies(this.components);
  }

  getReassignedComponents(): ComponentReassignment[] {
    return [...this.moduleIndex.reassignedComponents];
  }

  private ownedRecords(modulePath: string): ComponentRecord[] {
    const records: ComponentRecord[] = [];
    for (const componentId of this.getModuleComponents(modulePath)) {
      const record = this.components.get(componentId);
      if (record) records.push(record);
    }
    return records;
  }
}
