import type { CohesionLevel, ComponentKind, ComponentRole, PatternType } from './constants.js';

// ─── Raw inputs ────────────────────────────────────────────────────────────

export interface ModuleTreeNode {
  name?: string | null;
  path?: string | null;
  children?: ModuleTree | null; // keyed by child path
  components?: string[] | null;
}

export type ModuleTree = Record<string, ModuleTreeNode>;

export interface RawComponent {
  id?: string | null;
  name?: string | null;
  component_type?: string | null;
  file_path?: string | null;
  relative_path?: string | null;
  depends_on?: string[] | null;
}

export type DependencyGraphInput = Record<string, RawComponent>;

// ─── Indexed records ───────────────────────────────────────────────────────

export interface ModuleRecord {
  path: string;
  name: string;
  level: number; // root = 0
  parent: string | null;
  children: string[];
  components: string[];
  isLeaf: boolean;
}

export interface ComponentReassignment {
  componentId: string;
  previous: string;
  current: string; // the module that now owns the component
}

export interface ModuleIndex {
  modules: Map<string, ModuleRecord>;
  leafModules: string[];
  parentModules: string[];
  rootModules: string[];
  componentToModule: Map<string, string>;
  reassignedComponents: ComponentReassignment[];
}

export interface ComponentRecord {
  id: string;
  name: string;
  kind: ComponentKind;
  filePath: string | null;
  relativePath: string | null;
  module: string | null;
  dependsOn: string[];
  dependedBy: string[]; // derived, never read from input
  dependencyCount: number;
  dependentCount: number;
}

export type ComponentMap = Map<string, ComponentRecord>;

export interface DanglingDependency {
  componentId: string;
  missing: string[];
}

// ─── Reports ───────────────────────────────────────────────────────────────

export interface ExternalEndpoint {
  componentId: string;
  module: string | null;
}

export interface ComponentDependencyReport {
  found: boolean;
  componentId: string;
  module: string | null;
  error?: string;
  internalDeps: string[];
  externalDeps: ExternalEndpoint[];
  internalDependents: string[];
  externalDependents: ExternalEndpoint[];
  dependencyModules: string[];
  dependentModules: string[];
}

export interface ComponentRelationship {
  from: string;
  to: string;
}

export interface ModuleRelationshipGroup {
  module: string | null;
  relationships: ComponentRelationship[];
}

export interface ModuleComplexity {
  componentCount: number;
  internalEdgeCount: number;
  externalEdgeCount: number;
  cohesionScore: number; // 0..1
  cohesion: CohesionLevel;
  dependencyModuleCount: number;
  dependentModuleCount: number;
}

export interface ModuleDependencyReport {
  found: boolean;
  modulePath: string;
  error?: string;
  internalDependencies: ComponentRelationship[];
  externalDependenciesByModule: ModuleRelationshipGroup[];
  externalDependentsByModule: ModuleRelationshipGroup[];
  complexity: ModuleComplexity;
}

export interface RoleAssignment {
  componentId: string;
  role: ComponentRole;
  confidence: number;
  reasoning: string[];
  purpose: string;
}

export interface RoleReport extends RoleAssignment {
  found: boolean;
  error?: string;
}

export interface Pattern {
  type: PatternType;
  confidence: number;
  evidence: string[];
  components: string[];
}

export interface PatternReport {
  found: boolean;
  modulePath: string;
  error?: string;
  patterns: Pattern[];
  componentRoles: Record<string, RoleAssignment>;
}

export interface RepositorySummary {
  totalModules: number;
  leafModules: number;
  parentModules: number;
  rootModules: number;
  totalComponents: number;
  maxDepth: number;
  processingOrderLevels: number;
}

export interface ModuleDescription {
  module: ModuleRecord;
  dependencies: ModuleDependencyReport;
  patterns: Pattern[];
  keyComponents: string[];
}

// ─── Engine options ────────────────────────────────────────────────────────

export interface CohesionThresholds {
  high: number;
  moderate: number;
}

export interface EngineOptions {
  cohesion: CohesionThresholds;
  controllerFanOut: number;
}
