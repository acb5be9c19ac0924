export { GraphStore } from './graph-store.js';
export { buildModuleIndex, getProcessingOrder, getMaxDepth, getDescendants } from './module-tree-index.js';
export {
  buildComponentMap,
  invertDependencies,
  assignModules,
  findDanglingDependencies,
} from './component-index.js';
export { DependencyAnalyzer, cohesion } from './dependency-analyzer.js';
export { inferRole, matchRoleRule, describePurpose } from './role-inference.js';
export { detectPatterns, type PatternContext } from './pattern-detector.js';
export { ArchitectureEngine, type ModuleComponentsOptions } from './architecture-engine.js';
