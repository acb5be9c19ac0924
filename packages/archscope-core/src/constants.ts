// Component kinds: anything else in the input graph is normalized to 'unknown'
export const COMPONENT_KINDS = ['function', 'class', 'module', 'unknown'] as const;
export type ComponentKind = (typeof COMPONENT_KINDS)[number];

// Semantic roles assigned by the role inference cascade
export const COMPONENT_ROLES = [
  'manager',
  'service',
  'generator',
  'analyzer',
  'processor',
  'adapter',
  'model',
  'utility',
  'configuration',
  'controller',
  'unknown',
] as const;
export type ComponentRole = (typeof COMPONENT_ROLES)[number];

// Name-based role rules. Order is priority: the first rule whose keyword appears
// in the lowercased component name wins.
export interface RoleRule {
  role: ComponentRole;
  keywords: readonly string[];
  confidence: number;
}

export const ROLE_RULES: readonly RoleRule[] = [
  { role: 'manager', keywords: ['manager'], confidence: 0.8 },
  { role: 'service', keywords: ['service'], confidence: 0.8 },
  { role: 'generator', keywords: ['generator', 'builder'], confidence: 0.8 },
  { role: 'analyzer', keywords: ['analyzer', 'parser'], confidence: 0.8 },
  { role: 'processor', keywords: ['handler', 'processor'], confidence: 0.7 },
  { role: 'adapter', keywords: ['adapter', 'wrapper'], confidence: 0.8 },
  { role: 'model', keywords: ['model', 'entity', 'dto'], confidence: 0.7 },
  { role: 'utility', keywords: ['util', 'helper'], confidence: 0.7 },
  { role: 'configuration', keywords: ['config', 'settings'], confidence: 0.8 },
];

export const UNKNOWN_ROLE_CONFIDENCE = 0.5;

// Dependency-shape fallbacks, applied only while the role is still 'unknown'
export const SHAPE_FALLBACKS = {
  leaf: { role: 'model', confidence: 0.6 },
  fanOut: { role: 'controller', confidence: 0.6 },
} as const;

// Architectural patterns flagged per module
export const PATTERN_TYPES = ['layered', 'plugin', 'facade'] as const;
export type PatternType = (typeof PATTERN_TYPES)[number];

export const PATTERN_RULES = {
  layered: { minDistinctRoles: 3, minRoleMembers: 2, confidence: 0.7 },
  plugin: { keyword: 'plugin', minComponents: 2, confidence: 0.8 },
  facade: { minExternalDependents: 3, minInternalDependencies: 3, confidence: 0.7 },
} as const;

export const COHESION_LEVELS = ['high', 'moderate', 'low'] as const;
export type CohesionLevel = (typeof COHESION_LEVELS)[number];

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'verbose'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// Default values
export const DEFAULTS = {
  cohesion: { high: 0.7, moderate: 0.4 },
  controllerFanOut: 10,
  keyComponentLimit: 5,
  logLevel: 'info',
  moduleTreeFile: 'module_tree.json',
  dependencyGraphFile: 'dependency_graph.json',
} as const;

export const ARCHSCOPE_DIR = '.archscope';

export const ARCHSCOPE_FILES = {
  SETTINGS: `${ARCHSCOPE_DIR}/settings.json`,
} as const;
