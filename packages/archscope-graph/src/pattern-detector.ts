import {
  PATTERN_RULES,
  type ComponentRecord,
  type ComponentRole,
  type Pattern,
  type RoleAssignment,
} from '@archscope/core';
import type { DependencyAnalyzer } from './dependency-analyzer.js';

export interface PatternContext {
  components: ComponentRecord[];
  roles: Record<string, RoleAssignment>;
  analyzer: DependencyAnalyzer;
}

type PatternCheck = (ctx: PatternContext) => Pattern | null;

function detectLayered({ components, roles }: PatternContext): Pattern | null {
  const { minDistinctRoles, minRoleMembers, confidence } = PATTERN_RULES.layered;
  const members = new Map<ComponentRole, number>();
  for (const component of components) {
    const role = roles[component.id]?.role ?? 'unknown';
    members.set(role, (members.get(role) ?? 0) + 1);
  }
  const populated = [...members.values()].some((count) => count >= minRoleMembers);
  if (members.size < minDistinctRoles || !populated) return null;

  const distribution = [...members]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([role, count]) => `${role}(${count})`);
  return {
    type: 'layered',
    confidence,
    evidence: [`${members.size} distinct roles: ${distribution.join(', ')}`],
    components: components.map((c) => c.id),
  };
}

function detectPlugin({ components }: PatternContext): Pattern | null {
  const { keyword, minComponents, confidence } = PATTERN_RULES.plugin;
  const plugins = components.filter((c) => c.name.toLowerCase().includes(keyword));
  if (plugins.length < minComponents) return null;
  return {
    type: 'plugin',
    confidence,
    evidence: plugins.map((c) => `${c.name} looks like a plugin`),
    components: plugins.map((c) => c.id),
  };
}

function detectFacade({ components, analyzer }: PatternContext): Pattern | null {
  const { minExternalDependents, minInternalDependencies, confidence } = PATTERN_RULES.facade;
  const evidence: string[] = [];
  const facades: string[] = [];
  for (const component of components) {
    const report = analyzer.analyze(component.id);
    const fanIn = report.externalDependents.length;
    const fanOut = report.internalDeps.length;
    if (fanIn >= minExternalDependents && fanOut >= minInternalDependencies) {
      facades.push(component.id);
      evidence.push(`${component.name}: ${fanIn} external dependents, ${fanOut} internal dependencies`);
    }
  }
  if (facades.length === 0) return null;
  return { type: 'facade', confidence, evidence, components: facades };
}

// Independent checks; every one that fires contributes a finding.
const PATTERN_CHECKS: readonly PatternCheck[] = [detectLayered, detectPlugin, detectFacade];

export function detectPatterns(ctx: PatternContext): Pattern[] {
  const patterns: Pattern[] = [];
  for (const check of PATTERN_CHECKS) {
    const pattern = check(ctx);
    if (pattern) patterns.push(pattern);
  }
  return patterns;
}
