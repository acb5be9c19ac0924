import {
  DEFAULTS,
  ROLE_RULES,
  SHAPE_FALLBACKS,
  UNKNOWN_ROLE_CONFIDENCE,
  type ComponentRecord,
  type ComponentRole,
  type RoleAssignment,
  type RoleRule,
} from '@archscope/core';

/** First rule whose keyword occurs in the lowercased name, in table order. */
export function matchRoleRule(name: string, rules: readonly RoleRule[] = ROLE_RULES): { rule: RoleRule; keyword: string } | undefined {
  const lowered = name.toLowerCase();
  for (const rule of rules) {
    const keyword = rule.keywords.find((k) => lowered.includes(k));
    if (keyword) return { rule, keyword };
  }
  return undefined;
}

/**
 * Assign a heuristic role from the component's name, then let its dependency
 * shape fill in a role only where the name gave none.
 */
export function inferRole(
  component: Pick<ComponentRecord, 'id' | 'name' | 'kind' | 'dependsOn'>,
  controllerFanOut: number = DEFAULTS.controllerFanOut,
): RoleAssignment {
  const reasoning: string[] = [];
  let role: ComponentRole = 'unknown';
  let confidence = UNKNOWN_ROLE_CONFIDENCE;

  const match = matchRoleRule(component.name);
  if (match) {
    role = match.rule.role;
    confidence = match.rule.confidence;
    reasoning.push(`Name "${component.name}" contains "${match.keyword}"`);
  } else {
    reasoning.push(`Name "${component.name}" matches no naming convention`);
  }

  const outgoing = component.dependsOn.length;
  if (outgoing === 0) {
    if (role === 'unknown') {
      ({ role, confidence } = SHAPE_FALLBACKS.leaf);
      reasoning.push('Has no outgoing dependencies, typical of a data model');
    } else {
      reasoning.push('Has no outgoing dependencies');
    }
  } else if (outgoing > controllerFanOut) {
    if (role === 'unknown') {
      ({ role, confidence } = SHAPE_FALLBACKS.fanOut);
      reasoning.push(`Depends on ${outgoing} components, typical of a controller`);
    } else {
      reasoning.push(`Depends on ${outgoing} components`);
    }
  }

  return {
    componentId: component.id,
    role,
    confidence,
    reasoning,
    purpose: describePurpose(component.name, role, component.kind),
  };
}

export function describePurpose(name: string, role: ComponentRole, kind: string): string {
  const noun = kind === 'unknown' ? 'component' : kind;
  if (role === 'unknown') return `${name} is a ${noun} with no recognized architectural role`;
  return `${name} is a ${noun} acting as a ${role}`;
}
