import {
  COMPONENT_KINDS,
  type ComponentKind,
  type ComponentMap,
  type ComponentRecord,
  type DanglingDependency,
  type DependencyGraphInput,
} from '@archscope/core';

/**
 * One record per entry of the raw dependency graph. Reverse edges are left
 * empty here; `invertDependencies` fills them.
 */
export function buildComponentMap(graph: DependencyGraphInput): ComponentMap {
  const components: ComponentMap = new Map();
  for (const [id, raw] of Object.entries(graph)) {
    const dependsOn = [...new Set(raw.depends_on ?? [])];
    const record: ComponentRecord = {
      id,
      name: raw.name || defaultName(id),
      kind: toKind(raw.component_type),
      filePath: raw.file_path ?? null,
      relativePath: raw.relative_path ?? null,
      module: null,
      dependsOn,
      dependedBy: [],
      dependencyCount: dependsOn.length,
      dependentCount: 0,
    };
    components.set(id, record);
  }
  return components;
}

/**
 * Fill `dependedBy` / `dependentCount` in place from the forward edges.
 *
 * A dependency on an id missing from the map stays in the forward list but is
 * never added to the reverse index.
 */
export function invertDependencies(components: ComponentMap): Map<string, string[]> {
  const reverse = new Map<string, string[]>();
  for (const id of components.keys()) reverse.set(id, []);

  for (const component of components.values()) {
    for (const depId of component.dependsOn) {
      const dependents = reverse.get(depId);
      if (dependents) dependents.push(component.id);
    }
  }

  for (const [id, dependents] of reverse) {
    const record = components.get(id);
    if (!record) continue;
    record.dependedBy = dependents;
    record.dependentCount = dependents.length;
  }
  return reverse;
}

export function assignModules(components: ComponentMap, componentToModule: Map<string, string>): void {
  for (const component of components.values()) {
    component.module = componentToModule.get(component.id) ?? null;
  }
}

/** Components whose forward edges point at ids absent from the map. */
export function findDanglingDependencies(components: ComponentMap): DanglingDependency[] {
  const dangling: DanglingDependency[] = [];
  for (const component of components.values()) {
    const missing = component.dependsOn.filter((depId) => !components.has(depId));
    if (missing.length > 0) dangling.push({ componentId: component.id, missing });
  }
  return dangling;
}

// "pkg.mod.ClassName" → "ClassName"
function defaultName(id: string): string {
  const segments = id.split('.');
  return segments[segments.length - 1] || id;
}

function toKind(value: string | null | undefined): ComponentKind {
  const kind = COMPONENT_KINDS.find((k) => k === value);
  return kind ?? 'unknown';
}
