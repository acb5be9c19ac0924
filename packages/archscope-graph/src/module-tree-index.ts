import {
  GraphInputError,
  type ComponentReassignment,
  type ModuleIndex,
  type ModuleRecord,
  type ModuleTree,
  type ModuleTreeNode,
} from '@archscope/core';

/**
 * Flatten the nested module tree into a path → record table.
 *
 * Traversal is depth-first pre-order from every root. A component listed under
 * more than one module ends up owned by the last one visited; every such
 * overwrite is reported in `reassignedComponents` but not resolved.
 *
 * Two nodes resolving to the same module path (an explicit `path`, or a root
 * key such as `a/b` beside `a.children.b`) raise a GraphInputError.
 */
export function buildModuleIndex(tree: ModuleTree): ModuleIndex {
  const modules = new Map<string, ModuleRecord>();
  const componentToModule = new Map<string, string>();
  const reassignedComponents: ComponentReassignment[] = [];
  const rootModules: string[] = [];
  const collisions: string[] = [];

  const visit = (key: string, node: ModuleTreeNode, parent: ModuleRecord | null): void => {
    const modulePath = resolveModulePath(key, node, parent?.path ?? null);
    const existing = modules.get(modulePath);
    if (existing) {
      const where = parent ? `under ${parent.path}` : 'as a root';
      const first = existing.parent !== null ? `under ${existing.parent}` : 'as a root';
      collisions.push(`${modulePath}: declared ${first} and again ${where}`);
      return;
    }

    const record: ModuleRecord = {
      path: modulePath,
      name: node.name || lastSegment(modulePath),
      level: parent ? parent.level + 1 : 0,
      parent: parent?.path ?? null,
      children: [],
      components: [...new Set(node.components ?? [])],
      isLeaf: false,
    };
    modules.set(modulePath, record);

    if (parent) parent.children.push(modulePath);
    else rootModules.push(modulePath);

    for (const componentId of record.components) {
      const previous = componentToModule.get(componentId);
      if (previous !== undefined && previous !== modulePath) {
        reassignedComponents.push({ componentId, previous, current: modulePath });
      }
      componentToModule.set(componentId, modulePath);
    }

    for (const [childKey, child] of Object.entries(node.children ?? {})) {
      visit(childKey, child, record);
    }
  };

  for (const [rootKey, root] of Object.entries(tree)) {
    visit(rootKey, root, null);
  }
  if (collisions.length > 0) {
    throw new GraphInputError('Invalid module tree', collisions);
  }

  const leafModules: string[] = [];
  const parentModules: string[] = [];
  for (const record of modules.values()) {
    record.isLeaf = record.children.length === 0;
    (record.isLeaf ? leafModules : parentModules).push(record.path);
  }

  return { modules, leafModules, parentModules, rootModules, componentToModule, reassignedComponents };
}

/**
 * Module paths grouped by level, deepest level first. Every module lands in a
 * later batch than all of its descendants.
 */
export function getProcessingOrder(index: ModuleIndex): string[][] {
  const byLevel = new Map<number, string[]>();
  for (const record of index.modules.values()) {
    const batch = byLevel.get(record.level) ?? [];
    batch.push(record.path);
    byLevel.set(record.level, batch);
  }
  return [...byLevel.keys()].sort((a, b) => b - a).map((level) => byLevel.get(level) ?? []);
}

export function getMaxDepth(index: ModuleIndex): number {
  let max = 0;
  for (const record of index.modules.values()) max = Math.max(max, record.level);
  return max;
}

/** All modules below `modulePath`, in pre-order. Unknown path → []. */
export function getDescendants(index: ModuleIndex, modulePath: string): string[] {
  const out: string[] = [];
  const seen = new Set<string>([modulePath]);
  const stack = [...(index.modules.get(modulePath)?.children ?? [])].reverse();
  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    out.push(next);
    const children = index.modules.get(next)?.children ?? [];
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) stack.push(child);
    }
  }
  return out;
}

function resolveModulePath(key: string, node: ModuleTreeNode, parentPath: string | null): string {
  if (node.path) return node.path;
  if (parentPath !== null && !key.startsWith(`${parentPath}/`)) return `${parentPath}/${key}`;
  return key;
}

function lastSegment(modulePath: string): string {
  const parts = modulePath.split('/').filter(Boolean);
  return parts[parts.length - 1] ?? modulePath;
}
