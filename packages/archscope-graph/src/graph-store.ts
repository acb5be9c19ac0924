import { readFile } from 'fs/promises';
import path from 'path';
import {
  GraphInputError,
  parseDependencyGraph,
  parseModuleTree,
  type DependencyGraphInput,
  type ModuleTree,
} from '@archscope/core';

/**
 * Holds the two raw input graphs exactly as supplied (after validation).
 * Nothing downstream mutates them.
 */
export class GraphStore {
  private constructor(
    readonly moduleTree: ModuleTree,
    readonly dependencyGraph: DependencyGraphInput,
  ) {}

  static fromData(moduleTree: unknown, dependencyGraph: unknown): GraphStore {
    return new GraphStore(parseModuleTree(moduleTree), parseDependencyGraph(dependencyGraph));
  }

  static async fromFiles(moduleTreePath: string, dependencyGraphPath: string): Promise<GraphStore> {
    const [tree, graph] = await Promise.all([readJson(moduleTreePath), readJson(dependencyGraphPath)]);
    return GraphStore.fromData(tree, graph);
  }
}

async function readJson(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf-8');
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GraphInputError(`${path.basename(filePath)} is not valid JSON`, [reason]);
  }
}
