import path from 'path';
import { glob } from 'glob';
import type { ArchscopeConfig } from './config.js';

const IGNORE_DIRS = ['node_modules', '.git', 'dist', 'build', 'coverage'];

export interface InputOptions {
  dir?: string;
  tree?: string;
  graph?: string;
}

export interface ResolvedInputs {
  moduleTreePath: string;
  dependencyGraphPath: string;
}

/**
 * Explicit `--tree` / `--graph` paths win; otherwise the configured file names
 * are searched for under `--dir` (default: cwd), shallowest match first.
 */
export async function resolveInputs(
  opts: InputOptions,
  config: Pick<ArchscopeConfig, 'moduleTreeFile' | 'dependencyGraphFile'>,
  cwd: string = process.cwd(),
): Promise<ResolvedInputs> {
  const root = path.resolve(cwd, opts.dir ?? '.');
  const [moduleTreePath, dependencyGraphPath] = await Promise.all([
    opts.tree ? path.resolve(cwd, opts.tree) : findInput(root, config.moduleTreeFile),
    opts.graph ? path.resolve(cwd, opts.graph) : findInput(root, config.dependencyGraphFile),
  ]);
  return { moduleTreePath, dependencyGraphPath };
}

export async function findInput(root: string, fileName: string): Promise<string> {
  const matches = await glob(`**/${fileName}`, {
    cwd: root,
    nodir: true,
    ignore: IGNORE_DIRS.map((d) => `**/${d}/**`),
    absolute: false,
  });
  const best = matches
    .map((m) => m.split(path.sep).join('/'))
    .sort((a, b) => a.split('/').length - b.split('/').length || a.localeCompare(b))[0];
  if (best === undefined) {
    throw new Error(`Could not find ${fileName} under ${root} (pass it explicitly with --tree/--graph)`);
  }
  return path.join(root, best);
}
