import { z } from 'zod';
import type { DependencyGraphInput, ModuleTree, ModuleTreeNode, RawComponent } from './types.js';
import { LOG_LEVELS } from './constants.js';
import { GraphInputError } from './errors.js';

// ─── Reusable primitives ───────────────────────────────────────────────────

export const LogLevelSchema = z.enum(LOG_LEVELS);
const Ratio = z.number().min(0).max(1);

// ─── Input graphs ──────────────────────────────────────────────────────────

export const ModuleTreeNodeSchema: z.ZodType<ModuleTreeNode> = z.lazy(() =>
  z.object({
    name: z.string().nullish(),
    path: z.string().nullish(),
    children: z.record(z.string(), ModuleTreeNodeSchema).nullish(),
    components: z.array(z.string()).nullish(),
  }),
);

export const ModuleTreeSchema: z.ZodType<ModuleTree> = z.record(z.string(), ModuleTreeNodeSchema);

export const RawComponentSchema: z.ZodType<RawComponent> = z.object({
  id: z.string().nullish(),
  name: z.string().nullish(),
  component_type: z.string().nullish(),
  file_path: z.string().nullish(),
  relative_path: z.string().nullish(),
  depends_on: z.array(z.string()).nullish(),
});

export const DependencyGraphSchema: z.ZodType<DependencyGraphInput> = z.record(z.string(), RawComponentSchema);

// ─── Settings ──────────────────────────────────────────────────────────────

export const SettingsSchema = z
  .object({
    moduleTreeFile: z.string().min(1),
    dependencyGraphFile: z.string().min(1),
    logLevel: LogLevelSchema,
    cohesion: z
      .object({ high: Ratio, moderate: Ratio })
      .refine((c) => c.moderate <= c.high, { message: 'moderate threshold must not exceed high' }),
    controllerFanOut: z.number().int().nonnegative(),
    keyComponentLimit: z.number().int().positive(),
  })
  .partial();

export type Settings = z.infer<typeof SettingsSchema>;

// ─── Parse helpers ─────────────────────────────────────────────────────────

export function parseModuleTree(data: unknown): ModuleTree {
  const result = ModuleTreeSchema.safeParse(data);
  if (!result.success) throw GraphInputError.fromZod('module tree', result.error);
  return result.data;
}

export function parseDependencyGraph(data: unknown): DependencyGraphInput {
  const result = DependencyGraphSchema.safeParse(data);
  if (!result.success) throw GraphInputError.fromZod('dependency graph', result.error);
  return result.data;
}
