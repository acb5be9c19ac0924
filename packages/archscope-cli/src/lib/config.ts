import path from 'path';
import fs from 'fs';
import { ARCHSCOPE_FILES, DEFAULTS, SettingsSchema, type CohesionThresholds, type LogLevel } from '@archscope/core';
import { logger } from './logger.js';

export interface ArchscopeConfig {
  /** Module tree file name, searched for under the input directory */
  moduleTreeFile: string;
  /** Dependency graph file name, searched for under the input directory */
  dependencyGraphFile: string;
  /** silent|error|warn|info|verbose */
  logLevel: LogLevel;
  /** Score above `high` is high cohesion, above `moderate` is moderate */
  cohesion: CohesionThresholds;
  /** Outgoing dependency count above which an unnamed component is a controller */
  controllerFanOut: number;
  /** How many key components `module` lists */
  keyComponentLimit: number;
}

export function defaultConfig(): ArchscopeConfig {
  return {
    moduleTreeFile: DEFAULTS.moduleTreeFile,
    dependencyGraphFile: DEFAULTS.dependencyGraphFile,
    logLevel: DEFAULTS.logLevel,
    cohesion: { ...DEFAULTS.cohesion },
    controllerFanOut: DEFAULTS.controllerFanOut,
    keyComponentLimit: DEFAULTS.keyComponentLimit,
  };
}

/**
 * Load `.archscope/settings.json` from `cwd`. Missing fields are filled with
 * defaults. A missing file yields the defaults; an unreadable or invalid one
 * yields the defaults plus a warning.
 */
export function loadConfig(cwd: string = process.cwd()): ArchscopeConfig {
  const settingsPath = path.join(cwd, ARCHSCOPE_FILES.SETTINGS);
  if (!fs.existsSync(settingsPath)) return defaultConfig();

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(settingsPath, 'utf8'));
  } catch (err) {
    logger.warn(`Ignoring ${ARCHSCOPE_FILES.SETTINGS}: ${err instanceof Error ? err.message : String(err)}`);
    return defaultConfig();
  }

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const where = parsed.error.issues.map((i) => i.path.join('.') || '(root)').join(', ');
    logger.warn(`Ignoring ${ARCHSCOPE_FILES.SETTINGS}: invalid fields ${where}`);
    return defaultConfig();
  }

  const defaults = defaultConfig();
  return {
    ...defaults,
    ...parsed.data,
    cohesion: parsed.data.cohesion ? { ...parsed.data.cohesion } : defaults.cohesion,
  };
}
