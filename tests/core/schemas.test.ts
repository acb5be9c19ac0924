import { describe, it, expect } from 'vitest';
import {
  GraphInputError,
  SettingsSchema,
  parseDependencyGraph,
  parseModuleTree,
} from '@archscope/core';

describe('parseModuleTree', () => {
  it('accepts nested trees with optional fields', () => {
    const tree = parseModuleTree({
      root: { name: 'root', children: { 'root/a': { components: ['a.x'] }, 'root/b': {} } },
    });
    expect(tree['root']?.children?.['root/a']?.components).toEqual(['a.x']);
  });

  it('accepts null optional fields', () => {
    expect(() => parseModuleTree({ root: { children: null, components: null, path: null } })).not.toThrow();
  });

  it('drops unknown node fields', () => {
    const tree = parseModuleTree({ root: { description: 'ignored' } });
    expect(tree['root']).toEqual({});
  });

  it('rejects a list at the root', () => {
    expect(() => parseModuleTree(['root'])).toThrow(GraphInputError);
  });

  it('names the offending path when children are not a mapping', () => {
    try {
      parseModuleTree({ root: { children: { 'root/a': { children: [] } } } });
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(GraphInputError);
      const issues = err instanceof GraphInputError ? err.issues : [];
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^root\.children\.root\/a\.children: /);
    }
  });
});

describe('parseDependencyGraph', () => {
  it('accepts sparse records', () => {
    const graph = parseDependencyGraph({ 'a.b': {}, 'a.c': { depends_on: ['a.b'], component_type: 'class' } });
    expect(graph['a.c']?.depends_on).toEqual(['a.b']);
  });

  it('rejects a non-list depends_on', () => {
    expect(() => parseDependencyGraph({ x: { depends_on: 'y' } })).toThrow(/Invalid dependency graph: x\.depends_on: /);
  });

  it('rejects a string in place of the graph', () => {
    expect(() => parseDependencyGraph('graph')).toThrow(GraphInputError);
  });
});

describe('SettingsSchema', () => {
  it('accepts a partial settings file', () => {
    expect(SettingsSchema.parse({ logLevel: 'verbose' })).toEqual({ logLevel: 'verbose' });
  });

  it('rejects thresholds outside [0, 1]', () => {
    expect(SettingsSchema.safeParse({ cohesion: { high: 1.5, moderate: 0.4 } }).success).toBe(false);
  });

  it('rejects a moderate threshold above high', () => {
    expect(SettingsSchema.safeParse({ cohesion: { high: 0.3, moderate: 0.6 } }).success).toBe(false);
  });

  it('rejects unknown log levels', () => {
    expect(SettingsSchema.safeParse({ logLevel: 'loud' }).success).toBe(false);
  });
});

describe('GraphInputError', () => {
  it('folds issues into the message', () => {
    const err = new GraphInputError('Invalid module tree', ['a: bad', 'b: worse']);
    expect(err.message).toBe('Invalid module tree: a: bad; b: worse');
    expect(err.name).toBe('GraphInputError');
  });
});
