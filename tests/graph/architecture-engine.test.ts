import { describe, it, expect } from 'vitest';
import { GraphInputError } from '@archscope/core';
import { ArchitectureEngine, GraphStore } from '@archscope/graph';

const tree = {
  app: {
    components: ['app.Main'],
    children: {
      'app/api': { components: ['api.UserHandler', 'api.OrderHandler'] },
      'app/core': {
        components: ['core.UserService'],
        children: { 'app/core/models': { components: ['models.User', 'models.Order'] } },
      },
    },
  },
};

const graph = {
  'app.Main': { component_type: 'function', depends_on: ['api.UserHandler', 'api.OrderHandler'] },
  'api.UserHandler': { component_type: 'class', depends_on: ['core.UserService'] },
  'api.OrderHandler': { component_type: 'class', depends_on: ['core.UserService', 'models.Order'] },
  'core.UserService': { component_type: 'class', depends_on: ['models.User'] },
  'models.User': { component_type: 'class' },
  'models.Order': { component_type: 'class' },
  'vendor.Thing': { depends_on: ['models.User', 'missing.Id'] },
};

const engine = ArchitectureEngine.fromData(tree, graph);

describe('ArchitectureEngine: repository reports', () => {
  it('summarizes the hierarchy', () => {
    expect(engine.getSummary()).toEqual({
      totalModules: 4,
      leafModules: 2,
      parentModules: 2,
      rootModules: 1,
      totalComponents: 7,
      maxDepth: 2,
      processingOrderLevels: 3,
    });
  });

  it('orders modules children first', () => {
    expect(engine.getProcessingOrder()).toEqual([['app/core/models'], ['app/api', 'app/core'], ['app']]);
  });

  it('summarizes an empty repository without failing', () => {
    expect(ArchitectureEngine.fromData({}, {}).getSummary()).toEqual({
      totalModules: 0,
      leafModules: 0,
      parentModules: 0,
      rootModules: 0,
      totalComponents: 0,
      maxDepth: 0,
      processingOrderLevels: 0,
    });
  });

  it('lists dangling dependencies', () => {
    expect(engine.getDanglingDependencies()).toEqual([{ componentId: 'vendor.Thing', missing: ['missing.Id'] }]);
  });

  it('returns results that do not change between calls', () => {
    expect(engine.getSummary()).toEqual(engine.getSummary());
    expect(engine.analyzeModule('app/api')).toEqual(engine.analyzeModule('app/api'));
    expect(engine.detectPatterns('app/core/models')).toEqual(engine.detectPatterns('app/core/models'));
  });
});

describe('ArchitectureEngine: lookups', () => {
  it('cross-links components to modules', () => {
    expect(engine.getComponent('core.UserService')?.module).toBe('app/core');
    expect(engine.getComponent('vendor.Thing')?.module).toBeNull();
    expect(engine.getComponent('missing.Id')).toBeUndefined();
  });

  it('looks up module records by path', () => {
    expect(engine.getModule('app/core')).toMatchObject({
      path: 'app/core',
      name: 'core',
      parent: 'app',
      children: ['app/core/models'],
      isLeaf: false,
    });
    expect(engine.getModule('core')).toBeUndefined();
  });

  it('fills reverse dependencies without the dangling id', () => {
    expect(engine.getComponent('models.User')?.dependedBy).toEqual(['core.UserService', 'vendor.Thing']);
    expect(engine.getComponent('vendor.Thing')?.dependsOn).toEqual(['models.User', 'missing.Id']);
  });

  it('lists owned components, optionally with descendants', () => {
    expect(engine.getModuleComponents('app/core')).toEqual(['core.UserService']);
    expect(engine.getModuleComponents('app/core', { recursive: true })).toEqual([
      'core.UserService',
      'models.User',
      'models.Order',
    ]);
    expect(engine.getModuleComponents('nope')).toEqual([]);
  });

  it('ranks key components by dependents, then dependencies', () => {
    expect(engine.getKeyComponents('app/core/models')).toEqual(['models.User', 'models.Order']);
    expect(engine.getKeyComponents('app/core/models', 1)).toEqual(['models.User']);
    expect(engine.getKeyComponents('app/api')).toEqual(['api.OrderHandler', 'api.UserHandler']);
  });
});

describe('ArchitectureEngine: roles', () => {
  it('infers a role by component id', () => {
    expect(engine.inferRole('api.UserHandler')).toEqual({
      found: true,
      componentId: 'api.UserHandler',
      role: 'processor',
      confidence: 0.7,
      reasoning: ['Name "UserHandler" contains "handler"'],
      purpose: 'UserHandler is a class acting as a processor',
    });
  });

  it('returns a not-found role report', () => {
    const report = engine.inferRole('nope');
    expect(report.found).toBe(false);
    expect(report.error).toBe('Component not found: nope');
    expect(report.reasoning).toEqual([]);
  });

  it('applies the configured controller fan-out', () => {
    expect(engine.inferRole('app.Main').role).toBe('unknown');
    const strict = ArchitectureEngine.fromData(tree, graph, { controllerFanOut: 1 });
    expect(strict.inferRole('app.Main').role).toBe('controller');
  });
});

describe('ArchitectureEngine: module description', () => {
  it('bundles dependencies, patterns and key components', () => {
    const description = engine.describeModule('app/api');
    expect(description?.module.path).toBe('app/api');
    expect(description?.dependencies.complexity).toMatchObject({
      internalEdgeCount: 0,
      externalEdgeCount: 5,
      cohesionScore: 0,
    });
    expect(description?.patterns).toEqual([]);
    expect(description?.keyComponents).toEqual(['api.OrderHandler', 'api.UserHandler']);
  });

  it('applies configured cohesion thresholds', () => {
    const lenient = ArchitectureEngine.fromData(tree, graph, { cohesion: { high: 0, moderate: 0 } });
    const closed = ArchitectureEngine.fromData({ m: { components: ['a', 'b'] } }, { a: { depends_on: ['b'] }, b: {} });
    expect(lenient.analyzeModule('app/api').complexity.cohesion).toBe('low');
    expect(closed.analyzeModule('m').complexity.cohesion).toBe('high');
  });

  it('returns undefined for an unknown module', () => {
    expect(engine.describeModule('nope')).toBeUndefined();
  });
});

describe('ArchitectureEngine: duplicate ownership', () => {
  it('exposes components that changed owner', () => {
    const contested = ArchitectureEngine.fromData(
      { a: { components: ['x'] }, b: { components: ['x'] } },
      { x: {} },
    );
    expect(contested.getComponent('x')?.module).toBe('b');
    expect(contested.getReassignedComponents()).toEqual([{ componentId: 'x', previous: 'a', current: 'b' }]);
    expect(contested.getModuleComponents('a')).toEqual([]);
  });
});

describe('ArchitectureEngine: returned records', () => {
  it('keeps later analysis unchanged when a returned component is edited', () => {
    const local = ArchitectureEngine.fromData({ m: { components: ['a', 'b'] } }, { a: { depends_on: ['b'] }, b: {} });
    local.getComponent('b')?.dependedBy.push('ghost');
    local.getComponent('a')?.dependsOn.push('ghost');
    expect(local.getComponent('b')?.dependedBy).toEqual(['a']);
    expect(local.analyzeComponent('b').externalDependents).toEqual([]);
    expect(local.analyzeComponent('a').externalDeps).toEqual([]);
    expect(local.listComponents().map((c) => c.dependsOn)).toEqual([['b'], []]);
  });

  it('keeps module structure unchanged when a returned module is edited', () => {
    engine.getModule('app')?.children.push('app/ghost');
    engine.getModule('app/core')?.components.push('models.User');
    const description = engine.describeModule('app/api');
    description?.module.components.splice(0);
    expect(engine.getModule('app')?.children).toEqual(['app/api', 'app/core']);
    expect(engine.getModuleComponents('app/core')).toEqual(['core.UserService']);
    expect(engine.getModuleComponents('app/api')).toEqual(['api.UserHandler', 'api.OrderHandler']);
    expect(engine.getProcessingOrder()).toEqual([['app/core/models'], ['app/api', 'app/core'], ['app']]);
  });
});

describe('ArchitectureEngine: input validation', () => {
  it('rejects a list where a mapping is required', () => {
    expect(() => ArchitectureEngine.fromData([], {})).toThrow(GraphInputError);
  });

  it('rejects two tree nodes resolving to one module path', () => {
    expect(() => ArchitectureEngine.fromData({ a: { children: { b: {} } }, 'a/b': {} }, {})).toThrow(
      /^Invalid module tree: a\/b: declared under a and again as a root$/,
    );
  });

  it('can be built from a store', () => {
    const store = GraphStore.fromData(tree, graph);
    expect(new ArchitectureEngine(store).getSummary().totalModules).toBe(4);
  });
});
