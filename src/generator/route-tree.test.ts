import { describe, it, expect } from '@jest/globals';
import { buildRouteTree, printRouteTree } from './route-tree.js';
import { parseSpec } from '../parser.js';

function paths(raw: Record<string, unknown>) {
  return parseSpec({ openapi: '3.0.3', info: { title: 'Test API', version: '1.0.0' }, paths: raw }).paths;
}

const ok = { responses: { '200': { description: 'OK' } } };

describe('buildRouteTree', () => {
  it('should nest segments and bind path parameters', () => {
    const root = buildRouteTree(paths({ '/a/{id}': { get: ok }, '/a/{id}/b': { get: ok }, '/a/c': { get: ok } }));

    expect(root.url).toBe('/');
    expect([...root.children.keys()]).toEqual(['a']);

    const a = root.children.get('a');
    expect(a?.url).toBeUndefined();
    expect(a?.hasOperations).toBe(false);
    expect([...(a?.children.keys() ?? [])]).toEqual(['{id}', 'c']);

    const id = a?.children.get('{id}');
    expect(id?.url).toBe('/a/{id}');
    expect(id?.parameter).toBe('id');
    expect([...(id?.operations.keys() ?? [])]).toEqual(['get']);
    expect(id?.children.get('b')?.url).toBe('/a/{id}/b');

    expect(a?.children.get('c')?.parameter).toBeUndefined();
  });

  it('should bind / to the root', () => {
    const root = buildRouteTree(paths({ '/': { get: ok, post: ok } }));

    expect(root.url).toBe('/');
    expect([...root.operations.keys()]).toEqual(['get', 'post']);
    expect(root.children.size).toBe(0);
  });

  it('should keep children discovered before their parent path', () => {
    const root = buildRouteTree(paths({ '/teams/{id}': { get: ok }, '/teams': { parameters: [], put: ok } }));

    const teams = root.children.get('teams');
    expect(teams?.url).toBe('/teams');
    expect([...(teams?.operations.keys() ?? [])]).toEqual(['put']);
    expect(teams?.children.get('{id}')?.url).toBe('/teams/{id}');
  });

  it('should skip empty segments', () => {
    const root = buildRouteTree(paths({ '/a//b/': { get: ok } }));

    expect(root.children.get('a')?.children.get('b')?.url).toBe('/a//b/');
  });

  it('should attach path-level parameters', () => {
    const root = buildRouteTree(
      paths({ '/teams/{key}': { parameters: [{ name: 'key', in: 'path', schema: { type: 'string' } }], get: ok } })
    );

    expect(root.children.get('teams')?.children.get('{key}')?.parameters).toHaveLength(1);
  });
});

describe('printRouteTree', () => {
  it('should render segments, inherited parameters and operations', () => {
    const root = buildRouteTree(paths({ '/a/{id}': { get: ok }, '/a/{id}/b': { get: ok }, '/a/c': { get: ok } }));

    expect(printRouteTree(root)).toBe(['/', '  a/', '    {id}/ *', '      b/ [id] *', '    c/ *'].join('\n'));
  });

  it('should print a lone root', () => {
    expect(printRouteTree(buildRouteTree({}))).toBe('/');
  });
});
