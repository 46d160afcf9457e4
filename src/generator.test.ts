import { describe, it, expect } from '@jest/globals';
import { generateClient } from './generator/index.js';
import { parseSpec } from './parser.js';
import { GeneratorError } from './errors.js';

const teamSpec = {
  openapi: '3.0.3',
  info: { title: 'Example', version: '1.0.0' },
  paths: {
    '/teams/{id}': {
      get: {
        parameters: [{ name: 'id', in: 'path', required: true, schema: { type: 'integer' } }],
        responses: {
          '200': { description: 'OK', content: { 'application/json': { schema: { $ref: '#/components/schemas/Team' } } } },
        },
      },
    },
  },
  components: {
    schemas: {
      Team: {
        type: 'object',
        required: ['name'],
        properties: { id: { type: 'integer' }, name: { type: 'string' } },
      },
    },
  },
};

describe('generator', () => {
  it('should emit one type and one function for the Team document', () => {
    const client = generateClient(parseSpec(teamSpec), { namespace: 'Example' });

    expect(client.files.map((file) => file.path)).toEqual(['client.ts', 'schemas/Team.ts', 'schemas/index.ts']);
    expect(client.files[1]?.contents).toBe(
      [
        '// Example.schemas.Team (generated, do not edit)',
        'export interface Team {',
        '  id?: number;',
        '  name: string;',
        '}',
        '',
      ].join('\n')
    );
    expect(client.files[2]?.contents).toBe("export type { Team } from './Team.js';\n");
  });

  it('should mirror the URL tree in the client namespaces', () => {
    const client = generateClient(parseSpec(teamSpec), { namespace: 'Example' });
    const source = client.files[0]?.contents ?? '';

    expect(source.startsWith(
      [
        '// Example v1.0.0 client (generated, do not edit)',
        "import type { Team } from './schemas/Team.js';",
        '',
        '/**',
        ' * Example [v1.0.0]',
        ' */',
        'export namespace Example {',
        '  /** Servers declared by the specification */',
        '  export const servers: readonly string[] = [',
        '  ];',
        '',
      ].join('\n')
    )).toBe(true);

    expect(source.endsWith(
      [
        '  }',
        '',
        '  export namespace Teams {',
        '    /**',
        '     * Endpoint: `/teams/{id}`',
        '     */',
        '    export namespace Id {',
        '      /**',
        '       * `GET /teams/{id}`',
        '       */',
        '      export async function get(id: number): Promise<Team | undefined> {',
        "        return request<Team | undefined>('GET', `/teams/${encodeURIComponent(String(id))}`);",
        '      }',
        '    }',
        '  }',
        '}',
        '',
      ].join('\n')
    )).toBe(true);
  });

  it('should generate identical output for the same document', () => {
    const first = generateClient(parseSpec(teamSpec), { namespace: 'Example' });
    const second = generateClient(parseSpec(teamSpec), { namespace: 'Example' });

    expect(second.files).toEqual(first.files);
  });

  it('should default the namespace to the document title', () => {
    const client = generateClient(parseSpec({ ...teamSpec, info: { title: 'league-scores api', version: '2' } }));

    expect(client.namespace).toBe('LeagueScoresApi');
    expect(client.files[1]?.contents.split('\n')[0]).toBe('// LeagueScoresApi.schemas.Team (generated, do not edit)');
  });

  it('should place operations on / in the root namespace', () => {
    const client = generateClient(
      parseSpec({
        openapi: '3.0.0',
        info: { title: 'Status', version: '1.0.0' },
        paths: { '/': { get: { summary: 'Health check', responses: { '204': { description: 'Up' } } } } },
      })
    );
    const source = client.files[0]?.contents ?? '';

    expect(client.files.map((file) => file.path)).toEqual(['client.ts']);
    expect(source.endsWith(
      [
        '',
        '  /**',
        '   * Health check',
        '   * `GET /`',
        '   */',
        '  export async function get(): Promise<void> {',
        "    return request<void>('GET', `/`);",
        '  }',
        '}',
        '',
      ].join('\n')
    )).toBe(true);
  });

  it('should report unresolvable references', () => {
    const broken = {
      ...teamSpec,
      paths: {
        '/teams': {
          get: {
            responses: {
              '200': { description: 'OK', content: { 'application/json': { schema: { $ref: '#/components/schemas/Club' } } } },
            },
          },
        },
      },
    };

    expect(() => generateClient(parseSpec(broken))).toThrow(GeneratorError);
    expect(() => generateClient(parseSpec(broken))).toThrow(
      "No entry 'Club' in components.schemas (at #/components/schemas/Club)"
    );
  });
});
