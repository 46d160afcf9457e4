import { describe, it, expect } from '@jest/globals';
import { TypeResolver } from './type-resolver.js';
import { ReferenceResolver } from './reference-resolver.js';
import { parseSpec } from '../parser.js';
import { GeneratorError, GeneratorErrorKind } from '../errors.js';
import type { Referenceable, Schema } from '../types.js';

function captureError(action: () => unknown): GeneratorError {
  try {
    action();
  } catch (error) {
    if (error instanceof GeneratorError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a GeneratorError');
}

const spec = parseSpec({
  openapi: '3.0.3',
  info: { title: 'Test API', version: '1.0.0' },
  paths: {},
  components: {
    schemas: {
      Team: {
        type: 'object',
        required: ['name'],
        properties: { id: { type: 'integer' }, name: { type: 'string', description: 'Display name' } },
      },
      TeamAlias: { $ref: '#/components/schemas/Team' },
      Match: {
        type: 'object',
        description: 'A played match\nbetween two teams',
        properties: {
          home: { $ref: '#/components/schemas/Team' },
          venue: { type: 'object', properties: { city: { type: 'string' } } },
        },
      },
      Node: {
        type: 'object',
        properties: { children: { type: 'array', items: { $ref: '#/components/schemas/Node' } } },
      },
    },
  },
});

const ref = (name: string): Referenceable<Schema> => ({ kind: 'reference', pointer: `#/components/schemas/${name}` });
const inline = (value: Partial<Schema>): Referenceable<Schema> => ({ kind: 'value', value: { required: [], ...value } });

function createResolver(): TypeResolver {
  return new TypeResolver(new ReferenceResolver(spec), { namespace: 'Example' });
}

describe('TypeResolver', () => {
  it('should map primitives', () => {
    const types = createResolver();

    expect(types.resolveType(undefined, inline({ type: 'string' })).shortName).toBe('string');
    expect(types.resolveType(undefined, inline({ type: 'integer', format: 'int64' })).shortName).toBe('number');
    expect(types.resolveType(undefined, inline({ type: 'number' })).shortName).toBe('number');
    expect(types.resolveType(undefined, inline({ type: 'boolean' }))).toEqual({
      shortName: 'boolean',
      qualifiedName: 'boolean',
    });
    expect(types.emitted()).toEqual([]);
  });

  it('should emit a referenced object once', () => {
    const types = createResolver();

    const first = types.resolveType(undefined, ref('Team'));
    const second = types.resolveType(undefined, ref('Team'));

    expect(first).toEqual({ shortName: 'Team', qualifiedName: 'Example.schemas.Team' });
    expect(second).toEqual(first);
    expect(types.emitted()).toHaveLength(1);
    expect(types.emitted()[0]).toEqual({
      name: 'Team',
      dependencies: [],
      code: [
        '// Example.schemas.Team (generated, do not edit)',
        'export interface Team {',
        '  id?: number;',
        '  /** Display name */',
        '  name: string;',
        '}',
        '',
      ].join('\n'),
    });
    expect(types.lookup('Example.schemas.Team')).toBe('Team');
  });

  it('should prefer the referenced name over the suggested one', () => {
    const types = createResolver();

    expect(types.resolveType('Suggested', ref('TeamAlias')).shortName).toBe('TeamAlias');
  });

  it('should name inline objects after their parent property and import them', () => {
    const types = createResolver();

    types.resolveType(undefined, ref('Match'));

    expect(types.emitted().map((definition) => definition.name)).toEqual(['Team', 'MatchVenue', 'Match']);
    const match = types.emitted()[2];
    expect(match?.dependencies).toEqual(['MatchVenue', 'Team']);
    expect(match?.code).toBe(
      [
        '// Example.schemas.Match (generated, do not edit)',
        "import type { MatchVenue } from './MatchVenue.js';",
        "import type { Team } from './Team.js';",
        '',
        '/**',
        ' * A played match',
        ' * between two teams',
        ' */',
        'export interface Match {',
        '  home?: Team;',
        '  venue?: MatchVenue;',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should resolve arrays to their item type', () => {
    const types = createResolver();

    expect(types.resolveType(undefined, inline({ type: 'array', items: ref('Team') }))).toEqual({
      shortName: 'Team[]',
      qualifiedName: 'Example.schemas.Team',
    });
    expect(types.resolveType(undefined, inline({ type: 'array', items: inline({ type: 'array', items: inline({ type: 'string' }) }) })).shortName).toBe(
      'string[][]'
    );
  });

  it('should name inline array items after the enclosing type', () => {
    const types = createResolver();

    const resolved = types.resolveType(
      'Roster',
      inline({ type: 'array', items: inline({ type: 'object', properties: { name: inline({ type: 'string' }) } }) })
    );

    expect(resolved.shortName).toBe('RosterItem[]');
    expect(types.lookup('Example.schemas.RosterItem')).toBe('RosterItem');
  });

  it('should resolve additionalProperties to a record', () => {
    const types = createResolver();

    const resolved = types.resolveType(undefined, inline({ type: 'object', additionalProperties: ref('Team') }));

    expect(resolved).toEqual({ shortName: 'Record<string, Team>', qualifiedName: 'Example.schemas.Team' });
  });

  it('should resolve an object with only a description to void', () => {
    const types = createResolver();

    expect(types.resolveType(undefined, inline({ type: 'object', description: 'Anything' })).shortName).toBe('void');
  });

  it('should type an empty object property as an empty record', () => {
    const types = createResolver();

    types.resolveType('Event', inline({ type: 'object', properties: { meta: inline({ type: 'object', properties: {} }) } }));

    expect(types.emitted()[0]?.code).toContain('  meta?: Record<string, never>;\n');
  });

  it('should handle self-referencing schemas', () => {
    const types = createResolver();

    types.resolveType(undefined, ref('Node'));

    expect(types.emitted()).toHaveLength(1);
    expect(types.emitted()[0]?.dependencies).toEqual([]);
    expect(types.emitted()[0]?.code).toContain('  children?: Node[];\n');
  });

  it('should reject boolean additionalProperties', () => {
    const error = captureError(() =>
      createResolver().resolveType('Flags', inline({ type: 'object', additionalProperties: true }))
    );

    expect(error.kind).toBe(GeneratorErrorKind.INVALID_ADDITIONAL_PROPERTIES);
    expect(error.context).toBe('Flags');
  });

  it('should reject unknown primitive types', () => {
    const error = captureError(() => createResolver().resolveType(undefined, inline({ type: 'file' })));

    expect(error.kind).toBe(GeneratorErrorKind.UNKNOWN_PRIMITIVE_TYPE);
    expect(error.message).toBe('Unknown type: file (at inline schema)');
  });

  it('should reject an inline object that cannot be named', () => {
    const error = captureError(() =>
      createResolver().resolveType(undefined, inline({ type: 'object', properties: { id: inline({ type: 'integer' }) } }))
    );

    expect(error.kind).toBe(GeneratorErrorKind.SCHEMA_MISSING_NAME);
  });

  it('should reject an object with nothing to describe it', () => {
    const error = captureError(() => createResolver().resolveType('Empty', inline({ type: 'object' })));

    expect(error.kind).toBe(GeneratorErrorKind.INVALID_SPECIFICATION);
    expect(error.context).toBe('Empty');
  });
});
