/**
 * Schema type resolution
 *
 * Maps schema nodes to TypeScript type expressions. Object schemas with
 * properties become named interfaces, emitted once per name into a registry
 * that lives for one generation run.
 */

import type { Schema, Referenceable, ResolvedType, TypeDefinition } from '../types.js';
import { GeneratorError, GeneratorErrorKind } from '../errors.js';
import { ReferenceResolver } from './reference-resolver.js';
import { formatAsClassName } from './path-utils.js';
import { typescript, type TargetLanguage } from './language.js';
import { propertyTemplate, schemaTemplate } from './templates.js';

export interface TypeResolverOptions {
  /** Root namespace, used to qualify schema type names */
  namespace: string;
  language?: TargetLanguage;
}

export class TypeResolver {
  private readonly language: TargetLanguage;
  /** Short names of named types by qualified name, reserved before their properties resolve */
  private readonly names = new Map<string, string>();
  private readonly definitions: TypeDefinition[] = [];

  constructor(
    private readonly references: ReferenceResolver,
    private readonly options: TypeResolverOptions
  ) {
    this.language = options.language ?? typescript;
  }

  /**
   * Resolves a schema to a type expression
   *
   * Rules, in order: a referenced name wins over `name`; an unnamed schema under
   * a parent property is named `<Parent><Property>`; objects with properties
   * become named interfaces; `additionalProperties` becomes a record; objects
   * carrying only a description are opaque; arrays wrap their item type;
   * everything else must be a supported primitive.
   *
   * @param name - Name suggested by the caller
   * @param schema - Schema or reference
   * @param parentName - Name of the enclosing named type
   * @param propertyName - Property of the enclosing type that holds this schema
   * @returns Short and qualified type names
   */
  resolveType(
    name: string | undefined,
    schema: Referenceable<Schema>,
    parentName?: string,
    propertyName?: string
  ): ResolvedType {
    const resolved = this.references.resolveChain('schemas', schema, name);
    let typeName = resolved.name ? formatAsClassName(resolved.name) : undefined;
    if (!typeName && parentName && propertyName) {
      typeName = `${parentName}${formatAsClassName(propertyName)}`;
    }

    const value = resolved.value;
    const type = value.type ?? (value.properties ? 'object' : undefined);
    const context = typeName ?? (parentName && propertyName ? `${parentName}.${propertyName}` : 'inline schema');

    switch (type) {
      case 'object':
        return this.resolveObject(typeName, value, context, parentName, propertyName);

      case 'array': {
        if (!value.items) {
          throw new GeneratorError(GeneratorErrorKind.INVALID_SPECIFICATION, `Array schema has no 'items'`, context);
        }
        const [itemParent, itemProperty] = childContext(typeName, parentName, propertyName, 'Item');
        return this.language.array(this.resolveType(undefined, value.items, itemParent, itemProperty));
      }

      case undefined:
        throw new GeneratorError(GeneratorErrorKind.UNKNOWN_PRIMITIVE_TYPE, `Schema has no type`, context);

      default: {
        const primitive = this.language.primitive(type);
        if (primitive === undefined) {
          throw new GeneratorError(GeneratorErrorKind.UNKNOWN_PRIMITIVE_TYPE, `Unknown type: ${type}`, context);
        }
        return { shortName: primitive, qualifiedName: primitive };
      }
    }
  }

  /**
   * Short name of a named type emitted (or being emitted) in this run
   */
  lookup(qualifiedName: string): string | undefined {
    return this.names.get(qualifiedName);
  }

  /**
   * Named types emitted so far, in emission order
   */
  emitted(): readonly TypeDefinition[] {
    return this.definitions;
  }

  private get unit(): ResolvedType {
    return { shortName: this.language.unit, qualifiedName: this.language.unit };
  }

  private resolveObject(
    typeName: string | undefined,
    schema: Schema,
    context: string,
    parentName?: string,
    propertyName?: string
  ): ResolvedType {
    if (schema.properties) {
      const properties = Object.entries(schema.properties);
      if (properties.length === 0) {
        return this.unit;
      }
      if (!typeName) {
        throw new GeneratorError(
          GeneratorErrorKind.SCHEMA_MISSING_NAME,
          'Object schema with properties could not be named',
          context
        );
      }
      return this.emitObject(typeName, schema, properties);
    }

    if (schema.additionalProperties !== undefined) {
      if (typeof schema.additionalProperties === 'boolean') {
        throw new GeneratorError(
          GeneratorErrorKind.INVALID_ADDITIONAL_PROPERTIES,
          'Boolean supplied where a schema was expected for additionalProperties',
          context
        );
      }
      const [valueParent, valueProperty] = childContext(typeName, parentName, propertyName, 'Value');
      return this.language.map(this.resolveType(undefined, schema.additionalProperties, valueParent, valueProperty));
    }

    if (schema.description) {
      return this.unit;
    }

    throw new GeneratorError(
      GeneratorErrorKind.INVALID_SPECIFICATION,
      `Schema is of type 'object' but no 'properties' or 'additionalProperties' were supplied`,
      context
    );
  }

  private emitObject(
    typeName: string,
    schema: Schema,
    properties: [string, Referenceable<Schema>][]
  ): ResolvedType {
    const qualifiedName = `${this.options.namespace}.schemas.${typeName}`;
    if (this.names.has(qualifiedName)) {
      return { shortName: typeName, qualifiedName };
    }
    this.names.set(qualifiedName, typeName);

    const dependencies = new Set<string>();
    const lines = properties.map(([key, property]) => {
      const resolved = this.resolveType(undefined, property, typeName, key);
      const dependency = this.names.get(resolved.qualifiedName);
      if (dependency && dependency !== typeName) {
        dependencies.add(dependency);
      }

      const description = property.kind === 'value' ? property.value.description : undefined;
      return propertyTemplate.build({
        hasDescription: Boolean(description),
        description,
        key: this.language.propertyKey(key),
        optional: !schema.required.includes(key),
        type: resolved.shortName === this.language.unit ? this.language.emptyObject : resolved.shortName,
      });
    });

    const sorted = [...dependencies].sort();
    const code = schemaTemplate.build({
      namespace: this.options.namespace,
      name: typeName,
      hasImports: sorted.length > 0,
      imports: sorted.map((dependency) => `import type { ${dependency} } from './${dependency}.js';`),
      hasDescription: Boolean(schema.description),
      description: schema.description,
      properties: lines,
    });

    this.definitions.push({ name: typeName, code, dependencies: sorted });
    return { shortName: typeName, qualifiedName };
  }
}

/**
 * Naming context for a nested item or value schema: the enclosing property if
 * there is one, otherwise the enclosing type with a fixed suffix
 */
function childContext(
  typeName: string | undefined,
  parentName: string | undefined,
  propertyName: string | undefined,
  suffix: string
): [string | undefined, string | undefined] {
  if (parentName && propertyName) {
    return [parentName, propertyName];
  }
  return typeName ? [typeName, suffix] : [undefined, undefined];
}
