/**
 * Client emission
 *
 * Walks the route tree and writes one namespace per path segment and one async
 * function per operation, resolving parameter and response types on the way.
 */

import type {
  OpenAPISpec,
  HttpMethod,
  Operation,
  Parameter,
  ParameterLocation,
  Referenceable,
  ResolvedType,
  Schema,
  MediaType,
  GeneratedFile,
  Server,
} from '../types.js';
import { GeneratorError, GeneratorErrorKind } from '../errors.js';
import { ReferenceResolver } from './reference-resolver.js';
import { TypeResolver } from './type-resolver.js';
import { typescript, type TargetLanguage } from './language.js';
import { PathNode } from './route-tree.js';
import { formatAsClassName, formatAsParameterName, stripBraces } from './path-utils.js';
import { clientTemplate, functionTemplate, namespaceTemplate } from './templates.js';

export interface EmitterOptions {
  /** Root namespace of the generated client */
  namespace: string;
  language?: TargetLanguage;
}

/**
 * A function parameter of a generated operation
 */
interface OperationParameter {
  /** Name as written in the document */
  key: string;
  /** Identifier in the generated function */
  identifier: string;
  location: ParameterLocation | 'body';
  required: boolean;
  type: ResolvedType;
}

const URL_PLACEHOLDER = /\{([^}]+)\}/g;

export class Emitter {
  private readonly language: TargetLanguage;
  private readonly references: ReferenceResolver;
  private readonly types: TypeResolver;
  /** Short names of schema types referenced from the client file */
  private readonly clientDependencies = new Set<string>();

  constructor(
    private readonly spec: OpenAPISpec,
    private readonly options: EmitterOptions
  ) {
    this.language = options.language ?? typescript;
    this.references = new ReferenceResolver(spec);
    this.types = new TypeResolver(this.references, { namespace: options.namespace, language: this.language });
  }

  /**
   * Emits the client file and every named schema reached from an operation
   * @param root - Root of the route tree
   * @returns Files relative to the output directory, client first
   */
  emit(root: PathNode): GeneratedFile[] {
    const endpoints = [
      ...this.emitFunctions(root, []),
      ...[...root.children].map(([segment, child]) => this.emitNode(segment, child, [])),
    ];

    const schemas = this.types.emitted();
    const dependencies = [...this.clientDependencies].sort();
    const info = this.spec.info;

    const client = clientTemplate.build({
      title: info.title,
      version: info.version,
      hasImports: dependencies.length > 0,
      imports: dependencies.map((name) => `import type { ${name} } from './schemas/${name}.js';`),
      hasDescription: Boolean(info.description),
      description: info.description,
      namespace: this.options.namespace,
      hasServers: this.spec.servers.length > 0,
      servers: this.spec.servers.map((server) => this.formatServer(server)),
      hasEndpoints: endpoints.length > 0,
      endpoints,
    });

    const files: GeneratedFile[] = [{ path: 'client.ts', contents: client }];
    for (const schema of schemas) {
      files.push({ path: `schemas/${schema.name}.ts`, contents: schema.code });
    }
    if (schemas.length > 0) {
      const exports = schemas
        .map((schema) => schema.name)
        .sort()
        .map((name) => `export type { ${name} } from './${name}.js';`);
      files.push({ path: 'schemas/index.ts', contents: `${exports.join('\n')}\n` });
    }
    return files;
  }

  private emitNode(segment: string, node: PathNode, scope: readonly string[]): string {
    const name = formatAsClassName(stripBraces(segment)) || '_';
    const path = [...scope, name];
    const functions = this.emitFunctions(node, path);
    const children = [...node.children].map(([childSegment, child]) => this.emitNode(childSegment, child, path));

    return namespaceTemplate.build({
      hasUrl: node.url !== undefined,
      url: node.url,
      name,
      isEndpoint: functions.length > 0,
      functions,
      space: functions.length > 0 && children.length > 0,
      hasChildren: children.length > 0,
      children,
    });
  }

  private emitFunctions(node: PathNode, scope: readonly string[]): string[] {
    const url = node.url;
    if (url === undefined) {
      return [];
    }
    return [...node.operations].map(([method, operation]) =>
      this.emitOperation(url, method, operation, node.parameters, scope)
    );
  }

  private emitOperation(
    url: string,
    method: HttpMethod,
    operation: Operation,
    sharedParameters: readonly Referenceable<Parameter>[],
    scope: readonly string[]
  ): string {
    const context = `${method.toUpperCase()} ${url}`;
    const operationName = `${formatAsClassName(method)}${scope.join('')}`;

    const parameters = this.collectParameters(url, sharedParameters, operation.parameters, context);
    const body = this.resolveRequestBody(operation, operationName);
    if (body) {
      const taken = new Set(parameters.map((parameter) => parameter.identifier));
      parameters.push({ ...body, identifier: taken.has('body') ? 'requestBody' : 'body' });
    }

    const response = this.resolveResponse(operation, operationName);
    const returnType = response.shortName === this.language.unit ? this.language.unit : `${response.shortName} | undefined`;
    const options = this.formatOptions(parameters);

    return functionTemplate.build({
      hasSummary: Boolean(operation.summary ?? operation.description),
      summary: operation.summary ?? operation.description,
      httpMethod: method.toUpperCase(),
      path: url,
      deprecated: operation.deprecated,
      name: this.language.escapeIdentifier(method),
      parameters: this.formatParameterList(parameters),
      returnType,
      url: url.replace(/`/g, '\\`').replace(URL_PLACEHOLDER, (_match, raw: string) => {
        return `\${encodeURIComponent(String(${this.identifier(raw)}))}`;
      }),
      hasOptions: options !== undefined,
      options,
    });
  }

  /**
   * Merges path-level and operation parameters (the operation wins on equal
   * name and location) and adds URL placeholders that were never declared
   */
  private collectParameters(
    url: string,
    shared: readonly Referenceable<Parameter>[],
    own: readonly Referenceable<Parameter>[],
    context: string
  ): OperationParameter[] {
    const resolve = (parameter: Referenceable<Parameter>) =>
      this.references.resolveChain('parameters', parameter).value;
    const key = (parameter: Parameter) => `${parameter.in}:${parameter.name}`;

    const ownParameters = own.map(resolve);
    const overridden = new Set(ownParameters.map(key));
    const merged = [...shared.map(resolve).filter((parameter) => !overridden.has(key(parameter))), ...ownParameters]
      // Cookies are left to the caller's default headers
      .filter((parameter) => parameter.in !== 'cookie');

    const result = merged.map((parameter): OperationParameter => ({
      key: parameter.name,
      identifier: this.identifier(parameter.name),
      location: parameter.in,
      required: parameter.required,
      type: this.track(this.types.resolveType(undefined, this.parameterSchema(parameter, context))),
    }));

    const declared = new Set(result.filter((parameter) => parameter.location === 'path').map((parameter) => parameter.key));
    for (const match of url.matchAll(URL_PLACEHOLDER)) {
      const raw = match[1];
      if (raw !== undefined && !declared.has(raw)) {
        declared.add(raw);
        result.push({
          key: raw,
          identifier: this.identifier(raw),
          location: 'path',
          required: true,
          type: { shortName: 'string', qualifiedName: 'string' },
        });
      }
    }

    return result;
  }

  private parameterSchema(parameter: Parameter, context: string): Referenceable<Schema> {
    const schema = parameter.schema ?? firstMediaType(parameter.content)?.schema;
    if (!schema) {
      throw new GeneratorError(
        GeneratorErrorKind.INVALID_SPECIFICATION,
        `Parameter '${parameter.name}' has neither a schema nor content`,
        context
      );
    }
    return schema;
  }

  private resolveRequestBody(
    operation: Operation,
    operationName: string
  ): Omit<OperationParameter, 'identifier'> | undefined {
    if (!operation.requestBody) {
      return undefined;
    }
    const { value: requestBody } = this.references.resolveChain('requestBodies', operation.requestBody);
    const media = requestBody.content['application/json'] ?? firstMediaType(requestBody.content);
    if (!media?.schema) {
      return undefined;
    }

    return {
      key: 'body',
      location: 'body',
      required: requestBody.required,
      type: this.track(this.types.resolveType(undefined, media.schema, operationName, 'body')),
    };
  }

  /**
   * Type of the lowest 2xx response, or the unit type when there is none or it
   * has no content
   */
  private resolveResponse(operation: Operation, operationName: string): ResolvedType {
    const unit = { shortName: this.language.unit, qualifiedName: this.language.unit };
    // Integer-like keys come back in ascending order, not document order
    const success = Object.entries(operation.responses).find(([status]) => status.startsWith('2'));
    if (!success) {
      return unit;
    }

    const [, reference] = success;
    const { value: response } = this.references.resolveChain('responses', reference);
    const schema = firstMediaType(response.content)?.schema;
    if (!schema) {
      return unit;
    }

    return this.track(this.types.resolveType(undefined, schema, operationName, 'response'));
  }

  private formatParameterList(parameters: readonly OperationParameter[]): string[] {
    let lastRequired = -1;
    parameters.forEach((parameter, index) => {
      if (parameter.required) {
        lastRequired = index;
      }
    });

    return parameters.map((parameter, index) => {
      const type = parameter.type.shortName;
      if (parameter.required) {
        return `${parameter.identifier}: ${type}`;
      }
      return index < lastRequired ? `${parameter.identifier}: ${type} | undefined` : `${parameter.identifier}?: ${type}`;
    });
  }

  /**
   * Writes the options argument of the request helper, or undefined when empty
   */
  private formatOptions(parameters: readonly OperationParameter[]): string | undefined {
    const entries = (location: ParameterLocation) =>
      parameters
        .filter((parameter) => parameter.location === location)
        .map((parameter) => {
          const key = this.language.propertyKey(parameter.key);
          return key === parameter.identifier ? key : `${key}: ${parameter.identifier}`;
        });

    const parts: string[] = [];
    const query = entries('query');
    if (query.length > 0) {
      parts.push(`query: { ${query.join(', ')} }`);
    }
    const headers = entries('header');
    if (headers.length > 0) {
      parts.push(`headers: { ${headers.join(', ')} }`);
    }
    const body = parameters.find((parameter) => parameter.location === 'body');
    if (body) {
      parts.push(body.identifier === 'body' ? 'body' : `body: ${body.identifier}`);
    }

    return parts.length > 0 ? `{ ${parts.join(', ')} }` : undefined;
  }

  private formatServer(server: Server): string {
    const lines: string[] = [];
    if (server.description) {
      lines.push(`// ${server.description.replace(/\s+/g, ' ').trim()}`);
    }
    for (const [name, variable] of Object.entries(server.variables)) {
      const choices = variable.enum && variable.enum.length > 0 ? `, one of ${variable.enum.join(', ')}` : '';
      lines.push(`// {${name}} defaults to '${variable.default}'${choices}`);
    }
    lines.push(`${this.language.stringLiteral(server.url)},`);
    return lines.join('\n');
  }

  private identifier(name: string): string {
    return this.language.escapeIdentifier(formatAsParameterName(name) || '_');
  }

  /** Records a named schema type as a dependency of the client file */
  private track(type: ResolvedType): ResolvedType {
    const name = this.types.lookup(type.qualifiedName);
    if (name) {
      this.clientDependencies.add(name);
    }
    return type;
  }
}

function firstMediaType(content: Readonly<Record<string, MediaType>> | undefined): MediaType | undefined {
  if (!content) {
    return undefined;
  }
  const [first] = Object.values(content);
  return first;
}
