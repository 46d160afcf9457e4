import type {
  OpenAPISpec,
  Info,
  Server,
  ServerVariable,
  Tag,
  SecurityRequirement,
  PathItem,
  Operation,
  Parameter,
  ParameterLocation,
  RequestBody,
  MediaType,
  Response,
  Header,
  Example,
  SecurityScheme,
  Link,
  Callback,
  Schema,
  Components,
  Referenceable,
  HttpMethod,
} from './types.js';
import { HTTP_METHODS } from './types.js';
import { GeneratorError, GeneratorErrorKind } from './errors.js';

type JsonObject = Record<string, unknown>;

const SUPPORTED_VERSION = /^3\.0\.\d+$/;
const PARAMETER_LOCATIONS: readonly ParameterLocation[] = ['query', 'header', 'path', 'cookie'];

/**
 * Converts a parsed JSON document into the typed specification model
 *
 * Unknown fields are ignored. Every field that may hold a `$ref` becomes a
 * {@link Referenceable} so later stages never inspect raw `$ref` keys.
 *
 * @param raw - Parsed JSON document
 * @returns Specification model
 * @throws GeneratorError (InvalidSpecification) naming the offending JSON path
 */
export function parseSpec(raw: unknown): OpenAPISpec {
  const root = expectObject(raw, '#');
  const openapi = requiredString(root, 'openapi', '#');
  if (!SUPPORTED_VERSION.test(openapi)) {
    throw invalid(`Unsupported OpenAPI version '${openapi}', expected 3.0.x`, '#/openapi');
  }

  return {
    openapi,
    info: parseInfo(root.info, '#/info'),
    servers: optionalArray(root, 'servers', '#', parseServer),
    paths: requiredRecord(root, 'paths', '#', parsePathItem),
    components: parseComponents(root.components, '#/components'),
    tags: optionalArray(root, 'tags', '#', parseTag),
    security: optionalArray(root, 'security', '#', parseSecurityRequirement),
  };
}

/**
 * Checks if an object is a reference
 * @param obj - Object to check
 * @returns True if object carries a `$ref` string
 */
export function isRef(obj: unknown): obj is { $ref: string } {
  return isObject(obj) && typeof obj.$ref === 'string';
}

function parseInfo(value: unknown, path: string): Info {
  const obj = expectObject(value, path);
  const contact = obj.contact === undefined ? undefined : expectObject(obj.contact, `${path}/contact`);
  const license = obj.license === undefined ? undefined : expectObject(obj.license, `${path}/license`);

  return {
    title: requiredString(obj, 'title', path),
    version: requiredString(obj, 'version', path),
    description: optionalString(obj, 'description', path),
    termsOfService: optionalString(obj, 'termsOfService', path),
    contact: contact && {
      name: optionalString(contact, 'name', `${path}/contact`),
      url: optionalString(contact, 'url', `${path}/contact`),
      email: optionalString(contact, 'email', `${path}/contact`),
    },
    license: license && {
      name: requiredString(license, 'name', `${path}/license`),
      url: optionalString(license, 'url', `${path}/license`),
    },
  };
}

function parseServer(value: unknown, path: string): Server {
  const obj = expectObject(value, path);
  return {
    url: requiredString(obj, 'url', path),
    description: optionalString(obj, 'description', path),
    variables: optionalRecord(obj, 'variables', path, parseServerVariable),
  };
}

function parseServerVariable(value: unknown, path: string): ServerVariable {
  const obj = expectObject(value, path);
  return {
    default: requiredString(obj, 'default', path),
    enum: obj.enum === undefined ? undefined : optionalArray(obj, 'enum', path, expectString),
    description: optionalString(obj, 'description', path),
  };
}

function parseTag(value: unknown, path: string): Tag {
  const obj = expectObject(value, path);
  return {
    name: requiredString(obj, 'name', path),
    description: optionalString(obj, 'description', path),
  };
}

function parseSecurityRequirement(value: unknown, path: string): SecurityRequirement {
  const obj = expectObject(value, path);
  const requirement: Record<string, readonly string[]> = {};
  for (const key of Object.keys(obj)) {
    requirement[key] = optionalArray(obj, key, path, expectString);
  }
  return requirement;
}

function parsePathItem(value: unknown, path: string): PathItem {
  const obj = expectObject(value, path);
  const operations: Partial<Record<HttpMethod, Operation>> = {};

  for (const method of HTTP_METHODS) {
    if (obj[method] !== undefined) {
      operations[method] = parseOperation(obj[method], `${path}/${method}`);
    }
  }

  return {
    summary: optionalString(obj, 'summary', path),
    description: optionalString(obj, 'description', path),
    parameters: optionalArray(obj, 'parameters', path, referenceable(parseParameter)),
    operations,
  };
}

function parseOperation(value: unknown, path: string): Operation {
  const obj = expectObject(value, path);
  return {
    operationId: optionalString(obj, 'operationId', path),
    summary: optionalString(obj, 'summary', path),
    description: optionalString(obj, 'description', path),
    tags: optionalArray(obj, 'tags', path, expectString),
    deprecated: optionalBoolean(obj, 'deprecated', path, false),
    parameters: optionalArray(obj, 'parameters', path, referenceable(parseParameter)),
    requestBody: obj.requestBody === undefined
      ? undefined
      : referenceable(parseRequestBody)(obj.requestBody, `${path}/requestBody`),
    responses: optionalRecord(obj, 'responses', path, referenceable(parseResponse)),
  };
}

function parseParameter(value: unknown, path: string): Parameter {
  const obj = expectObject(value, path);
  const location = requiredString(obj, 'in', path);
  const parameterLocation = PARAMETER_LOCATIONS.find((candidate) => candidate === location);
  if (!parameterLocation) {
    throw invalid(`Unknown parameter location '${location}'`, `${path}/in`);
  }

  return {
    name: requiredString(obj, 'name', path),
    in: parameterLocation,
    description: optionalString(obj, 'description', path),
    // Path parameters are always required
    required: parameterLocation === 'path' || optionalBoolean(obj, 'required', path, false),
    deprecated: optionalBoolean(obj, 'deprecated', path, false),
    schema: obj.schema === undefined ? undefined : referenceable(parseSchema)(obj.schema, `${path}/schema`),
    content: obj.content === undefined ? undefined : optionalRecord(obj, 'content', path, parseMediaType),
  };
}

function parseRequestBody(value: unknown, path: string): RequestBody {
  const obj = expectObject(value, path);
  return {
    description: optionalString(obj, 'description', path),
    content: requiredRecord(obj, 'content', path, parseMediaType),
    required: optionalBoolean(obj, 'required', path, false),
  };
}

function parseMediaType(value: unknown, path: string): MediaType {
  const obj = expectObject(value, path);
  return {
    schema: obj.schema === undefined ? undefined : referenceable(parseSchema)(obj.schema, `${path}/schema`),
  };
}

function parseResponse(value: unknown, path: string): Response {
  const obj = expectObject(value, path);
  return {
    description: optionalString(obj, 'description', path) ?? '',
    content: obj.content === undefined ? undefined : optionalRecord(obj, 'content', path, parseMediaType),
    headers: obj.headers === undefined ? undefined : optionalRecord(obj, 'headers', path, referenceable(parseHeader)),
  };
}

function parseHeader(value: unknown, path: string): Header {
  const obj = expectObject(value, path);
  return {
    description: optionalString(obj, 'description', path),
    required: optionalBoolean(obj, 'required', path, false),
    schema: obj.schema === undefined ? undefined : referenceable(parseSchema)(obj.schema, `${path}/schema`),
  };
}

function parseExample(value: unknown, path: string): Example {
  const obj = expectObject(value, path);
  return {
    summary: optionalString(obj, 'summary', path),
    description: optionalString(obj, 'description', path),
    value: obj.value,
    externalValue: optionalString(obj, 'externalValue', path),
  };
}

function parseSecurityScheme(value: unknown, path: string): SecurityScheme {
  const obj = expectObject(value, path);
  return {
    type: requiredString(obj, 'type', path),
    description: optionalString(obj, 'description', path),
    name: optionalString(obj, 'name', path),
    in: optionalString(obj, 'in', path),
    scheme: optionalString(obj, 'scheme', path),
    bearerFormat: optionalString(obj, 'bearerFormat', path),
    openIdConnectUrl: optionalString(obj, 'openIdConnectUrl', path),
  };
}

function parseLink(value: unknown, path: string): Link {
  const obj = expectObject(value, path);
  return {
    operationRef: optionalString(obj, 'operationRef', path),
    operationId: optionalString(obj, 'operationId', path),
    description: optionalString(obj, 'description', path),
  };
}

function parseCallback(value: unknown, path: string): Callback {
  const obj = expectObject(value, path);
  const callback: Record<string, PathItem> = {};
  for (const [expression, item] of Object.entries(obj)) {
    callback[expression] = parsePathItem(item, `${path}/${escapePointer(expression)}`);
  }
  return callback;
}

function parseSchema(value: unknown, path: string): Schema {
  const obj = expectObject(value, path);
  const additional = obj.additionalProperties;

  return {
    type: optionalString(obj, 'type', path),
    format: optionalString(obj, 'format', path),
    description: optionalString(obj, 'description', path),
    properties: obj.properties === undefined
      ? undefined
      : optionalRecord(obj, 'properties', path, referenceable(parseSchema)),
    required: optionalArray(obj, 'required', path, expectString),
    items: obj.items === undefined ? undefined : referenceable(parseSchema)(obj.items, `${path}/items`),
    additionalProperties: additional === undefined || typeof additional === 'boolean'
      ? additional
      : referenceable(parseSchema)(additional, `${path}/additionalProperties`),
  };
}

function parseComponents(value: unknown, path: string): Components {
  const obj = value === undefined ? {} : expectObject(value, path);
  return {
    schemas: optionalRecord(obj, 'schemas', path, referenceable(parseSchema)),
    responses: optionalRecord(obj, 'responses', path, referenceable(parseResponse)),
    parameters: optionalRecord(obj, 'parameters', path, referenceable(parseParameter)),
    examples: optionalRecord(obj, 'examples', path, referenceable(parseExample)),
    requestBodies: optionalRecord(obj, 'requestBodies', path, referenceable(parseRequestBody)),
    headers: optionalRecord(obj, 'headers', path, referenceable(parseHeader)),
    securitySchemes: optionalRecord(obj, 'securitySchemes', path, referenceable(parseSecurityScheme)),
    links: optionalRecord(obj, 'links', path, referenceable(parseLink)),
    callbacks: optionalRecord(obj, 'callbacks', path, referenceable(parseCallback)),
  };
}

/**
 * Wraps a value parser so that `$ref` objects become references
 */
function referenceable<T>(parse: (value: unknown, path: string) => T) {
  return (value: unknown, path: string): Referenceable<T> =>
    isRef(value) ? { kind: 'reference', pointer: value.$ref } : { kind: 'value', value: parse(value, path) };
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw invalid('Expected an object', path);
  }
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw invalid('Expected a string', path);
  }
  return value;
}

function requiredString(obj: JsonObject, key: string, path: string): string {
  if (obj[key] === undefined) {
    throw invalid(`Missing required field '${key}'`, path);
  }
  return expectString(obj[key], `${path}/${key}`);
}

function optionalString(obj: JsonObject, key: string, path: string): string | undefined {
  return obj[key] === undefined ? undefined : expectString(obj[key], `${path}/${key}`);
}

function optionalBoolean(obj: JsonObject, key: string, path: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw invalid('Expected a boolean', `${path}/${key}`);
  }
  return value;
}

function optionalArray<T>(
  obj: JsonObject,
  key: string,
  path: string,
  parse: (value: unknown, path: string) => T
): T[] {
  const value = obj[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw invalid('Expected an array', `${path}/${key}`);
  }
  return value.map((item: unknown, index) => parse(item, `${path}/${key}/${index}`));
}

function optionalRecord<T>(
  obj: JsonObject,
  key: string,
  path: string,
  parse: (value: unknown, path: string) => T
): Record<string, T> {
  return obj[key] === undefined ? {} : requiredRecord(obj, key, path, parse);
}

function requiredRecord<T>(
  obj: JsonObject,
  key: string,
  path: string,
  parse: (value: unknown, path: string) => T
): Record<string, T> {
  if (obj[key] === undefined) {
    throw invalid(`Missing required field '${key}'`, path);
  }
  const value = expectObject(obj[key], `${path}/${key}`);
  const result: Record<string, T> = {};
  for (const [entryKey, entry] of Object.entries(value)) {
    result[entryKey] = parse(entry, `${path}/${key}/${escapePointer(entryKey)}`);
  }
  return result;
}

function escapePointer(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

function invalid(message: string, path: string): GeneratorError {
  return new GeneratorError(GeneratorErrorKind.INVALID_SPECIFICATION, message, path);
}
