/**
 * Configuration options for the openapi-client-gen tool
 */
export interface Config {
  /** URL or path to the OpenAPI JSON document */
  input?: string;
  /** Output directory for the generated client */
  output?: string;
  /** Name of the root namespace of the generated client */
  namespace?: string;
  /** Whether to clean output directory before generation */
  clean?: boolean;
  /** Whether to format generated code with Prettier */
  pretty?: boolean;
  /** Whether to log verbose debug information */
  verbose?: boolean;
  /** Whether to print the route tree before writing */
  tree?: boolean;
}

/**
 * A `$ref` pointer, e.g. `#/components/schemas/Team`
 */
export interface Reference {
  readonly kind: 'reference';
  readonly pointer: string;
}

/**
 * A value written inline in the document
 */
export interface Inline<T> {
  readonly kind: 'value';
  readonly value: T;
}

/**
 * Any field the document may either spell out or point to
 */
export type Referenceable<T> = Reference | Inline<T>;

/**
 * OpenAPI 3.0.x document
 */
export interface OpenAPISpec {
  readonly openapi: string;
  readonly info: Info;
  readonly servers: readonly Server[];
  readonly paths: Readonly<Record<string, PathItem>>;
  readonly components: Components;
  readonly tags: readonly Tag[];
  readonly security: readonly SecurityRequirement[];
}

export interface Info {
  readonly title: string;
  readonly version: string;
  readonly description?: string;
  readonly termsOfService?: string;
  readonly contact?: { readonly name?: string; readonly url?: string; readonly email?: string };
  readonly license?: { readonly name: string; readonly url?: string };
}

export interface Server {
  readonly url: string;
  readonly description?: string;
  readonly variables: Readonly<Record<string, ServerVariable>>;
}

export interface ServerVariable {
  readonly default: string;
  readonly enum?: readonly string[];
  readonly description?: string;
}

export interface Tag {
  readonly name: string;
  readonly description?: string;
}

export type SecurityRequirement = Readonly<Record<string, readonly string[]>>;

/**
 * HTTP method types, in the order operations are emitted
 */
export const HTTP_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Path item containing operations
 */
export interface PathItem {
  readonly summary?: string;
  readonly description?: string;
  /** Parameters shared by every operation of the path */
  readonly parameters: readonly Referenceable<Parameter>[];
  readonly operations: Readonly<Partial<Record<HttpMethod, Operation>>>;
}

/**
 * API operation
 */
export interface Operation {
  readonly operationId?: string;
  readonly summary?: string;
  readonly description?: string;
  readonly tags: readonly string[];
  readonly deprecated: boolean;
  readonly parameters: readonly Referenceable<Parameter>[];
  readonly requestBody?: Referenceable<RequestBody>;
  /** Keyed by status code or `default` */
  readonly responses: Readonly<Record<string, Referenceable<Response>>>;
}

export type ParameterLocation = 'query' | 'header' | 'path' | 'cookie';

export interface Parameter {
  readonly name: string;
  readonly in: ParameterLocation;
  readonly description?: string;
  readonly required: boolean;
  readonly deprecated: boolean;
  readonly schema?: Referenceable<Schema>;
  readonly content?: Readonly<Record<string, MediaType>>;
}

export interface RequestBody {
  readonly description?: string;
  readonly content: Readonly<Record<string, MediaType>>;
  readonly required: boolean;
}

export interface MediaType {
  readonly schema?: Referenceable<Schema>;
}

export interface Response {
  readonly description: string;
  readonly content?: Readonly<Record<string, MediaType>>;
  readonly headers?: Readonly<Record<string, Referenceable<Header>>>;
}

export interface Header {
  readonly description?: string;
  readonly required: boolean;
  readonly schema?: Referenceable<Schema>;
}

export interface Example {
  readonly summary?: string;
  readonly description?: string;
  readonly value?: unknown;
  readonly externalValue?: string;
}

export interface SecurityScheme {
  readonly type: string;
  readonly description?: string;
  readonly name?: string;
  readonly in?: string;
  readonly scheme?: string;
  readonly bearerFormat?: string;
  readonly openIdConnectUrl?: string;
}

export interface Link {
  readonly operationRef?: string;
  readonly operationId?: string;
  readonly description?: string;
}

/** Runtime expression to path item */
export type Callback = Readonly<Record<string, PathItem>>;

/**
 * JSON Schema subset used for type inference
 */
export interface Schema {
  readonly type?: string;
  readonly format?: string;
  readonly description?: string;
  /** Ordered as declared in the document */
  readonly properties?: Readonly<Record<string, Referenceable<Schema>>>;
  readonly required: readonly string[];
  readonly items?: Referenceable<Schema>;
  readonly additionalProperties?: boolean | Referenceable<Schema>;
}

/**
 * Value types of each components section
 */
export interface ComponentTypes {
  schemas: Schema;
  responses: Response;
  parameters: Parameter;
  examples: Example;
  requestBodies: RequestBody;
  headers: Header;
  securitySchemes: SecurityScheme;
  links: Link;
  callbacks: Callback;
}

export type ComponentSection = keyof ComponentTypes;

export const COMPONENT_SECTIONS: readonly ComponentSection[] = [
  'schemas',
  'responses',
  'parameters',
  'examples',
  'requestBodies',
  'headers',
  'securitySchemes',
  'links',
  'callbacks',
];

export type Components = {
  readonly [S in ComponentSection]: Readonly<Record<string, Referenceable<ComponentTypes[S]>>>;
};

/**
 * Output of type resolution: the expression to write and the name it depends on
 */
export interface ResolvedType {
  /** Type expression, e.g. `Team[]` */
  shortName: string;
  /** Fully-qualified name of the underlying type, e.g. `Example.schemas.Team` */
  qualifiedName: string;
}

/**
 * Type definition for generated TypeScript code
 */
export interface TypeDefinition {
  name: string;
  code: string;
  /** Names of the schema types the code refers to */
  dependencies: string[];
}

/**
 * A file of the generated client, relative to the output directory
 */
export interface GeneratedFile {
  path: string;
  contents: string;
}
