/**
 * Error kinds raised while templating or generating a client.
 *
 * Every kind aborts the whole generation run.
 */
export enum GeneratorErrorKind {
  /** A template placeholder was not supplied and is neither optional nor nullable */
  MISSING_REQUIRED_VARIABLE = 'MissingRequiredVariable',
  /** A supplied value (or a placeholder's usage) does not match its declaration */
  TYPE_MISMATCH = 'TypeMismatch',
  /** A `$ref` points at an unknown section or a missing key */
  UNRESOLVABLE_REFERENCE = 'UnresolvableReference',
  /** An object schema with properties could not be given a type name */
  SCHEMA_MISSING_NAME = 'SchemaMissingName',
  /** `additionalProperties` is a boolean where a schema is required */
  INVALID_ADDITIONAL_PROPERTIES = 'InvalidAdditionalProperties',
  /** A schema's `type` is not one of the supported primitives */
  UNKNOWN_PRIMITIVE_TYPE = 'UnknownPrimitiveType',
  /** A template string does not follow the placeholder grammar */
  INVALID_TEMPLATE = 'InvalidTemplate',
  /** The specification document is structurally invalid */
  INVALID_SPECIFICATION = 'InvalidSpecification',
}

/**
 * Error thrown by every stage of the pipeline
 */
export class GeneratorError extends Error {
  /** Error kind for programmatic handling */
  readonly kind: GeneratorErrorKind;
  /** Schema, path or placeholder the error was raised for */
  readonly context?: string;

  constructor(kind: GeneratorErrorKind, message: string, context?: string) {
    super(context ? `${message} (at ${context})` : message);
    this.name = 'GeneratorError';
    this.kind = kind;
    this.context = context;
  }
}

/**
 * Checks whether an error is a {@link GeneratorError}, optionally of one kind
 */
export function isGeneratorError(error: unknown, kind?: GeneratorErrorKind): error is GeneratorError {
  return error instanceof GeneratorError && (kind === undefined || error.kind === kind);
}
