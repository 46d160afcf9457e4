/**
 * Text templating engine
 *
 * A template is parsed once into typed placeholders and then built any number
 * of times against a mapping of placeholder name to value.
 *
 * @example
 * ```typescript
 * const template = new Template('export %kind% %name% {\n  %~hasBody -> "%body%"~%\n}', {
 *   variables: { hasBody: { type: 'boolean' } },
 * });
 * template.build({ kind: 'interface', name: 'Team', hasBody: false, body: '' });
 * // "export interface Team {\n}"
 * ```
 */

import { GeneratorError, GeneratorErrorKind } from '../errors.js';
import { parseTemplate, type TemplateNode } from './parser.js';

export type VariableType = 'string' | 'number' | 'boolean' | 'list';

export type VariableKind = 'plain' | 'optional' | 'nullable' | 'wholeLine' | 'conditional';

export type TemplateValue = string | number | boolean | readonly string[] | null | undefined;

export type TemplateArguments = Readonly<Record<string, TemplateValue>>;

interface DeclarationFlags {
  /** Missing values are treated as empty text (or false for conditionals) */
  optional?: boolean;
  /** An explicit null is accepted and formats to empty text */
  nullable?: boolean;
}

/**
 * Build-time contract of one placeholder; the formatter receives a value of the declared type
 */
export type VariableDeclaration =
  | (DeclarationFlags & { type?: 'string'; format?: (value: string) => string })
  | (DeclarationFlags & { type: 'number'; format?: (value: number) => string })
  | (DeclarationFlags & { type: 'boolean'; format?: (value: boolean) => string })
  | (DeclarationFlags & { type: 'list'; format?: (value: readonly string[]) => string });

export interface Variable {
  readonly name: string;
  readonly kind: VariableKind;
  readonly type: VariableType;
  readonly optional: boolean;
  readonly nullable: boolean;
}

export interface TemplateOptions {
  /** Declarations by placeholder name; undeclared placeholders are required strings */
  variables?: Readonly<Record<string, VariableDeclaration>>;
  /** Spaces prepended to every output line after the first */
  indent?: number;
}

export interface BuildOptions {
  /** Overrides the template's own indent */
  indent?: number;
}

type CompiledNode =
  | Exclude<TemplateNode, { kind: 'conditional' }>
  | { kind: 'conditional'; name: string; wholeLine: boolean; branch: Template };

const REMOVE_LINE = '\u0000remove-line\u0000';

export class Template<A extends TemplateArguments = TemplateArguments> {
  readonly source: string;
  readonly indent: number;
  /** Placeholders in the order first encountered in the source */
  readonly variables: ReadonlyMap<string, Variable>;

  private readonly nodes: CompiledNode[];
  private readonly declarations: Readonly<Record<string, VariableDeclaration>>;

  constructor(source: string, options: TemplateOptions = {}) {
    this.source = source;
    this.indent = options.indent ?? 0;
    this.declarations = options.variables ?? {};

    const variables = new Map<string, Variable>();
    this.nodes = parseTemplate(source).map((node): CompiledNode => {
      if (node.kind === 'text') {
        return node;
      }
      this.register(variables, node.name, node.kind === 'conditional' ? node.wholeLine : undefined);
      if (node.kind === 'placeholder') {
        return node;
      }
      return {
        kind: 'conditional',
        name: node.name,
        wholeLine: node.wholeLine,
        branch: new Template(node.body, { variables: this.declarations, indent: node.column }),
      };
    });
    this.variables = variables;
  }

  /**
   * Substitutes every placeholder and applies whole-line elision and indentation
   * @param args - Placeholder values by name
   * @param options - Build options
   * @returns Built text
   * @throws GeneratorError (MissingRequiredVariable, TypeMismatch)
   */
  build(args: A, options: BuildOptions = {}): string {
    const values: TemplateArguments = args;
    const plain = new Map<string, string>();
    const conditions = new Map<string, boolean>();

    for (const variable of this.variables.values()) {
      if (variable.kind === 'wholeLine' || variable.kind === 'conditional') {
        conditions.set(variable.name, this.evaluateCondition(variable, values));
      } else {
        plain.set(variable.name, this.formatValue(variable, values));
      }
    }

    let output = '';
    for (const node of this.nodes) {
      switch (node.kind) {
        case 'text':
          output += node.text;
          break;
        case 'placeholder':
          output += plain.get(node.name) ?? '';
          break;
        case 'conditional':
          if (conditions.get(node.name)) {
            output += node.branch.build(args);
          } else if (node.wholeLine) {
            output += REMOVE_LINE;
          }
          break;
      }
    }

    const indent = ' '.repeat(options.indent ?? this.indent);
    return output
      .split('\n')
      .filter((line) => !line.includes(REMOVE_LINE))
      .map((line, index) => (index > 0 && line.length > 0 ? indent + line : line))
      .join('\n');
  }

  private register(variables: Map<string, Variable>, name: string, wholeLine: boolean | undefined): void {
    const declaration = this.declarations[name];
    const isConditional = wholeLine !== undefined;
    const existing = variables.get(name);

    if (existing) {
      const existingConditional = existing.kind === 'wholeLine' || existing.kind === 'conditional';
      if (existingConditional !== isConditional) {
        throw new GeneratorError(
          GeneratorErrorKind.TYPE_MISMATCH,
          `Placeholder '${name}' is used both as a value and as a condition`
        );
      }
      return;
    }

    if (isConditional) {
      if (declaration?.type !== undefined && declaration.type !== 'boolean') {
        throw new GeneratorError(
          GeneratorErrorKind.TYPE_MISMATCH,
          `Condition '${name}' is declared as '${declaration.type}' but conditions must be 'boolean'`
        );
      }
      variables.set(name, {
        name,
        kind: wholeLine ? 'wholeLine' : 'conditional',
        type: 'boolean',
        optional: declaration?.optional ?? false,
        nullable: declaration?.nullable ?? false,
      });
      return;
    }

    const optional = declaration?.optional ?? false;
    const nullable = declaration?.nullable ?? false;
    variables.set(name, {
      name,
      kind: optional ? 'optional' : nullable ? 'nullable' : 'plain',
      type: declaration?.type ?? 'string',
      optional,
      nullable,
    });
  }

  /** Looks up a value, returning undefined when it may be left empty */
  private lookup(variable: Variable, values: TemplateArguments): NonNullable<TemplateValue> | undefined {
    const value = Object.prototype.hasOwnProperty.call(values, variable.name) ? values[variable.name] : undefined;

    if (value === undefined) {
      if (variable.optional || variable.nullable) {
        return undefined;
      }
      throw new GeneratorError(
        GeneratorErrorKind.MISSING_REQUIRED_VARIABLE,
        `Required variable '${variable.name}' not supplied`
      );
    }

    if (value === null) {
      if (variable.nullable) {
        return undefined;
      }
      throw typeMismatch(variable, value);
    }

    return value;
  }

  private evaluateCondition(variable: Variable, values: TemplateArguments): boolean {
    const value = this.lookup(variable, values);
    if (value === undefined) {
      return false;
    }
    if (typeof value !== 'boolean') {
      throw typeMismatch(variable, value);
    }
    return value;
  }

  private formatValue(variable: Variable, values: TemplateArguments): string {
    const value = this.lookup(variable, values);
    if (value === undefined) {
      return '';
    }

    const declaration: VariableDeclaration = this.declarations[variable.name] ?? {};
    switch (declaration.type) {
      case 'number':
        if (typeof value !== 'number') throw typeMismatch(variable, value);
        return declaration.format ? declaration.format(value) : String(value);
      case 'boolean':
        if (typeof value !== 'boolean') throw typeMismatch(variable, value);
        return declaration.format ? declaration.format(value) : String(value);
      case 'list':
        if (!isStringList(value)) throw typeMismatch(variable, value);
        return declaration.format ? declaration.format(value) : value.join(', ');
      default:
        if (typeof value !== 'string') throw typeMismatch(variable, value);
        return declaration.format ? declaration.format(value) : value;
    }
  }
}

function isStringList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function describeType(value: TemplateValue): string {
  if (value === null) return 'null';
  if (isStringList(value)) return 'list';
  return typeof value;
}

function typeMismatch(variable: Variable, value: TemplateValue): GeneratorError {
  return new GeneratorError(
    GeneratorErrorKind.TYPE_MISMATCH,
    `Value supplied for '${variable.name}' (${JSON.stringify(value)}) is not the correct type! ` +
      `It is of type '${describeType(value)}' but needs to be of type '${variable.type}'`
  );
}
