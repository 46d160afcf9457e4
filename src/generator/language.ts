/**
 * Lexical rules of the generated client language
 *
 * The resolver and emitter only build type expressions and identifiers through
 * this interface, so the spelling of the output stays in one place.
 */

import type { ResolvedType } from '../types.js';

export interface TargetLanguage {
  /** Built-in scalar for an OpenAPI primitive, or undefined if unsupported */
  primitive(type: string): string | undefined;
  /** Type of an empty object or an operation without content */
  readonly unit: string;
  /** Type of an object without properties when it is used as a property */
  readonly emptyObject: string;
  /** Sequence of the given element type */
  array(element: ResolvedType): ResolvedType;
  /** String-keyed map over the given value type */
  map(value: ResolvedType): ResolvedType;
  /** Makes an identifier safe to declare */
  escapeIdentifier(name: string): string;
  /** Writes an object key, quoting it when it is not an identifier */
  propertyKey(name: string): string;
  /** Writes a string literal */
  stringLiteral(value: string): string;
}

const PRIMITIVES: Readonly<Record<string, string>> = {
  string: 'string',
  integer: 'number',
  number: 'number',
  boolean: 'boolean',
};

const RESERVED_WORDS = new Set([
  'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default', 'delete', 'do',
  'else', 'enum', 'export', 'extends', 'false', 'finally', 'for', 'function', 'if', 'import', 'in',
  'instanceof', 'new', 'null', 'return', 'super', 'switch', 'this', 'throw', 'true', 'try', 'typeof',
  'var', 'void', 'while', 'with', 'let', 'static', 'yield', 'await', 'implements', 'interface',
  'package', 'private', 'protected', 'public',
]);

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function needsParentheses(expression: string): boolean {
  return /[|&]/.test(expression);
}

export const typescript: TargetLanguage = {
  primitive(type) {
    return Object.prototype.hasOwnProperty.call(PRIMITIVES, type) ? PRIMITIVES[type] : undefined;
  },

  unit: 'void',

  emptyObject: 'Record<string, never>',

  array(element) {
    const inner = needsParentheses(element.shortName) ? `(${element.shortName})` : element.shortName;
    return { shortName: `${inner}[]`, qualifiedName: element.qualifiedName };
  },

  map(value) {
    return { shortName: `Record<string, ${value.shortName}>`, qualifiedName: value.qualifiedName };
  },

  escapeIdentifier(name) {
    return RESERVED_WORDS.has(name) ? `${name}_` : name;
  },

  propertyKey(name) {
    return IDENTIFIER.test(name) ? name : this.stringLiteral(name);
  },

  stringLiteral(value) {
    return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
  },
};
