/**
 * Template grammar parser
 *
 * Turns template text into a flat list of text and placeholder nodes:
 * - `%name%` - plain placeholder
 * - `%name -> "text"%` - inline conditional, empty when false
 * - `%~name -> "text"~%` - whole-line conditional, drops its line when false
 *
 * Quoted branch text unescapes `\n`, `\"` and `\\`. A `%` that does not open a
 * well-formed placeholder is kept as literal text; an unfinished `%~` is an error.
 */

import { GeneratorError, GeneratorErrorKind } from '../errors.js';

export type TemplateNode = TextNode | PlaceholderNode | ConditionalNode;

export interface TextNode {
  kind: 'text';
  text: string;
}

export interface PlaceholderNode {
  kind: 'placeholder';
  name: string;
}

export interface ConditionalNode {
  kind: 'conditional';
  name: string;
  /** Whether a false condition removes the whole output line */
  wholeLine: boolean;
  /** Unescaped branch text, itself a template */
  body: string;
  /** Column of the opening `%` within its source line */
  column: number;
}

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;

/**
 * Character cursor over the template source
 */
class Scanner {
  pos: number;

  constructor(private readonly source: string, start: number) {
    this.pos = start;
  }

  peek(offset: number = 0): string {
    return this.source.charAt(this.pos + offset);
  }

  atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  /** Consumes `literal` if the source continues with it */
  accept(literal: string): boolean {
    if (this.source.startsWith(literal, this.pos)) {
      this.pos += literal.length;
      return true;
    }
    return false;
  }

  skipSpaces(): void {
    while (this.peek() === ' ' || this.peek() === '\t') {
      this.pos++;
    }
  }

  readIdentifier(): string | undefined {
    if (!IDENTIFIER_START.test(this.peek())) {
      return undefined;
    }
    const start = this.pos;
    while (!this.atEnd() && IDENTIFIER_PART.test(this.peek())) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  /** Reads a double-quoted string, returning undefined if it never closes */
  readQuoted(): string | undefined {
    if (!this.accept('"')) {
      return undefined;
    }
    let text = '';
    while (!this.atEnd()) {
      const ch = this.peek();
      if (ch === '"') {
        this.pos++;
        return text;
      }
      if (ch === '\\') {
        const next = this.peek(1);
        if (next === 'n') {
          text += '\n';
        } else if (next === '"' || next === '\\') {
          text += next;
        } else {
          text += ch + next;
        }
        this.pos += 2;
        continue;
      }
      text += ch;
      this.pos++;
    }
    return undefined;
  }

  /** Reads ` -> "text"`, the arrow and branch of a conditional */
  readBranch(): string | undefined {
    this.skipSpaces();
    if (!this.accept('->')) {
      return undefined;
    }
    this.skipSpaces();
    return this.readQuoted();
  }
}

/**
 * Parses template text into nodes
 * @param source - Template text
 * @returns Nodes in source order, adjacent text merged
 * @throws GeneratorError (InvalidTemplate) on an unfinished whole-line conditional
 */
export function parseTemplate(source: string): TemplateNode[] {
  const nodes: TemplateNode[] = [];
  let text = '';
  let pos = 0;

  while (pos < source.length) {
    if (source.charAt(pos) === '%') {
      const parsed = source.charAt(pos + 1) === '~'
        ? readWholeLineConditional(source, pos)
        : readPlaceholder(source, pos);

      if (parsed) {
        if (text.length > 0) {
          nodes.push({ kind: 'text', text });
          text = '';
        }
        nodes.push(parsed.node);
        pos = parsed.end;
        continue;
      }
    }
    text += source.charAt(pos);
    pos++;
  }

  if (text.length > 0) {
    nodes.push({ kind: 'text', text });
  }
  return nodes;
}

function readPlaceholder(source: string, start: number): { node: TemplateNode; end: number } | undefined {
  const scanner = new Scanner(source, start + 1);
  const name = scanner.readIdentifier();
  if (!name) {
    return undefined;
  }

  if (scanner.accept('%')) {
    return { node: { kind: 'placeholder', name }, end: scanner.pos };
  }

  const body = scanner.readBranch();
  if (body === undefined || !scanner.accept('%')) {
    return undefined;
  }
  return {
    node: { kind: 'conditional', name, wholeLine: false, body, column: columnOf(source, start) },
    end: scanner.pos,
  };
}

function readWholeLineConditional(source: string, start: number): { node: TemplateNode; end: number } {
  const scanner = new Scanner(source, start + 2);
  const name = scanner.readIdentifier();
  const body = name === undefined ? undefined : scanner.readBranch();

  if (name === undefined || body === undefined || !scanner.accept('~%')) {
    throw new GeneratorError(
      GeneratorErrorKind.INVALID_TEMPLATE,
      `Malformed whole-line conditional, expected %~name -> "text"~%`,
      describePosition(source, start)
    );
  }

  return {
    node: { kind: 'conditional', name, wholeLine: true, body, column: columnOf(source, start) },
    end: scanner.pos,
  };
}

function columnOf(source: string, offset: number): number {
  return offset - (source.lastIndexOf('\n', offset - 1) + 1);
}

function describePosition(source: string, offset: number): string {
  const line = source.slice(0, offset).split('\n').length;
  return `line ${line}, column ${columnOf(source, offset) + 1}`;
}
