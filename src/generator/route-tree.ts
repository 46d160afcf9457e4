/**
 * Route tree construction
 *
 * Folds the flat path map of a specification into a tree of URL segments so
 * that the client can mirror the URL hierarchy as nested namespaces.
 */

import type { HttpMethod, Operation, Parameter, PathItem, Referenceable } from '../types.js';
import { HTTP_METHODS } from '../types.js';
import { isPathParameter, splitPath, stripBraces } from './path-utils.js';

export class PathNode {
  /** Full matched path; absent for pure intermediate segments */
  url?: string;
  /** Path parameter bound by this segment, without braces */
  parameter?: string;
  readonly operations = new Map<HttpMethod, Operation>();
  /** Parameters the path item shares with all of its operations */
  parameters: readonly Referenceable<Parameter>[] = [];
  /** Child nodes by raw segment text, in first-seen order */
  readonly children = new Map<string, PathNode>();

  constructor(url?: string) {
    this.url = url;
  }

  get hasOperations(): boolean {
    return this.operations.size > 0;
  }

  /**
   * Binds a path item to this node, keeping any children already discovered
   */
  attach(url: string, item: PathItem): void {
    this.url = url;
    this.parameters = item.parameters;
    this.operations.clear();
    for (const method of HTTP_METHODS) {
      const operation = item.operations[method];
      if (operation) {
        this.operations.set(method, operation);
      }
    }
  }

  /**
   * Returns the child at `segment`, creating it if needed
   */
  child(segment: string): PathNode {
    let node = this.children.get(segment);
    if (!node) {
      node = new PathNode();
      this.children.set(segment, node);
    }
    return node;
  }
}

/**
 * Builds the route tree from a specification's path map
 *
 * @param paths - URL template to path item
 * @returns Synthetic root node with url `/`
 *
 * @example
 * ```typescript
 * const root = buildRouteTree(spec.paths);
 * root.children.get('teams')?.children.get('{id}')?.parameter; // "id"
 * ```
 */
export function buildRouteTree(paths: Readonly<Record<string, PathItem>>): PathNode {
  const root = new PathNode('/');

  for (const [url, item] of Object.entries(paths)) {
    const segments = splitPath(url);
    let node = root;
    for (const segment of segments) {
      node = node.child(segment);
    }

    node.attach(url, item);
    const last = segments[segments.length - 1];
    if (last !== undefined && isPathParameter(last)) {
      node.parameter = stripBraces(last);
    }
  }

  return root;
}

/**
 * Renders the route tree for diagnostics
 *
 * One line per node: its segment followed by `/`, `{param}` for a parameter
 * node whose segment is not itself braced, the parameters bound by its
 * ancestors in brackets, and `*` when it carries an operation.
 *
 * @example
 * ```text
 * /
 *   teams/
 *     {id}/ *
 *       matches/ [id] *
 * ```
 */
export function printRouteTree(root: PathNode): string {
  const lines: string[] = [];

  const visit = (segment: string, node: PathNode, depth: number, inherited: readonly string[]): void => {
    let line = `${'  '.repeat(depth)}${segment}/`;
    if (node.parameter && !isPathParameter(segment)) {
      line += `{${node.parameter}}`;
    }
    if (inherited.length > 0) {
      line += ` [${inherited.join(', ')}]`;
    }
    if (node.hasOperations) {
      line += ' *';
    }
    lines.push(line);

    const bound = node.parameter ? [...inherited, node.parameter] : inherited;
    for (const [childSegment, child] of node.children) {
      visit(childSegment, child, depth + 1, bound);
    }
  };

  visit('', root, 0, []);
  return lines.join('\n');
}
