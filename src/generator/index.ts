/**
 * Main client generator module
 *
 * This is the entry point for generating a TypeScript client from a parsed
 * OpenAPI specification. It builds the route tree and hands it to the emitter.
 */

import type { OpenAPISpec, GeneratedFile } from '../types.js';
import { Emitter } from './emitter.js';
import { buildRouteTree, type PathNode } from './route-tree.js';
import { formatAsClassName } from './path-utils.js';
import type { TargetLanguage } from './language.js';

export interface GenerateOptions {
  /** Root namespace; defaults to the document title in PascalCase */
  namespace?: string;
  language?: TargetLanguage;
}

export interface GeneratedClient {
  namespace: string;
  /** Route tree the client was emitted from */
  tree: PathNode;
  /** Files relative to the output directory */
  files: GeneratedFile[];
}

/**
 * Generates a TypeScript client from a parsed specification
 *
 * Generation is pure: nothing is written, and the same document always yields
 * the same files.
 *
 * @param spec - Parsed OpenAPI specification
 * @param options - Namespace and target language
 * @returns The namespace used, the route tree and the generated files
 *
 * @example
 * ```typescript
 * const client = generateClient(parseSpec(raw), { namespace: 'Example' });
 * // client.files[0].path === 'client.ts'
 * ```
 */
export function generateClient(spec: OpenAPISpec, options: GenerateOptions = {}): GeneratedClient {
  const namespace = options.namespace ?? defaultNamespace(spec);
  const tree = buildRouteTree(spec.paths);
  const emitter = new Emitter(spec, { namespace, language: options.language });

  return { namespace, tree, files: emitter.emit(tree) };
}

function defaultNamespace(spec: OpenAPISpec): string {
  return formatAsClassName(spec.info.title) || 'Api';
}

export { buildRouteTree, printRouteTree, PathNode } from './route-tree.js';
export { ReferenceResolver } from './reference-resolver.js';
export type { ResolvedReference, ResolvedValue } from './reference-resolver.js';
export { TypeResolver } from './type-resolver.js';
export type { TypeResolverOptions } from './type-resolver.js';
export { Emitter } from './emitter.js';
export type { EmitterOptions } from './emitter.js';
export { typescript } from './language.js';
export type { TargetLanguage } from './language.js';
export * from './path-utils.js';
