/**
 * Reference resolution
 *
 * Resolves `#/components/<section>/<key>` pointers against the components table
 * of a parsed specification.
 */

import type { OpenAPISpec, ComponentSection, ComponentTypes, Referenceable } from '../types.js';
import { COMPONENT_SECTIONS } from '../types.js';
import { GeneratorError, GeneratorErrorKind } from '../errors.js';
import { formatAsClassName, unescapePointer } from './path-utils.js';

/**
 * Result of one resolution step
 */
export interface ResolvedReference<T> {
  /** Type name inferred from the pointer, or the caller's context name */
  name?: string;
  /** The entry found, which may itself be another reference */
  value: Referenceable<T>;
}

/**
 * Result of following a reference chain to an inline value
 */
export interface ResolvedValue<T> {
  name?: string;
  value: T;
}

const POINTER_PREFIX = '#/components/';

export class ReferenceResolver {
  constructor(private readonly spec: OpenAPISpec) {}

  /**
   * Resolves a reference exactly one hop
   *
   * Inline values are returned unchanged together with `contextName`.
   *
   * @param section - Components section the value must come from
   * @param input - Inline value or reference
   * @param contextName - Name to report when the input is inline
   * @returns The inferred name and the entry found
   * @throws GeneratorError (UnresolvableReference) for an unknown section or missing key
   */
  resolve<S extends ComponentSection>(
    section: S,
    input: Referenceable<ComponentTypes[S]>,
    contextName?: string
  ): ResolvedReference<ComponentTypes[S]> {
    if (input.kind === 'value') {
      return { name: contextName, value: input };
    }

    const { pointer } = input;
    if (!pointer.startsWith(POINTER_PREFIX)) {
      throw unresolvable(`Only local component references are supported`, pointer);
    }

    const segments = pointer.slice(POINTER_PREFIX.length).split('/');
    const [pointerSection, rawKey] = segments;
    if (segments.length !== 2 || !rawKey) {
      throw unresolvable(`Expected '${POINTER_PREFIX}<section>/<key>'`, pointer);
    }
    if (!isComponentSection(pointerSection)) {
      throw unresolvable(`Unknown components section '${pointerSection ?? ''}'`, pointer);
    }
    if (pointerSection !== section) {
      throw unresolvable(`Expected a reference to '${section}' but found '${pointerSection}'`, pointer);
    }

    const key = unescapePointer(rawKey);
    const table: Readonly<Record<string, Referenceable<ComponentTypes[S]>>> = this.spec.components[section];
    if (!Object.prototype.hasOwnProperty.call(table, key)) {
      throw unresolvable(`No entry '${key}' in components.${section}`, pointer);
    }

    return { name: formatAsClassName(key), value: table[key] };
  }

  /**
   * Follows references until an inline value is reached
   *
   * The name of the first hop wins, so an alias schema keeps its own name.
   *
   * @throws GeneratorError (UnresolvableReference) on an unresolvable or circular chain
   */
  resolveChain<S extends ComponentSection>(
    section: S,
    input: Referenceable<ComponentTypes[S]>,
    contextName?: string
  ): ResolvedValue<ComponentTypes[S]> {
    let current = this.resolve(section, input, contextName);
    const name = current.name;
    const visited = new Set<string>();

    for (;;) {
      const next = current.value;
      if (next.kind === 'value') {
        return { name, value: next.value };
      }
      if (visited.has(next.pointer)) {
        throw unresolvable('Circular reference chain', next.pointer);
      }
      visited.add(next.pointer);
      current = this.resolve(section, next);
    }
  }
}

function isComponentSection(value: string | undefined): value is ComponentSection {
  return COMPONENT_SECTIONS.some((section) => section === value);
}

function unresolvable(message: string, pointer: string): GeneratorError {
  return new GeneratorError(GeneratorErrorKind.UNRESOLVABLE_REFERENCE, message, pointer);
}
