/**
 * Templates of the generated TypeScript client
 */

import { Template } from '../template/index.js';

/**
 * Escapes text for a single-line doc comment
 */
function docLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim().replace(/\*\//g, '*\\/');
}

/**
 * Escapes text for a multi-line doc comment whose lines start with ` * `
 */
function docBlock(text: string): string {
  return text.trim().replace(/\*\//g, '*\\/').split('\n').join('\n * ');
}

/**
 * Joins multi-line items, indenting every line after the first
 */
function joinIndented(items: readonly string[], indent: number, separator: string = '\n'): string {
  return items.join(separator).split('\n').join(`\n${' '.repeat(indent)}`).replace(/[ ]+\n/g, '\n');
}

export type SchemaArgs = {
  namespace: string;
  name: string;
  hasImports: boolean;
  imports: readonly string[];
  hasDescription: boolean;
  description?: string;
  properties: readonly string[];
};

export const schemaTemplate = new Template<SchemaArgs>(
  [
    '// %namespace%.schemas.%name% (generated, do not edit)',
    '%~hasImports -> "%imports%\\n"~%',
    '%~hasDescription -> "/**\\n * %description%\\n */"~%',
    'export interface %name% {',
    '  %properties%',
    '}',
    '',
  ].join('\n'),
  {
    variables: {
      imports: { type: 'list', format: (lines) => lines.join('\n') },
      description: { optional: true, format: docBlock },
      properties: { type: 'list', format: (lines) => joinIndented(lines, 2) },
    },
  }
);

export type PropertyArgs = {
  hasDescription: boolean;
  description?: string;
  key: string;
  optional: boolean;
  type: string;
};

export const propertyTemplate = new Template<PropertyArgs>(
  ['%~hasDescription -> "/** %description% */"~%', '%key%%optional -> "?"%: %type%;'].join('\n'),
  { variables: { description: { optional: true, format: docLine } } }
);

export type FunctionArgs = {
  hasSummary: boolean;
  summary?: string;
  httpMethod: string;
  path: string;
  deprecated: boolean;
  name: string;
  parameters: readonly string[];
  returnType: string;
  url: string;
  hasOptions: boolean;
  options?: string;
};

export const functionTemplate = new Template<FunctionArgs>(
  [
    '/**',
    ' * %~hasSummary -> "%summary%"~%',
    ' * `%httpMethod% %path%`',
    ' * %~deprecated -> "@deprecated"~%',
    ' */',
    'export async function %name%(%parameters%): Promise<%returnType%> {',
    "  return request<%returnType%>('%httpMethod%', `%url%`%hasOptions -> \", %options%\"%);",
    '}',
  ].join('\n'),
  {
    variables: {
      summary: { optional: true, format: docLine },
      parameters: { type: 'list' },
      options: { optional: true },
    },
  }
);

export type NamespaceArgs = {
  hasUrl: boolean;
  url?: string;
  name: string;
  isEndpoint: boolean;
  functions: readonly string[];
  space: boolean;
  hasChildren: boolean;
  children: readonly string[];
};

export const namespaceTemplate = new Template<NamespaceArgs>(
  [
    '%~hasUrl -> "/**\\n * Endpoint: `%url%`\\n */"~%',
    'export namespace %name% {',
    '  %~isEndpoint -> "%functions%"~%',
    '%~space -> ""~%',
    '  %~hasChildren -> "%children%"~%',
    '}',
  ].join('\n'),
  {
    variables: {
      url: { optional: true },
      functions: { type: 'list', format: (items) => items.join('\n\n') },
      children: { type: 'list', format: (items) => items.join('\n\n') },
    },
  }
);

export type ClientArgs = {
  title: string;
  version: string;
  hasImports: boolean;
  imports: readonly string[];
  hasDescription: boolean;
  description?: string;
  namespace: string;
  hasServers: boolean;
  servers: readonly string[];
  hasEndpoints: boolean;
  endpoints: readonly string[];
};

export const clientTemplate = new Template<ClientArgs>(
  [
    '// %title% v%version% client (generated, do not edit)',
    '%~hasImports -> "%imports%\\n"~%',
    '/**',
    ' * %title% [v%version%]',
    '%~hasDescription -> " *\\n * %description%"~%',
    ' */',
    'export namespace %namespace% {',
    '  /** Servers declared by the specification */',
    '  export const servers: readonly string[] = [',
    '    %~hasServers -> "%servers%"~%',
    '  ];',
    '',
    '  /** Settings applied to every request */',
    '  export const options: { baseUrl: string; headers: Record<string, string> } = {',
    "    baseUrl: servers[0] ?? '',",
    '    headers: {},',
    '  };',
    '',
    '  async function request<T>(',
    '    method: string,',
    '    path: string,',
    '    init: { query?: Record<string, unknown>; headers?: Record<string, unknown>; body?: unknown } = {}',
    '  ): Promise<T | undefined> {',
    '    const url = new URL(options.baseUrl + path);',
    '    for (const [key, value] of Object.entries(init.query ?? {})) {',
    '      if (value !== undefined && value !== null) {',
    "        url.searchParams.set(key, Array.isArray(value) ? value.join(',') : String(value));",
    '      }',
    '    }',
    "    const headers: Record<string, string> = { accept: 'application/json', ...options.headers };",
    '    for (const [key, value] of Object.entries(init.headers ?? {})) {',
    '      if (value !== undefined && value !== null) {',
    '        headers[key] = String(value);',
    '      }',
    '    }',
    '    if (init.body !== undefined) {',
    "      headers['content-type'] = 'application/json';",
    '    }',
    '    const response = await fetch(url, {',
    '      method,',
    '      headers,',
    '      body: init.body === undefined ? undefined : JSON.stringify(init.body),',
    '    });',
    '    if (!response.ok) {',
    '      throw new Error(`${method} ${path} failed with status ${response.status}`);',
    '    }',
    '    const text = await response.text();',
    '    return text.length > 0 ? (JSON.parse(text) as T) : undefined;',
    '  }',
    '%~hasEndpoints -> ""~%',
    '  %~hasEndpoints -> "%endpoints%"~%',
    '}',
    '',
  ].join('\n'),
  {
    variables: {
      imports: { type: 'list', format: (lines) => lines.join('\n') },
      description: { optional: true, format: docBlock },
      servers: { type: 'list', format: (lines) => lines.join('\n') },
      endpoints: { type: 'list', format: (items) => items.join('\n\n') },
    },
  }
);
