import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import type { OpenAPISpec } from './types.js';
import { parseSpec } from './parser.js';

/**
 * Loads an OpenAPI document from a URL or local file and parses it
 * @param input - URL or file path
 * @returns Parsed OpenAPI specification
 */
export async function loadSpec(input: string): Promise<OpenAPISpec> {
  return parseSpec(await loadDocument(input));
}

/**
 * Loads the raw JSON of an OpenAPI document
 * @param input - URL or file path
 * @returns Parsed JSON, not yet checked against the model
 */
export async function loadDocument(input: string): Promise<unknown> {
  const content = isUrl(input) ? await fetchSpec(input) : await loadLocalFile(input);

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to parse ${input} as JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  // Basic validation
  if (isSwagger(document)) {
    throw new Error('Swagger 2.0 documents are not supported. Convert the document to OpenAPI 3.0 first.');
  }
  if (!isOpenAPI(document)) {
    throw new Error('Invalid OpenAPI specification. Missing "openapi" field.');
  }

  return document;
}

/**
 * Checks if a string is a URL
 * @param str - String to check
 * @returns True if string is an http(s) URL
 */
export function isUrl(str: string): boolean {
  try {
    const url = new URL(str);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Fetches OpenAPI specification from a URL
 * @param url - URL to fetch from
 * @returns JSON content as string
 */
async function fetchSpec(url: string): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    throw new Error(`Failed to fetch OpenAPI spec from ${url}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!response.ok) {
    throw new Error(`Failed to fetch ${url}: ${response.status} ${response.statusText}`);
  }
  return response.text();
}

/**
 * Loads OpenAPI specification from a local file
 * @param filePath - Path to the file
 * @returns File content as string
 */
async function loadLocalFile(filePath: string): Promise<string> {
  if (!existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`Failed to read file ${filePath}: ${String(error)}`);
  }
}

/**
 * Checks if a document declares an OpenAPI version
 * @param document - Parsed JSON
 * @returns True if the document has a string `openapi` field
 */
export function isOpenAPI(document: unknown): document is { openapi: string } {
  return typeof document === 'object' && document !== null && 'openapi' in document && typeof document.openapi === 'string';
}

/**
 * Checks if a document is Swagger 2.0
 * @param document - Parsed JSON
 * @returns True if the document has a `swagger` field
 */
export function isSwagger(document: unknown): document is { swagger: string } {
  return typeof document === 'object' && document !== null && 'swagger' in document && typeof document.swagger === 'string';
}
