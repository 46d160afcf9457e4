/**
 * openapi-client-gen
 *
 * Generates a typed TypeScript client from OpenAPI 3.0 specifications
 */

export * from './types.js';
export * from './errors.js';
export * from './loader.js';
export * from './parser.js';
export * from './generator/index.js';
export * from './template/index.js';
export * from './writer.js';
export * from './config.js';
