import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadSpec, loadDocument, isUrl } from './loader.js';

describe('loader', () => {
  let dir: string;

  const write = (name: string, contents: unknown): string => {
    const path = join(dir, name);
    writeFileSync(path, typeof contents === 'string' ? contents : JSON.stringify(contents));
    return path;
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'openapi-client-gen-loader-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load and parse a local document', async () => {
    const path = write('api.json', { openapi: '3.0.1', info: { title: 'Local', version: '1.0.0' }, paths: {} });

    const spec = await loadSpec(path);

    expect(spec.info.title).toBe('Local');
    expect(spec.openapi).toBe('3.0.1');
  });

  it('should reject Swagger 2.0 documents', async () => {
    const path = write('swagger.json', { swagger: '2.0', info: { title: 'Old', version: '1' }, paths: {} });

    await expect(loadDocument(path)).rejects.toThrow(
      'Swagger 2.0 documents are not supported. Convert the document to OpenAPI 3.0 first.'
    );
  });

  it('should reject documents without an openapi field', async () => {
    const path = write('other.json', { info: {} });

    await expect(loadDocument(path)).rejects.toThrow('Invalid OpenAPI specification. Missing "openapi" field.');
  });

  it('should reject invalid JSON', async () => {
    const path = write('broken.json', '{ "openapi": ');

    await expect(loadDocument(path)).rejects.toThrow(`Failed to parse ${path} as JSON`);
  });

  it('should report missing files', async () => {
    const path = join(dir, 'missing.json');

    await expect(loadDocument(path)).rejects.toThrow(`File not found: ${path}`);
  });

  it('should only treat http and https as URLs', () => {
    expect(isUrl('https://api.example.test/openapi.json')).toBe(true);
    expect(isUrl('http://localhost:8080/spec')).toBe(true);
    expect(isUrl('./openapi.json')).toBe(false);
    expect(isUrl('C:/specs/openapi.json')).toBe(false);
  });
});
