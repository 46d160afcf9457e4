import { mkdir, writeFile, rm } from 'fs/promises';
import { join, dirname } from 'path';
import { existsSync } from 'fs';
import type { GeneratedFile } from './types.js';

export interface WriterOptions {
  clean?: boolean;
  pretty?: boolean;
  verbose?: boolean;
}

/**
 * Writes a generated client to the file system
 * @param outputDir - Output directory
 * @param files - Files relative to the output directory
 * @param options - Writer options
 * @returns Paths of the files written, in order
 */
export async function writeClient(
  outputDir: string,
  files: readonly GeneratedFile[],
  options: WriterOptions = {}
): Promise<string[]> {
  // Clean output directory if requested
  if (options.clean && existsSync(outputDir)) {
    if (options.verbose) {
      console.log(`Cleaning output directory: ${outputDir}`);
    }
    await rm(outputDir, { recursive: true, force: true });
  }

  const written: string[] = [];
  for (const file of files) {
    const filePath = join(outputDir, file.path);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, await formatContents(file.contents, options), 'utf-8');
    written.push(filePath);
    if (options.verbose) {
      console.log(`Generated: ${filePath}`);
    }
  }

  return written;
}

/**
 * Formats generated code with Prettier if requested
 * @param contents - Generated TypeScript source
 * @param options - Writer options
 * @returns Formatted source, or the input unchanged
 */
export async function formatContents(contents: string, options: Pick<WriterOptions, 'pretty'>): Promise<string> {
  if (!options.pretty) {
    return contents;
  }
  const { format } = await import('prettier');
  return format(contents, {
    parser: 'typescript',
    singleQuote: true,
    semi: true,
    trailingComma: 'es5',
    printWidth: 100,
  });
}
