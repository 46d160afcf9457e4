#!/usr/bin/env node

import { Command } from 'commander';
import { loadSpec } from './loader.js';
import { generateClient, printRouteTree } from './generator/index.js';
import { writeClient } from './writer.js';
import { mergeConfig, validateConfig, DEFAULT_CONFIG_FILE } from './config.js';
import type { Config } from './types.js';

/**
 * Main CLI entry point for openapi-client-gen
 *
 * This tool:
 * 1. Loads an OpenAPI 3.0 document from URL or file
 * 2. Parses it into the specification model
 * 3. Generates the client namespaces and schema types
 * 4. Writes the client to the output directory
 */
async function main(): Promise<void> {
  const program = new Command();

  program
    .name('openapi-client-gen')
    .description('Generate a typed TypeScript client from an OpenAPI 3.0 specification')
    .version('1.0.0')
    .option('-i, --input <url-or-path>', 'URL or path to OpenAPI JSON')
    .option('-o, --output <directory>', 'Output directory for the generated client')
    .option('-c, --config <path>', `Path to config file (default: ${DEFAULT_CONFIG_FILE})`)
    .option('-n, --namespace <name>', 'Root namespace of the generated client (default: document title)')
    .option('--clean', 'Clean output directory before generation')
    .option('--pretty', 'Format generated code with Prettier')
    .option('--verbose', 'Log verbose debug information')
    .option('--tree', 'Print the route tree before writing')
    .parse(process.argv);

  const options = program.opts<Config & { config?: string }>();

  try {
    // Merge CLI options with config file
    const config = validateConfig(
      mergeConfig(
        {
          input: options.input,
          output: options.output,
          namespace: options.namespace,
          clean: options.clean,
          pretty: options.pretty,
          verbose: options.verbose,
          tree: options.tree,
        },
        options.config
      )
    );

    if (config.verbose) {
      console.log('Configuration:', JSON.stringify(config, null, 2));
      console.log(`Loading specification from: ${config.input}`);
    }
    const spec = await loadSpec(config.input);

    if (config.verbose) {
      console.log(`Specification version: ${spec.openapi}`);
      console.log(`Found ${Object.keys(spec.components.schemas).length} schemas`);
      console.log(`Found ${Object.keys(spec.paths).length} paths`);
    }
    const client = generateClient(spec, { namespace: config.namespace });

    if (config.tree) {
      console.log(printRouteTree(client.tree));
    }
    if (config.verbose) {
      console.log(`Generated namespace ${client.namespace} with ${client.files.length} files`);
      console.log(`Writing client to: ${config.output}`);
    }
    await writeClient(config.output, client.files, {
      clean: config.clean,
      pretty: config.pretty,
      verbose: config.verbose,
    });

    console.log(`Successfully generated ${client.namespace} client in ${config.output}`);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    if (options.verbose && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

// Run CLI
main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
