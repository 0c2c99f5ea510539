#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { createConfigFromEnv, IRacingClient, QueryParams, Result } from '../api-clients/iracing';

/**
 * Parses repeated `key=value` options into query parameters
 */
export function collectParam(value: string, previous: QueryParams): QueryParams {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new Error(`Invalid parameter "${value}", expected key=value`);
  }
  return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
}

async function runWithClient<T>(operation: (client: IRacingClient) => Promise<Result<T>>): Promise<void> {
  const client = new IRacingClient(createConfigFromEnv());
  try {
    const result = await operation(client);
    if (result.ok) {
      console.log(JSON.stringify(result.value, null, 2));
    } else {
      console.error(chalk.red(`✗ ${result.error.code}: ${result.error.message}`));
      process.exitCode = 1;
    }
  } finally {
    client.close();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('iracing-data')
    .description('iRacing data API client')
    .version('1.0.0');

  program
    .command('get')
    .description('Authenticated GET against a data endpoint, e.g. /data/member/info')
    .argument('<endpoint>', 'API endpoint path')
    .option('-p, --param <key=value>', 'Query parameter (repeatable)', collectParam, {})
    .action(async (endpoint: string, options: { param: QueryParams }) => {
      await runWithClient(client => client.get(endpoint, options.param));
    });

  program
    .command('chunks')
    .description('Download a bulk dataset from its chunk base URL and file names')
    .argument('<baseUrl>', 'Chunk base download URL')
    .argument('<files...>', 'Chunk file names in order')
    .option('-a, --all', 'Download every chunk instead of only the first', false)
    .action(async (baseUrl: string, files: string[], options: { all: boolean }) => {
      await runWithClient(client =>
        client.downloadChunks(
          { baseDownloadUrl: baseUrl, chunkFileNames: files },
          { allChunks: options.all }
        )
      );
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
      process.exit(1);
    });
}
