import { Command, InvalidArgumentError } from 'commander';
import path from 'path';
import logger from '../logger.js';
import { resolveConfig, DEFAULT_EXCLUDED_FILE_EXTENSIONS, DEFAULT_EXCLUDED_FOLDERS, type ChunkerConfig } from '../config.js';
import { ChunkerError, getExitCode } from '../errors.js';
import { chunkRepo } from '../index/processor.js';

export interface CliOptions {
  limit?: number;
  excludeExt?: string[];
  excludeFolder?: string[];
  excludeFile?: string[];
  tree?: boolean;
}

export type CliAction = (source: string, output: string, options: CliOptions) => void;

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Splits `a,b` into entries; repeating the flag adds to the list.
 */
export function parseList(value: string, previous: string[] | undefined): string[] {
  const entries = value.split(',').map(entry => entry.trim()).filter(entry => entry.length > 0);
  return [...(previous ?? []), ...entries];
}

export function buildConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): ChunkerConfig {
  return resolveConfig({
    limit: options.limit,
    excludedFileExtensions: options.excludeExt,
    excludedFolders: options.excludeFolder,
    excludedFilenames: options.excludeFile,
    includeTree: options.tree,
  }, env);
}

/**
 * Runs one chunking pass and returns the process exit code.
 */
export function runChunker(source: string, output: string, options: CliOptions, env: NodeJS.ProcessEnv = process.env): number {
  try {
    const result = chunkRepo(source, output, buildConfig(options, env));
    console.log(`✅ Finished generating ${result.segmentCount} chunk(s) in '${path.resolve(output)}'.`);
    return 0;
  } catch (err) {
    if (err instanceof ChunkerError) {
      logger.error({ code: err.code, hint: err.hint, ...err.meta }, err.message);
      return getExitCode(err);
    }
    logger.error({ err }, 'Unexpected failure');
    return 1;
  }
}

export function createProgram(action: CliAction): Command {
  return new Command()
    .name('codebase-chunker')
    .description('Split the text files of a directory into size-bounded chunks for pasting into an LLM')
    .argument('<source>', 'Directory to read')
    .argument('<output>', 'Directory to write chunk_<i>_of_<M>.txt files into')
    .option('-l, --limit <chars>', 'Character budget per chunk (default: CHUNKER_LIMIT or 8000)', parseInteger)
    .option('--exclude-ext <list>', `Comma-separated file extensions to skip (default: ${DEFAULT_EXCLUDED_FILE_EXTENSIONS.join(',')})`, parseList)
    .option('--exclude-folder <list>', `Comma-separated folder names to skip at any depth (default: ${DEFAULT_EXCLUDED_FOLDERS.join(',')})`, parseList)
    .option('--exclude-file <list>', 'Comma-separated exact file names to skip', parseList)
    .option('--tree', 'Start the output with a tree of the included files')
    .action((source: string, output: string, options: CliOptions) => action(source, output, options));
}
