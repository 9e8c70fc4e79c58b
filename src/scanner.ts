import fg from 'fast-glob';
import fs from 'fs';
import path from 'path';
import { TextDecoder } from 'util';
import type { Logger } from 'pino';
import type { ChunkerConfig } from './config.js';
import type { SkippedFile, SourceFile } from './types.js';
import logger from './logger.js';

type ScanConfig = Pick<ChunkerConfig, 'excludedFileExtensions' | 'excludedFolders' | 'excludedFilenames'>;

export interface ScanOptions {
  log?: Logger;
  onSkip?: (skipped: SkippedFile) => void;
  /** Extra fast-glob ignore patterns, relative to the root */
  ignore?: string[];
}

const byPath = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

function isWithin(relativePath: string, directories: string[]): boolean {
  return directories.some(dir => relativePath.startsWith(`${dir}/`));
}

function isUnderExcludedFolder(relativePath: string, config: ScanConfig): boolean {
  return relativePath.split('/').some(segment => config.excludedFolders.has(segment));
}

function isExcludedFile(relativePath: string, config: ScanConfig): boolean {
  const fileName = path.posix.basename(relativePath);
  if (config.excludedFilenames.has(fileName)) {
    return true;
  }
  return config.excludedFileExtensions.has(path.posix.extname(fileName).toLowerCase());
}

/**
 * Lists the included files under `root` as sorted, `/`-separated relative paths.
 * Excluded folder names prune the walk at any depth. Symbolic links are not followed,
 * and directories that cannot be listed are reported and left out.
 */
export function listFiles(root: string, config: ScanConfig, options: ScanOptions = {}): string[] {
  const log = (options.log ?? logger).child({ component: 'collector' });
  const entries = fg.sync('**/*', {
    cwd: root,
    dot: true,
    onlyFiles: false,
    objectMode: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore: [
      ...Array.from(config.excludedFolders, folder => `**/${fg.escapePath(folder)}/**`),
      ...(options.ignore ?? []),
    ],
  });

  const directories = entries
    .filter(entry => entry.dirent.isDirectory() && !isUnderExcludedFolder(entry.path, config))
    .map(entry => entry.path)
    .sort(byPath);

  const unreadable: string[] = [];
  for (const dir of directories) {
    if (isWithin(dir, unreadable)) continue;
    try {
      fs.accessSync(path.join(root, dir), fs.constants.R_OK | fs.constants.X_OK);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn({ path: dir, reason }, 'Skipping directory that could not be read');
      options.onSkip?.({ relativePath: dir, kind: 'directory', reason });
      unreadable.push(dir);
    }
  }

  return entries
    .filter(entry => entry.dirent.isFile())
    .map(entry => entry.path)
    .filter(file => !isExcludedFile(file, config) && !isWithin(file, unreadable))
    .sort(byPath);
}

/**
 * Yields the text of every included file in `listFiles` order. Files that cannot be
 * read or are not valid UTF-8 are reported and skipped.
 */
export function* collectFiles(root: string, config: ScanConfig, options: ScanOptions = {}): Generator<SourceFile> {
  const log = (options.log ?? logger).child({ component: 'collector' });
  const decoder = new TextDecoder('utf-8', { fatal: true });

  for (const relativePath of listFiles(root, config, options)) {
    let content: string;
    try {
      content = decoder.decode(fs.readFileSync(path.join(root, relativePath)));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn({ path: relativePath, reason }, 'Skipping file that could not be read as text');
      options.onSkip?.({ relativePath, kind: 'file', reason });
      continue;
    }
    yield { relativePath, content };
  }
}
