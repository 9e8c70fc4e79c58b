import fg from 'fast-glob';
import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import logger from '../logger.js';
import type { ChunkerConfig } from '../config.js';
import { createChunkerError } from '../errors.js';
import { collectFiles } from '../scanner.js';
import { chunkFileName, packSegments, renderSegment } from '../chunker.js';
import { FileSink, type SegmentSink } from '../writer.js';
import type { Segment, SkippedFile, SourceFile } from '../types.js';
import { buildTree, formatTreeHeader, renderTree } from './tree.js';

export interface ChunkRepoOptions {
    sink?: SegmentSink;
    log?: Logger;
}

export interface ChunkRepoResult {
    /** Output names in write order */
    files: string[];
    segmentCount: number;
    skipped: SkippedFile[];
}

function assertReadableDirectory(sourceDir: string) {
    try {
        if (!fs.statSync(sourceDir).isDirectory()) {
            throw new Error('not a directory');
        }
        fs.accessSync(sourceDir, fs.constants.R_OK);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw createChunkerError('CHUNKER_SOURCE_NOT_FOUND', `Source directory ${sourceDir} is not readable: ${reason}`, { sourceDir });
    }
}

function treeSegments(sourceDir: string, relativePaths: string[], config: ChunkerConfig): Segment[] {
    const root = buildTree(relativePaths, path.basename(sourceDir) || sourceDir);
    const listing = { relativePath: '.', content: renderTree(root) };
    return [...packSegments([listing], { limit: config.limit, formatHeader: formatTreeHeader })];
}

function* recordPaths(files: Iterable<SourceFile>, paths: string[]): Generator<SourceFile> {
    for (const file of files) {
        paths.push(file.relativePath);
        yield file;
    }
}

/**
 * Glob patterns that keep an output directory inside the source out of the walk,
 * so earlier chunks are never packed again.
 */
export function outputIgnore(repoPath: string, outputDir: string): string[] {
    const relative = path.relative(repoPath, outputDir);
    if (relative === '') {
        return ['chunk_*_of_*.txt'];
    }
    if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
        return [];
    }
    return [`${fg.escapePath(relative.split(path.sep).join('/'))}/**`];
}

/**
 * Packs the text of `sourceDir` into `chunk_<i>_of_<M>.txt` files. Every check that can
 * fail fast runs before the tree is walked.
 */
export function chunkRepo(sourceDir: string, outputDir: string, config: ChunkerConfig, options: ChunkRepoOptions = {}): ChunkRepoResult {
    const log = (options.log ?? logger).child({ component: 'processor' });
    const repoPath = path.resolve(sourceDir);
    const outputPath = path.resolve(outputDir);
    const sink = options.sink ?? new FileSink(outputPath);

    assertReadableDirectory(repoPath);
    sink.prepare();

    log.info({ repo: repoPath, limit: config.limit, tree: config.includeTree }, 'Packing repository...');

    const skipped: SkippedFile[] = [];
    const included: string[] = [];
    const files = collectFiles(repoPath, config, {
        log: options.log,
        onSkip: s => skipped.push(s),
        ignore: outputIgnore(repoPath, outputPath),
    });

    // Names carry the total, so every segment is materialized before the first write.
    const fileSegments = [...packSegments(recordPaths(files, included), { limit: config.limit })];
    const segments = config.includeTree
        ? [...treeSegments(repoPath, included, config), ...fileSegments]
        : fileSegments;

    const total = segments.length;
    const written = segments.map((segment, i) => {
        const name = chunkFileName(i + 1, total);
        sink.write(name, renderSegment(segment));
        log.debug({ name, size: segment.size }, 'Wrote chunk');
        return name;
    });

    if (skipped.length > 0) {
        log.warn({ count: skipped.length }, 'Some files were skipped');
    }
    log.info({ segmentCount: total, outputDir: outputPath }, `Finished generating ${total} chunk(s)`);

    return { files: written, segmentCount: total, skipped };
}
