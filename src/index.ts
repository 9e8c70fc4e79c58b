import { listFiles, collectFiles } from './scanner.js';
import { packSegments, splitFile, renderSegment, formatHeader, chunkFileName, SegmentAccumulator } from './chunker.js';

export { buildTree, renderTree } from './index/tree.js';
export { chunkRepo } from './index/processor.js';
export { resolveConfig, DEFAULT_LIMIT, DEFAULT_EXCLUDED_FILE_EXTENSIONS, DEFAULT_EXCLUDED_FOLDERS } from './config.js';
export { ChunkerError, getExitCode } from './errors.js';
export { FileSink } from './writer.js';
export type { SegmentSink } from './writer.js';
export type { ChunkerConfig, ChunkerOptions } from './config.js';
export type { Block, Segment, SourceFile, SkippedFile } from './types.js';
export { listFiles, collectFiles, packSegments, splitFile, renderSegment, formatHeader, chunkFileName, SegmentAccumulator };
