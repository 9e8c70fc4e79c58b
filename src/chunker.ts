import { assertValidLimit } from './config.js';
import type { Block, HeaderFormatter, PartInfo, Segment, SourceFile } from './types.js';

export const HEADER_PREFIX = '# here is ';

export const formatHeader: HeaderFormatter = (relativePath, part) => {
  const suffix = part ? ` (part ${part.index}/${part.total})` : '';
  return `${HEADER_PREFIX}${relativePath}${suffix}\n`;
};

export interface PackOptions {
  limit: number;
  formatHeader?: HeaderFormatter;
}

export function blockSize(block: Block): number {
  return block.header.length + block.body.length;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

// Greedy character slicing; never cuts between the halves of a surrogate pair.
function sliceParts(content: string, capacityOf: (index: number) => number): string[] {
  const parts: string[] = [];
  let start = 0;

  while (start < content.length) {
    const capacity = Math.max(1, capacityOf(parts.length + 1));
    let end = Math.min(start + capacity, content.length);
    if (end < content.length && isHighSurrogate(content.charCodeAt(end - 1))) {
      end = end - 1 > start ? end - 1 : end + 1;
    }
    parts.push(content.slice(start, end));
    start = end;
  }

  return parts;
}

/**
 * Turns one file into blocks: a single block when header and content fit in `limit`,
 * otherwise numbered parts each sized to fit alongside its own header.
 */
export function splitFile(file: SourceFile, limit: number, format: HeaderFormatter = formatHeader): Block[] {
  const header = format(file.relativePath);
  // Empty files keep their header even when it alone overflows.
  if (file.content.length === 0 || header.length + file.content.length <= limit) {
    return [{ header, body: file.content }];
  }

  const capacityFor = (total: number) => (index: number) =>
    limit - format(file.relativePath, { index, total }).length;

  // Header width only grows with the total, so the part count converges upward.
  let total = 2;
  let parts = sliceParts(file.content, capacityFor(total));
  while (parts.length > total) {
    total = parts.length;
    parts = sliceParts(file.content, capacityFor(total));
  }

  return parts.map((body, i) => {
    const part: PartInfo = { index: i + 1, total: parts.length };
    return { header: format(file.relativePath, part), body };
  });
}

/**
 * The open segment of one packing pass.
 */
export class SegmentAccumulator {
  private blocks: Block[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  /**
   * Appends the block, or returns the finished segment when the block has to start a new one.
   */
  add(block: Block): Segment | undefined {
    const incoming = blockSize(block);
    if (this.blocks.length === 0 || this.size + incoming <= this.limit) {
      this.blocks.push(block);
      this.size += incoming;
      return undefined;
    }
    const finished = this.flush();
    this.blocks.push(block);
    this.size = incoming;
    return finished;
  }

  flush(): Segment | undefined {
    if (this.blocks.length === 0) return undefined;
    const segment: Segment = Object.freeze({ blocks: Object.freeze(this.blocks), size: this.size });
    this.blocks = [];
    this.size = 0;
    return segment;
  }
}

function* pack(files: Iterable<SourceFile>, limit: number, format: HeaderFormatter): Generator<Segment> {
  const accumulator = new SegmentAccumulator(limit);
  for (const file of files) {
    for (const block of splitFile(file, limit, format)) {
      const finished = accumulator.add(block);
      if (finished) yield finished;
    }
  }
  const last = accumulator.flush();
  if (last) yield last;
}

/**
 * Greedily groups files into segments of at most `limit` characters. The limit is
 * checked here, before any file is pulled from `files`.
 */
export function packSegments(files: Iterable<SourceFile>, options: PackOptions): Generator<Segment> {
  assertValidLimit(options.limit);
  return pack(files, options.limit, options.formatHeader ?? formatHeader);
}

export function renderSegment(segment: Segment): string {
  return segment.blocks.map(block => block.header + block.body).join('');
}

export function chunkFileName(index: number, total: number): string {
  return `chunk_${index}_of_${total}.txt`;
}
