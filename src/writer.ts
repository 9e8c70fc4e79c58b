import fs from 'fs';
import path from 'path';
import { createChunkerError } from './errors.js';

/**
 * Destination for named output texts.
 */
export interface SegmentSink {
    /** Called once before any segment is produced */
    prepare(): void;
    write(name: string, text: string): void;
}

export class FileSink implements SegmentSink {
    constructor(private readonly outputDir: string) {}

    prepare(): void {
        try {
            fs.mkdirSync(this.outputDir, { recursive: true });
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw createChunkerError('CHUNKER_OUTPUT_UNCREATABLE', `Cannot create output directory ${this.outputDir}: ${reason}`, { outputDir: this.outputDir });
        }
    }

    // Files already written stay in place when a later write fails.
    write(name: string, text: string): void {
        const target = path.join(this.outputDir, name);
        try {
            fs.writeFileSync(target, text, 'utf8');
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw createChunkerError('CHUNKER_WRITE_FAILED', `Failed to write ${name}: ${reason}`, { file: target });
        }
    }
}
