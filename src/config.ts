import { createChunkerError } from './errors.js';

export const DEFAULT_LIMIT = 8000;
export const DEFAULT_EXCLUDED_FILE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.zip', '.exe'];
export const DEFAULT_EXCLUDED_FOLDERS = ['node_modules', 'dist', 'venv'];

export interface ChunkerConfig {
    /** Character budget per output segment */
    readonly limit: number;
    /** Lower-cased, dot-prefixed extensions */
    readonly excludedFileExtensions: ReadonlySet<string>;
    readonly excludedFolders: ReadonlySet<string>;
    readonly excludedFilenames: ReadonlySet<string>;
    /** Prefix the output with a tree listing of the included files */
    readonly includeTree: boolean;
}

export interface ChunkerOptions {
    limit?: number;
    excludedFileExtensions?: Iterable<string>;
    excludedFolders?: Iterable<string>;
    excludedFilenames?: Iterable<string>;
    includeTree?: boolean;
}

export function assertValidLimit(limit: number): void {
    if (!Number.isInteger(limit) || limit <= 0) {
        throw createChunkerError('CHUNKER_INVALID_LIMIT', `Invalid chunk limit: ${limit}`, { limit });
    }
}

/**
 * Normalizes `PNG`, `.Png` and `.png` to `.png`.
 */
export function normalizeExtension(ext: string): string {
    const lowered = ext.trim().toLowerCase();
    return lowered.startsWith('.') ? lowered : `.${lowered}`;
}

function limitFromEnv(env: NodeJS.ProcessEnv): number | undefined {
    const raw = env.CHUNKER_LIMIT?.trim();
    if (!raw) return undefined;
    return Number(raw);
}

/**
 * Layers explicit options over `CHUNKER_LIMIT` from the environment over the defaults,
 * and validates the result.
 */
export function resolveConfig(options: ChunkerOptions = {}, env: NodeJS.ProcessEnv = process.env): ChunkerConfig {
    const limit = options.limit ?? limitFromEnv(env) ?? DEFAULT_LIMIT;
    assertValidLimit(limit);

    const extensions = options.excludedFileExtensions ?? DEFAULT_EXCLUDED_FILE_EXTENSIONS;
    const folders = options.excludedFolders ?? DEFAULT_EXCLUDED_FOLDERS;

    return Object.freeze({
        limit,
        excludedFileExtensions: new Set(Array.from(extensions, normalizeExtension)),
        excludedFolders: new Set(folders),
        excludedFilenames: new Set(options.excludedFilenames ?? []),
        includeTree: options.includeTree ?? false,
    });
}
