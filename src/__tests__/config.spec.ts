import { describe, it, expect } from 'vitest';
import { resolveConfig, normalizeExtension, DEFAULT_LIMIT } from '../config.js';
import { ChunkerError, createChunkerError, getExitCode } from '../errors.js';

describe('resolveConfig', () => {
  it('should fall back to the defaults', () => {
    const config = resolveConfig({}, {});
    expect(config.limit).toBe(DEFAULT_LIMIT);
    expect([...config.excludedFileExtensions]).toEqual(['.png', '.jpg', '.jpeg', '.gif', '.zip', '.exe']);
    expect([...config.excludedFolders]).toEqual(['node_modules', 'dist', 'venv']);
    expect(config.excludedFilenames.size).toBe(0);
    expect(config.includeTree).toBe(false);
  });

  it('should read the limit from the environment', () => {
    expect(resolveConfig({}, { CHUNKER_LIMIT: '1200' }).limit).toBe(1200);
  });

  it('should prefer an explicit limit over the environment', () => {
    expect(resolveConfig({ limit: 50 }, { CHUNKER_LIMIT: '1200' }).limit).toBe(50);
  });

  it('should replace the default lists when given', () => {
    const config = resolveConfig({ excludedFolders: ['.git'], excludedFileExtensions: ['LOG'] }, {});
    expect([...config.excludedFolders]).toEqual(['.git']);
    expect([...config.excludedFileExtensions]).toEqual(['.log']);
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(resolveConfig({}, {}))).toBe(true);
  });

  it('should reject a limit that is not a positive integer', () => {
    expect(() => resolveConfig({ limit: 0 }, {})).toThrow(ChunkerError);
    expect(() => resolveConfig({}, { CHUNKER_LIMIT: 'lots' })).toThrow('Invalid chunk limit: NaN');

    let caught: unknown;
    try {
      resolveConfig({ limit: -1 }, {});
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ code: 'CHUNKER_INVALID_LIMIT', meta: { limit: -1 } });
  });
});

describe('normalizeExtension', () => {
  it('should lower-case and add the dot', () => {
    expect(normalizeExtension('PNG')).toBe('.png');
    expect(normalizeExtension('.Jpeg')).toBe('.jpeg');
  });
});

describe('Error exit codes', () => {
  it('should map configuration problems to 2 and write failures to 1', () => {
    expect(getExitCode(createChunkerError('CHUNKER_INVALID_LIMIT', 'bad'))).toBe(2);
    expect(getExitCode(createChunkerError('CHUNKER_SOURCE_NOT_FOUND', 'missing'))).toBe(2);
    expect(getExitCode(createChunkerError('CHUNKER_OUTPUT_UNCREATABLE', 'no dir'))).toBe(2);
    expect(getExitCode(createChunkerError('CHUNKER_WRITE_FAILED', 'disk full'))).toBe(1);
  });

  it('should attach the standard hint', () => {
    const err = createChunkerError('CHUNKER_WRITE_FAILED', 'disk full', { file: 'chunk_1_of_1.txt' });
    expect(err.hint).toBe('Output may be incomplete - check disk space and permissions');
    expect(err.meta).toEqual({ file: 'chunk_1_of_1.txt' });
    expect(err.name).toBe('ChunkerError');
  });
});
