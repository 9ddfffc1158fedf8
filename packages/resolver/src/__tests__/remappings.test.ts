import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  parseRemapping,
  formatRemapping,
  dedupeRemappings,
  parseRemappingLines,
  readRemappingsFile,
  aggregateRemappings,
} from '../remappings.js';
import { ResolutionError } from '../errors.js';
import type { Remapping, RemappingDiscovery } from '../schema.js';
import { createTempDir, cleanupTempDir, makeDirs, writeFile } from './helpers.js';

const noDiscovery: RemappingDiscovery = { discover: () => [] };

function catchError(fn: () => unknown): ResolutionError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ResolutionError) return error;
    throw error;
  }
  throw new Error('expected a ResolutionError');
}

describe('parseRemapping', () => {
  it('should split on the first equals sign', () => {
    expect(parseRemapping('ds-test/=lib/ds-test/src/')).toEqual({
      prefix: 'ds-test/',
      target: 'lib/ds-test/src/',
    });
    expect(parseRemapping('a=b=c')).toEqual({ prefix: 'a', target: 'b=c' });
  });

  it('should reject entries without a separator', () => {
    const error = catchError(() => parseRemapping('ds-test/'));

    expect(error.kind).toBe('MalformedRemapping');
    expect(error.message).toBe('could not parse remapping: ds-test/');
    expect(error.input).toBe('ds-test/');
  });

  it('should reject an empty prefix or target', () => {
    expect(catchError(() => parseRemapping('=lib/x/')).kind).toBe('MalformedRemapping');
    expect(catchError(() => parseRemapping('x/=')).kind).toBe('MalformedRemapping');
    expect(catchError(() => parseRemapping('  =lib/x/')).kind).toBe('MalformedRemapping');
  });

  it('should format back to prefix=target', () => {
    expect(formatRemapping({ prefix: 'solmate/', target: 'lib/solmate/src/' })).toBe(
      'solmate/=lib/solmate/src/'
    );
  });
});

describe('dedupeRemappings', () => {
  it('should keep each distinct pair exactly once, sorted', () => {
    const input: Remapping[] = [
      { prefix: 'forge-std/', target: 'lib/forge-std/src/' },
      { prefix: 'ds-test/', target: 'lib/ds-test/src/' },
      { prefix: 'forge-std/', target: 'lib/forge-std/src/' },
      { prefix: 'ds-test/', target: 'lib/ds-test/src/' },
    ];

    expect(dedupeRemappings(input)).toEqual([
      { prefix: 'ds-test/', target: 'lib/ds-test/src/' },
      { prefix: 'forge-std/', target: 'lib/forge-std/src/' },
    ]);
  });

  it('should keep pairs that share a prefix but differ in target', () => {
    const input: Remapping[] = [
      { prefix: 'oz/', target: 'node_modules/oz/' },
      { prefix: 'oz/', target: 'lib/oz/src/' },
    ];

    expect(dedupeRemappings(input)).toEqual([
      { prefix: 'oz/', target: 'lib/oz/src/' },
      { prefix: 'oz/', target: 'node_modules/oz/' },
    ]);
  });

  it('should not modify the input', () => {
    const input: Remapping[] = [
      { prefix: 'b/', target: 'lib/b/' },
      { prefix: 'a/', target: 'lib/a/' },
    ];
    dedupeRemappings(input);

    expect(input[0].prefix).toBe('b/');
  });
});

describe('parseRemappingLines', () => {
  it('should skip empty lines and strip carriage returns', () => {
    const text = 'a/=lib/a/\r\n\r\n\nb/=lib/b/\n';

    expect(parseRemappingLines(text, 'remappings.txt')).toEqual([
      { prefix: 'a/', target: 'lib/a/' },
      { prefix: 'b/', target: 'lib/b/' },
    ]);
  });

  it('should name the offending line and its source', () => {
    const error = catchError(() => parseRemappingLines('a/=lib/a/\nbroken', 'environment'));

    expect(error.kind).toBe('MalformedRemapping');
    expect(error.input).toBe('broken');
    expect(error.message).toBe('could not parse remapping: broken (from environment)');
  });
});

describe('remappings.txt', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(root);
  });

  it('should contribute nothing when the file is missing', () => {
    expect(readRemappingsFile(root)).toEqual([]);
  });

  it('should contribute nothing when remappings.txt is a directory', async () => {
    await makeDirs(root, 'remappings.txt');

    expect(readRemappingsFile(root)).toEqual([]);
  });

  it('should parse an existing file', async () => {
    await writeFile(root, 'remappings.txt', 'solmate/=lib/solmate/src/\n');

    expect(readRemappingsFile(root)).toEqual([{ prefix: 'solmate/', target: 'lib/solmate/src/' }]);
  });

  it('should fail on a malformed line in an existing file', async () => {
    await writeFile(root, 'remappings.txt', 'solmate/=lib/solmate/src/\nnot a remapping\n');
    const error = catchError(() => readRemappingsFile(root));

    expect(error.kind).toBe('MalformedRemapping');
    expect(error.input).toBe('not a remapping');
  });
});

describe('aggregateRemappings', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(root);
  });

  it('should combine all four sources into one sorted list', async () => {
    await writeFile(root, 'remappings.txt', 'd/=file/d/\n');
    const discovery: RemappingDiscovery = {
      discover: (lib) => [{ prefix: 'c/', target: `${lib}/c/` }],
    };

    const result = aggregateRemappings(
      {
        root,
        libraryPaths: ['lib'],
        remappings: [{ prefix: 'b/', target: 'explicit/b/' }],
        remappingsEnv: 'a/=env/a/',
      },
      discovery
    );

    expect(result).toEqual([
      { prefix: 'a/', target: 'env/a/' },
      { prefix: 'b/', target: 'explicit/b/' },
      { prefix: 'c/', target: 'lib/c/' },
      { prefix: 'd/', target: 'file/d/' },
    ]);
  });

  it('should call discovery once per library path', () => {
    const seen: string[] = [];
    const discovery: RemappingDiscovery = {
      discover: (lib) => {
        seen.push(lib);
        return [];
      },
    };

    aggregateRemappings({ root, libraryPaths: ['lib', 'node_modules'] }, discovery);

    expect(seen).toEqual(['lib', 'node_modules']);
  });

  it('should collapse duplicates coming from different sources', async () => {
    await writeFile(root, 'remappings.txt', 'x/=lib/x/\n');

    const result = aggregateRemappings(
      {
        root,
        libraryPaths: [],
        remappings: [{ prefix: 'x/', target: 'lib/x/' }],
        remappingsEnv: 'x/=lib/x/\nx/=lib/x/',
      },
      noDiscovery
    );

    expect(result).toEqual([{ prefix: 'x/', target: 'lib/x/' }]);
  });

  it('should warn about shared prefixes without dropping either', () => {
    const warnings: string[] = [];
    const logger = {
      debug: () => {},
      info: () => {},
      warn: (message: string) => warnings.push(message),
    };

    const result = aggregateRemappings(
      { root, libraryPaths: [], remappingsEnv: 'x/=one/\nx/=two/\nx/=three/' },
      noDiscovery,
      logger
    );

    expect(result).toHaveLength(3);
    expect(warnings).toEqual(['Multiple remappings for prefix "x/"']);
  });

  it('should fail on a malformed environment line', () => {
    const error = catchError(() =>
      aggregateRemappings({ root, libraryPaths: [], remappingsEnv: 'nope' }, noDiscovery)
    );

    expect(error.kind).toBe('MalformedRemapping');
    expect(error.input).toBe('nope');
  });
});
