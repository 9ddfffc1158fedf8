import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { createCommandLogger, formatEntry, logFullError, setLogPath } from '../logger.js';

const NOW = new Date('2026-01-02T03:04:05.000Z');

describe('formatEntry', () => {
  it('should format a plain message', () => {
    expect(formatEntry('INFO', 'hello', undefined, NOW)).toBe('[2026-01-02T03:04:05.000Z] [INFO] hello\n');
  });

  it('should indent object data', () => {
    expect(formatEntry('DEBUG', 'paths', { root: '/p' }, NOW)).toBe(
      '[2026-01-02T03:04:05.000Z] [DEBUG] paths\n  Data: {\n    "root": "/p"\n  }\n'
    );
  });

  it('should stringify primitive data', () => {
    expect(formatEntry('WARN', 'count', 3, NOW)).toBe('[2026-01-02T03:04:05.000Z] [WARN] count\n  Data: 3\n');
  });
});

describe('createCommandLogger', () => {
  let dir: string;
  let logPath: string;

  beforeEach(async () => {
    dir = path.join(tmpdir(), `solbuild-log-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(dir, { recursive: true });
    logPath = path.join(dir, 'debug.log');
    setLogPath(logPath);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should prefix entries with the command name', async () => {
    const log = createCommandLogger('config');
    log.debug('resolved');
    log.warn('shared prefix');

    const content = await fs.readFile(logPath, 'utf-8');
    expect(content).toContain('solbuild session started');
    expect(content).toMatch(/\[DEBUG\] \[config\] resolved\n/);
    expect(content).toMatch(/\[WARN\] \[config\] shared prefix\n/);
  });

  it('should log full errors with their context', async () => {
    logFullError('resolve', new Error('could not parse remapping: bad'), { kind: 'MalformedRemapping' });

    const content = await fs.readFile(logPath, 'utf-8');
    expect(content).toContain('[ERROR] Error in resolve');
    expect(content).toContain('"kind": "MalformedRemapping"');
    expect(content).toContain('"errorMessage": "could not parse remapping: bad"');
  });
});
