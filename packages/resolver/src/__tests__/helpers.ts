import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';

/**
 * Create a temp project root. Returned path is canonical so it compares
 * equal to what the resolver produces.
 */
export async function createTempDir(): Promise<string> {
  const tempDir = path.join(tmpdir(), `solbuild-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(tempDir, { recursive: true });
  return fs.realpath(tempDir);
}

export async function cleanupTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function makeDirs(root: string, ...dirs: string[]): Promise<void> {
  for (const dir of dirs) {
    await fs.mkdir(path.join(root, dir), { recursive: true });
  }
}

export async function writeFile(root: string, file: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(path.join(root, file)), { recursive: true });
  await fs.writeFile(path.join(root, file), content);
}
