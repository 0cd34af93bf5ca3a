import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLocalExecutionEnvironment } from './local.js';
import type { ExecutionEnvironment } from '../types/environment.js';
import { AgentError, ToolFailure } from '../types/error.js';

async function failureKind(promise: Promise<unknown>): Promise<string> {
  const error = await promise.then(
    () => null,
    (err: unknown) => err,
  );
  expect(error).toBeInstanceOf(ToolFailure);
  return error instanceof ToolFailure ? error.kind : '';
}

describe('LocalExecutionEnvironment', () => {
  let testDir: string;
  let env: ExecutionEnvironment;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'filewright-test-'));
    env = createLocalExecutionEnvironment(testDir);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('readFile', () => {
    it('should return the full text unchanged', async () => {
      await writeFile(join(testDir, 'test.txt'), 'line 1\nline 2\n');

      await expect(env.readFile('test.txt')).resolves.toBe('line 1\nline 2\n');
    });

    it('should fail with NotFound for a missing file', async () => {
      expect(await failureKind(env.readFile('missing.txt'))).toBe('NotFound');
    });

    it('should fail with NotAFile for a directory', async () => {
      await mkdir(join(testDir, 'src'));

      expect(await failureKind(env.readFile('src'))).toBe('NotAFile');
    });

    it('should fail with DecodeError for bytes that are not UTF-8', async () => {
      await writeFile(join(testDir, 'blob.bin'), Buffer.from([0xff, 0xfe, 0xfd]));

      expect(await failureKind(env.readFile('blob.bin'))).toBe('DecodeError');
    });

    it('should fail with PathEscape outside the working directory', async () => {
      expect(await failureKind(env.readFile('../outside.txt'))).toBe('PathEscape');
    });
  });

  describe('writeFile', () => {
    it('should create parent directories', async () => {
      await env.writeFile('a/b/c.txt', 'nested');

      await expect(readFile(join(testDir, 'a', 'b', 'c.txt'), 'utf-8')).resolves.toBe('nested');
    });

    it('should fail with NotAFile when the target is a directory', async () => {
      await mkdir(join(testDir, 'dir'));

      expect(await failureKind(env.writeFile('dir', 'x'))).toBe('NotAFile');
    });
  });

  describe('listDirectory', () => {
    it('should report names and whether each is a directory', async () => {
      await writeFile(join(testDir, 'file.txt'), 'x');
      await mkdir(join(testDir, 'sub'));

      const entries = await env.listDirectory('.');
      const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name));

      expect(sorted).toEqual([
        { name: 'file.txt', isDir: false },
        { name: 'sub', isDir: true },
      ]);
    });

    it('should fail with NotFound for a missing directory', async () => {
      expect(await failureKind(env.listDirectory('nope'))).toBe('NotFound');
    });

    it('should fail with NotADirectory for a file', async () => {
      await writeFile(join(testDir, 'file.txt'), 'x');

      expect(await failureKind(env.listDirectory('file.txt'))).toBe('NotADirectory');
    });
  });

  describe('stat', () => {
    it('should classify entries and return null for missing paths', async () => {
      await writeFile(join(testDir, 'file.txt'), 'x');
      await mkdir(join(testDir, 'sub'));

      await expect(env.stat('file.txt')).resolves.toBe('file');
      await expect(env.stat('sub')).resolves.toBe('directory');
      await expect(env.stat('missing')).resolves.toBeNull();
    });
  });

  describe('resolvePath', () => {
    it('should resolve relative paths against the working directory', () => {
      expect(env.resolvePath('sub/file.txt')).toBe(join(testDir, 'sub', 'file.txt'));
      expect(env.resolvePath('.')).toBe(testDir);
    });

    it('should allow names that merely start with two dots', () => {
      expect(env.resolvePath('..notes')).toBe(join(testDir, '..notes'));
    });

    it('should reject absolute paths outside the working directory', () => {
      expect(() => env.resolvePath('/etc/passwd')).toThrow(ToolFailure);
    });
  });

  describe('initialize', () => {
    it('should accept an existing directory', async () => {
      await expect(env.initialize()).resolves.toBeUndefined();
    });

    it('should reject a missing working directory', async () => {
      const missing = createLocalExecutionEnvironment(join(testDir, 'does-not-exist'));

      await expect(missing.initialize()).rejects.toThrow(AgentError);
    });
  });

  it('should report the resolved working directory', () => {
    expect(env.workingDirectory()).toBe(testDir);
  });
});
