import { mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import type { DirEntry, EntryKind, ExecutionEnvironment } from '../types/environment.js';
import { AgentError, ToolFailure } from '../types/error.js';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Translates filesystem errors into tool failures. Errors without a known
 * errno code are returned unchanged and surface as ToolExecutionError.
 */
function toToolFailure(error: unknown, path: string): unknown {
  if (!isErrnoException(error)) {
    return error;
  }

  switch (error.code) {
    case 'ENOENT':
      return new ToolFailure('NotFound', `No such file or directory: ${path}`, error);
    case 'ENOTDIR':
      return new ToolFailure('NotADirectory', `Not a directory: ${path}`, error);
    case 'EISDIR':
      return new ToolFailure('NotAFile', `Is a directory: ${path}`, error);
    case 'EACCES':
    case 'EPERM':
      return new ToolFailure('PermissionDenied', `Permission denied: ${path}`, error);
    default:
      return error;
  }
}

export function createLocalExecutionEnvironment(workingDir: string): ExecutionEnvironment {
  const root = resolve(workingDir);

  function resolvePathImpl(path: string): string {
    const resolvedPath = resolve(root, path);
    const fromRoot = relative(root, resolvedPath);

    if (fromRoot === '..' || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
      throw new ToolFailure('PathEscape', `Path is outside the working directory: ${path}`);
    }

    return resolvedPath;
  }

  async function statImpl(path: string): Promise<EntryKind | null> {
    const resolvedPath = resolvePathImpl(path);
    try {
      const stats = await stat(resolvedPath);
      if (stats.isFile()) return 'file';
      if (stats.isDirectory()) return 'directory';
      return 'other';
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return null;
      }
      throw toToolFailure(error, path);
    }
  }

  async function readFileImpl(path: string): Promise<string> {
    const resolvedPath = resolvePathImpl(path);

    const kind = await statImpl(path);
    if (kind === null) {
      throw new ToolFailure('NotFound', `No such file: ${path}`);
    }
    if (kind !== 'file') {
      throw new ToolFailure('NotAFile', `Not a file: ${path}`);
    }

    let bytes: Buffer;
    try {
      bytes = await readFile(resolvedPath);
    } catch (error) {
      throw toToolFailure(error, path);
    }

    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (error) {
      throw new ToolFailure(
        'DecodeError',
        `File is not valid UTF-8 text: ${path}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  async function writeFileImpl(path: string, content: string): Promise<void> {
    const resolvedPath = resolvePathImpl(path);
    try {
      await mkdir(dirname(resolvedPath), { recursive: true });
      await writeFile(resolvedPath, content, 'utf-8');
    } catch (error) {
      throw toToolFailure(error, path);
    }
  }

  async function listDirectoryImpl(path: string): Promise<ReadonlyArray<DirEntry>> {
    const resolvedPath = resolvePathImpl(path);

    const kind = await statImpl(path);
    if (kind === null) {
      throw new ToolFailure('NotFound', `No such directory: ${path}`);
    }
    if (kind !== 'directory') {
      throw new ToolFailure('NotADirectory', `Not a directory: ${path}`);
    }

    try {
      const entries = await readdir(resolvedPath, { withFileTypes: true });
      return entries.map((entry) => ({ name: entry.name, isDir: entry.isDirectory() }));
    } catch (error) {
      throw toToolFailure(error, path);
    }
  }

  async function initializeImpl(): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(root)).isDirectory();
    } catch (error) {
      throw new AgentError(
        `Working directory is not accessible: ${root}`,
        error instanceof Error ? error : undefined,
      );
    }
    if (!isDirectory) {
      throw new AgentError(`Working directory is not a directory: ${root}`);
    }
  }

  return {
    readFile: readFileImpl,
    writeFile: writeFileImpl,
    listDirectory: listDirectoryImpl,
    stat: statImpl,
    resolvePath: resolvePathImpl,
    initialize: initializeImpl,
    workingDirectory: () => root,
  };
}
