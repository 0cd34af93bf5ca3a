export type DirEntry = {
  readonly name: string;
  readonly isDir: boolean;
};

export type EntryKind = 'file' | 'directory' | 'other';

/**
 * Filesystem primitives the built-in tools run against. Paths are relative
 * to workingDirectory(); failures are thrown as ToolFailure.
 */
export type ExecutionEnvironment = {
  readonly readFile: (path: string) => Promise<string>;
  readonly writeFile: (path: string, content: string) => Promise<void>;
  readonly listDirectory: (path: string) => Promise<ReadonlyArray<DirEntry>>;
  /** Kind of the entry at `path`, or null when nothing is there. */
  readonly stat: (path: string) => Promise<EntryKind | null>;
  readonly resolvePath: (path: string) => string;
  readonly initialize: () => Promise<void>;
  readonly workingDirectory: () => string;
};
