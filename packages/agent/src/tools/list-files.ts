import type { ToolExecutor, ToolSpec } from '../types/index.js';
import { optionalStringArg } from './args.js';

/** Entry names sorted by code point; directories end in `/`. */
export const listFilesExecutor: ToolExecutor = async (args, env) => {
  const entries = await env.listDirectory(optionalStringArg(args, 'path', '.'));

  return entries
    .map((entry) => (entry.isDir ? `${entry.name}/` : entry.name))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
};

export function createListFilesTool(): ToolSpec {
  return {
    name: 'list_files',
    description:
      'List the files and directories at a path. Directory names end with a slash. ' +
      'Without a path, lists the working directory.',
    parameters: {
      path: {
        type: 'string',
        description: 'Relative path of the directory to list (defaults to the working directory)',
      },
    },
    executor: listFilesExecutor,
  };
}
