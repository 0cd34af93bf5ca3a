import type { ToolExecutor, ToolSpec } from '../types/index.js';
import { ToolFailure } from '../types/index.js';
import { stringArg } from './args.js';

/**
 * Replaces the first literal occurrence of `old_str` with `new_str`.
 *
 * A missing file is created with `new_str` as its content. An empty
 * `old_str` only applies to an empty file; on a non-empty file it is
 * rejected as AmbiguousEdit.
 */
export const editFileExecutor: ToolExecutor = async (args, env) => {
  const path = stringArg(args, 'path');
  const oldString = stringArg(args, 'old_str');
  const newString = stringArg(args, 'new_str');

  const kind = await env.stat(path);
  if (kind === null) {
    await env.writeFile(path, newString);
    return { path, action: 'created' };
  }
  if (kind !== 'file') {
    throw new ToolFailure('NotAFile', `Not a file: ${path}`);
  }

  const content = await env.readFile(path);

  if (oldString === '') {
    if (content !== '') {
      throw new ToolFailure(
        'AmbiguousEdit',
        `old_str is empty but ${path} is not; quote the text to replace, or an anchor to insert at`,
      );
    }
    await env.writeFile(path, newString);
    return { path, action: 'edited' };
  }

  const index = content.indexOf(oldString);
  if (index === -1) {
    throw new ToolFailure('OldStringNotFound', `old_str not found in ${path}`);
  }

  const updated = content.slice(0, index) + newString + content.slice(index + oldString.length);
  await env.writeFile(path, updated);
  return { path, action: 'edited' };
};

export function createEditFileTool(): ToolSpec {
  return {
    name: 'edit_file',
    description:
      'Edit a text file by replacing the first occurrence of old_str with new_str. ' +
      'old_str must match the file exactly. If the file does not exist it is created with new_str as its content.',
    parameters: {
      path: {
        type: 'string',
        description: 'Relative path of the file to edit or create',
        required: true,
      },
      old_str: {
        type: 'string',
        description: 'Exact text to replace; empty when creating a file',
        required: true,
      },
      new_str: {
        type: 'string',
        description: 'Replacement text',
        required: true,
      },
    },
    executor: editFileExecutor,
  };
}
