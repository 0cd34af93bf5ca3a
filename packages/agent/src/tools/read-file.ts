import type { ToolExecutor, ToolSpec } from '../types/index.js';
import { stringArg } from './args.js';

export const readFileExecutor: ToolExecutor = async (args, env) => {
  return env.readFile(stringArg(args, 'path'));
};

export function createReadFileTool(): ToolSpec {
  return {
    name: 'read_file',
    description:
      'Read the full contents of a text file. Use this to look at a file before you change it. ' +
      'Do not use it on directories.',
    parameters: {
      path: {
        type: 'string',
        description: 'Relative path of the file in the working directory',
        required: true,
      },
    },
    executor: readFileExecutor,
  };
}
