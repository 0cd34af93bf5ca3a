import type { ToolSpec } from '../types/index.js';
import { createReadFileTool } from './read-file.js';
import { createListFilesTool } from './list-files.js';
import { createEditFileTool } from './edit-file.js';

export function createBuiltinTools(): ReadonlyArray<ToolSpec> {
  return [createReadFileTool(), createListFilesTool(), createEditFileTool()];
}
