export { createToolRegistry, toArgumentSchema } from './registry.js';
export { argumentValidator, dispatchToolCall, dispatchToolCalls, validateArguments } from './dispatch.js';
export { createReadFileTool, readFileExecutor } from './read-file.js';
export { createListFilesTool, listFilesExecutor } from './list-files.js';
export { createEditFileTool, editFileExecutor } from './edit-file.js';
export { createBuiltinTools } from './builtin.js';
