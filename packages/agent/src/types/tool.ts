import type { ExecutionEnvironment } from './environment.js';
import type { JsonValue } from './outcome.js';

export type ScalarValue = string | number | boolean | null;

/** Flat argument mapping carried by a directive. */
export type ToolArgs = Readonly<Record<string, ScalarValue>>;

export type ToolInvocation = {
  readonly toolName: string;
  readonly args: ToolArgs;
};

export type ParameterType = 'string' | 'number' | 'boolean';

export type ParameterSpec = {
  readonly type: ParameterType;
  readonly description: string;
  readonly required?: boolean;
};

export type ToolExecutor = (args: ToolArgs, env: ExecutionEnvironment) => Promise<JsonValue>;

export type ToolSpec = {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ParameterSpec>>;
  readonly executor: ToolExecutor;
};

export type JsonSchemaProperty = {
  readonly type: ParameterType;
  readonly description: string;
};

export type ArgumentSchema = {
  readonly type: 'object';
  readonly properties: Readonly<Record<string, JsonSchemaProperty>>;
  readonly required: ReadonlyArray<string>;
  readonly additionalProperties: false;
};

/** What the model is told about a tool. */
export type ToolDeclaration = {
  readonly name: string;
  readonly description: string;
  readonly parameters: ArgumentSchema;
};

/**
 * Registration happens once at startup; after seal() the registry is
 * read-only and register() throws.
 */
export type ToolRegistry = {
  readonly register: (spec: ToolSpec) => void;
  readonly lookup: (name: string) => ToolSpec;
  readonly get: (name: string) => ToolSpec | null;
  readonly list: () => ReadonlyArray<ToolSpec>;
  readonly declarations: () => ReadonlyArray<ToolDeclaration>;
  readonly seal: () => void;
  readonly isSealed: () => boolean;
};
