import type {
  ArgumentSchema,
  JsonSchemaProperty,
  ToolDeclaration,
  ToolRegistry,
  ToolSpec,
} from '../types/index.js';
import { DuplicateToolError, RegistrySealedError, UnknownToolError } from '../types/index.js';

/**
 * Derives the JSON Schema used both to validate arguments and to declare the
 * tool to the model. Unknown keys are rejected.
 */
export function toArgumentSchema(spec: ToolSpec): ArgumentSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: Array<string> = [];

  for (const [name, parameter] of Object.entries(spec.parameters)) {
    properties[name] = { type: parameter.type, description: parameter.description };
    if (parameter.required) {
      required.push(name);
    }
  }

  return { type: 'object', properties, required, additionalProperties: false };
}

export function createToolRegistry(initial?: ReadonlyArray<ToolSpec>): ToolRegistry {
  const tools = new Map<string, ToolSpec>();
  let sealed = false;

  const register = (spec: ToolSpec): void => {
    if (sealed) {
      throw new RegistrySealedError(spec.name);
    }
    if (tools.has(spec.name)) {
      throw new DuplicateToolError(spec.name);
    }
    tools.set(spec.name, spec);
  };

  for (const spec of initial ?? []) {
    register(spec);
  }

  return {
    register,
    lookup(name: string): ToolSpec {
      const spec = tools.get(name);
      if (!spec) {
        throw new UnknownToolError(name, Array.from(tools.keys()));
      }
      return spec;
    },
    get(name: string): ToolSpec | null {
      return tools.get(name) ?? null;
    },
    list(): ReadonlyArray<ToolSpec> {
      return Array.from(tools.values());
    },
    declarations(): ReadonlyArray<ToolDeclaration> {
      return Array.from(tools.values()).map((spec) => ({
        name: spec.name,
        description: spec.description,
        parameters: toArgumentSchema(spec),
      }));
    },
    seal(): void {
      sealed = true;
    },
    isSealed(): boolean {
      return sealed;
    },
  };
}
