import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';
import type {
  ExecutionEnvironment,
  ToolInvocation,
  ToolOutcome,
  ToolRegistry,
  ToolSpec,
} from '../types/index.js';
import { ToolFailure, failure, success } from '../types/index.js';
import { toArgumentSchema } from './registry.js';

// ajv is CommonJS; under NodeNext its class sits on the default export's `default`
const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true });
const validators = new WeakMap<ToolSpec, ValidateFunction>();

/** The compiled argument validator for a tool, built on first use. */
export function argumentValidator(spec: ToolSpec): ValidateFunction {
  let validate = validators.get(spec);
  if (!validate) {
    validate = ajv.compile(toArgumentSchema(spec));
    validators.set(spec, validate);
  }
  return validate;
}

/**
 * Validates invocation arguments against the tool's derived schema.
 * Returns the first problem as a failed outcome, or null when valid.
 */
export function validateArguments(spec: ToolSpec, invocation: ToolInvocation): ToolOutcome | null {
  const validate = argumentValidator(spec);
  if (validate(invocation.args)) {
    return null;
  }

  return describeValidationErrors(spec.name, validate.errors ?? []);
}

function describeValidationErrors(toolName: string, errors: ReadonlyArray<ErrorObject>): ToolOutcome {
  const missing = errors.find((e) => e.keyword === 'required');
  if (missing) {
    return failure(
      'MissingArgument',
      `${toolName}: missing required argument '${String(missing.params['missingProperty'])}'`,
    );
  }

  const unexpected = errors.find((e) => e.keyword === 'additionalProperties');
  if (unexpected) {
    return failure(
      'UnexpectedArgument',
      `${toolName}: unexpected argument '${String(unexpected.params['additionalProperty'])}'`,
    );
  }

  const first = errors[0];
  const argument = first?.instancePath.replace(/^\//, '') ?? '';
  return failure(
    'InvalidArgument',
    `${toolName}: argument '${argument}' ${first?.message ?? 'is invalid'}`,
  );
}

/**
 * Resolves one invocation to its tool and runs it. Never rejects: every
 * problem is reported as a failed outcome.
 */
export async function dispatchToolCall(
  invocation: ToolInvocation,
  registry: ToolRegistry,
  env: ExecutionEnvironment,
): Promise<ToolOutcome> {
  const spec = registry.get(invocation.toolName);
  if (!spec) {
    const available = registry.list().map((t) => t.name).join(', ');
    return failure('UnknownTool', `Unknown tool: ${invocation.toolName}. Available tools: ${available}`);
  }

  const invalid = validateArguments(spec, invocation);
  if (invalid) {
    return invalid;
  }

  try {
    return success(await spec.executor(invocation.args, env));
  } catch (error) {
    if (error instanceof ToolFailure) {
      return failure(error.kind, error.message);
    }
    const errorMessage = error instanceof Error ? error.message : String(error);
    return failure('ToolExecutionError', `Tool error in ${spec.name}: ${errorMessage}`);
  }
}

/**
 * Runs invocations strictly one after another; outcomes come back in
 * invocation order and a failure never stops the ones after it.
 */
export async function dispatchToolCalls(
  invocations: ReadonlyArray<ToolInvocation>,
  registry: ToolRegistry,
  env: ExecutionEnvironment,
): Promise<ReadonlyArray<ToolOutcome>> {
  const outcomes: Array<ToolOutcome> = [];

  for (const invocation of invocations) {
    outcomes.push(await dispatchToolCall(invocation, registry, env));
  }

  return outcomes;
}
