import type { ScalarValue, ToolArgs } from '../types/index.js';
import { ToolFailure } from '../types/index.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is ScalarValue {
  return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/** Narrows an untyped value to a flat argument mapping, or null if it is not one. */
export function toToolArgs(value: unknown): ToolArgs | null {
  if (!isPlainObject(value)) {
    return null;
  }
  const args: Record<string, ScalarValue> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isScalar(entry)) {
      return null;
    }
    args[key] = entry;
  }
  return args;
}

export function stringArg(args: ToolArgs, name: string): string {
  const value = args[name];
  if (typeof value !== 'string') {
    throw new ToolFailure('InvalidArgument', `argument '${name}' must be a string`);
  }
  return value;
}

export function optionalStringArg(args: ToolArgs, name: string, fallback: string): string {
  return args[name] === undefined ? fallback : stringArg(args, name);
}
