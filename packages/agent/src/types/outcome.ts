export const FAILURE_KINDS = [
  'ParseError',
  'UnknownTool',
  'MissingArgument',
  'UnexpectedArgument',
  'InvalidArgument',
  'NotFound',
  'NotAFile',
  'NotADirectory',
  'DecodeError',
  'PathEscape',
  'PermissionDenied',
  'OldStringNotFound',
  'AmbiguousEdit',
  'ToolExecutionError',
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

export function isFailureKind(value: string): value is FailureKind {
  return FAILURE_KINDS.some((kind) => kind === value);
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | ReadonlyArray<JsonValue>
  | { readonly [key: string]: JsonValue };

export type ToolSuccess = {
  readonly ok: true;
  readonly value: JsonValue;
};

export type ToolFailureOutcome = {
  readonly ok: false;
  readonly kind: FailureKind;
  readonly message: string;
};

export type ToolOutcome = ToolSuccess | ToolFailureOutcome;

export function success(value: JsonValue): ToolSuccess {
  return { ok: true, value };
}

export function failure(kind: FailureKind, message: string): ToolFailureOutcome {
  return { ok: false, kind, message };
}
