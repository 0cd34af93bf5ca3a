import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import AjvModule from 'ajv';
import {
  ANTHROPIC_BASE_URL,
  AnthropicAdapter,
  Client,
  ConfigurationError,
  OpenAICompatibleAdapter,
} from '@filewright/llm';
import type { ProviderAdapter } from '@filewright/llm';
import { isLogLevel, type LogLevel } from './logger.js';

const Ajv = AjvModule.default;

export type ProviderName = 'anthropic' | 'ollama';

export type AppConfig = {
  readonly provider: ProviderName;
  readonly model: string;
  readonly apiKey: string | null;
  readonly anthropicBaseUrl: string;
  readonly ollamaBaseUrl: string;
  readonly rootDir: string;
  readonly maxToolRounds: number;
  readonly requestTimeoutMs: number;
  readonly maxTokens: number;
  /** Sampling temperature; null leaves the provider default. */
  readonly temperature: number | null;
  /** Command (program and arguments) of an MCP server to take tools from; null uses the built-in tools. */
  readonly mcpCommand: ReadonlyArray<string> | null;
  readonly logLevel: LogLevel;
};

/** What the MCP tool server needs; it talks to no model. */
export type ServerConfig = {
  readonly rootDir: string;
  readonly logLevel: LogLevel;
};

export type LoadConfigOptions = {
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
};

export const DEFAULT_MODELS: Readonly<Record<ProviderName, string>> = {
  anthropic: 'claude-3-5-sonnet-20240620',
  ollama: 'qwen3:4b',
};

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';

// Small local models follow the directive format more reliably when sampling is cool
export const DEFAULT_TEMPERATURES: Readonly<Record<ProviderName, number | null>> = {
  anthropic: null,
  ollama: 0.2,
};

/** Credentials file some setups keep beside the project instead of a .env. */
const ENV_FILE_SCHEMA = {
  type: 'object',
  properties: {
    ANTHROPIC_AUTH_TOKEN: { type: 'string' },
    ANTHROPIC_API_KEY: { type: 'string' },
    ANTHROPIC_BASE_URL: { type: 'string' },
  },
} as const;

type EnvFile = {
  readonly ANTHROPIC_AUTH_TOKEN?: string;
  readonly ANTHROPIC_API_KEY?: string;
  readonly ANTHROPIC_BASE_URL?: string;
};

function readEnvFile(path: string): EnvFile {
  if (!existsSync(path)) {
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `${path} is not valid JSON`,
      error instanceof Error ? error : undefined,
    );
  }

  const ajv = new Ajv({ allErrors: true });
  if (!ajv.validate(ENV_FILE_SCHEMA, data) || typeof data !== 'object' || data === null) {
    const details = (ajv.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? e.keyword}`);
    throw new ConfigurationError(`${path} is invalid: ${details.join('; ') || 'expected an object'}`);
  }

  const record: object = data;
  const field = (name: keyof EnvFile): string | undefined => {
    const value: unknown = Reflect.get(record, name);
    return typeof value === 'string' && value !== '' ? value : undefined;
  };

  return {
    ANTHROPIC_AUTH_TOKEN: field('ANTHROPIC_AUTH_TOKEN'),
    ANTHROPIC_API_KEY: field('ANTHROPIC_API_KEY'),
    ANTHROPIC_BASE_URL: field('ANTHROPIC_BASE_URL'),
  };
}

function setting(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parseInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = setting(env, name);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || Number(raw) < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return Number(raw);
}

function parseTemperature(env: NodeJS.ProcessEnv, fallback: number | null): number | null {
  const raw = setting(env, 'FILEWRIGHT_TEMPERATURE');
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+(\.\d+)?$/.test(raw) || Number(raw) > 2) {
    throw new ConfigurationError(`FILEWRIGHT_TEMPERATURE must be a number from 0 to 2, got '${raw}'`);
  }
  return Number(raw);
}

function parseCommand(raw: string | undefined): ReadonlyArray<string> | null {
  return raw === undefined ? null : raw.split(/\s+/);
}

function parseProvider(raw: string | undefined): ProviderName {
  if (raw === undefined) {
    return 'anthropic';
  }
  if (raw === 'anthropic' || raw === 'ollama') {
    return raw;
  }
  throw new ConfigurationError(`FILEWRIGHT_PROVIDER must be 'anthropic' or 'ollama', got '${raw}'`);
}

/**
 * Reads settings from the environment (already populated from .env by the
 * entry point) and from an optional env.json in the root directory. The
 * environment wins over env.json.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const { rootDir, logLevel } = loadServerConfig(options);
  const envFile = readEnvFile(join(rootDir, 'env.json'));

  const provider = parseProvider(setting(env, 'FILEWRIGHT_PROVIDER'));
  const apiKey =
    setting(env, 'ANTHROPIC_API_KEY') ?? envFile.ANTHROPIC_API_KEY ?? envFile.ANTHROPIC_AUTH_TOKEN ?? null;

  if (provider === 'anthropic' && apiKey === null) {
    throw new ConfigurationError('ANTHROPIC_API_KEY is not set (environment, .env or env.json)');
  }

  return {
    provider,
    model: setting(env, 'FILEWRIGHT_MODEL') ?? DEFAULT_MODELS[provider],
    apiKey,
    anthropicBaseUrl: setting(env, 'ANTHROPIC_BASE_URL') ?? envFile.ANTHROPIC_BASE_URL ?? ANTHROPIC_BASE_URL,
    ollamaBaseUrl: setting(env, 'OLLAMA_BASE_URL') ?? DEFAULT_OLLAMA_BASE_URL,
    rootDir,
    maxToolRounds: parseInteger(env, 'FILEWRIGHT_MAX_TOOL_ROUNDS', 10, 0),
    requestTimeoutMs: parseInteger(env, 'FILEWRIGHT_REQUEST_TIMEOUT_MS', 120_000, 1),
    maxTokens: parseInteger(env, 'FILEWRIGHT_MAX_TOKENS', 4096, 1),
    temperature: parseTemperature(env, DEFAULT_TEMPERATURES[provider]),
    mcpCommand: parseCommand(setting(env, 'FILEWRIGHT_MCP_COMMAND')),
    logLevel,
  };
}

/** Root directory and log level, the settings shared by the REPL and the MCP server. */
export function loadServerConfig(options: LoadConfigOptions = {}): ServerConfig {
  const env = options.env ?? process.env;
  const rootDir = resolve(options.cwd ?? process.cwd(), setting(env, 'FILEWRIGHT_ROOT') ?? '.');

  const logLevel = setting(env, 'LOG_LEVEL') ?? 'error';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of silent, error, info, debug; got '${logLevel}'`);
  }

  return { rootDir, logLevel };
}

export function createModelClient(config: AppConfig): Client {
  let adapter: ProviderAdapter;
  if (config.provider === 'anthropic') {
    if (config.apiKey === null) {
      throw new ConfigurationError('ANTHROPIC_API_KEY is not set');
    }
    adapter = new AnthropicAdapter(config.apiKey, { baseUrl: config.anthropicBaseUrl });
  } else {
    adapter = new OpenAICompatibleAdapter(config.ollamaBaseUrl, { name: 'ollama' });
  }

  return new Client({ providers: { [config.provider]: adapter }, defaultProvider: config.provider });
}
