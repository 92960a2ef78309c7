import { z } from 'zod';
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 */
function interpolateEnvVars(value: string): string {
  return value.replace(
    /\$\{([^}:]+)(?::-([^}]*))?\}/g,
    (_, varName: string, defaultValue: string | undefined) => {
      const envValue = process.env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      return '';
    }
  );
}

/**
 * Recursively process an object and interpolate environment variables in string values
 */
function processEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(processEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = processEnvVars(value);
    }
    return result;
  }
  return obj;
}

const StaticUserSchema = z.object({
  username: z.string().min(1).regex(/^[^:]*$/, 'username must not contain ":"'),
  password: z.string(),
});

// Directory backends
// - http: POSTs credentials to a directory agent (LDAP/Kerberos bridge, IdP, ...)
// - static: in-process user list, for development
const DirectorySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('http'),
    profile: z.string().min(1).default('default'),
    url: z.string().url(),
  }),
  z.object({
    type: z.literal('static'),
    profile: z.string().min(1).default('default'),
    users: z.array(StaticUserSchema).default([]),
  }),
]);

export type DirectoryConfig = z.infer<typeof DirectorySchema>;

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const LogFormatSchema = z.enum(['json', 'pretty']);

const ConfigSchema = z.object({
  server: z
    .object({
      listen_port: z.number().int().min(0).max(65535).default(3128),
      host: z.string().default('0.0.0.0'),
      trust_proxy: z.boolean().default(false),
    })
    .default({}),
  auth: z
    .object({
      realm: z
        .string()
        .min(1)
        .regex(/^[^"\r\n]*$/, 'realm must not contain quotes or line breaks')
        .default('Proxy'),
      cache_ttl_seconds: z.number().positive().default(300),
      max_cache_entries: z.number().int().positive().default(10000),
      validation_timeout_ms: z.number().int().positive().default(1000),
      cleanup_interval_seconds: z.number().positive().default(60),
    })
    .default({}),
  directory: DirectorySchema.default({ type: 'static' }),
  registry: z
    .object({
      ttl_seconds: z.number().positive().default(3600),
      max_entries: z.number().int().positive().default(10000),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default('info'),
      format: LogFormatSchema.default('json'),
      audit: z.boolean().default(true),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(processEnvVars(raw ?? {}));
}

export function loadConfig(configPath: string): Config {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      // Config file doesn't exist, use defaults
      return parseConfig({});
    }
    throw error;
  }
  return parseConfig(parseYaml(content));
}

function envInt(name: string): number | undefined {
  const value = process.env[name];
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function envBool(name: string): boolean | undefined {
  const value = process.env[name];
  if (value === undefined || value === '') return undefined;
  return value === 'true';
}

function envString(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Drop keys whose value is undefined
 */
function defined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(Object.entries(obj).filter(([, value]) => value !== undefined));
}

export interface EnvConfig {
  server: Partial<Config['server']>;
  auth: Partial<Config['auth']>;
  registry: Partial<Config['registry']>;
  logging: Partial<Config['logging']>;
}

/**
 * Environment overrides. Only variables that are set appear in the result, so
 * merging it over the file config keeps file values for everything else.
 */
export function loadConfigFromEnv(): EnvConfig {
  const level = LogLevelSchema.safeParse(process.env.LOG_LEVEL);
  const format = LogFormatSchema.safeParse(process.env.LOG_FORMAT);

  return {
    server: defined({
      listen_port: envInt('GATE_PORT'),
      host: envString('GATE_HOST'),
      trust_proxy: envBool('GATE_TRUST_PROXY'),
    }),
    auth: defined({
      realm: envString('AUTH_REALM'),
      cache_ttl_seconds: envInt('AUTH_CACHE_TTL'),
      max_cache_entries: envInt('AUTH_MAX_CACHE_ENTRIES'),
      validation_timeout_ms: envInt('AUTH_VALIDATION_TIMEOUT_MS'),
      cleanup_interval_seconds: envInt('AUTH_CLEANUP_INTERVAL'),
    }),
    registry: defined({
      ttl_seconds: envInt('REGISTRY_TTL'),
      max_entries: envInt('REGISTRY_MAX_ENTRIES'),
    }),
    logging: defined({
      level: level.success ? level.data : undefined,
      format: format.success ? format.data : undefined,
      audit: envBool('LOG_AUDIT'),
    }),
  };
}

/**
 * Merge environment overrides over the file config and re-validate the result.
 * The returned value is deeply frozen; it is built once at startup.
 */
export function resolveConfig(configPath: string): Readonly<Config> {
  const fileConfig = loadConfig(configPath);
  const envConfig = loadConfigFromEnv();

  const merged = ConfigSchema.parse({
    server: { ...fileConfig.server, ...envConfig.server },
    auth: { ...fileConfig.auth, ...envConfig.auth },
    directory: fileConfig.directory, // Directory only from file
    registry: { ...fileConfig.registry, ...envConfig.registry },
    logging: { ...fileConfig.logging, ...envConfig.logging },
  });

  return deepFreeze(merged);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
    Object.freeze(value);
  }
  return value;
}
