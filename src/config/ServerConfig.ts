import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { FORMAT_TYPES } from '../services/time/formats.js';
import { Zone } from '../services/time/zone.js';
import { VERSION } from '../version.js';

export type TransportType = 'stdio' | 'http';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const FormatSchema = z.enum(FORMAT_TYPES);
const PortSchema = z.number().int().min(1).max(65535);

export const ServerConfigSchema = z.object({
  transport: z.object({
    type: z.enum(['stdio', 'http']).default('http'),
    host: z.string().min(1).default('0.0.0.0'),
    port: PortSchema.default(8080)
  }).default({}),
  server: z.object({
    name: z.string().min(1).default('mcp-time-server'),
    version: z.string().min(1).default(VERSION),
    /** Milliseconds allowed for in-flight requests during shutdown */
    shutdownTimeout: z.number().int().positive().default(30000)
  }).default({}),
  time: z.object({
    defaultTimezone: z.string().min(1).default('UTC'),
    defaultFormat: FormatSchema.default('RFC3339'),
    supportedFormats: z.array(FormatSchema).min(1).default([...FORMAT_TYPES])
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    format: z.enum(['json', 'console']).default('json')
  }).default({}),
  metrics: z.object({
    enabled: z.boolean().default(true),
    port: PortSchema.default(9090),
    path: z.string().startsWith('/').default('/metrics')
  }).default({}),
  debug: z.boolean().default(false),
  enabledTools: z.array(z.string().min(1)).min(1).optional(),
  disabledTools: z.array(z.string().min(1)).min(1).optional()
}).superRefine((config, ctx) => {
  if (!config.time.supportedFormats.includes(config.time.defaultFormat)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['time', 'defaultFormat'],
      message: `Default format ${config.time.defaultFormat} is not in supportedFormats`
    });
  }
  try {
    Zone.resolve(config.time.defaultTimezone);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['time', 'defaultTimezone'],
      message: error instanceof Error ? error.message : String(error)
    });
  }
  if (config.enabledTools && config.disabledTools) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['enabledTools'],
      message: 'enabledTools and disabledTools are mutually exclusive'
    });
  }
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

type ConfigLayer = { [key: string]: unknown };

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
  const result: ConfigLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const existing = result[key];
      result[key] = isPlainObject(existing) && isPlainObject(value)
        ? mergeLayers(existing, value)
        : value;
    }
  }
  return result;
}

function parseToolList(raw: string, source: string): string[] {
  const tools = raw.split(',').map(t => t.trim()).filter(t => t.length > 0);
  if (tools.length === 0) {
    throw new ConfigurationError(`${source} must list at least one tool name`);
  }
  return tools;
}

function parseNumber(raw: string | undefined): number | undefined {
  return raw === undefined || raw === '' ? undefined : Number(raw);
}

function parseBoolean(raw: string | undefined): boolean | undefined {
  return raw === undefined || raw === '' ? undefined : raw.toLowerCase() === 'true';
}

function parseList(raw: string | undefined): string[] | undefined {
  return raw === undefined || raw === '' ? undefined : raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

/**
 * Reads the JSON configuration file. An explicitly named file must exist;
 * the implicit ./config.json is optional.
 */
export function loadConfigFile(path: string | undefined): ConfigLayer {
  const explicit = path !== undefined;
  const filePath = resolve(path ?? 'config.json');

  if (!existsSync(filePath)) {
    if (explicit) {
      throw new ConfigurationError(`Config file not found: ${filePath}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in config file ${filePath}: ${error instanceof Error ? error.message : error}`);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

function fromEnvironment(env: NodeJS.ProcessEnv): ConfigLayer {
  return {
    transport: {
      type: env.TRANSPORT || undefined,
      host: env.SERVER_HOST || env.HOST || undefined,
      port: parseNumber(env.SERVER_PORT ?? env.PORT)
    },
    server: {
      name: env.SERVER_NAME || undefined,
      version: env.SERVER_VERSION || undefined,
      shutdownTimeout: parseNumber(env.SERVER_SHUTDOWN_TIMEOUT)
    },
    time: {
      defaultTimezone: env.TIME_DEFAULT_TIMEZONE || undefined,
      defaultFormat: env.TIME_DEFAULT_FORMAT || undefined,
      supportedFormats: parseList(env.TIME_SUPPORTED_FORMATS)
    },
    logging: {
      level: env.LOG_LEVEL || undefined,
      format: env.LOG_FORMAT || undefined
    },
    metrics: {
      enabled: parseBoolean(env.METRICS_ENABLED),
      port: parseNumber(env.METRICS_PORT),
      path: env.METRICS_PATH || undefined
    },
    debug: parseBoolean(env.DEBUG),
    enabledTools: env.ENABLED_TOOLS !== undefined ? parseToolList(env.ENABLED_TOOLS, 'ENABLED_TOOLS') : undefined,
    disabledTools: env.DISABLED_TOOLS !== undefined ? parseToolList(env.DISABLED_TOOLS, 'DISABLED_TOOLS') : undefined
  };
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new ConfigurationError(`${flag} requires a value`);
  }
  return value;
}

function fromArgs(args: string[]): { layer: ConfigLayer; configPath?: string } {
  const transport: ConfigLayer = {};
  const logging: ConfigLayer = {};
  const layer: ConfigLayer = { transport, logging };
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--transport':
        transport.type = requireValue(args, ++i, arg);
        break;
      case '--port':
        transport.port = Number(requireValue(args, ++i, arg));
        break;
      case '--host':
        transport.host = requireValue(args, ++i, arg);
        break;
      case '--config':
        configPath = requireValue(args, ++i, arg);
        break;
      case '--log-level':
        logging.level = requireValue(args, ++i, arg);
        break;
      case '--log-format':
        logging.format = requireValue(args, ++i, arg);
        break;
      case '--debug':
        layer.debug = true;
        break;
      case '--enable-tools':
        layer.enabledTools = parseToolList(requireValue(args, ++i, arg), arg);
        break;
      case '--disable-tools':
        layer.disabledTools = parseToolList(requireValue(args, ++i, arg), arg);
        break;
    }
  }

  return { layer, configPath };
}

/**
 * Builds the server configuration. Precedence, lowest first: defaults,
 * config file, environment, command line.
 */
export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const cli = fromArgs(args);
  const fileLayer = loadConfigFile(cli.configPath ?? (env.CONFIG_FILE || undefined));
  const merged = mergeLayers(fileLayer, fromEnvironment(env), cli.layer);

  const result = ServerConfigSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const config = result.data;
  if (config.debug) {
    config.logging.level = 'debug';
  }
  return config;
}
