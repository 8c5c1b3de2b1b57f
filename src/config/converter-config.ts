/**
 * Converter Configuration
 *
 * Settings come from an optional `.quizmarkrc.yml` in the working directory,
 * then environment variables, then CLI flags (applied by the CLI handlers).
 *
 * Example `.quizmarkrc.yml`:
 *
 *   logLevel: debug
 *   collectErrors: true
 *   outDir: build/quizzes
 */

import * as path from 'path';

import * as yaml from 'js-yaml';
import { z } from 'zod';

import { parseBoolean } from '../parsers/base-parser';
import { LOG_LEVELS } from '../utils/console-logger';

export const CONFIG_FILENAME = '.quizmarkrc.yml';

export const logLevelEnum = z.enum(LOG_LEVELS);

export const converterConfigSchema = z
  .object({
    logLevel: logLevelEnum.default('info'),
    collectErrors: z.boolean().default(false),
    outDir: z.string().min(1).optional(),
  })
  .strict();

export type ConverterConfig = z.infer<typeof converterConfigSchema>;

/**
 * Raised for unreadable or invalid configuration
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(`${source}: ${message}`);
    this.name = 'ConfigError';
  }
}

/**
 * Where configuration is read from
 */
export interface ConfigSources {
  fs: {
    existsSync(path: string): boolean;
    readFileSync(path: string, encoding: BufferEncoding): string;
  };
  cwd: string;
  env: Record<string, string | undefined>;
}

/**
 * Parse and validate the YAML text of a config file
 */
export function parseConfig(content: string, source: string = CONFIG_FILENAME): ConverterConfig {
  let raw: unknown;
  try {
    raw = yaml.load(content) ?? {};
  } catch (err) {
    throw new ConfigError(`invalid YAML: ${err instanceof Error ? err.message : String(err)}`, source);
  }
  return checkConfig(raw, source);
}

/**
 * Defaults, overlaid by the config file, overlaid by the environment
 */
export function loadConfig(sources: ConfigSources): ConverterConfig {
  const file = path.join(sources.cwd, CONFIG_FILENAME);
  const base = sources.fs.existsSync(file)
    ? parseConfig(sources.fs.readFileSync(file, 'utf-8'), file)
    : converterConfigSchema.parse({});

  return applyEnvironment(base, sources.env);
}

function applyEnvironment(
  config: ConverterConfig,
  env: Record<string, string | undefined>
): ConverterConfig {
  const overrides: Record<string, unknown> = {};

  const logLevel = env.QUIZMARK_LOG_LEVEL;
  if (logLevel !== undefined && logLevel !== '') {
    overrides.logLevel = logLevel.toLowerCase();
  }

  const collectErrors = env.QUIZMARK_COLLECT_ERRORS;
  if (collectErrors !== undefined && collectErrors !== '') {
    overrides.collectErrors = parseBoolean(collectErrors) ?? collectErrors;
  }

  return checkConfig({ ...config, ...overrides }, 'environment');
}

function checkConfig(raw: unknown, source: string): ConverterConfig {
  const parsed = converterConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new ConfigError(problems.join('; '), source);
  }
  return parsed.data;
}
