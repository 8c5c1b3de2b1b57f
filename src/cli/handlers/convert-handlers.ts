/**
 * Convert Command Handlers
 *
 * Business logic for the md2txt, txt2md and check commands.
 * Handlers accept services via dependency injection for testability.
 */

import * as path from 'path';

import { ConfigError, ConverterConfig, loadConfig } from '../../config/converter-config';
import { QuizError } from '../../parsers/parser-result';
import {
  check,
  convert,
  detectFormat,
  FORMAT_EXTENSIONS,
  QuizFormat,
} from '../../services/conversion.service';
import { Logger } from '../../utils/console-logger';
import { ServiceContainer } from '../service-container';

/** `--output -` writes to standard output */
export const STDOUT = '-';

/**
 * Options for md2txt and txt2md
 */
export interface ConvertCommandOptions {
  output?: string;
  outDir?: string;
  collectErrors?: boolean;
}

/**
 * Options for check
 */
export interface CheckCommandOptions {
  format?: QuizFormat;
}

/**
 * Where a converted file goes: beside its input (or in `outDir`) with the
 * target format's extension
 */
export function outputPathFor(input: string, to: QuizFormat, outDir?: string): string {
  const name = path.basename(input, path.extname(input)) + FORMAT_EXTENSIONS[to];
  return path.join(outDir ?? path.dirname(input), name);
}

/**
 * Handle md2txt / txt2md
 */
export function handleConvert(
  from: QuizFormat,
  to: QuizFormat,
  patterns: string[],
  options: ConvertCommandOptions,
  container: ServiceContainer
): void {
  const config = loadConfigOrExit(container);
  const logger = container.createLogger(config.logLevel);
  const files = expandInputs(patterns, container);

  if (options.output !== undefined && files.length > 1) {
    container.console.error(`✗ --output takes a single input; ${files.length} files matched`);
    container.process.exit(1);
  }

  const outDir = options.outDir ?? config.outDir;
  const collectErrors = options.collectErrors ?? config.collectErrors;
  let failures = 0;

  for (const file of files) {
    const target = options.output ?? outputPathFor(file, to, outDir);
    if (target !== STDOUT && path.resolve(target) === path.resolve(file)) {
      container.console.error(`✗ ${file}: refusing to overwrite the input file`);
      failures++;
      continue;
    }

    const content = readInput(file, container, logger);
    if (content === undefined) {
      failures++;
      continue;
    }

    logger.debug('Converting', { file, from, to });
    const result = convert(content, {
      from,
      to,
      collectErrors,
      logger,
    });

    if (!result.ok) {
      reportErrors(file, result.errors, container);
      failures++;
      continue;
    }

    if (target === STDOUT) {
      container.process.writeStdout(result.value.output);
    } else {
      writeOutput(target, result.value.output, container, logger);
      container.console.log(`✓ ${file} → ${target}`);
    }
  }

  if (failures > 0) {
    container.console.error(`\n✗ ${failures} of ${files.length} file(s) failed to convert`);
    container.process.exit(1);
  }
}

/**
 * Handle check: read and validate, reporting every violation
 */
export function handleCheck(
  patterns: string[],
  options: CheckCommandOptions,
  container: ServiceContainer
): void {
  const config = loadConfigOrExit(container);
  const logger = container.createLogger(config.logLevel);
  const files = expandInputs(patterns, container);
  let failures = 0;

  for (const file of files) {
    const format = options.format ?? detectFormat(file);
    if (!format) {
      container.console.error(`✗ ${file}: cannot tell the format from the extension; pass --format`);
      failures++;
      continue;
    }

    const content = readInput(file, container, logger);
    if (content === undefined) {
      failures++;
      continue;
    }

    logger.debug('Checking', { file, format });
    const result = check(content, format);
    if (result.ok) {
      const count = result.value.quiz.questions.length;
      container.console.log(`✓ ${file}: ${count} question${count === 1 ? '' : 's'}`);
    } else {
      reportErrors(file, result.errors, container);
      failures++;
    }
  }

  if (failures > 0) {
    container.console.error(`\n✗ ${failures} of ${files.length} file(s) have errors`);
    container.process.exit(1);
  }
}

function loadConfigOrExit(container: ServiceContainer): ConverterConfig {
  try {
    return loadConfig({
      fs: container.fs,
      cwd: container.process.cwd(),
      env: container.process.env,
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      container.console.error(`✗ Invalid configuration: ${err.message}`);
      container.process.exit(1);
    }
    throw err;
  }
}

function expandInputs(patterns: string[], container: ServiceContainer): string[] {
  const cwd = container.process.cwd();
  const files: string[] = [];

  for (const pattern of patterns) {
    const matches = container.inputs.expand(pattern, cwd);
    if (matches.length === 0) {
      container.console.error(`✗ No input files match '${pattern}'`);
      container.process.exit(1);
    }
    for (const match of matches) {
      if (!files.includes(match)) {
        files.push(match);
      }
    }
  }

  return files;
}

function readInput(file: string, container: ServiceContainer, logger: Logger): string | undefined {
  try {
    return container.fs.readFileSync(file, 'utf-8');
  } catch (err) {
    logger.error('Cannot read input file', err, { file });
    container.console.error(`✗ ${file}: cannot read the file`);
    return undefined;
  }
}

function writeOutput(
  target: string,
  output: string,
  container: ServiceContainer,
  logger: Logger
): void {
  const dir = path.dirname(target);
  if (!container.fs.existsSync(dir)) {
    logger.info('Creating output directory', { dir });
    container.fs.mkdirSync(dir, { recursive: true });
  } else if (container.fs.existsSync(target)) {
    logger.warn('Overwriting existing file', { file: target });
  }
  container.fs.writeFileSync(target, output, 'utf-8');
}

function reportErrors(file: string, errors: QuizError[], container: ServiceContainer): void {
  container.console.error(`✗ ${file}:`);
  for (const error of errors) {
    container.console.error(`  - ${error.message}`);
  }
}
