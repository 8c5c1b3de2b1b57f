/**
 * Service Container - Dependency Injection Container
 *
 * Provides the file system, console and process the CLI handlers work
 * against, so tests can swap in in-memory fakes.
 */

import * as fs from 'fs';

import { globSync } from 'glob';

import { ConsoleLogger, Logger, LogLevel, LogSink } from '../utils/console-logger';

/**
 * File system operations interface (for testability)
 */
export interface IFileSystem {
  existsSync(path: string): boolean;
  readFileSync(path: string, encoding: BufferEncoding): string;
  writeFileSync(path: string, data: string, encoding: BufferEncoding): void;
  mkdirSync(path: string, options?: { recursive?: boolean }): void;
}

/**
 * Console operations interface (for testability)
 */
export interface IConsole {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Process operations interface (for testability)
 */
export interface IProcess {
  exit(code?: number): never;
  cwd(): string;
  env: Record<string, string | undefined>;
  writeStdout(text: string): void;
}

/**
 * Expands input patterns into file paths
 */
export interface IInputResolver {
  expand(pattern: string, cwd: string): string[];
}

/**
 * Service container configuration
 */
export interface ServiceContainerConfig {
  fileSystem?: IFileSystem;
  console?: IConsole;
  process?: IProcess;
  inputs?: IInputResolver;
  logger?: (level: LogLevel) => Logger;
}

/**
 * Service container - manages all service dependencies
 */
export class ServiceContainer {
  public readonly fs: IFileSystem;
  public readonly console: IConsole;
  public readonly process: IProcess;
  public readonly inputs: IInputResolver;
  private readonly loggerFactory: (level: LogLevel) => Logger;

  constructor(config: ServiceContainerConfig = {}) {
    // Use provided implementations or fall back to real implementations
    this.fs = config.fileSystem || this.createRealFileSystem();
    this.console = config.console || this.createRealConsole();
    this.process = config.process || this.createRealProcess();
    this.inputs = config.inputs || this.createRealInputResolver();
    this.loggerFactory =
      config.logger || (level => new ConsoleLogger('quizmark', level, this.createStderrSink()));
  }

  /**
   * Create a logger at the configured level
   */
  createLogger(level: LogLevel): Logger {
    return this.loggerFactory(level);
  }

  // Private factory methods for real implementations

  private createRealFileSystem(): IFileSystem {
    return {
      existsSync: fs.existsSync,
      readFileSync: (path, encoding) => fs.readFileSync(path, encoding),
      writeFileSync: (path, data, encoding) => fs.writeFileSync(path, data, encoding),
      mkdirSync: (path, options) => {
        fs.mkdirSync(path, options);
      },
    };
  }

  private createRealConsole(): IConsole {
    return {
      log: console.log.bind(console),
      error: console.error.bind(console),
    };
  }

  private createRealProcess(): IProcess {
    return {
      exit: (code?: number): never => process.exit(code),
      cwd: () => process.cwd(),
      env: process.env,
      writeStdout: text => {
        process.stdout.write(text);
      },
    };
  }

  /** Log lines go to stderr; stdout may carry a converted quiz */
  private createStderrSink(): LogSink {
    return new console.Console({ stdout: process.stderr, stderr: process.stderr });
  }

  private createRealInputResolver(): IInputResolver {
    return {
      expand: (pattern, cwd) => globSync(pattern, { cwd, nodir: true }).sort(),
    };
  }
}
