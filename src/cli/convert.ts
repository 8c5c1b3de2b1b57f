#!/usr/bin/env node
/**
 * Quiz Conversion CLI
 *
 * Usage:
 *   quizmark md2txt quizzes/*.md --out-dir build
 *   quizmark txt2md week1.txt -o week1.md
 *   quizmark check 'quizzes/week-*.md'
 */

import { Command, Option } from 'commander';

import { QUIZ_FORMATS } from '../services/conversion.service';
import {
  CheckCommandOptions,
  ConvertCommandOptions,
  handleCheck,
  handleConvert,
} from './handlers/convert-handlers';
import { ServiceContainer } from './service-container';

/**
 * Build the command tree against the given services
 */
export function createProgram(container: ServiceContainer = new ServiceContainer()): Command {
  const program = new Command();

  program
    .name('quizmark')
    .description('Convert quizzes between the Markdown quiz schema and text2qti plaintext')
    .version('1.0.0');

  program
    .command('md2txt')
    .description('Convert Markdown quizzes to text2qti plaintext')
    .argument('<inputs...>', 'Markdown files or glob patterns')
    .option('-o, --output <file>', "Output file for a single input ('-' for stdout)")
    .option('--out-dir <dir>', 'Directory for converted files (default: beside each input)')
    .option('--collect-errors', 'Report every validation error instead of the first')
    .action((inputs: string[], options: ConvertCommandOptions) => {
      handleConvert('markdown', 'plaintext', inputs, options, container);
    });

  program
    .command('txt2md')
    .description('Convert text2qti plaintext quizzes to Markdown')
    .argument('<inputs...>', 'Plaintext files or glob patterns')
    .option('-o, --output <file>', "Output file for a single input ('-' for stdout)")
    .option('--out-dir <dir>', 'Directory for converted files (default: beside each input)')
    .option('--collect-errors', 'Report every validation error instead of the first')
    .action((inputs: string[], options: ConvertCommandOptions) => {
      handleConvert('plaintext', 'markdown', inputs, options, container);
    });

  program
    .command('check')
    .description('Read and validate quizzes without converting them')
    .argument('<inputs...>', 'Quiz files or glob patterns')
    .addOption(
      new Option('-f, --format <format>', 'Input format (default: from the file extension)').choices(
        QUIZ_FORMATS
      )
    )
    .action((inputs: string[], options: CheckCommandOptions) => {
      handleCheck(inputs, options, container);
    });

  return program;
}

if (require.main === module) {
  createProgram().parse();
}
