/**
 * Conversion Service
 *
 * Reader → Validator → Writer through the shared Quiz Model. There is no
 * direct format-to-format path: every conversion reads into the model,
 * validates it, and writes it back out.
 */

import * as path from 'path';

import { Annotations } from '../models/annotation.model';
import { Quiz } from '../models/quiz.model';
import { readMarkdown } from '../parsers/markdown-parser';
import { fail, ok, QuizError, ReadResult, Result } from '../parsers/parser-result';
import { readPlaintext } from '../parsers/plaintext-parser';
import { writeMarkdown } from '../serializers/markdown-serializer';
import { writePlaintext } from '../serializers/plaintext-serializer';
import { ConsoleLogger, Logger } from '../utils/console-logger';
import { checkQuiz, validate } from '../validators/quiz-validator';

export const QUIZ_FORMATS = ['markdown', 'plaintext'] as const;

export type QuizFormat = (typeof QUIZ_FORMATS)[number];

/** Conventional file extension of each format */
export const FORMAT_EXTENSIONS: Record<QuizFormat, string> = {
  markdown: '.md',
  plaintext: '.txt',
};

export interface ConvertOptions {
  from: QuizFormat;
  to: QuizFormat;

  /** Report every validation violation instead of the first */
  collectErrors?: boolean;

  logger?: Logger;
}

export interface Conversion {
  output: string;
  quiz: Quiz;
  annotations: Annotations;
}

export type ConversionResult = Result<Conversion>;

/**
 * Read either format into the model
 */
export function readQuiz(content: string, format: QuizFormat): ReadResult {
  return format === 'markdown' ? readMarkdown(content) : readPlaintext(content);
}

/**
 * Write the model in either format
 */
export function writeQuiz(quiz: Quiz, annotations: Annotations, format: QuizFormat): string {
  return format === 'markdown'
    ? writeMarkdown(quiz, annotations)
    : writePlaintext(quiz, annotations);
}

/**
 * Convert quiz text from one format to another
 */
export function convert(content: string, options: ConvertOptions): ConversionResult {
  const logger = options.logger ?? new ConsoleLogger('quizmark');

  try {
    const { quiz, annotations, locations } = readQuiz(content, options.from);
    logger.debug('Read quiz', {
      format: options.from,
      questions: quiz.questions.length,
      annotations: annotations.length,
    });

    if (options.collectErrors) {
      const { valid, errors } = checkQuiz(quiz, locations);
      if (!valid) {
        return fail(...errors);
      }
    } else {
      validate(quiz, locations);
    }

    const output = writeQuiz(quiz, annotations, options.to);
    logger.debug('Wrote quiz', { format: options.to, lines: output.split('\n').length - 1 });

    return ok({ output, quiz, annotations });
  } catch (err) {
    if (err instanceof QuizError) {
      logger.debug('Conversion failed', { kind: err.kind, line: err.line });
      return fail(err);
    }
    throw err;
  }
}

/**
 * Read and validate without writing, reporting every violation
 */
export function check(content: string, format: QuizFormat): Result<ReadResult> {
  try {
    const result = readQuiz(content, format);
    const { valid, errors } = checkQuiz(result.quiz, result.locations);
    return valid ? ok(result) : fail(...errors);
  } catch (err) {
    if (err instanceof QuizError) {
      return fail(err);
    }
    throw err;
  }
}

/**
 * Guess the format of a file from its extension
 */
export function detectFormat(filePath: string): QuizFormat | undefined {
  switch (path.extname(filePath).toLowerCase()) {
    case '.md':
    case '.markdown':
      return 'markdown';
    case '.txt':
      return 'plaintext';
    default:
      return undefined;
  }
}
