/**
 * Parser Result Types
 *
 * The contract between readers, the validator and writers, plus the error
 * taxonomy every stage reports through.
 */

import { Annotations } from '../models/annotation.model';
import { Quiz } from '../models/quiz.model';

/**
 * 1-based source lines recorded while reading, kept apart from the model so
 * that models read from either format compare equal
 */
export interface SourceLocations {
  /** Header line of each question, by `position - 1` */
  questions: number[];

  /** Line of each quiz option, by index */
  options: number[];
}

/**
 * What both readers produce
 */
export interface ReadResult {
  quiz: Quiz;
  annotations: Annotations;
  locations: SourceLocations;
}

export type QuizErrorKind = 'structural' | 'type-constraint' | 'missing-field';

/**
 * Where an error was found
 */
export interface ErrorLocation {
  /** 1-based source line */
  line?: number;

  /** 1-based question position */
  position?: number;
}

/**
 * Base class for every conversion failure
 */
export class QuizError extends Error {
  public readonly line?: number;
  public readonly position?: number;

  constructor(
    public readonly kind: QuizErrorKind,
    public readonly description: string,
    location: ErrorLocation = {}
  ) {
    super(formatMessage(description, location));
    this.name = 'QuizError';
    this.line = location.line;
    this.position = location.position;
  }
}

/**
 * Grammar violation: bad indentation, stray content, missing sub-block
 */
export class StructuralError extends QuizError {
  constructor(description: string, location: ErrorLocation = {}) {
    super('structural', description, location);
    this.name = 'StructuralError';
  }
}

/**
 * A value is present but breaks a type-specific rule
 */
export class TypeConstraintError extends QuizError {
  constructor(description: string, location: ErrorLocation = {}) {
    super('type-constraint', description, location);
    this.name = 'TypeConstraintError';
  }
}

/**
 * A required field is absent altogether
 */
export class MissingFieldError extends QuizError {
  constructor(description: string, location: ErrorLocation = {}) {
    super('missing-field', description, location);
    this.name = 'MissingFieldError';
  }
}

/**
 * Prefix a description with where it happened:
 * `Line 4: …`, `Question 2: …`, `Question 2 (line 9): …`
 */
export function formatMessage(description: string, location: ErrorLocation): string {
  const { line, position } = location;
  if (position !== undefined && line !== undefined) {
    return `Question ${position} (line ${line}): ${description}`;
  }
  if (position !== undefined) {
    return `Question ${position}: ${description}`;
  }
  if (line !== undefined) {
    return `Line ${line}: ${description}`;
  }
  return description;
}

/**
 * Success value or the errors that stopped the conversion
 */
export type Result<T, E = QuizError> =
  | { ok: true; value: T }
  | { ok: false; errors: E[] };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(...errors: E[]): Result<never, E> {
  return { ok: false, errors };
}
