/**
 * Quiz Validator
 *
 * Type-specific structural rules over a Quiz Model read from either format.
 * Validation never mutates the model; running it twice gives the same answer.
 *
 * Usage:
 *   import { checkQuiz, validate } from './quiz-validator';
 *
 *   validate(quiz, locations);            // throws the first violation
 *   const { valid, errors } = checkQuiz(quiz, locations);
 */

import {
  FEEDBACK_KINDS,
  isGradeable,
  isQuestionType,
  isQuizOptionName,
  NumericAnswer,
  OPTION_LABELS,
  Question,
  QUESTION_TYPES,
  Quiz,
  QuizOptionName,
} from '../models/quiz.model';
import {
  ErrorLocation,
  MissingFieldError,
  QuizError,
  SourceLocations,
  TypeConstraintError,
} from '../parsers/parser-result';

/** Letters a–z label single-choice answers in the plaintext format */
export const MAX_SINGLE_CHOICES = 26;

export interface QuizValidationResult {
  valid: boolean;
  errors: QuizError[];
}

/**
 * Collect every rule violation
 */
export function checkQuiz(quiz: Quiz, locations?: SourceLocations): QuizValidationResult {
  const errors = [
    ...validateOptions(quiz, locations),
    ...quiz.questions.flatMap(question =>
      validateQuestion(question, {
        position: question.position,
        line: locations?.questions[question.position - 1],
      })
    ),
  ];

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Throw the first rule violation, if any
 */
export function validate(quiz: Quiz, locations?: SourceLocations): void {
  const { errors } = checkQuiz(quiz, locations);
  if (errors.length > 0) {
    throw errors[0];
  }
}

// =============================================================================
// Quiz options
// =============================================================================

function validateOptions(quiz: Quiz, locations?: SourceLocations): QuizError[] {
  const errors: QuizError[] = [];
  const seen = new Set<QuizOptionName>();

  quiz.options.forEach((option, index) => {
    const location = { line: locations?.options[index] };
    // Models built in code bypass the readers' checks
    const name: string = option.name;
    const value: unknown = option.value;

    if (!isQuizOptionName(name)) {
      errors.push(new TypeConstraintError(`unknown quiz option '${name}'`, location));
      return;
    }
    if (seen.has(name)) {
      errors.push(
        new TypeConstraintError(`quiz option '${OPTION_LABELS[name]}' given more than once`, location)
      );
    }
    if (typeof value !== 'boolean') {
      errors.push(
        new TypeConstraintError(`quiz option '${OPTION_LABELS[name]}' expects true or false`, location)
      );
    }
    seen.add(name);
  });

  return errors;
}

// =============================================================================
// Questions
// =============================================================================

function validateQuestion(question: Question, location: ErrorLocation): QuizError[] {
  const type: string = question.type;
  if (!isQuestionType(type)) {
    return [
      new TypeConstraintError(
        `unknown question type '${type}'; expected one of ${QUESTION_TYPES.join(', ')}`,
        location
      ),
    ];
  }

  const errors = [...validatePoints(question, location)];

  if (!question.prompt.some(line => line.trim() !== '')) {
    errors.push(new MissingFieldError('missing prompt text', location));
  }

  switch (question.type) {
    case 'single-choice': {
      const correct = question.choices.filter(choice => choice.correct).length;
      if (question.choices.length === 0) {
        errors.push(new MissingFieldError('no choices', location));
      } else if (correct !== 1) {
        errors.push(
          new TypeConstraintError(`expected exactly 1 correct choice, found ${correct}`, location)
        );
      }
      if (question.choices.length > MAX_SINGLE_CHOICES) {
        errors.push(
          new TypeConstraintError(
            `${question.choices.length} choices; at most ${MAX_SINGLE_CHOICES} are allowed`,
            location
          )
        );
      }
      break;
    }

    case 'multi-choice': {
      const correct = question.choices.filter(choice => choice.correct).length;
      if (question.choices.length === 0) {
        errors.push(new MissingFieldError('no choices', location));
      } else if (correct === 0) {
        errors.push(
          new TypeConstraintError('expected at least 1 correct choice, found 0', location)
        );
      }
      break;
    }

    case 'numeric':
      if (question.answer === undefined) {
        errors.push(new MissingFieldError('missing numeric answer', location));
      } else {
        errors.push(...validateNumericAnswer(question.answer, location));
      }
      break;

    case 'short-answer':
      if (question.answers.length === 0) {
        errors.push(new MissingFieldError('no acceptable answers', location));
      }
      break;

    case 'text-stimulus':
      if (FEEDBACK_KINDS.some(kind => question.feedback[kind] !== undefined)) {
        errors.push(new TypeConstraintError('text stimulus cannot carry feedback', location));
      }
      break;

    case 'essay':
    case 'file-upload':
      break;
  }

  return errors;
}

function validatePoints(question: Question, location: ErrorLocation): QuizError[] {
  const { points } = question;

  if (!isGradeable(question.type)) {
    return points === undefined
      ? []
      : [new TypeConstraintError('text stimulus cannot carry points', location)];
  }

  if (points === undefined) {
    return [new MissingFieldError('missing points', location)];
  }
  if (!Number.isFinite(points) || points < 0) {
    return [
      new TypeConstraintError(
        `points must be a finite non-negative number, found ${points}`,
        location
      ),
    ];
  }
  if (!Number.isInteger(points * 2)) {
    return [
      new TypeConstraintError(`points must be a whole or half number, found ${points}`, location),
    ];
  }
  return [];
}

function validateNumericAnswer(answer: NumericAnswer, location: ErrorLocation): QuizError[] {
  if (answer.kind === 'range') {
    if (!Number.isFinite(answer.min) || !Number.isFinite(answer.max)) {
      return [new TypeConstraintError('numeric range bounds must be finite numbers', location)];
    }
    if (answer.min > answer.max) {
      return [
        new TypeConstraintError(
          `numeric range minimum ${answer.min} exceeds maximum ${answer.max}`,
          location
        ),
      ];
    }
    return [];
  }

  if (!Number.isFinite(answer.value)) {
    return [new TypeConstraintError('numeric answer must be a finite number', location)];
  }
  if (answer.tolerance === undefined) {
    return [
      new MissingFieldError(
        "numeric answer has no tolerance; write '= <value> +- <tolerance>'",
        location
      ),
    ];
  }
  if (!Number.isFinite(answer.tolerance) || answer.tolerance < 0) {
    return [
      new TypeConstraintError(
        `tolerance must be a non-negative number, found ${answer.tolerance}`,
        location
      ),
    ];
  }
  return [];
}
