/**
 * Quiz Validator Tests
 */

import { createEmptyQuiz, createQuestion, Question, Quiz } from '../models/quiz.model';
import { MissingFieldError, TypeConstraintError } from '../parsers/parser-result';
import { FULL_QUIZ } from '../testing/quiz-fixtures';
import { checkQuiz, MAX_SINGLE_CHOICES, validate } from './quiz-validator';

function quizOf(...questions: Question[]): Quiz {
  return { ...createEmptyQuiz(), questions };
}

function messages(quiz: Quiz): string[] {
  return checkQuiz(quiz).errors.map(error => error.message);
}

const singleChoice = (correct: boolean[]): Question => ({
  type: 'single-choice',
  position: 1,
  title: 'Q',
  points: 1,
  prompt: ['Pick one.'],
  feedback: {},
  choices: correct.map((isCorrect, index) => ({ text: `choice ${index}`, correct: isCorrect })),
});

describe('quiz-validator', () => {
  describe('checkQuiz', () => {
    it('should accept a well-formed quiz', () => {
      expect(checkQuiz(FULL_QUIZ)).toEqual({ valid: true, errors: [] });
    });

    it('should not change the model', () => {
      const quiz = quizOf(singleChoice([true, true]));
      const before = JSON.stringify(quiz);

      checkQuiz(quiz);
      checkQuiz(quiz);

      expect(JSON.stringify(quiz)).toBe(before);
    });

    it('should require exactly one correct single-choice answer', () => {
      expect(messages(quizOf(singleChoice([true, true])))).toEqual([
        'Question 1: expected exactly 1 correct choice, found 2',
      ]);
      expect(messages(quizOf(singleChoice([false, false])))).toEqual([
        'Question 1: expected exactly 1 correct choice, found 0',
      ]);
    });

    it('should prefix the source line when locations are given', () => {
      const { errors } = checkQuiz(quizOf(singleChoice([true, true])), {
        questions: [12],
        options: [],
      });

      expect(errors[0]).toBeInstanceOf(TypeConstraintError);
      expect(errors[0].message).toBe('Question 1 (line 12): expected exactly 1 correct choice, found 2');
    });

    it('should limit single-choice questions to the plaintext letters', () => {
      const correct = Array.from({ length: MAX_SINGLE_CHOICES + 1 }, (_, index) => index === 0);

      expect(messages(quizOf(singleChoice(correct)))).toEqual([
        'Question 1: 27 choices; at most 26 are allowed',
      ]);
    });

    it('should reject choice questions without choices', () => {
      expect(messages(quizOf(singleChoice([])))).toEqual(['Question 1: no choices']);
    });

    it('should require at least one correct multi-choice answer', () => {
      const question: Question = {
        type: 'multi-choice',
        position: 1,
        title: 'Q',
        points: 1,
        prompt: ['Pick.'],
        feedback: {},
        choices: [
          { text: 'a', correct: false },
          { text: 'b', correct: false },
        ],
      };

      expect(messages(quizOf(question))).toEqual([
        'Question 1: expected at least 1 correct choice, found 0',
      ]);
    });

    it('should allow every multi-choice answer to be correct', () => {
      const question: Question = {
        type: 'multi-choice',
        position: 1,
        title: 'Q',
        points: 1,
        prompt: ['Pick.'],
        feedback: {},
        choices: [
          { text: 'a', correct: true },
          { text: 'b', correct: true },
        ],
      };

      expect(checkQuiz(quizOf(question)).valid).toBe(true);
    });

    it('should require points on gradeable questions', () => {
      const question = createQuestion('essay', { position: 1, title: '', prompt: ['Discuss.'] });
      const { errors } = checkQuiz(quizOf(question));

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(MissingFieldError);
      expect(errors[0].message).toBe('Question 1: missing points');
    });

    it('should reject negative points', () => {
      const question = createQuestion('essay', {
        position: 1,
        title: '',
        points: -1,
        prompt: ['Discuss.'],
      });

      expect(messages(quizOf(question))).toEqual([
        'Question 1: points must be a finite non-negative number, found -1',
      ]);
    });

    it('should reject points that are not a whole or half number', () => {
      const question = createQuestion('essay', {
        position: 1,
        title: '',
        points: 0.3,
        prompt: ['Discuss.'],
      });

      expect(messages(quizOf(question))).toEqual([
        'Question 1: points must be a whole or half number, found 0.3',
      ]);
    });

    it('should accept half points', () => {
      const question = createQuestion('essay', {
        position: 1,
        title: '',
        points: 2.5,
        prompt: ['Discuss.'],
      });

      expect(checkQuiz(quizOf(question)).valid).toBe(true);
    });

    it('should accept zero points', () => {
      const question = createQuestion('essay', {
        position: 1,
        title: '',
        points: 0,
        prompt: ['Discuss.'],
      });

      expect(checkQuiz(quizOf(question)).valid).toBe(true);
    });

    it('should reject points and feedback on a text stimulus', () => {
      const question = createQuestion('text-stimulus', {
        position: 1,
        title: 'Passage',
        points: 1,
        prompt: ['Read.'],
        feedback: { general: ['Nothing to grade.'] },
      });

      expect(messages(quizOf(question))).toEqual([
        'Question 1: text stimulus cannot carry points',
        'Question 1: text stimulus cannot carry feedback',
      ]);
    });

    it('should require prompt text', () => {
      const question = createQuestion('file-upload', {
        position: 1,
        title: '',
        points: 1,
        prompt: [' '],
      });

      expect(messages(quizOf(question))).toEqual(['Question 1: missing prompt text']);
    });

    it('should require a numeric answer with a tolerance', () => {
      const missing: Question = {
        type: 'numeric',
        position: 1,
        title: '',
        points: 1,
        prompt: ['Value?'],
        feedback: {},
      };
      const bare: Question = { ...missing, position: 2, answer: { kind: 'tolerance', value: 5 } };

      expect(messages(quizOf(missing, bare))).toEqual([
        'Question 1: missing numeric answer',
        "Question 2: numeric answer has no tolerance; write '= <value> +- <tolerance>'",
      ]);
    });

    it('should reject a negative tolerance and an inverted range', () => {
      const negative: Question = {
        type: 'numeric',
        position: 1,
        title: '',
        points: 1,
        prompt: ['Value?'],
        feedback: {},
        answer: { kind: 'tolerance', value: 5, tolerance: -0.5 },
      };
      const inverted: Question = {
        ...negative,
        position: 2,
        answer: { kind: 'range', min: 3, max: 2 },
      };

      expect(messages(quizOf(negative, inverted))).toEqual([
        'Question 1: tolerance must be a non-negative number, found -0.5',
        'Question 2: numeric range minimum 3 exceeds maximum 2',
      ]);
    });

    it('should require at least one short answer', () => {
      const question = createQuestion('short-answer', {
        position: 1,
        title: '',
        points: 1,
        prompt: ['City?'],
      });

      expect(messages(quizOf(question))).toEqual(['Question 1: no acceptable answers']);
    });

    it('should collect errors from every question', () => {
      const first = singleChoice([false]);
      const second = { ...singleChoice([true, true]), position: 2 };

      expect(messages(quizOf(first, second))).toEqual([
        'Question 1: expected exactly 1 correct choice, found 0',
        'Question 2: expected exactly 1 correct choice, found 2',
      ]);
    });

    it('should reject repeated quiz options at their source line', () => {
      const quiz: Quiz = {
        ...createEmptyQuiz(),
        options: [
          { name: 'shuffle-answers', value: true },
          { name: 'shuffle-answers', value: false },
        ],
      };

      expect(checkQuiz(quiz, { questions: [], options: [1, 2] }).errors.map(e => e.message)).toEqual([
        "Line 2: quiz option 'shuffle answers' given more than once",
      ]);
    });
  });

  describe('validate', () => {
    it('should throw the first violation', () => {
      const first = singleChoice([false]);
      const second = { ...singleChoice([true, true]), position: 2 };

      expect(() => validate(quizOf(first, second))).toThrow(
        'Question 1: expected exactly 1 correct choice, found 0'
      );
    });

    it('should return quietly for a valid quiz', () => {
      expect(() => validate(FULL_QUIZ)).not.toThrow();
    });
  });
});
