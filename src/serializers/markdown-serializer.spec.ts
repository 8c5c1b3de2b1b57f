/**
 * Markdown Serializer Tests
 */

import { Annotation } from '../models/annotation.model';
import { createEmptyQuiz, createQuestion, Question, Quiz } from '../models/quiz.model';
import { FULL_MARKDOWN, FULL_QUIZ } from '../testing/quiz-fixtures';
import {
  formatNumericAnswer,
  formatQuestionHeader,
  renderMarkdownComment,
  writeMarkdown,
} from './markdown-serializer';

const md = (...lines: string[]): string => lines.join('\n') + '\n';

function quizOf(...questions: Question[]): Quiz {
  return { ...createEmptyQuiz(), questions };
}

describe('markdown-serializer', () => {
  describe('writeMarkdown', () => {
    it('should write the canonical layout', () => {
      expect(writeMarkdown(FULL_QUIZ)).toBe(FULL_MARKDOWN);
    });

    it('should renumber questions by position, skipping text stimuli', () => {
      const quiz = quizOf(
        createQuestion('text-stimulus', { position: 1, number: 9, title: 'Intro', prompt: ['Read.'] }),
        createQuestion('essay', { position: 2, number: 4, title: 'A', points: 1, prompt: ['x'] }),
        createQuestion('essay', { position: 3, number: 4, title: 'B', points: 1, prompt: ['y'] })
      );

      expect(writeMarkdown(quiz)).toBe(
        md(
          '## Intro {type=text}',
          '',
          'Read.',
          '',
          '## 1. A (points: 1) {type=essay}',
          '',
          'x',
          '',
          '## 2. B (points: 1) {type=essay}',
          '',
          'y'
        )
      );
    });

    it('should write multi-line feedback as blockquote continuations', () => {
      const question: Question = {
        type: 'single-choice',
        position: 1,
        title: 'Q',
        points: 1,
        prompt: ['Pick.'],
        feedback: { general: ['First.', '', 'Second.'] },
        choices: [{ text: 'a', correct: true, feedback: ['Yes.', '', 'Really.'] }],
      };

      expect(writeMarkdown(quizOf(question))).toBe(
        md(
          '## 1. Q (points: 1) {type=mc}',
          '',
          'Pick.',
          '',
          '- [x] a',
          '  > Yes.',
          '  >',
          '  > Really.',
          '',
          '> General: First.',
          '>',
          '> Second.'
        )
      );
    });

    it('should re-insert comments before their elements', () => {
      const annotations: Annotation[] = [
        {
          anchor: { scope: 'question', question: 1, element: 'answer', index: 1 },
          style: 'line',
          text: ['lowercase too'],
          blankBefore: false,
        },
        {
          anchor: { scope: 'question', question: 1, element: 'response' },
          style: 'block',
          text: ['kept at the end'],
          blankBefore: true,
        },
      ];
      const question: Question = {
        type: 'short-answer',
        position: 1,
        title: 'Capital',
        points: 1,
        prompt: ['Capital of France?'],
        feedback: {},
        answers: ['Paris', 'paris'],
      };

      expect(writeMarkdown(quizOf(question), annotations)).toBe(
        md(
          '## 1. Capital (points: 1) {type=fill}',
          '',
          'Capital of France?',
          '',
          '### Answers',
          '',
          '- Paris',
          '<!-- lowercase too -->',
          '- paris',
          '',
          '<!--',
          'kept at the end',
          '-->'
        )
      );
    });

    it('should write an empty quiz as a single newline', () => {
      expect(writeMarkdown(createEmptyQuiz())).toBe('\n');
    });

    it('should write hidden options as comments and information feedback last', () => {
      const quiz: Quiz = {
        title: 'T',
        description: [],
        options: [
          { name: 'shuffle-answers', value: true, hidden: true },
          { name: 'cant-go-back', value: false },
        ],
        questions: [
          {
            type: 'numeric',
            position: 1,
            title: 'Q',
            points: 1,
            prompt: ['Value?'],
            feedback: { information: ['Counts twice.'], general: ['See notes.'] },
            answer: { kind: 'tolerance', value: 100, tolerance: 5, percent: true },
          },
        ],
      };

      expect(writeMarkdown(quiz)).toBe(
        md(
          '# T',
          '',
          '<!--# shuffle answers: true -->',
          "> can't go back: false",
          '',
          '## 1. Q (points: 1) {type=num}',
          '',
          'Value?',
          '',
          '### Answer',
          '',
          '= 100 +- 5%',
          '',
          '> General: See notes.',
          '> Information: Counts twice.'
        )
      );
    });

    it('should keep the blank line after a comment', () => {
      const quiz = quizOf(
        createQuestion('essay', { position: 1, title: 'A', points: 1, prompt: ['x'] }),
        createQuestion('essay', { position: 2, title: 'B', points: 1, prompt: ['y'] })
      );
      const annotations: Annotation[] = [
        {
          anchor: { scope: 'question', question: 2, element: 'header' },
          style: 'line',
          text: ['about B'],
          blankBefore: false,
          blankAfter: true,
        },
      ];

      expect(writeMarkdown(quiz, annotations)).toBe(
        md(
          '## 1. A (points: 1) {type=essay}',
          '',
          'x',
          '<!-- about B -->',
          '',
          '## 2. B (points: 1) {type=essay}',
          '',
          'y'
        )
      );
    });
  });

  describe('formatQuestionHeader', () => {
    it('should leave out points that are not set', () => {
      const question = createQuestion('essay', { position: 1, title: 'Essay' });

      expect(formatQuestionHeader(question, 3)).toBe('## 3. Essay {type=essay}');
    });

    it('should leave out an empty title', () => {
      const question = createQuestion('file-upload', { position: 1, title: '', points: 2.5 });

      expect(formatQuestionHeader(question, 1)).toBe('## 1. (points: 2.5) {type=file}');
    });
  });

  describe('formatNumericAnswer', () => {
    it('should write each numeric answer form', () => {
      expect(formatNumericAnswer({ kind: 'tolerance', value: 3.14, tolerance: 0.01 })).toBe(
        '= 3.14 +- 0.01'
      );
      expect(formatNumericAnswer({ kind: 'tolerance', value: -0 })).toBe('= 0');
      expect(formatNumericAnswer({ kind: 'range', min: 1, max: 2.5 })).toBe('= [1, 2.5]');
      expect(
        formatNumericAnswer({ kind: 'tolerance', value: 100, tolerance: 5, percent: true })
      ).toBe('= 100 +- 5%');
    });
  });

  describe('renderMarkdownComment', () => {
    it('should render line and block comments', () => {
      const anchor = { scope: 'end' } as const;

      expect(
        renderMarkdownComment({ anchor, style: 'line', text: ['note'], blankBefore: false })
      ).toEqual(['<!-- note -->']);
      expect(renderMarkdownComment({ anchor, style: 'line', text: [''], blankBefore: false })).toEqual(
        ['<!-- -->']
      );
      expect(
        renderMarkdownComment({ anchor, style: 'block', text: ['a', 'b'], blankBefore: false })
      ).toEqual(['<!--', 'a', 'b', '-->']);
    });
  });
});
