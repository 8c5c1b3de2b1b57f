/**
 * Markdown Quiz Serializer
 *
 * Writes a Quiz Model in the canonical Markdown quiz layout. Question numbers
 * are recomputed from position, counting only numbered (non-text) questions.
 */

import { Annotation, Annotations } from '../models/annotation.model';
import {
  Choice,
  FeedbackKind,
  MARKDOWN_TYPE_CODES,
  NumericAnswer,
  OPTION_LABELS,
  Question,
  Quiz,
  RichText,
} from '../models/quiz.model';
import { formatNumber, formatNumericSpec } from '../utils/text-formatters';
import { DocumentBuilder } from './document-builder';

const FEEDBACK_ORDER: FeedbackKind[] = ['correct', 'incorrect', 'general', 'information'];

const FEEDBACK_LABELS: Record<FeedbackKind, string> = {
  correct: 'Correct',
  incorrect: 'Incorrect',
  general: 'General',
  information: 'Information',
};

/**
 * Render a comment as an HTML comment
 */
export function renderMarkdownComment(annotation: Annotation): string[] {
  if (annotation.style === 'block') {
    return ['<!--', ...annotation.text, '-->'];
  }
  const text = annotation.text.join(' ');
  return [text === '' ? '<!-- -->' : `<!-- ${text} -->`];
}

/**
 * Serialize a quiz to Markdown
 */
export function writeMarkdown(quiz: Quiz, annotations: Annotations = []): string {
  const doc = new DocumentBuilder(annotations, renderMarkdownComment);

  if (quiz.title !== undefined) {
    doc.element({ scope: 'quiz', element: 'title' }, `# ${quiz.title}`.trimEnd());
  }

  doc.separate();
  quiz.description.forEach((line, index) => {
    doc.element({ scope: 'quiz', element: 'description', line: index }, line);
  });

  doc.separate();
  quiz.options.forEach((option, index) => {
    const setting = `${OPTION_LABELS[option.name]}: ${option.value}`;
    doc.element(
      { scope: 'quiz', element: 'option', index },
      option.hidden ? `<!--# ${setting} -->` : `> ${setting}`
    );
  });

  let number = 0;
  for (const question of quiz.questions) {
    if (question.type !== 'text-stimulus') {
      number++;
    }
    writeQuestion(doc, question, number);
  }

  return doc.finish();
}

/**
 * `## N. Title (points: P) {type=code}`; text stimuli carry no number or
 * points
 */
export function formatQuestionHeader(question: Question, number: number): string {
  const attributes = `{type=${MARKDOWN_TYPE_CODES[question.type]}}`;
  if (question.type === 'text-stimulus') {
    return ['##', question.title, attributes].filter(part => part !== '').join(' ');
  }

  const points = question.points === undefined ? '' : `(points: ${formatNumber(question.points)})`;
  return ['##', `${number}.`, question.title, points, attributes]
    .filter(part => part !== '')
    .join(' ');
}

function writeQuestion(doc: DocumentBuilder, question: Question, number: number): void {
  const position = question.position;

  doc.separate().element(
    { scope: 'question', question: position, element: 'header' },
    formatQuestionHeader(question, number)
  );

  doc.separate();
  question.prompt.forEach((line, index) => {
    doc.element({ scope: 'question', question: position, element: 'prompt', line: index }, line);
  });

  doc.separate();
  switch (question.type) {
    case 'single-choice':
    case 'multi-choice':
      question.choices.forEach((choice, index) => {
        doc.element(
          { scope: 'question', question: position, element: 'choice', index },
          ...formatChoice(choice)
        );
      });
      break;

    case 'numeric':
      if (question.answer) {
        doc.element(
          { scope: 'question', question: position, element: 'answer', index: 0 },
          '### Answer',
          '',
          formatNumericAnswer(question.answer)
        );
      }
      break;

    case 'short-answer':
      question.answers.forEach((answer, index) => {
        const heading = index === 0 ? ['### Answers', ''] : [];
        doc.element(
          { scope: 'question', question: position, element: 'answer', index },
          ...heading,
          `- ${answer}`
        );
      });
      break;

    case 'essay':
    case 'file-upload':
    case 'text-stimulus':
      break;
  }

  doc.separate();
  for (const kind of FEEDBACK_ORDER) {
    const lines = question.feedback[kind];
    if (lines) {
      doc.element(
        { scope: 'question', question: position, element: 'feedback', kind },
        ...formatFeedback(FEEDBACK_LABELS[kind], lines)
      );
    }
  }

  // Comments that sat in front of a plaintext response marker
  doc.element({ scope: 'question', question: position, element: 'response' });
}

function formatChoice(choice: Choice): string[] {
  const box = choice.correct ? '[x]' : '[ ]';
  const feedback = (choice.feedback ?? []).map(line => (line === '' ? '  >' : `  > ${line}`));
  return [`- ${box} ${choice.text}`.trimEnd(), ...feedback];
}

export function formatNumericAnswer(answer: NumericAnswer): string {
  return `= ${formatNumericSpec(answer)}`;
}

function formatFeedback(label: string, lines: RichText): string[] {
  const [first = '', ...rest] = lines;
  return [
    `> ${label}: ${first}`.trimEnd(),
    ...rest.map(line => (line === '' ? '>' : `> ${line}`)),
  ];
}
