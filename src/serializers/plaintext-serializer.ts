/**
 * Plaintext Quiz Serializer
 *
 * Writes a Quiz Model in the text2qti plaintext grammar. Feedback is written
 * ahead of the answers, as text2qti requires; markers are padded to four
 * columns and continuation lines are indented four spaces.
 */

import { Anchor, Annotation, Annotations } from '../models/annotation.model';
import {
  ChoiceQuestion,
  FeedbackKind,
  OPTION_LABELS,
  Question,
  Quiz,
  RichText,
} from '../models/quiz.model';
import {
  formatNumber,
  formatNumericSpec,
  markerBlock,
  MARKER_WIDTH,
  padMarker,
} from '../utils/text-formatters';
import { DocumentBuilder } from './document-builder';

const FEEDBACK_MARKERS: Array<[FeedbackKind, string]> = [
  ['general', '...'],
  ['correct', '+'],
  ['incorrect', '-'],
  ['information', '!'],
];

const CHOICE_LETTERS = 'abcdefghijklmnopqrstuvwxyz';

/**
 * Render a comment as `% text` or a `COMMENT` block
 */
export function renderPlaintextComment(annotation: Annotation): string[] {
  if (annotation.style === 'block') {
    return ['COMMENT', ...annotation.text, 'END_COMMENT'];
  }
  const text = annotation.text.join(' ');
  return [text === '' ? '%' : `% ${text}`];
}

/**
 * Serialize a quiz to text2qti plaintext
 */
export function writePlaintext(quiz: Quiz, annotations: Annotations = []): string {
  const doc = new DocumentBuilder(annotations, renderPlaintextComment);

  if (quiz.title !== undefined) {
    doc.element({ scope: 'quiz', element: 'title' }, `Quiz title: ${quiz.title}`.trimEnd());
  }

  writeBlock(doc, 'Quiz description:', quiz.description, line => ({
    scope: 'quiz',
    element: 'description',
    line,
  }));

  quiz.options.forEach((option, index) => {
    doc.element(
      { scope: 'quiz', element: 'option', index },
      `${OPTION_LABELS[option.name]}: ${option.value}`
    );
  });

  let number = 0;
  for (const question of quiz.questions) {
    doc.separate();
    if (question.type === 'text-stimulus') {
      writeTextRegion(doc, question);
    } else {
      number++;
      writeQuestion(doc, question, number);
    }
  }

  return doc.finish();
}

/**
 * One element per line so that annotations can sit between lines. The first
 * line follows `marker`; the rest are continuation lines.
 */
function writeBlock(
  doc: DocumentBuilder,
  marker: string,
  lines: RichText,
  anchor: (line: number) => Anchor
): void {
  lines.forEach((line, index) => {
    if (index === 0) {
      const lead = marker.endsWith(':') ? `${marker} ` : padMarker(marker);
      doc.element(anchor(index), `${lead}${line}`.trimEnd());
    } else {
      doc.element(anchor(index), line === '' ? '' : `${' '.repeat(MARKER_WIDTH)}${line}`);
    }
  });
}

function writeTextRegion(doc: DocumentBuilder, question: Question): void {
  const position = question.position;
  doc.element(
    { scope: 'question', question: position, element: 'header' },
    `Text title: ${question.title}`.trimEnd()
  );
  writePrompt(doc, 'Text:', question);
}

function writeQuestion(doc: DocumentBuilder, question: Question, number: number): void {
  const position = question.position;

  const header: string[] = [];
  if (question.title !== '') {
    header.push(`Title: ${question.title}`);
  }
  if (question.points !== undefined) {
    header.push(`Points: ${formatNumber(question.points)}`);
  }
  doc.element({ scope: 'question', question: position, element: 'header' }, ...header);

  writePrompt(doc, `${number}.`, question);

  for (const [kind, marker] of FEEDBACK_MARKERS) {
    const lines = question.feedback[kind];
    if (lines) {
      doc.element(
        { scope: 'question', question: position, element: 'feedback', kind },
        ...markerBlock(marker, lines)
      );
    }
  }

  switch (question.type) {
    case 'single-choice':
    case 'multi-choice':
      writeChoices(doc, question);
      break;

    case 'numeric':
      if (question.answer) {
        doc.element(
          { scope: 'question', question: position, element: 'answer', index: 0 },
          `${padMarker('=')}${formatNumericSpec(question.answer)}`
        );
      }
      break;

    case 'short-answer':
      question.answers.forEach((answer, index) => {
        doc.element(
          { scope: 'question', question: position, element: 'answer', index },
          `${padMarker('*')}${answer}`.trimEnd()
        );
      });
      break;

    case 'essay':
      doc.element({ scope: 'question', question: position, element: 'response' }, '____');
      break;

    case 'file-upload':
      doc.element({ scope: 'question', question: position, element: 'response' }, '^^^^');
      break;

    case 'text-stimulus':
      break;
  }
}

function writePrompt(doc: DocumentBuilder, marker: string, question: Question): void {
  const position = question.position;
  const anchor = (line: number): Anchor => ({
    scope: 'question',
    question: position,
    element: 'prompt',
    line,
  });

  if (question.prompt.length === 0) {
    doc.element(anchor(0), marker);
    return;
  }
  writeBlock(doc, marker, question.prompt, anchor);
}

function writeChoices(doc: DocumentBuilder, question: ChoiceQuestion): void {
  question.choices.forEach((choice, index) => {
    const marker =
      question.type === 'single-choice'
        ? `${choice.correct ? '*' : ''}${CHOICE_LETTERS.charAt(index)})`
        : choice.correct
          ? '[*]'
          : '[ ]';
    const feedback = choice.feedback ? markerBlock('...', choice.feedback) : [];

    doc.element(
      { scope: 'question', question: question.position, element: 'choice', index },
      `${padMarker(marker)}${choice.text}`.trimEnd(),
      ...feedback
    );
  });
}
