/**
 * Plaintext Quiz Parser
 *
 * Reads the text2qti plaintext grammar: a `Quiz title:` / `Quiz description:`
 * preamble with option lines, then questions made of optional `Title:` and
 * `Points:` lines, a numbered stem, feedback lines and one answer payload.
 * Continuation lines are indented four spaces. `%` lines and
 * `COMMENT` / `END_COMMENT` blocks go to the annotation side-channel.
 */

import { Anchor } from '../models/annotation.model';
import {
  ChoiceQuestion,
  createEmptyQuiz,
  createQuestion,
  FeedbackKind,
  optionNameFromLabel,
  Question,
  QuestionBase,
  QuestionFeedback,
  Quiz,
  QuizOptionName,
  ShortAnswerQuestion,
} from '../models/quiz.model';
import {
  AnnotationRecorder,
  CommentSyntax,
  isBlank,
  isComment,
  LineCursor,
  parseBoolean,
  parseNumericAnswer,
  parsePoints,
  readComment,
  RichTextCollector,
  splitLines,
  textAfterMarker,
  trimBlankEdges,
} from './base-parser';
import {
  ReadResult,
  SourceLocations,
  StructuralError,
  TypeConstraintError,
} from './parser-result';

/**
 * `% text` lines, or `COMMENT` and `END_COMMENT` on lines of their own.
 * Both must start in column 0, so indented continuation text may begin
 * with `%`.
 */
export const PLAINTEXT_COMMENTS: CommentSyntax = {
  single: line => {
    const match = /^%(.*)$/.exec(line);
    return match ? match[1].trim() : undefined;
  },
  opens: line => line.trimEnd() === 'COMMENT',
  closes: line => line.trimEnd() === 'END_COMMENT',
  closer: 'END_COMMENT',
};

const QUIZ_TITLE = /^Quiz title:\s*(.*?)\s*$/;
const QUIZ_DESCRIPTION = /^Quiz description:/;
const OPTION = /^([A-Za-z][A-Za-z'’ ]*?)\s*:\s*(.*?)\s*$/;
const TITLE = /^Title:\s*(.*?)\s*$/;
const POINTS = /^Points:\s*(.*?)\s*$/;
const STEM = /^(\d+)\.(?=\s|$)/;
const TEXT_TITLE = /^Text title:\s*(.*?)\s*$/;
const TEXT = /^Text:/;
const CONTINUATION = /^ {4}(.*?)\s*$/;
const SINGLE_CHOICE = /^(\*?)([a-zA-Z])\)(?:\s+(.*?))?\s*$/;
const MULTI_CHOICE = /^\[([ *])\](?:\s+(.*?))?\s*$/;
const NUMERIC = /^=(?:\s+(.*?))?\s*$/;
const SHORT_ANSWER = /^\*(?:\s+(.*?))?\s*$/;
const ESSAY = /^_{4,}\s*$/;
const FILE_UPLOAD = /^\^{4,}\s*$/;
const GENERAL_FEEDBACK = /^\.\.\.(?:\s+(.*?))?\s*$/;

const FEEDBACK_MARKERS: Array<[RegExp, FeedbackKind]> = [
  [GENERAL_FEEDBACK, 'general'],
  [/^\+(?:\s+(.*?))?\s*$/, 'correct'],
  [/^-(?:\s+(.*?))?\s*$/, 'incorrect'],
  [/^!(?:\s+(.*?))?\s*$/, 'information'],
];

const QUESTION_START = [TITLE, POINTS, STEM, TEXT_TITLE, TEXT];

type ChoiceStyle = 'letter' | 'checkbox';

/**
 * Parse a text2qti plaintext quiz
 */
export function readPlaintext(content: string): ReadResult {
  return new PlaintextQuizReader(splitLines(content)).read();
}

function startsQuestion(line: string): boolean {
  return QUESTION_START.some(pattern => pattern.test(line));
}

function feedbackMarker(line: string): { kind: FeedbackKind; text: string } | undefined {
  for (const [pattern, kind] of FEEDBACK_MARKERS) {
    const match = pattern.exec(line);
    if (match) {
      return { kind, text: match[1] ?? '' };
    }
  }
  return undefined;
}

function parseChoice(
  line: string
): { style: ChoiceStyle; text: string; correct: boolean } | undefined {
  const letter = SINGLE_CHOICE.exec(line);
  if (letter) {
    return { style: 'letter', text: letter[3] ?? '', correct: letter[1] === '*' };
  }
  const checkbox = MULTI_CHOICE.exec(line);
  if (checkbox) {
    return { style: 'checkbox', text: checkbox[2] ?? '', correct: checkbox[1] === '*' };
  }
  return undefined;
}

function isContinuation(line: string): boolean {
  return CONTINUATION.test(line) && !isBlank(line);
}

class PlaintextQuizReader {
  private readonly cursor: LineCursor;
  private readonly recorder = new AnnotationRecorder();
  private readonly quiz: Quiz = createEmptyQuiz();
  private readonly locations: SourceLocations = { questions: [], options: [] };

  constructor(lines: string[]) {
    this.cursor = new LineCursor(lines);
  }

  read(): ReadResult {
    this.readPreamble();

    for (;;) {
      this.skipTrivia();
      const line = this.cursor.peek();
      if (line === undefined) break;

      if (TEXT_TITLE.test(line) || TEXT.test(line)) {
        this.readTextRegion();
      } else if (startsQuestion(line)) {
        this.readQuestion();
      } else {
        throw new StructuralError(
          `unexpected content between questions: '${line.trim()}'; expected 'Title:', ` +
            "'Points:', a numbered stem or 'Text:'",
          { line: this.cursor.lineNumber }
        );
      }
    }

    this.recorder.attach({ scope: 'end' });
    return {
      quiz: this.quiz,
      annotations: this.recorder.annotations,
      locations: this.locations,
    };
  }

  // ===========================================================================
  // Preamble
  // ===========================================================================

  private readPreamble(): void {
    this.skipTrivia();

    const title = this.matchCurrent(QUIZ_TITLE);
    if (title) {
      this.recorder.attach({ scope: 'quiz', element: 'title' });
      this.quiz.title = title[1];
      this.cursor.next();
      this.skipTrivia();
    }

    const description = this.matchCurrent(QUIZ_DESCRIPTION);
    if (description) {
      const text = new RichTextCollector();
      const first = textAfterMarker(description.input, description[0].length);
      if (first !== '') {
        this.recorder.attach({ scope: 'quiz', element: 'description', line: text.text(first) });
      }
      this.cursor.next();
      this.readContinuation(text, line => ({ scope: 'quiz', element: 'description', line }));
      this.quiz.description = text.lines;
    }

    this.readOptions();
  }

  private readOptions(): void {
    const seen = new Set<QuizOptionName>();

    for (;;) {
      this.skipTrivia();
      const line = this.cursor.peek();
      if (line === undefined || startsQuestion(line)) return;

      const match = OPTION.exec(line);
      if (!match) return;

      const lineNumber = this.cursor.lineNumber;
      const [, label, raw] = match;
      const name = optionNameFromLabel(label);
      if (!name) {
        throw new TypeConstraintError(`unknown quiz option '${label}'`, { line: lineNumber });
      }
      if (seen.has(name)) {
        throw new TypeConstraintError(`quiz option '${label}' given more than once`, {
          line: lineNumber,
        });
      }
      const value = parseBoolean(raw);
      if (value === undefined) {
        throw new TypeConstraintError(
          `quiz option '${label}' expects true or false, found '${raw}'`,
          { line: lineNumber }
        );
      }

      seen.add(name);
      this.recorder.attach({ scope: 'quiz', element: 'option', index: this.quiz.options.length });
      this.quiz.options.push({ name, value });
      this.locations.options.push(lineNumber);
      this.cursor.next();
    }
  }

  // ===========================================================================
  // Questions
  // ===========================================================================

  private readQuestion(): void {
    const position = this.quiz.questions.length + 1;
    const headerLine = this.cursor.lineNumber;
    const header: Anchor = { scope: 'question', question: position, element: 'header' };
    let headerAttached = false;
    const attachHeader = (): void => {
      if (!headerAttached) {
        this.recorder.attach(header);
        headerAttached = true;
      }
    };

    let title = '';
    const titleMatch = this.matchCurrent(TITLE);
    if (titleMatch) {
      attachHeader();
      title = titleMatch[1];
      this.cursor.next();
      this.skipTrivia();
    }

    let points: number | undefined;
    const pointsMatch = this.matchCurrent(POINTS);
    if (pointsMatch) {
      attachHeader();
      points = parsePoints(pointsMatch[1], { line: this.cursor.lineNumber, position });
      this.cursor.next();
      this.skipTrivia();
    }

    const stem = this.matchCurrent(STEM);
    if (!stem) {
      throw new StructuralError("expected a numbered question stem such as '1.  What is...'", {
        line: this.cursor.lineNumber,
        position,
      });
    }
    attachHeader();

    const prompt = new RichTextCollector();
    const promptAnchor = (line: number): Anchor => ({
      scope: 'question',
      question: position,
      element: 'prompt',
      line,
    });
    const first = textAfterMarker(stem.input, stem[0].length);
    if (first !== '') {
      this.recorder.attach(promptAnchor(prompt.text(first)));
    }
    this.cursor.next();
    this.readContinuation(prompt, promptAnchor);

    const feedback = this.readFeedback(position);
    const question = this.readPayload({
      position,
      number: parseInt(stem[1], 10),
      title,
      points,
      prompt: prompt.lines,
      feedback,
    });

    this.quiz.questions.push(question);
    this.locations.questions.push(headerLine);
    this.checkQuestionEnd(position);
  }

  /**
   * `...`, `+`, `-` and `!` lines ahead of the answers, each with continuations
   */
  private readFeedback(position: number): QuestionFeedback {
    const feedback: QuestionFeedback = {};

    for (;;) {
      this.skipTrivia();
      const line = this.cursor.peek();
      const marker = line === undefined ? undefined : feedbackMarker(line);
      if (!marker) break;

      if (feedback[marker.kind]) {
        throw new StructuralError(`${marker.kind} feedback given more than once`, {
          line: this.cursor.lineNumber,
          position,
        });
      }
      this.recorder.attach({
        scope: 'question',
        question: position,
        element: 'feedback',
        kind: marker.kind,
      });
      this.cursor.next();
      feedback[marker.kind] = this.readFeedbackText(marker.text);
    }

    return feedback;
  }

  private readPayload(base: QuestionBase): Question {
    const position = base.position;
    this.skipTrivia();
    const line = this.cursor.peek();

    if (line !== undefined) {
      const choice = parseChoice(line);
      if (choice) {
        const question: ChoiceQuestion = {
          ...base,
          type: choice.style === 'letter' ? 'single-choice' : 'multi-choice',
          choices: [],
        };
        this.readChoices(question, choice.style);
        return question;
      }

      const numeric = NUMERIC.exec(line);
      if (numeric) {
        this.recorder.attach({ scope: 'question', question: position, element: 'answer', index: 0 });
        const answer = parseNumericAnswer(numeric[1] ?? '', {
          line: this.cursor.lineNumber,
          position,
        });
        this.cursor.next();
        return { ...base, type: 'numeric', answer };
      }

      if (SHORT_ANSWER.test(line)) {
        const question: ShortAnswerQuestion = { ...base, type: 'short-answer', answers: [] };
        this.readShortAnswers(question.answers, position);
        return question;
      }

      if (ESSAY.test(line) || FILE_UPLOAD.test(line)) {
        this.recorder.attach({ scope: 'question', question: position, element: 'response' });
        this.cursor.next();
        return { ...base, type: ESSAY.test(line) ? 'essay' : 'file-upload' };
      }
    }

    throw new StructuralError(
      line === undefined || startsQuestion(line)
        ? 'question has no answers; expected choices, =, *, ____ or ^^^^'
        : `expected an indented stem continuation, feedback or answers; found '${line.trim()}'`,
      { line: this.cursor.lineNumber, position }
    );
  }

  private readChoices(question: ChoiceQuestion, style: ChoiceStyle): void {
    const position = question.position;

    for (;;) {
      this.skipTrivia();
      const line = this.cursor.peek();
      const choice = line === undefined ? undefined : parseChoice(line);
      if (!choice) return;

      if (choice.style !== style) {
        throw new StructuralError("mixed choice styles: 'a)' and '[ ]' choices in one question", {
          line: this.cursor.lineNumber,
          position,
        });
      }

      this.recorder.attach({
        scope: 'question',
        question: position,
        element: 'choice',
        index: question.choices.length,
      });
      this.cursor.next();

      const next = this.cursor.peek();
      if (next !== undefined && isContinuation(next)) {
        throw new StructuralError(
          `choice ${question.choices.length + 1} has continuation lines; choice text must fit on one line`,
          { line: this.cursor.lineNumber, position }
        );
      }

      const general = next === undefined ? null : GENERAL_FEEDBACK.exec(next);
      if (general) {
        this.cursor.next();
        question.choices.push({
          text: choice.text,
          correct: choice.correct,
          feedback: this.readFeedbackText(general[1] ?? ''),
        });
      } else {
        question.choices.push({ text: choice.text, correct: choice.correct });
      }
    }
  }

  private readShortAnswers(answers: string[], position: number): void {
    for (;;) {
      this.skipTrivia();
      const match = this.matchCurrent(SHORT_ANSWER);
      if (!match) return;

      this.recorder.attach({
        scope: 'question',
        question: position,
        element: 'answer',
        index: answers.length,
      });
      answers.push(match[1] ?? '');
      this.cursor.next();
    }
  }

  private readTextRegion(): void {
    const position = this.quiz.questions.length + 1;
    const headerLine = this.cursor.lineNumber;
    this.recorder.attach({ scope: 'question', question: position, element: 'header' });

    let title = '';
    const titleMatch = this.matchCurrent(TEXT_TITLE);
    if (titleMatch) {
      title = titleMatch[1];
      this.cursor.next();
      this.skipTrivia();
    }

    const textMatch = this.matchCurrent(TEXT);
    if (!textMatch) {
      throw new StructuralError("expected 'Text:' after 'Text title:'", {
        line: this.cursor.lineNumber,
        position,
      });
    }

    const prompt = new RichTextCollector();
    const promptAnchor = (line: number): Anchor => ({
      scope: 'question',
      question: position,
      element: 'prompt',
      line,
    });
    const first = textAfterMarker(textMatch.input, textMatch[0].length);
    if (first !== '') {
      this.recorder.attach(promptAnchor(prompt.text(first)));
    }
    this.cursor.next();
    this.readContinuation(prompt, promptAnchor);

    this.quiz.questions.push(
      createQuestion('text-stimulus', { position, title, prompt: prompt.lines })
    );
    this.locations.questions.push(headerLine);
    this.checkQuestionEnd(position);
  }

  private checkQuestionEnd(position: number): void {
    this.skipTrivia();
    const line = this.cursor.peek();
    if (line !== undefined && !startsQuestion(line)) {
      throw new StructuralError(`unexpected content: '${line.trim()}'`, {
        line: this.cursor.lineNumber,
        position,
      });
    }
  }

  // ===========================================================================
  // Shared scanning
  // ===========================================================================

  private matchCurrent(pattern: RegExp): RegExpExecArray | null {
    const line = this.cursor.peek();
    return line === undefined ? null : pattern.exec(line);
  }

  /**
   * Consume blank lines and comments, holding the comments for the next
   * element
   */
  private skipTrivia(): void {
    for (;;) {
      const line = this.cursor.peek();
      if (line === undefined) return;
      if (isBlank(line)) {
        this.cursor.next();
      } else if (isComment(line, PLAINTEXT_COMMENTS)) {
        this.recorder.hold(readComment(this.cursor, PLAINTEXT_COMMENTS));
      } else {
        return;
      }
    }
  }

  /**
   * Four-space continuation lines of a description or stem, with paragraph
   * breaks and comments between them
   */
  private readContinuation(text: RichTextCollector, anchor: (line: number) => Anchor): void {
    for (;;) {
      const line = this.cursor.peek();
      if (line === undefined) return;

      if (isBlank(line)) {
        this.cursor.next();
        text.blank();
      } else if (isComment(line, PLAINTEXT_COMMENTS)) {
        this.recorder.hold(readComment(this.cursor, PLAINTEXT_COMMENTS));
        text.comment();
      } else if (isContinuation(line)) {
        const blankIsContent = text.breaksParagraph;
        this.recorder.attach(anchor(text.text(line.slice(4).trimEnd())), blankIsContent);
        this.cursor.next();
      } else {
        return;
      }
    }
  }

  /**
   * Feedback text: the marker line and its continuations, which stop at the
   * first comment
   */
  private readFeedbackText(first: string): string[] {
    const lines = [first];
    let blanks = 0;

    for (;;) {
      const line = this.cursor.peek(blanks);
      if (line === undefined) break;
      if (isBlank(line)) {
        blanks++;
        continue;
      }
      if (!isContinuation(line)) break;

      for (; blanks > 0; blanks--) {
        this.cursor.next();
        lines.push('');
      }
      lines.push(line.slice(4).trimEnd());
      this.cursor.next();
    }

    return trimBlankEdges(lines);
  }
}
