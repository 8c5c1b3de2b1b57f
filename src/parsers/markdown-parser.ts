/**
 * Markdown Quiz Parser
 *
 * Reads the Markdown quiz schema: an optional `# Title`, a description, a
 * blockquoted options block (or `<!--# option: value -->` comments), then
 * `## N. Title (points: P) {type=mc}`
 * question sections with checkbox choices, `### Answer(s)` sub-sections and
 * blockquoted feedback. HTML comments are captured into the annotation
 * side-channel.
 */

import { Anchor } from '../models/annotation.model';
import {
  Choice,
  ChoiceQuestion,
  createEmptyQuiz,
  createQuestion,
  FEEDBACK_KINDS,
  FeedbackKind,
  isChoiceQuestion,
  MARKDOWN_TYPE_CODES,
  NumericQuestion,
  optionNameFromLabel,
  Question,
  QuestionFeedback,
  QuestionType,
  Quiz,
  QuizOptionName,
  questionTypeFromCode,
  ShortAnswerQuestion,
} from '../models/quiz.model';
import {
  AnnotationRecorder,
  CommentSyntax,
  indentOf,
  isBlank,
  isComment,
  LineCursor,
  parseBoolean,
  parseNumericAnswer,
  parsePoints,
  readComment,
  RichTextCollector,
  splitLines,
  trimBlankEdges,
} from './base-parser';
import {
  ReadResult,
  SourceLocations,
  StructuralError,
  TypeConstraintError,
} from './parser-result';

/**
 * `<!-- text -->` on one line, or `<!--` and `-->` on lines of their own
 */
export const MARKDOWN_COMMENTS: CommentSyntax = {
  single: line => {
    const match = /^\s*<!--(.*?)-->\s*$/.exec(line);
    return match ? match[1].trim() : undefined;
  },
  opens: line => line.trim() === '<!--',
  closes: line => line.trim() === '-->',
  closer: '-->',
};

const TITLE = /^#(?:\s+(.*?))?\s*$/;
const QUESTION_HEADER = /^##(?:\s+(.*?))?\s*$/;
const ANSWER_HEADER = /^###\s+answers?\s*:?\s*$/i;
const TASK_ITEM = /^(\s*)-\s+\[([ xX])\](?:\s+(.*?))?\s*$/;
const BLOCKQUOTE = /^(\s*)>\s?(.*?)\s*$/;
const QUESTION_FEEDBACK = /^>\s?(.*?)\s*$/;
const FEEDBACK_PREFIX = /^(correct|incorrect|general|information)\s*:\s*(.*)$/i;
const OPTION = /^>\s*([^:]+?)\s*:\s*(.*?)\s*$/;
const HIDDEN_OPTION = /^\s*<!--#\s*([^:]+?)\s*:\s*(.*?)\s*-->\s*$/;
const BULLET = /^\s*-\s+(.*?)\s*$/;
const NUMERIC = /^=(.*)$/;

const ATTRIBUTES = /\{([^{}]*)\}$/;
const ATTRIBUTE = /^([A-Za-z][\w-]*)\s*=\s*(.*)$/;
const POINTS = /\(\s*points\s*:\s*([^)]*)\)/i;
const NUMBER_PREFIX = /^(\d+)\.(?:\s+|$)/;

const HEADER_ATTRIBUTES = ['type', 'points'] as const;

type HeaderAttribute = (typeof HEADER_ATTRIBUTES)[number];

interface ParsedHeader {
  type: QuestionType;
  number?: number;
  title: string;
  points?: number;
}

/**
 * Parse a Markdown quiz
 */
export function readMarkdown(content: string): ReadResult {
  return new MarkdownQuizReader(splitLines(content)).read();
}

/**
 * Parse the text of a `##` header (everything after the hashes)
 */
export function parseQuestionHeader(text: string, line: number): ParsedHeader {
  const attributeMatch = ATTRIBUTES.exec(text);
  if (!attributeMatch) {
    throw new StructuralError("question header has no '{type=...}' attribute block", { line });
  }
  const attributes = parseAttributes(attributeMatch[1], line);

  const code = attributes.get('type');
  if (code === undefined) {
    throw new StructuralError("question header is missing 'type=' in its attribute block", {
      line,
    });
  }
  const type = questionTypeFromCode(code);
  if (!type) {
    const known = Object.values(MARKDOWN_TYPE_CODES).join(', ');
    throw new StructuralError(`unrecognized question type '${code}'; expected one of ${known}`, {
      line,
    });
  }

  let rest = text.slice(0, attributeMatch.index).trim();
  let points: number | undefined;

  const pointsMatch = POINTS.exec(rest);
  if (pointsMatch) {
    points = parsePoints(pointsMatch[1], { line });
    const before = rest.slice(0, pointsMatch.index).trim();
    const after = rest.slice(pointsMatch.index + pointsMatch[0].length).trim();
    rest = [before, after].filter(part => part !== '').join(' ');
  }

  // {points=N} wins over (points: N)
  const pointsAttribute = attributes.get('points');
  if (pointsAttribute !== undefined) {
    points = parsePoints(pointsAttribute, { line });
  }

  let number: number | undefined;
  const numberMatch = NUMBER_PREFIX.exec(rest);
  if (numberMatch) {
    number = parseInt(numberMatch[1], 10);
    rest = rest.slice(numberMatch[0].length);
  }

  return { type, number, title: rest.trim(), points };
}

function parseAttributes(block: string, line: number): Map<HeaderAttribute, string> {
  const attributes = new Map<HeaderAttribute, string>();

  for (const part of block.split(',')) {
    const entry = part.trim();
    if (entry === '') continue;

    const match = ATTRIBUTE.exec(entry);
    if (!match) {
      throw new StructuralError(`malformed header attribute '${entry}'; expected key=value`, {
        line,
      });
    }

    const keyName = match[1].toLowerCase();
    const key = HEADER_ATTRIBUTES.find(name => name === keyName);
    if (!key) {
      throw new StructuralError(`unknown header attribute '${match[1]}'`, { line });
    }
    if (attributes.has(key)) {
      throw new StructuralError(`header attribute '${key}' given more than once`, { line });
    }
    attributes.set(key, match[2].trim().replace(/^(["'])(.*)\1$/, '$2'));
  }

  return attributes;
}

function feedbackKindFromLabel(label: string): FeedbackKind {
  switch (label.toLowerCase()) {
    case 'correct':
      return 'correct';
    case 'incorrect':
      return 'incorrect';
    case 'information':
      return 'information';
    default:
      return 'general';
  }
}

/**
 * `<!--# shuffle answers: true -->`: an option kept out of the rendered page.
 * Comments whose label is not an option stay comments.
 */
function matchHiddenOption(line: string): RegExpExecArray | null {
  const match = HIDDEN_OPTION.exec(line);
  return match && optionNameFromLabel(match[1]) ? match : null;
}

function isHiddenOption(line: string): boolean {
  return matchHiddenOption(line) !== null;
}

class MarkdownQuizReader {
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
      this.readQuestion(line);
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
    this.skipTrivia(isHiddenOption);

    const first = this.cursor.peek();
    const title = first === undefined ? null : TITLE.exec(first);
    if (title) {
      this.recorder.attach({ scope: 'quiz', element: 'title' });
      this.quiz.title = title[1] ?? '';
      this.cursor.next();
    }

    this.quiz.description = this.readRichText(
      line => QUESTION_HEADER.test(line) || OPTION.test(line) || isHiddenOption(line),
      line => ({ scope: 'quiz', element: 'description', line })
    );

    this.readOptions();
  }

  private readOptions(): void {
    const seen = new Set<QuizOptionName>();

    for (;;) {
      this.skipTrivia(isHiddenOption);
      const line = this.cursor.peek();
      if (line === undefined || QUESTION_HEADER.test(line)) return;

      const lineNumber = this.cursor.lineNumber;
      const hidden = matchHiddenOption(line);
      const match = hidden ?? OPTION.exec(line);
      if (!match) {
        throw new StructuralError(`unexpected content after quiz options: '${line.trim()}'`, {
          line: lineNumber,
        });
      }

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
      this.quiz.options.push(hidden ? { name, value, hidden: true } : { name, value });
      this.locations.options.push(lineNumber);
      this.cursor.next();
    }
  }

  // ===========================================================================
  // Questions
  // ===========================================================================

  private readQuestion(line: string): void {
    const lineNumber = this.cursor.lineNumber;
    const match = QUESTION_HEADER.exec(line);
    if (!match) {
      throw new StructuralError(`expected a '## ' question header, found '${line.trim()}'`, {
        line: lineNumber,
      });
    }

    const position = this.quiz.questions.length + 1;
    const header = parseQuestionHeader(match[1] ?? '', lineNumber);
    this.recorder.attach({ scope: 'question', question: position, element: 'header' });
    this.cursor.next();

    const question = createQuestion(header.type, {
      position,
      number: header.number,
      title: header.title,
      points: header.points,
    });
    this.quiz.questions.push(question);
    this.locations.questions.push(lineNumber);

    question.prompt = this.readRichText(
      text => this.endsPrompt(question, text),
      index => ({ scope: 'question', question: position, element: 'prompt', line: index })
    );

    if (isChoiceQuestion(question)) {
      this.readChoices(question);
    } else if (question.type === 'numeric') {
      this.readNumericAnswer(question);
    } else if (question.type === 'short-answer') {
      this.readShortAnswers(question);
    }

    this.readFeedback(question.feedback, position);

    this.skipTrivia();
    const next = this.cursor.peek();
    if (next !== undefined && !QUESTION_HEADER.test(next)) {
      throw new StructuralError(`unexpected content: '${next.trim()}'`, {
        line: this.cursor.lineNumber,
        position,
      });
    }
  }

  /**
   * Whether the line starts the part of the question after its prompt
   */
  private endsPrompt(question: Question, line: string): boolean {
    if (QUESTION_HEADER.test(line) || QUESTION_FEEDBACK.test(line)) {
      return true;
    }

    const location = { line: this.cursor.lineNumber, position: question.position };
    const code = MARKDOWN_TYPE_CODES[question.type];

    if (TASK_ITEM.test(line)) {
      if (isChoiceQuestion(question)) return true;
      throw new StructuralError(
        `checkbox item in a question of type '${code}'; only 'mc' and 'ma' questions have choices`,
        location
      );
    }

    if (ANSWER_HEADER.test(line)) {
      if (question.type === 'numeric' || question.type === 'short-answer') return true;
      throw new StructuralError(
        `'${line.trim()}' section in a question of type '${code}'; only 'num' and 'fill' questions have one`,
        location
      );
    }

    return false;
  }

  private readChoices(question: ChoiceQuestion): void {
    const position = question.position;

    for (;;) {
      this.skipTrivia();
      const line = this.cursor.peek();
      if (line === undefined) return;

      const match = TASK_ITEM.exec(line);
      if (!match) {
        this.checkAfterChoices(line, position);
        return;
      }

      this.recorder.attach({
        scope: 'question',
        question: position,
        element: 'choice',
        index: question.choices.length,
      });
      this.cursor.next();

      const choice: Choice = { text: match[3] ?? '', correct: match[2] !== ' ' };
      const feedback = this.readChoiceFeedback(match[1].length);
      if (feedback.length > 0) {
        choice.feedback = feedback;
      }
      question.choices.push(choice);

      this.rejectWrappedChoice(question.choices.length, position);
    }
  }

  /**
   * Blockquote lines indented deeper than the choice marker, directly
   * beneath it
   */
  private readChoiceFeedback(markerIndent: number): string[] {
    const lines: string[] = [];
    for (;;) {
      const line = this.cursor.peek();
      const match = line === undefined ? null : BLOCKQUOTE.exec(line);
      if (!match || match[1].length <= markerIndent) break;
      lines.push(match[2]);
      this.cursor.next();
    }
    return trimBlankEdges(lines);
  }

  private rejectWrappedChoice(choiceNumber: number, position: number): void {
    const line = this.cursor.peek();
    if (
      line === undefined ||
      isBlank(line) ||
      indentOf(line) === 0 ||
      isComment(line, MARKDOWN_COMMENTS) ||
      TASK_ITEM.test(line) ||
      BLOCKQUOTE.test(line)
    ) {
      return;
    }
    throw new StructuralError(
      `wrapped choice text under choice ${choiceNumber}; choice text must fit on one line ` +
        "and per-choice feedback goes in an indented '>' blockquote",
      { line: this.cursor.lineNumber, position }
    );
  }

  private checkAfterChoices(line: string, position: number): void {
    if (QUESTION_HEADER.test(line) || QUESTION_FEEDBACK.test(line)) return;

    const location = { line: this.cursor.lineNumber, position };
    if (BLOCKQUOTE.test(line)) {
      throw new StructuralError(
        'per-choice feedback must sit directly beneath its choice, indented deeper than the choice marker',
        location
      );
    }
    throw new StructuralError(`stray content after the choices: '${line.trim()}'`, location);
  }

  private readNumericAnswer(question: NumericQuestion): void {
    const heading = this.cursor.peek();
    if (heading === undefined || !ANSWER_HEADER.test(heading)) return;

    const headingLine = this.cursor.lineNumber;
    this.cursor.next();
    this.skipTrivia();

    const line = this.cursor.peek();
    const match = line === undefined ? null : NUMERIC.exec(line.trim());
    if (!match) {
      throw new StructuralError("expected '= <value> +- <tolerance>' under the answer heading", {
        line: line === undefined ? headingLine : this.cursor.lineNumber,
        position: question.position,
      });
    }

    this.recorder.attach({
      scope: 'question',
      question: question.position,
      element: 'answer',
      index: 0,
    });
    question.answer = parseNumericAnswer(match[1], {
      line: this.cursor.lineNumber,
      position: question.position,
    });
    this.cursor.next();
  }

  private readShortAnswers(question: ShortAnswerQuestion): void {
    const heading = this.cursor.peek();
    if (heading === undefined || !ANSWER_HEADER.test(heading)) return;
    this.cursor.next();

    for (;;) {
      this.skipTrivia();
      const line = this.cursor.peek();
      if (line === undefined) return;

      if (TASK_ITEM.test(line)) {
        throw new StructuralError(
          "checkbox item in a 'fill' question; list acceptable answers as '- answer'",
          { line: this.cursor.lineNumber, position: question.position }
        );
      }
      const match = BULLET.exec(line);
      if (!match) return;

      this.recorder.attach({
        scope: 'question',
        question: question.position,
        element: 'answer',
        index: question.answers.length,
      });
      question.answers.push(match[1]);
      this.cursor.next();
    }
  }

  /**
   * Column-0 blockquotes: `> Correct: …`, `> Incorrect: …`, `> General: …`.
   * An unprefixed line continues the entry above it, or starts a general
   * entry; a blank line or comment ends the entry.
   */
  private readFeedback(feedback: QuestionFeedback, position: number): void {
    let current: string[] | undefined;

    for (;;) {
      const line = this.cursor.peek();
      if (line === undefined) break;

      if (isBlank(line)) {
        this.cursor.next();
        current = undefined;
        continue;
      }
      if (isComment(line, MARKDOWN_COMMENTS)) {
        this.recorder.hold(readComment(this.cursor, MARKDOWN_COMMENTS));
        current = undefined;
        continue;
      }

      const match = QUESTION_FEEDBACK.exec(line);
      if (!match) break;

      const prefixed = FEEDBACK_PREFIX.exec(match[1]);
      if (prefixed || current === undefined) {
        const kind = prefixed ? feedbackKindFromLabel(prefixed[1]) : 'general';
        if (feedback[kind]) {
          throw new StructuralError(`${kind} feedback given more than once`, {
            line: this.cursor.lineNumber,
            position,
          });
        }
        this.recorder.attach({ scope: 'question', question: position, element: 'feedback', kind });
        current = [prefixed ? prefixed[2].trim() : match[1]];
        feedback[kind] = current;
      } else {
        current.push(match[1]);
      }
      this.cursor.next();
    }

    for (const kind of FEEDBACK_KINDS) {
      const lines = feedback[kind];
      if (lines) {
        feedback[kind] = trimBlankEdges(lines);
      }
    }
  }

  // ===========================================================================
  // Shared scanning
  // ===========================================================================

  /**
   * Consume blank lines and comments, holding the comments for the next
   * element. Comments for which `keeps` holds are left in place.
   */
  private skipTrivia(keeps: (line: string) => boolean = () => false): void {
    for (;;) {
      const line = this.cursor.peek();
      if (line === undefined) return;
      if (isBlank(line)) {
        this.cursor.next();
      } else if (isComment(line, MARKDOWN_COMMENTS) && !keeps(line)) {
        this.recorder.hold(readComment(this.cursor, MARKDOWN_COMMENTS));
      } else {
        return;
      }
    }
  }

  /**
   * Read a rich-text block up to the first line for which `stops` holds
   */
  private readRichText(stops: (line: string) => boolean, anchor: (line: number) => Anchor): string[] {
    const text = new RichTextCollector();

    for (;;) {
      const line = this.cursor.peek();
      if (line === undefined) break;

      if (isBlank(line)) {
        this.cursor.next();
        text.blank();
      } else if (stops(line)) {
        break;
      } else if (isComment(line, MARKDOWN_COMMENTS)) {
        this.recorder.hold(readComment(this.cursor, MARKDOWN_COMMENTS));
        text.comment();
      } else {
        const blankIsContent = text.breaksParagraph;
        this.recorder.attach(anchor(text.text(line.trimEnd())), blankIsContent);
        this.cursor.next();
      }
    }

    return text.lines;
  }
}
