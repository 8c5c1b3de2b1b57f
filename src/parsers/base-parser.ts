/**
 * Base Parser Utilities
 *
 * Line scanning shared by the Markdown and plaintext readers: a cursor that
 * remembers whether blank lines preceded the current line, comment capture
 * for either comment syntax, a collector for multi-line text blocks, and the
 * recorder that anchors held comments to the next structural element.
 */

import { Anchor, Annotation, CommentStyle } from '../models/annotation.model';
import { NumericAnswer } from '../models/quiz.model';
import { MARKER_WIDTH } from '../utils/text-formatters';
import { ErrorLocation, StructuralError } from './parser-result';

/**
 * Split content into lines, handling different line endings. A final
 * newline does not start another line.
 */
export function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 1 && lines.at(-1) === '') {
    lines.pop();
  }
  return lines;
}

export function isBlank(line: string): boolean {
  return line.trim() === '';
}

/**
 * Number of leading whitespace characters
 */
export function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

const DECIMAL_PATTERN = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Parse a decimal literal; undefined for anything else (including '', 'NaN',
 * hex and trailing garbage that Number() would accept or coerce)
 */
export function parseDecimal(text: string): number | undefined {
  const trimmed = text.trim();
  return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : undefined;
}

/**
 * Forward-only cursor over the source lines
 */
export class LineCursor {
  private index = 0;
  private blankSinceContent = false;

  constructor(private readonly lines: string[]) {}

  /** 1-based number of the line under the cursor */
  get lineNumber(): number {
    return this.index + 1;
  }

  /** True when a blank line was consumed since the last non-blank one */
  get blankBefore(): boolean {
    return this.blankSinceContent;
  }

  peek(offset = 0): string | undefined {
    return this.lines[this.index + offset];
  }

  next(): string {
    const line = this.lines[this.index];
    if (line === undefined) {
      throw new StructuralError('unexpected end of input', { line: this.lineNumber });
    }
    this.index++;
    this.blankSinceContent = isBlank(line);
    return line;
  }
}

/**
 * A comment that has been read but not yet anchored
 */
export interface HeldComment {
  style: CommentStyle;
  text: string[];
  blankBefore: boolean;
  blankAfter: boolean;
  line: number;
}

/**
 * How one format spells its comments
 */
export interface CommentSyntax {
  /** Body of a one-line comment, or undefined when the line is not one */
  single(line: string): string | undefined;

  /** Whether the line opens a block comment */
  opens(line: string): boolean;

  /** Whether the line closes a block comment */
  closes(line: string): boolean;

  /** Closing delimiter, for error messages */
  closer: string;
}

export function isComment(line: string, syntax: CommentSyntax): boolean {
  return syntax.single(line) !== undefined || syntax.opens(line);
}

/**
 * Consume the comment under the cursor
 */
export function readComment(cursor: LineCursor, syntax: CommentSyntax): HeldComment {
  const blankBefore = cursor.blankBefore;
  const line = cursor.lineNumber;
  const first = cursor.next();

  const blankAfter = (): boolean => {
    const next = cursor.peek();
    return next !== undefined && isBlank(next);
  };

  const body = syntax.single(first);
  if (body !== undefined) {
    return { style: 'line', text: [body], blankBefore, blankAfter: blankAfter(), line };
  }

  const text: string[] = [];
  for (;;) {
    const next = cursor.peek();
    if (next === undefined) {
      throw new StructuralError(`comment opened here is never closed with '${syntax.closer}'`, {
        line,
      });
    }
    cursor.next();
    if (syntax.closes(next)) {
      return { style: 'block', text, blankBefore, blankAfter: blankAfter(), line };
    }
    text.push(next);
  }
}

/**
 * Holds comments until the next structural element is known, then anchors
 * them to it
 */
export class AnnotationRecorder {
  readonly annotations: Annotation[] = [];
  private held: HeldComment[] = [];

  hold(comment: HeldComment): void {
    this.held.push(comment);
  }

  /**
   * Anchor the held comments. `blankIsContent` says the blank line after the
   * last comment was kept as a paragraph break of the element's text.
   */
  attach(anchor: Anchor, blankIsContent = false): void {
    const last = this.held.length - 1;
    this.held.forEach((comment, index) => {
      const annotation: Annotation = {
        anchor,
        style: comment.style,
        text: comment.text,
        blankBefore: comment.blankBefore,
      };
      if (comment.blankAfter && !(index === last && blankIsContent)) {
        annotation.blankAfter = true;
      }
      this.annotations.push(annotation);
    });
    this.held = [];
  }
}

/**
 * Builds a rich-text block line by line. Blank lines between text lines are
 * kept as paragraph breaks; a blank line directly in front of a comment
 * belongs to the comment instead.
 */
export class RichTextCollector {
  readonly lines: string[] = [];
  private pendingBlanks = 0;

  blank(): void {
    this.pendingBlanks++;
  }

  comment(): void {
    this.pendingBlanks = 0;
  }

  /** Whether the next text line will be preceded by a paragraph break */
  get breaksParagraph(): boolean {
    return this.lines.length > 0 && this.pendingBlanks > 0;
  }

  /**
   * Append a text line and return the index of the first line added, which
   * is where held comments anchor
   */
  text(line: string): number {
    const start = this.lines.length;
    if (start > 0) {
      for (let i = 0; i < this.pendingBlanks; i++) {
        this.lines.push('');
      }
    }
    this.pendingBlanks = 0;
    this.lines.push(line);
    return start;
  }
}

/**
 * Text after a marker padded to the marker column. Whitespace beyond the
 * column belongs to the text.
 * @example
 * textAfterMarker('1.    indented', 2) // returns '  indented'
 * textAfterMarker('100. Why?', 4) // returns 'Why?'
 */
export function textAfterMarker(line: string, markerLength: number): string {
  const padding = Math.max(1, MARKER_WIDTH - markerLength);
  let start = markerLength;
  while (start < line.length && start < markerLength + padding && /\s/.test(line.charAt(start))) {
    start++;
  }
  return line.slice(start).trimEnd();
}

/**
 * Drop leading and trailing blank entries
 */
export function trimBlankEdges(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && isBlank(lines[start])) {
    start++;
  }
  while (end > start && isBlank(lines[end - 1])) {
    end--;
  }
  return lines.slice(start, end);
}

// =============================================================================
// Value parsing shared by both readers
// =============================================================================

const RANGE_PATTERN = /^\[\s*([^,\]]+?)\s*,\s*([^\]]+?)\s*\]$/;
const TOLERANCE_PATTERN = /^(.+?)\s*\+-\s*(.+?)(%?)$/;

export function parsePoints(text: string, location: ErrorLocation): number {
  const points = parseDecimal(text);
  if (points === undefined) {
    throw new StructuralError(`points value '${text.trim()}' is not a number`, location);
  }
  return points;
}

export function parseBoolean(text: string): boolean | undefined {
  switch (text.trim().toLowerCase()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      return undefined;
  }
}

/**
 * Parse `5`, `5 +- 0.1`, `100 +- 5%` or `[4.9, 5.1]`
 */
export function parseNumericAnswer(text: string, location: ErrorLocation): NumericAnswer {
  const number = (part: string): number => {
    const value = parseDecimal(part);
    if (value === undefined) {
      throw new StructuralError(`numeric answer '${part.trim()}' is not a number`, location);
    }
    return value;
  };

  const spec = text.trim();
  const range = RANGE_PATTERN.exec(spec);
  if (range) {
    return { kind: 'range', min: number(range[1]), max: number(range[2]) };
  }

  const tolerance = TOLERANCE_PATTERN.exec(spec);
  if (tolerance) {
    const answer: NumericAnswer = {
      kind: 'tolerance',
      value: number(tolerance[1]),
      tolerance: number(tolerance[2]),
    };
    if (tolerance[3] === '%') {
      answer.percent = true;
    }
    return answer;
  }

  return { kind: 'tolerance', value: number(spec) };
}
