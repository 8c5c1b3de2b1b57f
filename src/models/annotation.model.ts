/**
 * Comment/Spacing Side-Channel
 *
 * Comments and the blank line in front of them carry no quiz meaning, so they
 * live beside the Quiz Model rather than inside it. Each annotation names the
 * structural element it sits before; writers emit the element's annotations,
 * then the element.
 */

import { FeedbackKind } from './quiz.model';

/**
 * Position in the quiz structure. Line and index values are 0-based offsets
 * into the anchored block; `question` is the 1-based question position.
 */
export type Anchor =
  | { scope: 'quiz'; element: 'title' }
  | { scope: 'quiz'; element: 'description'; line: number }
  | { scope: 'quiz'; element: 'option'; index: number }
  | { scope: 'question'; question: number; element: 'header' }
  | { scope: 'question'; question: number; element: 'prompt'; line: number }
  | { scope: 'question'; question: number; element: 'choice'; index: number }
  | { scope: 'question'; question: number; element: 'answer'; index: number }
  | { scope: 'question'; question: number; element: 'feedback'; kind: FeedbackKind }
  | { scope: 'question'; question: number; element: 'response' }
  | { scope: 'end' };

/**
 * `line` comments are single-line (`<!-- x -->`, `% x`); `block` comments
 * span lines (`<!--` … `-->`, `COMMENT` … `END_COMMENT`).
 */
export type CommentStyle = 'line' | 'block';

export interface Annotation {
  anchor: Anchor;

  style: CommentStyle;

  /** Comment body without delimiters; exactly one entry for `line` style */
  text: string[];

  /** Whether a blank line separated the comment from the content above it */
  blankBefore: boolean;

  /** Set when a blank line separated the comment from the element below it */
  blankAfter?: boolean;
}

/**
 * Annotations of one document, in source order
 */
export type Annotations = Annotation[];

/**
 * Stable string key for an anchor, used to group annotations for writers
 */
export function anchorKey(anchor: Anchor): string {
  switch (anchor.scope) {
    case 'end':
      return 'end';
    case 'quiz':
      return quizAnchorKey(anchor);
    case 'question':
      return questionAnchorKey(anchor);
  }
}

function quizAnchorKey(anchor: Extract<Anchor, { scope: 'quiz' }>): string {
  switch (anchor.element) {
    case 'title':
      return 'quiz/title';
    case 'description':
      return `quiz/description/${anchor.line}`;
    case 'option':
      return `quiz/option/${anchor.index}`;
  }
}

function questionAnchorKey(anchor: Extract<Anchor, { scope: 'question' }>): string {
  const prefix = `q${anchor.question}`;
  switch (anchor.element) {
    case 'header':
      return `${prefix}/header`;
    case 'prompt':
      return `${prefix}/prompt/${anchor.line}`;
    case 'choice':
      return `${prefix}/choice/${anchor.index}`;
    case 'answer':
      return `${prefix}/answer/${anchor.index}`;
    case 'feedback':
      return `${prefix}/feedback/${anchor.kind}`;
    case 'response':
      return `${prefix}/response`;
  }
}

/**
 * Index annotations by anchor, keeping source order within each anchor
 */
export class AnnotationIndex {
  private readonly byAnchor = new Map<string, Annotation[]>();

  constructor(annotations: Annotations) {
    for (const annotation of annotations) {
      const key = anchorKey(annotation.anchor);
      const existing = this.byAnchor.get(key);
      if (existing) {
        existing.push(annotation);
      } else {
        this.byAnchor.set(key, [annotation]);
      }
    }
  }

  /** Annotations anchored before the given element */
  at(anchor: Anchor): Annotation[] {
    return this.byAnchor.get(anchorKey(anchor)) ?? [];
  }
}
