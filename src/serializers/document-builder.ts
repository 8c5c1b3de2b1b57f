/**
 * Document Builder
 *
 * Line assembly shared by the Markdown and plaintext writers. Writers emit
 * structural elements in order and ask for separators between blocks; the
 * builder places each element's annotations in front of it and never adds
 * a blank line next to another one.
 */

import { Anchor, Annotation, AnnotationIndex, Annotations } from '../models/annotation.model';

export type CommentRenderer = (annotation: Annotation) => string[];

export class DocumentBuilder {
  private readonly lines: string[] = [];
  private readonly index: AnnotationIndex;
  private separatorPending = false;

  constructor(
    annotations: Annotations,
    private readonly renderComment: CommentRenderer
  ) {
    this.index = new AnnotationIndex(annotations);
  }

  /**
   * Request one blank line before the next element
   */
  separate(): this {
    this.separatorPending = true;
    return this;
  }

  /**
   * Emit the annotations anchored at `anchor`, then the element's lines.
   * Comments replace the pending separator: their own blank-line flags
   * decide the spacing above and below them.
   */
  element(anchor: Anchor, ...lines: string[]): this {
    const comments = this.index.at(anchor);

    if (comments.length > 0) {
      this.emitComments(comments);
      this.separatorPending = false;
    } else if (lines.length > 0) {
      if (this.separatorPending && this.lines.length > 0) {
        this.blankLine();
      }
      this.separatorPending = false;
    }

    this.lines.push(...lines);
    return this;
  }

  /**
   * Emit end-of-file annotations and join the document
   */
  finish(): string {
    this.emitComments(this.index.at({ scope: 'end' }));
    while (this.lines.at(-1) === '') {
      this.lines.pop();
    }
    return this.lines.join('\n') + '\n';
  }

  private emitComments(comments: Annotation[]): void {
    for (const comment of comments) {
      if (comment.blankBefore) {
        this.blankLine();
      }
      this.lines.push(...this.renderComment(comment));
      if (comment.blankAfter) {
        this.blankLine();
      }
    }
  }

  private blankLine(): void {
    if (this.lines.at(-1) !== '') {
      this.lines.push('');
    }
  }
}
