import { Annotation } from '../models/annotation.model';
import { DocumentBuilder } from './document-builder';

const render = (annotation: Annotation): string[] => annotation.text.map(line => `# ${line}`);

const titleNote = (blankBefore: boolean): Annotation => ({
  anchor: { scope: 'quiz', element: 'title' },
  style: 'line',
  text: ['note'],
  blankBefore,
});

describe('DocumentBuilder', () => {
  it('should join lines with a trailing newline', () => {
    const doc = new DocumentBuilder([], render);
    doc.element({ scope: 'quiz', element: 'title' }, 'Title');

    expect(doc.finish()).toBe('Title\n');
  });

  it('should place one blank line where a separator was requested', () => {
    const doc = new DocumentBuilder([], render);
    doc.element({ scope: 'quiz', element: 'title' }, 'Title');
    doc.separate().separate();
    doc.element({ scope: 'quiz', element: 'description', line: 0 }, 'Body');

    expect(doc.finish()).toBe('Title\n\nBody\n');
  });

  it('should not start the document with a separator', () => {
    const doc = new DocumentBuilder([], render);
    doc.separate().element({ scope: 'quiz', element: 'title' }, 'Title');

    expect(doc.finish()).toBe('Title\n');
  });

  it('should keep a separator pending across empty elements', () => {
    const doc = new DocumentBuilder([], render);
    doc.element({ scope: 'quiz', element: 'title' }, 'Title');
    doc.separate();
    doc.element({ scope: 'question', question: 1, element: 'response' });
    doc.element({ scope: 'quiz', element: 'description', line: 0 }, 'Body');

    expect(doc.finish()).toBe('Title\n\nBody\n');
  });

  it('should put comments directly before their element', () => {
    const doc = new DocumentBuilder([titleNote(false)], render);
    doc.element({ scope: 'quiz', element: 'title' }, 'Title');

    expect(doc.finish()).toBe('# note\nTitle\n');
  });

  it('should let a comment decide the spacing above it', () => {
    const intro: Annotation = {
      anchor: { scope: 'quiz', element: 'description', line: 0 },
      style: 'line',
      text: ['hugging'],
      blankBefore: false,
    };
    const doc = new DocumentBuilder([intro], render);
    doc.element({ scope: 'quiz', element: 'title' }, 'Title');
    doc.separate();
    doc.element({ scope: 'quiz', element: 'description', line: 0 }, 'Body');

    expect(doc.finish()).toBe('Title\n# hugging\nBody\n');
  });

  it('should write a blank line before a comment that had one', () => {
    const doc = new DocumentBuilder([titleNote(true)], render);
    doc.element({ scope: 'quiz', element: 'title' }, 'Title');

    expect(doc.finish()).toBe('\n# note\nTitle\n');
  });

  it('should write comments anchored to an element with no lines', () => {
    const response: Annotation = {
      anchor: { scope: 'question', question: 1, element: 'response' },
      style: 'line',
      text: ['graded later'],
      blankBefore: false,
    };
    const doc = new DocumentBuilder([response], render);
    doc.element({ scope: 'quiz', element: 'title' }, 'Title');
    doc.element({ scope: 'question', question: 1, element: 'response' });

    expect(doc.finish()).toBe('Title\n# graded later\n');
  });

  it('should write end-of-document comments last', () => {
    const end: Annotation = {
      anchor: { scope: 'end' },
      style: 'block',
      text: ['one', 'two'],
      blankBefore: true,
    };
    const doc = new DocumentBuilder([end], render);
    doc.element({ scope: 'quiz', element: 'title' }, 'Title');

    expect(doc.finish()).toBe('Title\n\n# one\n# two\n');
  });

  it('should write a blank line after a comment that had one', () => {
    const note: Annotation = { ...titleNote(false), blankAfter: true };
    const doc = new DocumentBuilder([note], render);
    doc.element({ scope: 'quiz', element: 'title' }, 'Title');

    expect(doc.finish()).toBe('# note\n\nTitle\n');
  });

  it('should write one blank line between comments that both asked for it', () => {
    const first: Annotation = { ...titleNote(false), text: ['first'], blankAfter: true };
    const second: Annotation = { ...titleNote(true), text: ['second'] };
    const doc = new DocumentBuilder([first, second], render);
    doc.element({ scope: 'quiz', element: 'title' }, 'Title');

    expect(doc.finish()).toBe('# first\n\n# second\nTitle\n');
  });

  it('should not add a separator after a blank line left by a comment', () => {
    const response: Annotation = {
      anchor: { scope: 'question', question: 1, element: 'response' },
      style: 'line',
      text: ['graded later'],
      blankBefore: false,
      blankAfter: true,
    };
    const doc = new DocumentBuilder([response], render);
    doc.element({ scope: 'quiz', element: 'title' }, 'Title');
    doc.element({ scope: 'question', question: 1, element: 'response' });
    doc.separate();
    doc.element({ scope: 'question', question: 2, element: 'header' }, 'Next');

    expect(doc.finish()).toBe('Title\n# graded later\n\nNext\n');
  });

  it('should not end the document with a blank line', () => {
    const end: Annotation = {
      anchor: { scope: 'end' },
      style: 'line',
      text: ['last'],
      blankBefore: false,
      blankAfter: true,
    };
    const doc = new DocumentBuilder([end], render);
    doc.element({ scope: 'quiz', element: 'title' }, 'Title');

    expect(doc.finish()).toBe('Title\n# last\n');
  });
});
