/**
 * quizmark - Markdown ⇄ text2qti quiz conversion
 *
 * Reads either format into one Quiz Model plus a comment/spacing
 * side-channel, validates the model, and writes either format back out with
 * comments re-inserted where they were found.
 *
 * Entry points:
 * - CLI: `quizmark md2txt quiz.md`
 * - Programmatic: `convert(text, { from: 'markdown', to: 'plaintext' })`
 */

// Models
export * from './models/quiz.model';
export * from './models/annotation.model';

// Parsers
export * from './parsers/parser-result';
export { readMarkdown } from './parsers/markdown-parser';
export { readPlaintext } from './parsers/plaintext-parser';

// Validation
export * from './validators/quiz-validator';

// Serializers
export { writeMarkdown } from './serializers/markdown-serializer';
export { writePlaintext } from './serializers/plaintext-serializer';

// Services
export * from './services/conversion.service';

// Configuration & logging
export * from './config/converter-config';
export * from './utils/console-logger';
