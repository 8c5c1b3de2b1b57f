/**
 * Quiz Model
 *
 * Format-neutral representation of a quiz shared by the Markdown and
 * plaintext readers and writers. Nothing here knows about either surface
 * syntax; the code tables at the bottom map the closed enumerations onto
 * their spellings in each format.
 */

/**
 * Question kinds
 */
export const QUESTION_TYPES = [
  'single-choice',
  'multi-choice',
  'numeric',
  'short-answer',
  'essay',
  'file-upload',
  'text-stimulus',
] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

/**
 * Quiz-level options understood by text2qti
 */
export const QUIZ_OPTION_NAMES = [
  'shuffle-answers',
  'show-correct-answers',
  'one-question-at-a-time',
  'cant-go-back',
  'feedback-is-solution',
  'solutions-sample-groups',
  'solutions-randomize-groups',
] as const;

export type QuizOptionName = (typeof QUIZ_OPTION_NAMES)[number];

/**
 * Question-level feedback kinds; `information` is the plaintext `!` block
 */
export const FEEDBACK_KINDS = ['correct', 'incorrect', 'general', 'information'] as const;

export type FeedbackKind = (typeof FEEDBACK_KINDS)[number];

/**
 * Rich text is kept as the author's lines. Blank entries are paragraph
 * breaks; the block never starts or ends with one.
 */
export type RichText = string[];

export interface QuizOption {
  name: QuizOptionName;
  value: boolean;

  /** Written as a `<!--# name: value -->` comment in Markdown */
  hidden?: boolean;
}

export type QuestionFeedback = Partial<Record<FeedbackKind, RichText>>;

export interface Choice {
  /** Single line of choice text (inline LaTeX passes through untouched) */
  text: string;

  correct: boolean;

  /** Feedback shown when this choice is selected */
  feedback?: RichText;
}

/**
 * Numeric answer: either a target with a tolerance or an inclusive range.
 * A `percent` tolerance is a percentage of the target.
 */
export type NumericAnswer =
  | { kind: 'tolerance'; value: number; tolerance?: number; percent?: boolean }
  | { kind: 'range'; min: number; max: number };

export interface QuestionBase {
  /** 1-based ordinal within the quiz, used when reporting errors */
  position: number;

  /** Number the author wrote in the source; never used for output */
  number?: number;

  title: string;

  points?: number;

  prompt: RichText;

  feedback: QuestionFeedback;
}

export interface ChoiceQuestion extends QuestionBase {
  type: 'single-choice' | 'multi-choice';
  choices: Choice[];
}

export interface NumericQuestion extends QuestionBase {
  type: 'numeric';
  answer?: NumericAnswer;
}

export interface ShortAnswerQuestion extends QuestionBase {
  type: 'short-answer';
  answers: string[];
}

export interface ResponseQuestion extends QuestionBase {
  type: 'essay' | 'file-upload';
}

export interface TextStimulus extends QuestionBase {
  type: 'text-stimulus';
}

export type Question =
  | ChoiceQuestion
  | NumericQuestion
  | ShortAnswerQuestion
  | ResponseQuestion
  | TextStimulus;

export interface Quiz {
  title?: string;
  description: RichText;
  options: QuizOption[];
  questions: Question[];
}

/**
 * Create an empty quiz
 */
export function createEmptyQuiz(): Quiz {
  return {
    description: [],
    options: [],
    questions: [],
  };
}

/**
 * Create a question of the given type with an empty payload
 */
export function createQuestion(
  type: QuestionType,
  base: Omit<QuestionBase, 'feedback' | 'prompt'> & Partial<Pick<QuestionBase, 'feedback' | 'prompt'>>
): Question {
  const common: QuestionBase = { prompt: [], feedback: {}, ...base };

  switch (type) {
    case 'single-choice':
    case 'multi-choice':
      return { ...common, type, choices: [] };
    case 'numeric':
      return { ...common, type };
    case 'short-answer':
      return { ...common, type, answers: [] };
    case 'essay':
    case 'file-upload':
      return { ...common, type };
    case 'text-stimulus':
      return { ...common, type };
  }
}

export function isQuestionType(value: string): value is QuestionType {
  return (QUESTION_TYPES as readonly string[]).includes(value);
}

export function isQuizOptionName(value: string): value is QuizOptionName {
  return (QUIZ_OPTION_NAMES as readonly string[]).includes(value);
}

/**
 * Every type except text-stimulus is worth points
 */
export function isGradeable(type: QuestionType): boolean {
  return type !== 'text-stimulus';
}

export function isChoiceQuestion(question: Question): question is ChoiceQuestion {
  return question.type === 'single-choice' || question.type === 'multi-choice';
}

// =============================================================================
// Surface spellings
// =============================================================================

/** `{type=...}` codes in Markdown headers */
export const MARKDOWN_TYPE_CODES: Record<QuestionType, string> = {
  'single-choice': 'mc',
  'multi-choice': 'ma',
  numeric: 'num',
  'short-answer': 'fill',
  essay: 'essay',
  'file-upload': 'file',
  'text-stimulus': 'text',
};

/** Option keys as both formats spell them */
export const OPTION_LABELS: Record<QuizOptionName, string> = {
  'shuffle-answers': 'shuffle answers',
  'show-correct-answers': 'show correct answers',
  'one-question-at-a-time': 'one question at a time',
  'cant-go-back': "can't go back",
  'feedback-is-solution': 'feedback is solution',
  'solutions-sample-groups': 'solutions sample groups',
  'solutions-randomize-groups': 'solutions randomize groups',
};

/**
 * Resolve a Markdown type code (case-insensitive)
 */
export function questionTypeFromCode(code: string): QuestionType | undefined {
  const normalized = code.trim().toLowerCase();
  return QUESTION_TYPES.find(type => MARKDOWN_TYPE_CODES[type] === normalized);
}

/**
 * Resolve an option label such as "Can't go back" or "shuffle answers"
 */
export function optionNameFromLabel(label: string): QuizOptionName | undefined {
  const normalized = label
    .trim()
    .toLowerCase()
    .replace(/[’']/g, '')
    .replace(/\s+/g, ' ');
  return QUIZ_OPTION_NAMES.find(
    name => OPTION_LABELS[name].replace(/'/g, '') === normalized
  );
}
