// ============================================================================
// Questions & answers
// ============================================================================

/** A related question as shown by the search backend, compared verbatim */
export type Question = string;

export type SnippetType = "definition" | "ordered" | "unordered" | "table";

export interface SnippetFields {
  type: SnippetType;

  /** Short answer text */
  response: string;

  /** Source link of the snippet */
  link: string;

  heading?: string;
  title?: string;
  displayedLink?: string;
  date?: string;

  /** List entries for ordered/unordered snippets */
  items?: string[];

  /** Rows of cells for table snippets */
  table?: string[][];
}

export interface FeaturedSnippet {
  response: string;
  toFields: () => SnippetFields;
}

interface AnswerRecordBase {
  question: Question;
  relatedQuestions: Question[];
}

export interface UnansweredRecord extends AnswerRecordBase {
  hasAnswer: false;
}

export interface AnsweredRecord extends AnswerRecordBase {
  hasAnswer: true;
  snippet: SnippetFields;
}

export type AnswerRecord = UnansweredRecord | AnsweredRecord;

// ============================================================================
// Search backend
// ============================================================================

/**
 * Everything the explorer needs from a search backend.
 * `fetchDocument` resolving to null means "no result".
 */
export interface SearchAdapter<TDocument = unknown> {
  name: string;
  fetchDocument: (query: string, locale: string) => Promise<TDocument | null>;
  extractRelatedQuestions: (document: TDocument) => Question[];
  extractFeaturedSnippet: (
    query: string,
    document: TDocument
  ) => FeaturedSnippet | null;
}

// ============================================================================
// Options
// ============================================================================

export interface ExplorerOptions {
  /** Country code passed through to the backend (e.g. "us", "fr") */
  locale?: string;
}

export interface CollectOptions extends ExplorerOptions {
  /** Stop traversing once more than this many questions were collected */
  maxQuestions?: number;
}

export interface SimpleAnswerOptions extends ExplorerOptions {
  /** Answer with the first related question when the question has no snippet */
  fallback?: boolean;
}
