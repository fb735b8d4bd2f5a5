/**
 * Related question discovery
 * Follows the backend's "people also ask" suggestions outward from a seed question
 *
 * @example
 * import { collectRelatedQuestions } from "./explorer.js";
 * const questions = await collectRelatedQuestions("what is a leap year", { maxQuestions: 10 });
 */

import { config } from "./config.js";
import {
  FeaturedSnippetParseError,
  InvalidQuestionError,
  RelatedQuestionParseError,
} from "./errors.js";
import { googleAdapter } from "./google.js";
import type {
  AnswerRecord,
  AnsweredRecord,
  CollectOptions,
  ExplorerOptions,
  Question,
  SearchAdapter,
  SimpleAnswerOptions,
  SnippetFields,
} from "./types.js";

// ============================================================================
// Traversal state
// ============================================================================

/**
 * Frontier and visited set of a single traversal.
 * A taken question is tombstoned in `visited` and never re-enters the frontier.
 */
export class TraversalRun {
  private readonly frontier = new Set<Question>();
  private readonly visited = new Set<Question>();

  constructor(seed: Question, initial: Iterable<Question> = []) {
    this.visited.add(seed);
    this.merge(initial);
  }

  get pending(): ReadonlySet<Question> {
    return this.frontier;
  }

  get expanded(): ReadonlySet<Question> {
    return this.visited;
  }

  take(): Question | undefined {
    const next = this.frontier.values().next();
    if (next.done) return undefined;

    this.frontier.delete(next.value);
    this.visited.add(next.value);
    return next.value;
  }

  merge(found: Iterable<Question>): void {
    for (const question of found) {
      if (!this.visited.has(question)) {
        this.frontier.add(question);
      }
    }
  }
}

// ============================================================================
// Explorer
// ============================================================================

export interface Explorer {
  relatedQuestions: (
    text: string,
    options?: ExplorerOptions
  ) => Promise<Question[]>;
  traverseRelatedQuestions: (
    text: string,
    options?: ExplorerOptions
  ) => AsyncGenerator<Question, void, undefined>;
  collectRelatedQuestions: (
    text: string,
    options?: CollectOptions
  ) => Promise<Question[]>;
  answer: (question: string, options?: ExplorerOptions) => Promise<AnswerRecord>;
  traverseAnswers: (
    text: string,
    options?: ExplorerOptions
  ) => AsyncGenerator<AnsweredRecord, void, undefined>;
  simpleAnswer: (
    question: string,
    options?: SimpleAnswerOptions
  ) => Promise<string>;
}

export interface ExplorerDefaults {
  /** Locale used when an operation is called without one */
  locale?: string;
}

const requireText = (text: string): string => {
  if (!text.trim()) {
    throw new InvalidQuestionError(text);
  }
  return text;
};

/**
 * Bind the discovery operations to a search backend
 *
 * @example
 * ```ts
 * const explorer = createExplorer(googleAdapter, { locale: "fr" });
 * for await (const question of explorer.traverseRelatedQuestions("qu'est-ce qu'un volcan")) {
 *   console.log(question);
 * }
 * ```
 */
export const createExplorer = <TDocument>(
  adapter: SearchAdapter<TDocument>,
  defaults: ExplorerDefaults = {}
): Explorer => {
  const localeOf = (options: ExplorerOptions): string =>
    options.locale ?? defaults.locale ?? config.locale;

  const readRelated = (question: Question, document: TDocument): Question[] => {
    try {
      return [...new Set(adapter.extractRelatedQuestions(document))];
    } catch (error) {
      throw new RelatedQuestionParseError(question, { cause: error });
    }
  };

  // Internal hops take backend suggestions verbatim; only caller input is validated
  const lookup = async (question: Question, locale: string): Promise<Question[]> => {
    const document = await adapter.fetchDocument(question, locale);
    if (document === null) return [];
    return readRelated(question, document);
  };

  const assemble = async (
    question: Question,
    locale: string
  ): Promise<AnswerRecord> => {
    const document = await adapter.fetchDocument(question, locale);
    if (document === null) {
      return { question, hasAnswer: false, relatedQuestions: [] };
    }

    const related = readRelated(question, document);
    const featured = adapter.extractFeaturedSnippet(question, document);
    if (!featured) {
      return { question, hasAnswer: false, relatedQuestions: related };
    }

    let snippet: SnippetFields;
    try {
      snippet = featured.toFields();
    } catch (error) {
      throw new FeaturedSnippetParseError(question, { cause: error });
    }

    return { question, hasAnswer: true, relatedQuestions: related, snippet };
  };

  const shortAnswer = async (
    question: Question,
    locale: string,
    fallback: boolean
  ): Promise<string> => {
    const document = await adapter.fetchDocument(question, locale);
    const featured =
      document === null
        ? null
        : adapter.extractFeaturedSnippet(question, document);
    if (featured) return featured.response;
    if (!fallback) return "";

    // Single hop, as collectRelatedQuestions does without a bound
    const [first] = await lookup(question, locale);
    if (first === undefined) return "";

    // One extra hop at most
    return shortAnswer(first, locale, false);
  };

  const relatedQuestions = async (
    text: string,
    options: ExplorerOptions = {}
  ): Promise<Question[]> => lookup(requireText(text), localeOf(options));

  async function* traverseRelatedQuestions(
    text: string,
    options: ExplorerOptions = {}
  ): AsyncGenerator<Question, void, undefined> {
    const locale = localeOf(options);
    const run = new TraversalRun(text, await lookup(requireText(text), locale));

    for (let question = run.take(); question !== undefined; question = run.take()) {
      yield question;
      run.merge(await lookup(question, locale));
    }
  }

  const collectRelatedQuestions = async (
    text: string,
    options: CollectOptions = {}
  ): Promise<Question[]> => {
    const { maxQuestions } = options;
    // Without a bound this is a single hop, not a traversal
    if (maxQuestions === undefined) {
      return relatedQuestions(text, options);
    }

    const collected = new Set<Question>();
    let count = 0;
    for await (const question of traverseRelatedQuestions(text, options)) {
      // Checked before insertion: up to maxQuestions + 1 questions are kept
      if (count > maxQuestions) break;
      collected.add(question);
      count += 1;
    }
    return [...collected];
  };

  const answer = async (
    question: string,
    options: ExplorerOptions = {}
  ): Promise<AnswerRecord> =>
    assemble(requireText(question), localeOf(options));

  async function* traverseAnswers(
    text: string,
    options: ExplorerOptions = {}
  ): AsyncGenerator<AnsweredRecord, void, undefined> {
    const locale = localeOf(options);
    const seed = await assemble(requireText(text), locale);
    const run = new TraversalRun(text, seed.relatedQuestions);
    if (seed.hasAnswer) yield seed;

    for (let question = run.take(); question !== undefined; question = run.take()) {
      const record = await assemble(question, locale);
      if (record.hasAnswer) yield record;
      run.merge(record.relatedQuestions);
    }
  }

  const simpleAnswer = async (
    question: string,
    options: SimpleAnswerOptions = {}
  ): Promise<string> =>
    shortAnswer(requireText(question), localeOf(options), options.fallback ?? false);

  return {
    relatedQuestions,
    traverseRelatedQuestions,
    collectRelatedQuestions,
    answer,
    traverseAnswers,
    simpleAnswer,
  };
};

/**
 * Default explorer backed by Google results pages
 * For another backend or default locale, use `createExplorer(adapter, { ... })` instead.
 */
export const explorer = createExplorer(googleAdapter);

export const {
  relatedQuestions,
  traverseRelatedQuestions,
  collectRelatedQuestions,
  answer,
  traverseAnswers,
  simpleAnswer,
} = explorer;
