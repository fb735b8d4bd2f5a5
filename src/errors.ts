import type { Question } from "./types.js";

export class PeopleAlsoAskError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidQuestionError extends PeopleAlsoAskError {
  constructor(readonly input: string) {
    super(`Invalid question: ${JSON.stringify(input)}`);
  }
}

/**
 * Related questions could not be read from the results page of `question`.
 */
export class RelatedQuestionParseError extends PeopleAlsoAskError {
  constructor(readonly question: Question, options?: { cause?: unknown }) {
    super(`Failed to parse related questions for: ${question}`, options);
  }
}

/**
 * A featured snippet was found for `question` but could not be normalized.
 */
export class FeaturedSnippetParseError extends PeopleAlsoAskError {
  constructor(readonly question: Question, options?: { cause?: unknown }) {
    super(`Failed to parse featured snippet for: ${question}`, options);
  }
}

export class SearchRequestError extends PeopleAlsoAskError {
  constructor(readonly query: string, readonly status: number) {
    super(`HTTP error! status: ${status} for ${query}`);
  }
}
