import type { Question, SearchAdapter, SnippetFields } from "./types.js";

/**
 * What the in-memory backend shows for one query
 */
export interface GraphPage {
  related?: Question[];
  snippet?: string;

  /** toFields() throws */
  brokenSnippet?: boolean;

  /** extractRelatedQuestions() throws */
  malformed?: boolean;

  /** fetchDocument() resolves to null */
  empty?: boolean;
}

export interface GraphDocument {
  query: string;
  page: GraphPage;
}

export interface GraphAdapter extends SearchAdapter<GraphDocument> {
  calls: Array<{ query: string; locale: string }>;
}

/**
 * In-memory search backend over a question graph, used by the tests.
 * `expand` describes pages for queries missing from `pages`.
 */
export const createGraphAdapter = (
  pages: Record<string, GraphPage>,
  expand?: (query: string) => GraphPage
): GraphAdapter => {
  const known = new Map(Object.entries(pages));
  const calls: GraphAdapter["calls"] = [];

  return {
    name: "graph",
    calls,

    fetchDocument: async (query, locale) => {
      calls.push({ query, locale });
      const page = known.get(query) ?? expand?.(query) ?? {};
      return page.empty ? null : { query, page };
    },

    extractRelatedQuestions: (document) => {
      if (document.page.malformed) {
        throw new Error(`Malformed results page for: ${document.query}`);
      }
      return [...(document.page.related ?? [])];
    },

    extractFeaturedSnippet: (query, document) => {
      const { snippet, brokenSnippet } = document.page;
      if (snippet === undefined) return null;

      return {
        response: snippet,
        toFields: (): SnippetFields => {
          if (brokenSnippet) {
            throw new Error(`Unreadable snippet for: ${query}`);
          }
          return {
            type: "definition",
            response: snippet,
            link: `https://example.com/${encodeURIComponent(query)}`,
          };
        },
      };
    },
  };
};
