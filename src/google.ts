/**
 * Google results page adapter
 * Fetches a results page and reads its "People also ask" block and featured snippet
 *
 * @example
 * import { search, extractRelatedQuestions } from "./google.js";
 * const $ = await search("how do bees make honey", "us");
 * if ($) console.log(extractRelatedQuestions($));
 */

import * as cheerio from "cheerio";
import type { CheerioAPI, Cheerio, Element } from "cheerio";
import { config, debug } from "./config.js";
import { SearchRequestError } from "./errors.js";
import type {
  FeaturedSnippet,
  Question,
  SearchAdapter,
  SnippetFields,
  SnippetType,
} from "./types.js";

// ============================================================================
// Helpers
// ============================================================================

const clean = (text: string | undefined): string =>
  (text ?? "").replace(/\s+/g, " ").trim();

const texts = ($: CheerioAPI, nodes: Cheerio<Element>): string[] =>
  nodes
    .toArray()
    .map((node) => clean($(node).text()))
    .filter((text) => text.length > 0);

// ============================================================================
// Request
// ============================================================================

/**
 * Run a search and load the results page
 * @returns the loaded page, or null when the backend answered with an empty body
 * @throws SearchRequestError on a non-2xx response
 */
export const search = async (
  query: string,
  locale: string
): Promise<CheerioAPI | null> => {
  const url = new URL(config.searchUrl);
  url.searchParams.set("q", query);
  url.searchParams.set("gl", locale);
  if (config.language) {
    url.searchParams.set("hl", config.language);
  }

  debug("GET", url.toString());

  const response = await fetch(url, {
    headers: {
      "User-Agent": config.userAgent,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    },
    signal: AbortSignal.timeout(config.timeoutMs),
  });

  debug("status", response.status, "for", query);

  if (!response.ok) {
    throw new SearchRequestError(query, response.status);
  }

  const html = await response.text();
  if (!html.trim()) return null;

  return cheerio.load(html);
};

// ============================================================================
// Related questions
// ============================================================================

/**
 * Read the "People also ask" questions of a results page, in page order
 * @throws Error when a question block carries no text
 */
export const extractRelatedQuestions = ($: CheerioAPI): Question[] => {
  const questions: Question[] = [];

  $(".related-question-pair")
    .toArray()
    .forEach((pair, index) => {
      const node = $(pair);
      const text =
        clean(node.attr("data-q")) ||
        clean(node.find("[role='heading']").first().text()) ||
        clean(node.text());

      if (!text) {
        throw new Error(`Empty related question block at index ${index}`);
      }
      if (!questions.includes(text)) {
        questions.push(text);
      }
    });

  debug(questions.length, "related questions parsed");
  return questions;
};

// ============================================================================
// Featured snippet
// ============================================================================

const classify = (block: Cheerio<Element>): SnippetType => {
  if (block.find("table").length > 0) return "table";
  if (block.find("ol").length > 0) return "ordered";
  if (block.find("ul").length > 0) return "unordered";
  return "definition";
};

const readTable = ($: CheerioAPI, block: Cheerio<Element>): string[][] =>
  block
    .find("table tr")
    .toArray()
    .map((row) => texts($, $(row).find("th, td")))
    .filter((cells) => cells.length > 0);

const readItems = (
  $: CheerioAPI,
  block: Cheerio<Element>,
  type: "ordered" | "unordered"
): string[] => texts($, block.find(type === "ordered" ? "ol li" : "ul li"));

const readResponse = (
  $: CheerioAPI,
  block: Cheerio<Element>,
  type: SnippetType
): string => {
  switch (type) {
    case "table":
      return readTable($, block)
        .map((cells) => cells.join(" | "))
        .join("\n");
    case "ordered":
    case "unordered":
      return readItems($, block, type).join("\n");
    case "definition":
      return (
        clean(block.find(".hgKElc").first().text()) ||
        clean(block.find("[data-attrid='wa:/description']").first().text())
      );
  }
};

const readFields = (
  $: CheerioAPI,
  block: Cheerio<Element>,
  type: SnippetType,
  response: string
): SnippetFields => {
  const link = block.find(".yuRUbf a[href]").first().attr("href");
  if (!link) {
    throw new Error("Featured snippet has no source link");
  }

  const heading = clean(block.find("[role='heading']").first().text());
  const title = clean(block.find("h3").first().text());
  const displayedLink = clean(block.find("cite").first().text());
  const date = clean(block.find(".kX21rb").first().text());

  return {
    type,
    response,
    link,
    ...(heading ? { heading } : {}),
    ...(title ? { title } : {}),
    ...(displayedLink ? { displayedLink } : {}),
    ...(date ? { date } : {}),
    ...(type === "ordered" || type === "unordered"
      ? { items: readItems($, block, type) }
      : {}),
    ...(type === "table" ? { table: readTable($, block) } : {}),
  };
};

/**
 * Find the featured snippet answering `query` on a results page
 * @returns null when the page has no featured snippet
 */
export const extractFeaturedSnippet = (
  query: string,
  $: CheerioAPI
): FeaturedSnippet | null => {
  const block = $(".xpdopen").first();
  if (block.length === 0) return null;

  const type = classify(block);
  const response = readResponse($, block, type);
  if (!response) return null;

  debug(`featured snippet (${type}) for`, query);

  return {
    response,
    toFields: () => readFields($, block, type, response),
  };
};

export const googleAdapter: SearchAdapter<CheerioAPI> = {
  name: "google",
  fetchDocument: search,
  extractRelatedQuestions,
  extractFeaturedSnippet,
};
