import { tool, type Tool } from "ai";
import { z } from "zod";
import { explorer as defaultExplorer, type Explorer } from "./explorer.js";
import type { AnswerRecord, Question } from "./types.js";

const questionSchema = z
  .string()
  .refine((val) => val.trim().length > 0, { message: "Question is empty" })
  .describe("The question or search text to start from");

const localeSchema = z
  .string()
  .min(2)
  .optional()
  .describe(
    "Country code of the search results, e.g. 'us', 'gb', 'fr'. Defaults to the configured locale."
  );

/**
 * Creates a related questions tool with optional default overrides
 * @param config - Configuration options for default values
 * @returns A tool listing the "people also ask" questions around a question
 *
 * @example
 * ```ts
 * // Follow related questions until 20 are found
 * const tool = createRelatedQuestionsTool({ defaultMaxQuestions: 20 });
 * ```
 */
export const createRelatedQuestionsTool = ({
  explorer = defaultExplorer,
  defaultLocale,
  defaultMaxQuestions,
}: {
  explorer?: Explorer;
  defaultLocale?: string;
  defaultMaxQuestions?: number;
} = {}): Tool => {
  return tool({
    description:
      "List the 'people also ask' questions related to a question. Without maxQuestions only the questions shown for the question itself are returned; with maxQuestions the related questions are followed recursively.",
    inputSchema: z.object({
      question: questionSchema,
      locale: localeSchema,
      maxQuestions: z
        .number()
        .int()
        .nonnegative()
        .optional()
        .describe(
          "Follow related questions recursively and stop after about this many. Omit for a single lookup."
        ),
    }),
    execute: async ({
      question,
      locale,
      maxQuestions,
    }): Promise<{ question: string; relatedQuestions: Question[] }> => {
      const relatedQuestions = await explorer.collectRelatedQuestions(
        question,
        {
          locale: locale || defaultLocale,
          maxQuestions: maxQuestions ?? defaultMaxQuestions,
        }
      );

      return { question, relatedQuestions };
    },
  });
};

/**
 * Creates an answer tool with optional default overrides
 * @param config - Configuration options for default values
 * @returns A tool answering a question from the featured snippet of its results page
 *
 * @example
 * ```ts
 * const tool = createAnswerTool({ defaultLocale: "gb", defaultFallback: true });
 * ```
 */
export const createAnswerTool = ({
  explorer = defaultExplorer,
  defaultLocale,
  defaultFallback,
}: {
  explorer?: Explorer;
  defaultLocale?: string;
  defaultFallback?: boolean;
} = {}): Tool => {
  return tool({
    description:
      "Answer a question with the featured snippet of its search results, along with the related questions shown for it. Set simple to get only the short answer text.",
    inputSchema: z.object({
      question: questionSchema,
      locale: localeSchema,
      simple: z
        .boolean()
        .optional()
        .describe("Whether to return only the short answer text. Defaults to false."),
      fallback: z
        .boolean()
        .optional()
        .describe(
          "When simple is set and the question has no answer, answer the first related question instead. Defaults to false."
        ),
    }),
    execute: async ({
      question,
      locale,
      simple,
      fallback,
    }): Promise<AnswerRecord | { question: string; answer: string }> => {
      if (simple) {
        const answer = await explorer.simpleAnswer(question, {
          locale: locale || defaultLocale,
          fallback: fallback ?? defaultFallback,
        });
        return { question, answer };
      }

      return explorer.answer(question, { locale: locale || defaultLocale });
    },
  });
};

/**
 * Default related questions tool instance
 * For custom defaults, use `createRelatedQuestionsTool({ ... })` instead.
 */
export const relatedQuestionsTool = createRelatedQuestionsTool();

/**
 * Default answer tool instance
 * For custom defaults, use `createAnswerTool({ ... })` instead.
 */
export const answerTool = createAnswerTool();
