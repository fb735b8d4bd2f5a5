import { test, describe } from "node:test";
import assert from "node:assert";
import type { Tool } from "ai";
import { createExplorer } from "./explorer.js";
import { createGraphAdapter } from "./graph-adapter.js";
import { createAnswerTool, createRelatedQuestionsTool } from "./questions-tool.js";

const run = async (tool: Tool, input: unknown): Promise<unknown> => {
  const { execute } = tool;
  assert.ok(execute, "tool should be executable");
  return await execute(input, { toolCallId: "call-1", messages: [] });
};

describe("question tools", () => {
  const pages = {
    Q: { related: ["R", "T"] },
    R: { related: ["S"], snippet: "r answer" },
    S: { related: [] },
    T: { related: ["S"] },
  };

  describe("createRelatedQuestionsTool", () => {
    test("should do a single lookup by default", async () => {
      const adapter = createGraphAdapter(pages);
      const tool = createRelatedQuestionsTool({
        explorer: createExplorer(adapter),
        defaultLocale: "gb",
      });

      const result = await run(tool, { question: "Q" });

      assert.deepStrictEqual(result, { question: "Q", relatedQuestions: ["R", "T"] });
      assert.deepStrictEqual(adapter.calls, [{ query: "Q", locale: "gb" }]);
    });

    test("should follow related questions with a maximum", async () => {
      const tool = createRelatedQuestionsTool({
        explorer: createExplorer(createGraphAdapter(pages)),
        defaultMaxQuestions: 10,
      });

      const result = await run(tool, { question: "Q", locale: "us" });

      assert.ok(result && typeof result === "object" && "relatedQuestions" in result);
      assert.ok(Array.isArray(result.relatedQuestions));
      assert.deepStrictEqual(
        [...result.relatedQuestions].sort(),
        ["R", "S", "T"]
      );
    });
  });

  describe("createAnswerTool", () => {
    test("should return the answer record", async () => {
      const tool = createAnswerTool({ explorer: createExplorer(createGraphAdapter(pages)) });

      const result = await run(tool, { question: "R" });

      assert.deepStrictEqual(result, {
        question: "R",
        hasAnswer: true,
        relatedQuestions: ["S"],
        snippet: {
          type: "definition",
          response: "r answer",
          link: "https://example.com/R",
        },
      });
    });

    test("should return the short answer with fallback", async () => {
      const tool = createAnswerTool({
        explorer: createExplorer(createGraphAdapter(pages)),
        defaultFallback: true,
      });

      assert.deepStrictEqual(await run(tool, { question: "Q", simple: true }), {
        question: "Q",
        answer: "r answer",
      });
      assert.deepStrictEqual(
        await run(tool, { question: "Q", simple: true, fallback: false }),
        { question: "Q", answer: "" }
      );
    });
  });
});
