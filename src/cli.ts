#!/usr/bin/env node
import { answer, collectRelatedQuestions } from "./explorer.js";
import { config } from "./config.js";

const usage = 'Usage: paa-explorer "<question>" [locale] [--related [maxQuestions]]';

async function main() {
  const args = process.argv.slice(2);
  const relatedIdx = args.indexOf("--related");
  const related = relatedIdx >= 0;

  let maxQuestions: number | undefined;
  if (related) {
    const value = args[relatedIdx + 1];
    if (value !== undefined && /^\d+$/.test(value)) {
      maxQuestions = Number(value);
      args.splice(relatedIdx, 2);
    } else {
      args.splice(relatedIdx, 1);
    }
  }

  const [question, locale = config.locale] = args;
  if (!question) {
    console.error(usage);
    process.exit(1);
  }

  if (related) {
    const questions = await collectRelatedQuestions(question, {
      locale,
      maxQuestions,
    });
    console.log(questions.join("\n"));
    return;
  }

  const result = await answer(question, { locale });
  console.dir(result, { depth: null });
}

main().catch((e) => {
  console.error("Error:", e instanceof Error ? e.message : e);
  process.exit(1);
});
