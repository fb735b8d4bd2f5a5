export {
  createExplorer,
  explorer,
  relatedQuestions,
  traverseRelatedQuestions,
  collectRelatedQuestions,
  answer,
  traverseAnswers,
  simpleAnswer,
  TraversalRun,
  type Explorer,
  type ExplorerDefaults,
} from "./explorer.js";
export {
  googleAdapter,
  search,
  extractRelatedQuestions,
  extractFeaturedSnippet,
} from "./google.js";
export {
  createRelatedQuestionsTool,
  createAnswerTool,
  relatedQuestionsTool,
  answerTool,
} from "./questions-tool.js";
export {
  PeopleAlsoAskError,
  InvalidQuestionError,
  RelatedQuestionParseError,
  FeaturedSnippetParseError,
  SearchRequestError,
} from "./errors.js";
export { loadConfig, type Config } from "./config.js";
export type * from "./types.js";
