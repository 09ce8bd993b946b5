export {
  PromptWrapper,
  keywordScore,
  DEFAULT_KEYWORDS,
  type PromptWrapperConfig,
} from "./PromptWrapper";
