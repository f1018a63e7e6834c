export type { SummarizationProvider, SummarizeOptions, Summarizer } from "./types.js";
export { createSummarizer } from "./summarizer.js";
export { createSummarizationProvider } from "./create-provider.js";
