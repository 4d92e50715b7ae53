/**
 * OpenAI caption writer public API
 */

export { OpenAiCaptionWriter, buildCaptionPrompt } from "./openAiCaptionWriter";
export type { OpenAiCaptionWriterConfig } from "./openAiCaptionWriter";
