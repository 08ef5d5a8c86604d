import { initChatModel } from "langchain/chat_models/universal";
import { logger } from "@/utils/logger";

export const DEFAULT_TEMPERATURE = 0.4;

/**
 * Chat model from a "provider:model" id, e.g. "google-genai:gemini-2.5-flash".
 * The Google provider reads GOOGLE_API_KEY from the environment.
 */
export async function createChatModel(modelName: string, temperature = DEFAULT_TEMPERATURE) {
  logger.onboarding.info("Initializing model", { model: modelName, temperature });
  return initChatModel(modelName, { temperature });
}
