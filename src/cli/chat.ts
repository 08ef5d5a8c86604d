/**
 * onboardia chat -- interactive HR assistant loop
 */

import * as clack from "@clack/prompts";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { ChatSession } from "@/agents/chat";
import { errorMessage } from "@/core/errors";
import { logger } from "@/utils/logger";

const log = logger.cli;

export async function runChat(model: BaseChatModel) {
  const session = new ChatSession(model);
  clack.log.info("Ask anything about onboarding. Type `exit` to leave.");

  while (true) {
    const input = await clack.text({
      message: "You",
      placeholder: "Type your message...",
    });

    if (clack.isCancel(input)) {
      clack.outro("Bye!");
      return;
    }
    if (!input.trim()) continue;

    const s = clack.spinner();
    s.start("Thinking...");

    try {
      const reply = await session.reply(input);
      s.stop("Onboardia");
      if (reply.stopped) {
        clack.outro(reply.text);
        return;
      }
      clack.log.message(reply.text);
    } catch (error) {
      s.stop("Failed");
      log.error("Chat reply failed", { error: errorMessage(error) });
      clack.log.error(`Could not get a reply: ${errorMessage(error)}`);
    }
  }
}
