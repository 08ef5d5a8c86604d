/**
 * Free-form HR chat
 */

import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { AIMessage, HumanMessage, type BaseMessage } from "@langchain/core/messages";
import { StringOutputParser } from "@langchain/core/output_parsers";
import type { ChatTurn } from "@/core/types";
import { CHAT_PROMPT } from "./prompts";
import { logger } from "@/utils/logger";

const log = logger.chat;

export const STOP_COMMANDS = new Set(["stop", "exit", "quit", "silence"]);
export const STOP_REPLY = "Okay, stopping the onboarding flow. Bye!";

export function isStopCommand(text: string): boolean {
  return STOP_COMMANDS.has(text.trim().toLowerCase());
}

function toMessages(history: ChatTurn[]): BaseMessage[] {
  return history.map((turn) =>
    turn.sender === "user" ? new HumanMessage(turn.text) : new AIMessage(turn.text)
  );
}

export interface ChatReply {
  text: string;
  /** True when the user asked to end the session */
  stopped: boolean;
}

/**
 * A chat session keeps the conversation so follow-ups have context
 */
export class ChatSession {
  private readonly turns: ChatTurn[] = [];

  constructor(private readonly model: BaseChatModel) {}

  get history(): readonly ChatTurn[] {
    return this.turns;
  }

  async reply(userText: string): Promise<ChatReply> {
    if (isStopCommand(userText)) {
      log.info("Stop command received");
      return { text: STOP_REPLY, stopped: true };
    }

    const chain = CHAT_PROMPT.pipe(this.model).pipe(new StringOutputParser());
    const start = performance.now();
    const text = await chain.invoke({
      input: userText,
      history: toMessages(this.turns),
    });
    log.debug("Chat reply", {
      inputLength: userText.length,
      historyTurns: this.turns.length,
      durationMs: Math.round(performance.now() - start),
    });

    this.turns.push({ sender: "user", text: userText }, { sender: "assistant", text });
    return { text, stopped: false };
  }
}
