// ============================================
// Conversation State — the ordered message log
// ============================================

import type { AssistantMessage, Message } from "../types.js";
import { ConversationStateError } from "./errors.js";

export class ConversationState {
  private messages: Message[] = [];

  constructor(systemPrompt?: string) {
    if (systemPrompt) {
      this.messages.push({ role: "system", content: systemPrompt });
    }
  }

  get length(): number {
    return this.messages.length;
  }

  append(message: Message): void {
    this.check(message);
    this.messages.push(message);
  }

  /** Current log length, to hand back to `rollback`. */
  snapshot(): number {
    return this.messages.length;
  }

  /** Truncate back to a length captured earlier with `snapshot`. */
  rollback(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index > this.messages.length) {
      throw new ConversationStateError(
        `Cannot roll back to ${index}: log has ${this.messages.length} message(s)`,
      );
    }
    this.messages.length = index;
  }

  asTranscript(): readonly Message[] {
    return [...this.messages];
  }

  /** Drop everything except the system prompt. */
  reset(): void {
    const first = this.messages[0];
    this.messages = first?.role === "system" ? [first] : [];
  }

  private check(message: Message): void {
    if (message.role === "system" && this.messages.length > 0) {
      throw new ConversationStateError("A system message may only open the conversation");
    }

    if (message.role === "tool") {
      const assistant = this.lastAssistant();
      const known = assistant?.tool_calls?.some((call) => call.id === message.tool_call_id) ?? false;
      if (!known) {
        throw new ConversationStateError(
          `Tool result ${message.tool_call_id} does not answer a call of the latest assistant message`,
        );
      }
    }
  }

  private lastAssistant(): AssistantMessage | undefined {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      const message = this.messages[i];
      if (message.role === "assistant") return message;
    }
    return undefined;
  }
}
