/** Raised locally when the model asks for a tool that was never discovered. */
export class ToolNotInContextError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool '${toolName}' not in context. Use tool_search to discover it first.`);
    this.name = "ToolNotInContextError";
  }
}

/** A transcript invariant was broken. This is a bug, not a runtime condition. */
export class ConversationStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConversationStateError";
  }
}

/** The chat endpoint failed or answered with something unusable. */
export class ChatError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "ChatError";
  }
}
