import { InvalidInputError } from "../errors.js";
import type { ChatMessage, ChatRole } from "./types.js";

const CHAT_ROLES: ReadonlySet<string> = new Set<ChatRole>(["system", "user", "assistant"]);

const isChatRole = (value: unknown): value is ChatRole =>
  typeof value === "string" && CHAT_ROLES.has(value);

export const assertValidMessages = (messages: readonly unknown[]): ChatMessage[] => {
  if (messages.length === 0) {
    throw new InvalidInputError("Message history must not be empty", { field: "messages" });
  }

  return messages.map((message, index) => {
    if (!message || typeof message !== "object") {
      throw new InvalidInputError(`messages[${index}] must be an object`, { field: "messages" });
    }
    const role = "role" in message ? message.role : undefined;
    const content = "content" in message ? message.content : undefined;
    if (!isChatRole(role)) {
      throw new InvalidInputError(`messages[${index}].role is not one of system|user|assistant`, {
        field: "messages"
      });
    }
    if (typeof content !== "string") {
      throw new InvalidInputError(`messages[${index}].content must be a string`, {
        field: "messages"
      });
    }
    if (index === 0 && role !== "system") {
      throw new InvalidInputError("messages[0] must be the system instruction", {
        field: "messages"
      });
    }
    return { role, content };
  });
};
