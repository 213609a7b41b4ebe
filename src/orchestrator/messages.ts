import type { AgentRole, ChatMessage } from "../providers/types.js";
import { ROLE_FOLLOW_UPS, ROLE_INSTRUCTIONS } from "./stages.js";

/**
 * Builds the prompt for one agent: its fixed instruction, the user query,
 * the prior agent turns as assistant messages and, when there are prior
 * turns, a closing user message asking for this role's contribution.
 */
export const buildAgentMessages = (input: {
  role: AgentRole;
  query: string;
  history: readonly ChatMessage[];
}): ChatMessage[] => {
  const messages: ChatMessage[] = [
    { role: "system", content: ROLE_INSTRUCTIONS[input.role] },
    { role: "user", content: input.query }
  ];

  if (input.history.length > 0) {
    messages.push(...input.history.map((entry) => ({ role: entry.role, content: entry.content })));
    messages.push({ role: "user", content: ROLE_FOLLOW_UPS[input.role] });
  }

  return messages;
};
