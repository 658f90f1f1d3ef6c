export const TURN_SYSTEM_PROMPT =
  "You resolve the user's task. Invoke the available capabilities when they help, then give a final answer.";

export const SYNTHESIS_PROMPT =
  "The turn limit is reached. Give your best final answer from what is known so far, without invoking anything.";

export function promptTokenEstimate(str: string): number {
  return Math.ceil(str.length / 4);
}

/**
 * Keeps the tail of a prompt within a token estimate, cutting on line boundaries.
 */
export function ensurePromptLimit(prompt: string, maxTokens = 4000): string {
  if (promptTokenEstimate(prompt) <= maxTokens) return prompt;
  const parts = prompt.split("\n");
  let acc = "";
  for (let i = parts.length - 1; i >= 0; i--) {
    if (promptTokenEstimate(acc + "\n" + parts[i]) > maxTokens) break;
    acc = parts[i] + "\n" + acc;
  }
  return acc;
}
