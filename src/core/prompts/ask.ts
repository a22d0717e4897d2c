import type { AnswerSource } from "./answer-source.js";
import type { Validator } from "./validators.js";

/**
 * Asks a free-form question. An empty answer yields the default when one is
 * shown, otherwise `undefined`.
 */
async function ask(source: AnswerSource, message: string, defaultValue?: string): Promise<string | undefined> {
  const answer = await source.text({ message, ...(defaultValue !== undefined ? { defaultValue } : {}) });
  if (answer.length > 0) return answer;
  return defaultValue !== undefined && defaultValue.length > 0 ? defaultValue : undefined;
}

/**
 * Re-asks the same question, with the same default, until `validator` accepts
 * the answer. There is no attempt limit; only cancelling the prompt ends it
 * early. The default (not the empty string) is validated when the user just
 * presses enter.
 */
async function askUntilValid<T>(
  source: AnswerSource,
  message: string,
  defaultValue: string | undefined,
  validator: Validator<T>
): Promise<T> {
  for (;;) {
    const answer = (await ask(source, message, defaultValue)) ?? "";
    const result = validator(answer);
    if (result.ok) return result.value;
    source.reject(result.message);
  }
}

export { ask, askUntilValid };
