import type { AnswerSource, ConfirmQuestion, SelectQuestion, TextQuestion } from "../src/core/prompts.js";

type ScriptedAnswer = string | number | boolean;

/** Replays answers in order; text prompts take strings, selects numbers, confirms booleans. */
export class ScriptedAnswerSource implements AnswerSource {
  readonly asked: Array<{ message: string; defaultValue?: string; initialValue?: boolean }> = [];
  readonly rejections: string[] = [];
  private readonly answers: ScriptedAnswer[];

  constructor(answers: ScriptedAnswer[]) {
    this.answers = [...answers];
  }

  get remaining(): number {
    return this.answers.length;
  }

  private next(kind: "string" | "number" | "boolean", message: string): ScriptedAnswer {
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer left for "${message}"`);
    }
    if (typeof answer !== kind) {
      throw new Error(`Expected a ${kind} answer for "${message}", got ${JSON.stringify(answer)}`);
    }
    return answer;
  }

  async text(question: TextQuestion): Promise<string> {
    this.asked.push({ message: question.message, ...(question.defaultValue !== undefined ? { defaultValue: question.defaultValue } : {}) });
    return String(this.next("string", question.message));
  }

  async select(question: SelectQuestion): Promise<number> {
    this.asked.push({ message: question.message });
    return Number(this.next("number", question.message));
  }

  async confirm(question: ConfirmQuestion): Promise<boolean> {
    this.asked.push({ message: question.message, initialValue: question.initialValue });
    return Boolean(this.next("boolean", question.message));
  }

  reject(message: string): void {
    this.rejections.push(message);
  }
}
