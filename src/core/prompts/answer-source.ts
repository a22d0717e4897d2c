import { cancel, confirm, isCancel, log, select, text } from "@clack/prompts";

export interface TextQuestion {
  message: string;
  defaultValue?: string;
}

export interface SelectQuestion {
  message: string;
  options: readonly string[];
  initialIndex: number;
}

export interface ConfirmQuestion {
  message: string;
  initialValue: boolean;
}

/**
 * Where the wizard gets its answers from. The console implementation below is
 * the production one; tests replay a scripted sequence instead.
 */
export interface AnswerSource {
  /** Raw line as typed; an empty string means the user just pressed enter. */
  text(question: TextQuestion): Promise<string>;
  /** Index into `question.options`. */
  select(question: SelectQuestion): Promise<number>;
  confirm(question: ConfirmQuestion): Promise<boolean>;
  /** Shows why the previous answer was rejected. */
  reject(message: string): void;
}

function unwrapPrompt<T>(value: T | symbol): T {
  if (isCancel(value)) {
    cancel("Manifest setup canceled.");
    process.exit(1);
  }

  return value as T;
}

export class ClackAnswerSource implements AnswerSource {
  async text(question: TextQuestion): Promise<string> {
    // No clack defaultValue here: an empty line must reach askUntilValid untouched.
    const value = unwrapPrompt<string | undefined>(
      await text({
        message: question.message,
        ...(question.defaultValue ? { placeholder: question.defaultValue } : {})
      })
    );
    return value ?? "";
  }

  async select(question: SelectQuestion): Promise<number> {
    return unwrapPrompt<number>(
      await select<number>({
        message: question.message,
        initialValue: question.initialIndex,
        options: question.options.map((label, index) => ({ value: index, label }))
      })
    );
  }

  async confirm(question: ConfirmQuestion): Promise<boolean> {
    return unwrapPrompt<boolean>(
      await confirm({
        message: question.message,
        initialValue: question.initialValue
      })
    );
  }

  reject(message: string): void {
    log.warn(message);
  }
}
