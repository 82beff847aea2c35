import * as p from "@clack/prompts";
import { InterruptedError } from "../shared/errors.js";

export interface SelectOption<T extends string> {
  value: T;
  label: string;
  hint?: string;
}

/**
 * Source of operator input. Flows only talk to this interface, so tests drive
 * them with canned answers instead of a terminal.
 */
export interface Prompter {
  text(message: string, options?: { placeholder?: string; defaultValue?: string }): Promise<string>;
  password(message: string): Promise<string>;
  multiselect<T extends string>(message: string, options: SelectOption<T>[], initial: T[]): Promise<T[]>;
}

function orCancel<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel("Setup cancelled.");
    throw new InterruptedError("Prompt cancelled by the operator");
  }
  return value;
}

/** Terminal prompter backed by @clack/prompts. */
export class ClackPrompter implements Prompter {
  async text(message: string, options: { placeholder?: string; defaultValue?: string } = {}): Promise<string> {
    const value = orCancel(await p.text({ message, placeholder: options.placeholder, defaultValue: options.defaultValue }));
    return value ?? "";
  }

  async password(message: string): Promise<string> {
    const value = orCancel(await p.password({ message }));
    return value ?? "";
  }

  async multiselect<T extends string>(message: string, options: SelectOption<T>[], initial: T[]): Promise<T[]> {
    const picked = orCancel(
      await p.multiselect<SelectOption<string>[], string>({
        message,
        options: options.map((o) => ({ value: o.value, label: o.label, hint: o.hint })),
        initialValues: initial,
        required: false,
      }),
    );
    // Map back through the offered options so only known values survive.
    return options.filter((o) => picked.includes(o.value)).map((o) => o.value);
  }
}
