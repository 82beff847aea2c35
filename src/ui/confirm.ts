import type { Prompter } from "./prompter.js";
import type { Reporter } from "./reporter.js";

export type ConfirmAnswer = "yes" | "no" | "help";

export interface ConfirmOptions {
  defaultYes?: boolean;
  /** Shown when the operator answers `?` or `help`. */
  help?: string;
  maxAttempts?: number;
}

const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Interpret a raw answer. Empty input takes the default; unrecognized input is null.
 */
export function parseConfirmAnswer(input: string, defaultYes: boolean): ConfirmAnswer | null {
  const answer = input.trim().toLowerCase();
  if (answer === "") return defaultYes ? "yes" : "no";
  if (answer === "y" || answer === "yes") return "yes";
  if (answer === "n" || answer === "no") return "no";
  if (answer === "?" || answer === "h" || answer === "help") return "help";
  return null;
}

/**
 * Ask a yes/no question. Help and unrecognized answers re-ask, up to maxAttempts;
 * after that the default answer is taken.
 */
export async function confirm(
  io: { prompter: Prompter; reporter: Reporter },
  message: string,
  options: ConfirmOptions = {},
): Promise<boolean> {
  const defaultYes = options.defaultYes ?? false;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const suffix = defaultYes ? "[Y/n]" : "[y/N]";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const raw = await io.prompter.text(`${message} ${suffix}`, { placeholder: defaultYes ? "y" : "n" });
    const answer = parseConfirmAnswer(raw, defaultYes);
    if (answer === "yes") return true;
    if (answer === "no") return false;
    if (answer === "help") {
      io.reporter.info(options.help ?? "Answer y (yes) or n (no); press Enter for the default.");
    } else {
      io.reporter.warn(`Please answer y, n or ? (got '${raw.trim()}')`);
    }
  }

  io.reporter.warn(`No valid answer after ${maxAttempts} attempts — using default (${defaultYes ? "yes" : "no"})`);
  return defaultYes;
}
