import chalk from "chalk";
import type { Logger } from "pino";

/** Anything text can be written to: process.stdout, or a buffer in tests. */
export interface OutputSink {
  write(chunk: string): unknown;
}

export interface ReporterOptions {
  out?: OutputSink;
  /** Force colors on or off; defaults to chalk's terminal detection. */
  color?: boolean;
}

type Level = "info" | "warn" | "error";

/**
 * Console side of the run log. Every line is color-coded for the operator and
 * mirrored into the pino log file, so the log holds the same story as the screen.
 */
export class Reporter {
  private readonly out: OutputSink;
  private readonly c: chalk.Chalk;

  constructor(private readonly logger: Logger, options: ReporterOptions = {}) {
    this.out = options.out ?? process.stdout;
    this.c = options.color === undefined ? chalk : new chalk.Instance({ level: options.color ? 1 : 0 });
  }

  banner(version: string, logFile: string | null): void {
    const rule = "=".repeat(66);
    this.write(this.c.cyan(rule));
    this.write(this.c.cyan(`          DEVHOST SETUP v${version}`));
    this.write(this.c.cyan(rule));
    this.write(this.c.yellow("This tool will set up your development environment"));
    if (logFile) this.write(this.c.yellow(`Log file: ${logFile}`));
    this.write("");
    this.logger.info({ version, logFile }, "Setup started");
  }

  step(message: string): void {
    this.emit("info", "step", `${this.c.blue("[STEP]")} ${message}`, message);
  }

  success(message: string): void {
    this.emit("info", "success", `${this.c.green("[SUCCESS]")} ${message}`, message);
  }

  info(message: string): void {
    this.emit("info", "info", `${this.c.cyan("[INFO]")} ${message}`, message);
  }

  warn(message: string): void {
    this.emit("warn", "warning", `${this.c.yellow("[WARNING]")} ${message}`, message);
  }

  error(message: string, remediation: readonly string[] = []): void {
    this.emit("error", "error", `${this.c.red("[ERROR]")} ${message}`, message, { remediation });
    for (const hint of remediation) this.write(`  ${this.c.yellow("→")} ${hint}`);
  }

  section(title: string): void {
    this.write("");
    this.write(this.c.cyan(`=== ${title} ===`));
    this.logger.info({ kind: "section" }, title);
  }

  heading(title: string): void {
    this.write("");
    this.write(this.c.magenta(`${title}:`));
  }

  /** Plain line, mirrored to the log. */
  line(text = ""): void {
    this.write(text);
    if (text) this.logger.info({ kind: "line" }, text);
  }

  /** Raw output of a child process. */
  output(chunk: string, stream: "stdout" | "stderr" = "stdout"): void {
    this.out.write(chunk);
    const text = chunk.trimEnd();
    if (text) this.logger.info({ kind: "output", stream }, text);
  }

  private emit(level: Level, kind: string, rendered: string, plain: string, extra: Record<string, unknown> = {}): void {
    this.write(rendered);
    this.logger[level]({ kind, ...extra }, plain);
  }

  private write(text: string): void {
    this.out.write(`${text}\n`);
  }
}
