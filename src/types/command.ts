/**
 * A structured command ready for execution.
 * Installers never build raw package-manager strings; they produce Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  /** Written to the child's stdin, then closed. Never logged. */
  readonly stdin?: string;
  readonly cwd?: string;
  /** Attach the operator's terminal (password prompts, dpkg-reconfigure). */
  readonly interactive?: boolean;
}

/** One step of a multi-command install sequence. */
export interface InstallStep {
  readonly command: Command;
  readonly description: string;
  /** A failing optional step is reported as a warning instead of failing the component. */
  readonly optional?: boolean;
}
