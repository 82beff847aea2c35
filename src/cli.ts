import { Command } from "commander";
import { VERSION } from "./version.js";

/**
 * Command line: no arguments starts the interactive run. Anything besides
 * -h/--help and -v/--version is rejected with exit code 1.
 */
export function buildProgram(action: () => Promise<void>): Command {
  return new Command()
    .name("devhost-setup")
    .description("Interactive setup of a Linux development machine: user, Docker, Claude CLI, development tools")
    .version(VERSION, "-v, --version", "print the version and exit")
    .helpOption("-h, --help", "print this help and exit")
    .allowExcessArguments(false)
    .action(action);
}
