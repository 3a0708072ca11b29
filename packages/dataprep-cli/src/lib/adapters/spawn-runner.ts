import { spawn, type StdioOptions } from "child_process";
import type { CommandResult, CommandRunner } from "../ports/command-runner.js";

export interface SpawnRunnerOptions {
  /** Send the child's stdout to our stderr, keeping stdout free for JSON output */
  stdoutToStderr?: boolean;
}

/**
 * Create a command runner that spawns the command without a shell and
 * passes its output through to the terminal.
 */
export function createSpawnCommandRunner(options: SpawnRunnerOptions = {}): CommandRunner {
  const stdio: StdioOptions = options.stdoutToStderr
    ? ["inherit", 2, "inherit"]
    : "inherit";

  return {
    run(command: string, args: string[]): Promise<CommandResult> {
      return new Promise((resolve, reject) => {
        const child = spawn(command, args, { stdio });

        child.once("error", reject);
        child.once("close", (code, signal) => {
          resolve({
            exitCode: code ?? 1,
            ...(signal && { signal }),
          });
        });
      });
    },
  };
}
