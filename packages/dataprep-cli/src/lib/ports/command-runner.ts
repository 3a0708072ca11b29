export interface CommandResult {
  exitCode: number;
  signal?: NodeJS.Signals;
}

/**
 * Abstraction for running external commands.
 * Allows testing without spawning child processes.
 */
export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
}
