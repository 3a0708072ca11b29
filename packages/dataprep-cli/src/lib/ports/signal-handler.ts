/**
 * Abstraction for process signal handling.
 * Allows testing interruption cleanup without actual process signals.
 */
export interface SignalHandler {
  /** Register cleanup to run before the process exits on SIGINT or SIGTERM */
  onShutdown(callback: (signal: NodeJS.Signals) => Promise<void>): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
