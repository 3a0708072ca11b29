import { constants } from "os";
import type { SignalHandler } from "../ports/signal-handler.js";

type SignalListener = (signal: NodeJS.Signals) => void;

/** Where the signals come from; the running process in production */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

const SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

/**
 * Create a signal handler that runs the registered cleanup callbacks and then
 * exits with the conventional 128 + signal number status.
 */
export function createProcessSignalHandler(
  exit: (code: number) => void = (code) => process.exit(code),
  source: SignalSource = process
): SignalHandler {
  const handlers: Array<(signal: NodeJS.Signals) => Promise<void>> = [];
  let isHandling = false;

  const handleSignal = async (signal: NodeJS.Signals) => {
    if (isHandling) return;
    isHandling = true;
    await Promise.allSettled(handlers.map((h) => h(signal)));
    exit(128 + (constants.signals[signal] ?? 0));
  };

  const listener: SignalListener = (signal) => {
    void handleSignal(signal);
  };

  return {
    onShutdown(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        for (const signal of SIGNALS) source.on(signal, listener);
      }
    },
    removeAll() {
      handlers.length = 0;
      for (const signal of SIGNALS) source.off(signal, listener);
    },
  };
}
