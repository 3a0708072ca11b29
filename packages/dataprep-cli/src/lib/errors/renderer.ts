import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";
import { isJsonMode } from "../cli-context.js";
import { outputError } from "../json-output.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Format an error as the lines printed to stderr in human-readable mode.
 */
export function formatError(error: CLIError): string[] {
  const output: string[] = [""];

  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(error.message)}`);

  if (error.details) {
    output.push("");
    for (const line of error.details.split("\n")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  if (error.example) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  output.push("");
  return output;
}

/**
 * Render an error as text or, in JSON mode, as a JSON error document.
 */
export function renderError(error: CLIError, json: boolean = isJsonMode()): void {
  if (json) {
    outputError(error);
    return;
  }

  for (const line of formatError(error)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError, render it and flag the process as failed.
 */
export function handleCommandError(error: unknown): void {
  renderError(isCLIError(error) ? error : unknownError(error));
  process.exitCode = 1;
}

export { CLIError, isCLIError };
