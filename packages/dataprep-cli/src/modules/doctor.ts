/**
 * Doctor command - reports what a run would need and what is already on disk,
 * without downloading or installing anything.
 */

import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import os from "os";
import { resolve } from "path";
import { loadConfig, type ResolvedConfig } from "../lib/config.js";
import { checkRequirements } from "../lib/requirements.js";
import { getFileIdentity } from "../lib/file-identity.js";
import { formatBytes } from "../lib/spinner.js";
import { maybeOutputJson, type DoctorResultJson } from "../lib/json-output.js";
import { handleCommandError } from "../lib/errors/renderer.js";
import { pathResolver } from "../lib/adapters/path-resolver.js";
import type { ExecutableResolver } from "../lib/ports/executable-resolver.js";
import { getCliVersion } from "../lib/version.js";

type Check = DoctorResultJson["checks"][number];

const MIN_NODE_MAJOR = 20;

/**
 * Run every diagnostic check against the resolved configuration.
 */
export async function collectChecks(
  config: ResolvedConfig,
  resolver: ExecutableResolver
): Promise<Check[]> {
  const checks: Check[] = [];

  const nodeMajor = parseInt(process.version.slice(1).split(".")[0], 10);
  checks.push(
    nodeMajor >= MIN_NODE_MAJOR
      ? { name: "Node.js version", status: "pass", message: `Node.js ${process.version}` }
      : {
          name: "Node.js version",
          status: "fail",
          message: `Node.js ${process.version} (requires >= ${MIN_NODE_MAJOR})`,
        }
  );

  for (const requirement of await checkRequirements(config.requirements, resolver)) {
    checks.push(
      requirement.path
        ? { name: requirement.name, status: "pass", message: "found", details: requirement.path }
        : { name: requirement.name, status: "fail", message: "not installed or not on PATH" }
    );
  }

  const dataDir = resolve(config.dataDir);
  for (const task of config.downloads) {
    const identity = await getFileIdentity(resolve(dataDir, task.dest));
    checks.push(
      identity
        ? { name: task.dest, status: "pass", message: `present (${formatBytes(identity.size)})` }
        : { name: task.dest, status: "warn", message: "not downloaded yet", details: task.url }
    );
  }

  return checks;
}

function statusIcon(status: Check["status"]): string {
  return status === "pass" ? chalk.green("✓") :
         status === "warn" ? chalk.yellow("⚠") :
         chalk.red("✗");
}

export function registerDoctorCommand(
  program: Command,
  resolver: ExecutableResolver = pathResolver
): void {
  program
    .command("doctor")
    .description("Check prerequisites and which files are already downloaded")
    .option("-d, --data-dir <dir>", "Directory to inspect")
    .option("-c, --config <path>", "Config file to use instead of the user/system files")
    .option("--verbose", "Show resolved paths and source URLs")
    .action(async (options: { dataDir?: string; config?: string; verbose?: boolean }) => {
      try {
        const { config } = loadConfig(options.config, { dataDir: options.dataDir });
        const checks = await collectChecks(config, resolver);
        const failCount = checks.filter((c) => c.status === "fail").length;
        if (failCount > 0) {
          process.exitCode = 1;
        }

        const result: DoctorResultJson = {
          checks,
          system: {
            os: `${os.platform()} ${os.release()}`,
            nodeVersion: process.version,
            cliVersion: getCliVersion(),
          },
          dataDir: resolve(config.dataDir),
        };

        if (maybeOutputJson(result)) {
          return;
        }

        const table = new CliTable3({
          head: ["", chalk.cyan("Check"), chalk.cyan("Status")].concat(
            options.verbose ? [chalk.cyan("Details")] : []
          ),
        });
        for (const check of checks) {
          table.push(
            [statusIcon(check.status), check.name, check.message].concat(
              options.verbose ? [check.details ?? ""] : []
            )
          );
        }

        console.log(chalk.bold.cyan(`Data directory: ${result.dataDir}`));
        console.log(table.toString());
        console.log("");
        if (failCount > 0) {
          console.log(chalk.red(`✗ ${failCount} check(s) failed`));
        } else {
          console.log(chalk.green("✓ Ready to run"));
        }
      } catch (error) {
        handleCommandError(error);
      }
    });
}
