import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { maybeOutputJson } from "../lib/json-output.js";
import { formatError } from "../lib/errors/renderer.js";
import { isCLIError } from "../lib/errors/types.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# dataprep configuration
# Place at ~/.config/dataprep/config.yaml (user) or /etc/dataprep/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. User config (~/.config/dataprep/config.yaml), or the file given with --config
# 3. System config (/etc/dataprep/config.yaml)
# 4. Built-in defaults

# Directory the download destinations are relative to
dataDir: "."

# Executables that must be on PATH before anything is downloaded
requirements:
  - python3
  - pip

# Files to fetch, in order. Existing destinations are never downloaded again.
# Destinations ending in .zip are extracted next to the archive.
# Optional per file: sha256 (hex digest) and sizeBytes, checked after download.
downloads:
  - url: "https://storage.googleapis.com/boolq/train.jsonl"
    dest: "boolq/train.jsonl"
  - url: "https://storage.googleapis.com/boolq/dev.jsonl"
    dest: "boolq/dev.jsonl"
  - url: "https://nlp.stanford.edu/data/glove.840B.300d.zip"
    dest: "glove/glove.840B.300d.zip"

# Language model install: <python> -m spacy download <model>
install:
  enabled: true
  # Fail the run when the install fails
  required: true
  python: python3
  model: en_core_web_sm

# Logging configuration
logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON log lines
  json: false
`;

function describeError(error: unknown): string {
  if (isCLIError(error)) {
    return formatError(error).filter((line) => line !== "").join("\n");
  }
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage dataprep configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/dataprep/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(
          chalk.red(`Failed to create config: ${error instanceof Error ? error.message : String(error)}`)
        );
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config
        ? [options.config]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid`));
          console.error(describeError(error));
          hasErrors = true;
        }
      }

      if (!foundAny && !options.config) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'dataprep config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);

        if (maybeOutputJson({ effective: resolved, sources })) {
          return;
        }

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        console.log();
        console.log(`dataDir:          ${resolved.dataDir}`);

        console.log();
        console.log(chalk.bold("Requirements:"));
        for (const name of resolved.requirements) {
          console.log(`  - ${name}`);
        }

        console.log();
        console.log(chalk.bold("Downloads:"));
        for (const task of resolved.downloads) {
          console.log(`  - ${task.dest}`);
          console.log(chalk.gray(`      ${task.url}`));
        }

        console.log();
        console.log(chalk.bold("Install:"));
        console.log(`  enabled:        ${resolved.install.enabled}`);
        console.log(`  required:       ${resolved.install.required}`);
        console.log(`  command:        ${resolved.install.python} -m spacy download ${resolved.install.model}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:          ${resolved.logLevel}`);
        console.log(`  json:           ${resolved.logJson}`);
      } catch (error) {
        console.error(chalk.red("Failed to load config"));
        console.error(describeError(error));
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
