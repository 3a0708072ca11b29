import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { isAbsolute, join, normalize, sep } from "path";
import { invalidConfig } from "./errors/catalog.js";
import type { DownloadTask } from "./downloads.js";
import type { LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/dataprep/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "dataprep",
  "config.yaml"
);

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  dataDir: ".",
  requirements: ["python3", "pip"],
  downloads: [
    {
      url: "https://storage.googleapis.com/boolq/train.jsonl",
      dest: "boolq/train.jsonl",
    },
    {
      url: "https://storage.googleapis.com/boolq/dev.jsonl",
      dest: "boolq/dev.jsonl",
    },
    {
      url: "https://nlp.stanford.edu/data/glove.840B.300d.zip",
      dest: "glove/glove.840B.300d.zip",
    },
  ],
  install: {
    enabled: true,
    required: true,
    python: "python3",
    model: "en_core_web_sm",
  },
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/**
 * True for a relative path that stays inside the directory it is resolved
 * against and names something below it.
 */
export function isContainedRelativePath(path: string): boolean {
  if (isAbsolute(path)) return false;
  const normalized = normalize(path);
  return normalized !== "." && normalized !== ".." && !normalized.startsWith(`..${sep}`);
}

const DownloadTaskSchema = z.object({
  url: z.string().url(),
  dest: z
    .string()
    .min(1)
    .refine(isContainedRelativePath, "must be a relative path inside dataDir"),
  sha256: z
    .string()
    .regex(/^[a-fA-F0-9]{64}$/, "must be a hex-encoded SHA-256 digest")
    .optional(),
  sizeBytes: z.number().int().positive().optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  dataDir: z.string().min(1).optional(),
  requirements: z.array(z.string().min(1)).optional(),
  downloads: z.array(DownloadTaskSchema).min(1).optional(),
  install: z
    .object({
      enabled: z.boolean().optional(),
      required: z.boolean().optional(),
      python: z.string().min(1).optional(),
      model: z.string().min(1).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface InstallConfig {
  enabled: boolean;
  required: boolean;
  python: string;
  model: string;
}

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  dataDir: string;
  requirements: string[];
  downloads: DownloadTask[];
  install: InstallConfig;
  logLevel: LogLevel;
  logJson: boolean;
}

/** Values taken from command-line flags */
export interface CliOverrides {
  dataDir?: string;
  installEnabled?: boolean;
  model?: string;
  logLevel?: LogLevel;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws a VALIDATION_CONFIG_INVALID error if the file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${err instanceof Error ? err.message : String(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${err instanceof Error ? err.message : String(err)}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".") || "(root)"}: ${i.message}`
    );
    throw invalidConfig(path, issues);
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.dataDir !== undefined) {
    target.dataDir = source.dataDir;
  }
  if (source.requirements !== undefined) {
    target.requirements = [...source.requirements];
  }
  if (source.downloads !== undefined) {
    target.downloads = source.downloads.map((task) => ({ ...task }));
  }
  if (source.install?.enabled !== undefined) {
    target.install.enabled = source.install.enabled;
  }
  if (source.install?.required !== undefined) {
    target.install.required = source.install.required;
  }
  if (source.install?.python !== undefined) {
    target.install.python = source.install.python;
  }
  if (source.install?.model !== undefined) {
    target.install.model = source.install.model;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: CliOverrides = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const config: ResolvedConfig = {
    dataDir: CONFIG_DEFAULTS.dataDir,
    requirements: [...CONFIG_DEFAULTS.requirements],
    downloads: CONFIG_DEFAULTS.downloads.map((task) => ({ ...task })),
    install: { ...CONFIG_DEFAULTS.install },
    logLevel: "info",
    logJson: false,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  if (cliOptions.dataDir !== undefined) {
    config.dataDir = cliOptions.dataDir;
  }
  if (cliOptions.installEnabled !== undefined) {
    config.install.enabled = cliOptions.installEnabled;
  }
  if (cliOptions.model !== undefined) {
    config.install.model = cliOptions.model;
  }
  if (cliOptions.logLevel !== undefined) {
    config.logLevel = cliOptions.logLevel;
  }

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Config file named with --config; it must exist and
 *   replaces both the user and the system file
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: CliOverrides = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) {
      throw invalidConfig(explicitPath, ["file not found"]);
    }
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}
