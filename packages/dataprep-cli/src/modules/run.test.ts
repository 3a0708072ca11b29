import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import chalk from "chalk";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { registerRunCommand, type DepsFactory } from "./run.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { silentSpinnerFactory } from "../lib/spinner.js";

const CONFIG = `requirements:
  - python3
  - pip
downloads:
  - url: https://example.com/boolq/train.jsonl
    dest: boolq/train.jsonl
  - url: https://example.com/glove/vectors.zip
    dest: glove/vectors.zip
`;

describe("run command", () => {
  let dataDir: string;
  let configPath: string;
  let installed: string[];
  let commands: string[];
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  const makeDeps: DepsFactory = (logger) => ({
    resolver: {
      async resolve(name) {
        return installed.includes(name) ? `/usr/bin/${name}` : undefined;
      },
    },
    downloader: {
      async download(url, outputPath) {
        await writeFile(outputPath, url);
        return { bytes: url.length };
      },
    },
    extractor: {
      async extract(_archivePath, targetDir) {
        const out = join(targetDir, "vectors.txt");
        await writeFile(out, "the 0.1 0.2\n");
        return [out];
      },
    },
    runner: {
      async run(command, args) {
        commands.push([command, ...args].join(" "));
        return { exitCode: 0 };
      },
    },
    logger,
    spinner: silentSpinnerFactory,
  });

  async function dataprep(...args: string[]): Promise<void> {
    const argv = ["node", "dataprep", ...args];
    initContext(argv);
    const program = new Command();
    program.exitOverride();
    program.option("--json").option("-q, --quiet");
    registerRunCommand(program, makeDeps);
    await program.parseAsync(argv);
  }

  beforeEach(() => {
    chalk.level = 0;
    dataDir = mkdtempSync(join(tmpdir(), "dataprep-run-"));
    configPath = join(dataDir, "dataprep.yaml");
    writeFileSync(configPath, CONFIG);
    installed = ["python3", "pip"];
    commands = [];
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetContext();
    rmSync(dataDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it("downloads, extracts and installs, then prints a summary", async () => {
    await dataprep("run", "-d", dataDir, "-c", configPath);

    expect(consoleLogSpy).toHaveBeenCalledWith(
      "https://example.com/boolq/train.jsonl successfully downloaded."
    );
    expect(consoleLogSpy).toHaveBeenCalledWith("Extracted 1 file(s) from glove/vectors.zip.");
    expect(consoleLogSpy).toHaveBeenCalledWith(`✓ Data directory ready: ${dataDir}`);
    expect(consoleLogSpy).toHaveBeenCalledWith("  Downloaded: 2  Skipped: 0  Extracted: 1");
    expect(consoleLogSpy).toHaveBeenCalledWith("  Language model: installed");
    expect(commands).toEqual(["python3 -m spacy download en_core_web_sm"]);
    expect(existsSync(join(dataDir, "glove/vectors.txt"))).toBe(true);
    expect(process.exitCode).toBeUndefined();
  });

  it("is the default command", async () => {
    await dataprep("-d", dataDir, "-c", configPath);

    expect(consoleLogSpy).toHaveBeenCalledWith(`✓ Data directory ready: ${dataDir}`);
  });

  it("skips files that are already present on the next run", async () => {
    await dataprep("run", "-d", dataDir, "-c", configPath);
    consoleLogSpy.mockClear();

    await dataprep("run", "-d", dataDir, "-c", configPath);

    expect(consoleLogSpy).toHaveBeenCalledWith(
      "boolq/train.jsonl already exists, skipping download."
    );
    expect(consoleLogSpy).toHaveBeenCalledWith(
      "glove/vectors.zip already exists, skipping download."
    );
    expect(consoleLogSpy).toHaveBeenCalledWith("  Downloaded: 0  Skipped: 2  Extracted: 0");
  });

  it("honors --skip-install and --model", async () => {
    await dataprep("run", "-d", dataDir, "-c", configPath, "--skip-install");
    expect(commands).toEqual([]);
    expect(consoleLogSpy).toHaveBeenCalledWith("  Language model: skipped");

    await dataprep("run", "-d", dataDir, "-c", configPath, "-m", "en_core_web_md");
    expect(commands).toEqual(["python3 -m spacy download en_core_web_md"]);
  });

  it("reports a missing prerequisite and creates nothing", async () => {
    installed = ["python3"];

    await dataprep("run", "-d", dataDir, "-c", configPath);

    expect(consoleErrorSpy).toHaveBeenCalledWith('✗ "pip" is not installed or not on PATH');
    expect(existsSync(join(dataDir, "boolq"))).toBe(false);
    expect(process.exitCode).toBe(1);
  });

  it("reports a config file that does not exist", async () => {
    const missing = join(dataDir, "missing.yaml");

    await dataprep("run", "-d", dataDir, "-c", missing);

    expect(consoleErrorSpy).toHaveBeenCalledWith(`✗ Config file ${missing} has errors`);
    expect(process.exitCode).toBe(1);
  });

  describe("with --json", () => {
    it("prints only the run report on stdout", async () => {
      await dataprep("--json", "run", "-d", dataDir, "-c", configPath);

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output.success).toBe(true);
      expect(output.data.dataDir).toBe(dataDir);
      expect(output.data.tasks).toEqual([
        {
          url: "https://example.com/boolq/train.jsonl",
          dest: "boolq/train.jsonl",
          status: "downloaded",
          bytes: "https://example.com/boolq/train.jsonl".length,
          extracted: [],
        },
        {
          url: "https://example.com/glove/vectors.zip",
          dest: "glove/vectors.zip",
          status: "downloaded",
          bytes: "https://example.com/glove/vectors.zip".length,
          extracted: [join("glove", "vectors.txt")],
        },
      ]);
      expect(output.data.install).toEqual({
        status: "installed",
        command: "python3 -m spacy download en_core_web_sm",
        exitCode: 0,
      });
    });

    it("prints errors as a JSON document", async () => {
      installed = [];

      await dataprep("--json", "run", "-d", dataDir, "-c", configPath);

      const output = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
      expect(output.success).toBe(false);
      expect(output.error.code).toBe("PREREQ_MISSING");
      expect(output.error.message).toBe('"python3" is not installed or not on PATH');
      expect(process.exitCode).toBe(1);
    });
  });
});
