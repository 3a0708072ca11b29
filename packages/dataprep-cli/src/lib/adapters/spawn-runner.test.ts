import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "events";

vi.mock("child_process", () => ({
  spawn: vi.fn(),
}));

import { spawn, type ChildProcess } from "child_process";
import { createSpawnCommandRunner } from "./spawn-runner.js";

function fakeChild(): EventEmitter {
  const child = new EventEmitter();
  vi.mocked(spawn).mockReturnValue(child as unknown as ChildProcess);
  return child;
}

describe("createSpawnCommandRunner", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("spawns without a shell and resolves with the exit code", async () => {
    const child = fakeChild();

    const pending = createSpawnCommandRunner().run("python3", ["-m", "spacy", "download", "en_core_web_sm"]);
    child.emit("close", 0, null);

    await expect(pending).resolves.toEqual({ exitCode: 0 });
    expect(spawn).toHaveBeenCalledWith(
      "python3",
      ["-m", "spacy", "download", "en_core_web_sm"],
      { stdio: "inherit" }
    );
  });

  it("sends the child's stdout to stderr when asked", async () => {
    const child = fakeChild();

    const pending = createSpawnCommandRunner({ stdoutToStderr: true }).run("pip", ["--version"]);
    child.emit("close", 0, null);
    await pending;

    expect(spawn).toHaveBeenCalledWith("pip", ["--version"], { stdio: ["inherit", 2, "inherit"] });
  });

  it("reports the terminating signal", async () => {
    const child = fakeChild();

    const pending = createSpawnCommandRunner().run("python3", []);
    child.emit("close", null, "SIGTERM");

    await expect(pending).resolves.toEqual({ exitCode: 1, signal: "SIGTERM" });
  });

  it("rejects when the command cannot be started", async () => {
    const child = fakeChild();

    const pending = createSpawnCommandRunner().run("python3", []);
    child.emit("error", new Error("spawn python3 ENOENT"));

    await expect(pending).rejects.toThrow("spawn python3 ENOENT");
  });
});
