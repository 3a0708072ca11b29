import { access, stat } from "fs/promises";
import { constants } from "fs";
import { join } from "path";
import type { ExecutableResolver } from "../ports/executable-resolver.js";

export interface PathResolverOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Read PATH the way the platform spells it (Windows keeps it as "Path").
 */
function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const match = Object.keys(env).find((k) => k.toUpperCase() === key);
  return match ? env[match] : undefined;
}

async function isExecutable(path: string, windows: boolean): Promise<boolean> {
  try {
    const stats = await stat(path);
    if (!stats.isFile()) return false;
    if (!windows) {
      await access(path, constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a resolver that searches the directories listed in PATH, the same
 * lookup a shell performs before running a command. On Windows every
 * PATHEXT extension is tried as well.
 */
export function createPathResolver(options: PathResolverOptions = {}): ExecutableResolver {
  const env = options.env ?? process.env;
  const windows = (options.platform ?? process.platform) === "win32";
  const delimiter = windows ? ";" : ":";

  function candidates(name: string): string[] {
    const extensions = windows
      ? ["", ...(readEnv(env, "PATHEXT") ?? ".COM;.EXE;.BAT;.CMD").split(";").filter(Boolean)]
      : [""];

    if (name.includes("/") || (windows && name.includes("\\"))) {
      return extensions.map((ext) => name + ext);
    }

    const dirs = (readEnv(env, "PATH") ?? "").split(delimiter).filter(Boolean);
    return dirs.flatMap((dir) => extensions.map((ext) => join(dir, name + ext)));
  }

  return {
    async resolve(name: string): Promise<string | undefined> {
      for (const candidate of candidates(name)) {
        if (await isExecutable(candidate, windows)) {
          return candidate;
        }
      }
      return undefined;
    },
  };
}

/**
 * Default resolver reading the current process environment.
 */
export const pathResolver = createPathResolver();
