import type { ExecutableResolver } from "./ports/executable-resolver.js";
import type { Logger } from "./logger.js";
import { prerequisiteMissing } from "./errors/catalog.js";

export interface RequirementCheck {
  name: string;
  /** Resolved location; absent when the executable was not found */
  path?: string;
}

/**
 * Resolve every required executable without failing.
 */
export async function checkRequirements(
  names: readonly string[],
  resolver: ExecutableResolver
): Promise<RequirementCheck[]> {
  const checks: RequirementCheck[] = [];
  for (const name of names) {
    const path = await resolver.resolve(name);
    checks.push(path ? { name, path } : { name });
  }
  return checks;
}

/**
 * Resolve the required executables in order and stop at the first one that
 * is missing with a PREREQ_MISSING error naming it.
 */
export async function verifyRequirements(
  names: readonly string[],
  resolver: ExecutableResolver,
  logger: Logger
): Promise<RequirementCheck[]> {
  const checks: RequirementCheck[] = [];
  for (const name of names) {
    const path = await resolver.resolve(name);
    if (!path) {
      throw prerequisiteMissing(name);
    }
    logger.debug(`Found ${name}`, { path });
    checks.push({ name, path });
  }
  return checks;
}
