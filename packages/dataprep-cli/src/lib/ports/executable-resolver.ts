/**
 * Abstraction for locating executables on the command search path.
 */
export interface ExecutableResolver {
  /** Absolute path of the executable, or undefined when it cannot be found */
  resolve(name: string): Promise<string | undefined>;
}
