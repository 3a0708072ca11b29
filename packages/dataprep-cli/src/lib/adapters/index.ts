export { createPathResolver, pathResolver } from "./path-resolver.js";
export { createFetchDownloadService, fetchDownloadService } from "./fetch-download.js";
export { zipExtractor } from "./zip-extractor.js";
export { createSpawnCommandRunner } from "./spawn-runner.js";
export { createProcessSignalHandler } from "./process-signals.js";
