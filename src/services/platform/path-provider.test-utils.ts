/**
 * Test utilities for PathProvider.
 */
import { join } from "node:path";
import type { PathProvider } from "./path-provider";

/**
 * Create a mock PathProvider.
 * Defaults to test paths under `/test/app-data/`; derived paths follow `dataRootDir`.
 */
export function createMockPathProvider(overrides?: Partial<PathProvider>): PathProvider {
  const dataRootDir = overrides?.dataRootDir ?? join("/test", "app-data");
  return {
    dataRootDir,
    installDir: overrides?.installDir ?? join(dataRootDir, "server"),
    logsDir: overrides?.logsDir ?? join(dataRootDir, "logs"),
    configPath: overrides?.configPath ?? join(dataRootDir, "provisioner.json"),
  };
}
