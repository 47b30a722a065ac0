/**
 * Temporary directories for tests that touch the real filesystem.
 */

import { mkdtemp, rm, realpath } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

/**
 * Create a temporary directory; the caller runs `cleanup` when done.
 * The path is resolved with realpath so it compares equal to paths the
 * code under test derives (macOS /var -> /private/var).
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const tempPath = await mkdtemp(join(tmpdir(), "adapter-provisioner-test-"));
  const resolvedPath = await realpath(tempPath);
  return {
    path: resolvedPath,
    cleanup: async () => {
      await rm(resolvedPath, { recursive: true, force: true, maxRetries: 5, retryDelay: 200 });
    },
  };
}
