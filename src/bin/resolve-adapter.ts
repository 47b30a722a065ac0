#!/usr/bin/env node
/**
 * adapter-resolve - print the command that launches the Vulnera adapter.
 *
 * Resolves (and installs if needed) the adapter for the current process's
 * platform and environment, then writes the command as JSON to stdout:
 *
 *   { "command": "/home/me/.local/share/vulnera/server/vulnera-adapter",
 *     "args": [], "env": [["VULNERA_LOG", "info"]] }
 *
 * On failure the serialized error goes to stderr and the exit code is 1.
 */

import {
  createAdapterProvisioner,
  type AdapterProvisioner,
  type AdapterProvisionerOptions,
} from "../services/adapter/provisioner";
import { shellEnvFromRecord } from "../services/adapter/environment";
import { isServiceError } from "../services/errors";
import { getErrorMessage } from "../shared/error-utils";

// Exit codes
export const EXIT_OK = 0;
export const EXIT_FAILED = 1;

export interface RunOptions {
  readonly env: NodeJS.ProcessEnv;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly createProvisioner?: (options: AdapterProvisionerOptions) => Promise<AdapterProvisioner>;
}

/**
 * Resolve the adapter command once.
 *
 * @returns Process exit code
 */
export async function run(options: RunOptions): Promise<number> {
  const create = options.createProvisioner ?? createAdapterProvisioner;

  let provisioner: AdapterProvisioner | undefined;
  try {
    provisioner = await create({ processEnv: options.env });
    const command = await provisioner.resolveCommand({ shellEnv: shellEnvFromRecord(options.env) });
    options.stdout(JSON.stringify(command, null, 2) + "\n");
    return EXIT_OK;
  } catch (error) {
    const payload = isServiceError(error)
      ? error.toJSON()
      : { type: "unexpected", message: getErrorMessage(error) };
    options.stderr(JSON.stringify(payload) + "\n");
    return EXIT_FAILED;
  } finally {
    provisioner?.dispose();
  }
}

// Skip when running in test environment (Vitest sets VITEST env var)
if (!process.env.VITEST) {
  run({
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error("Fatal error:", getErrorMessage(error));
      process.exitCode = EXIT_FAILED;
    });
}
