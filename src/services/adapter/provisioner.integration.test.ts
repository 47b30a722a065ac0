// @vitest-environment node
/**
 * Integration tests for createAdapterProvisioner against a real temporary
 * data directory. HTTP is served by the in-memory client mock.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { readFile, stat, writeFile } from "node:fs/promises";
import { createAdapterProvisioner } from "./provisioner";
import { SessionPathCache } from "./session-cache";
import { ConfigError, UnsupportedPlatformError } from "../errors";
import type { ProvisionerConfigOverrides } from "../config/types";
import { createMockHttpClient, type MockHttpClient } from "../platform/http-client.state-mock";
import { createMockPlatformInfo } from "../platform/platform-info.test-utils";
import { ManualClock } from "../platform/clock.test-utils";
import { createMockLoggingService } from "../logging/logging.test-utils";
import { createTempDir } from "../test-utils";

const RELEASES_URL = "https://api.github.com/repos/vulnera-rs/adapter/releases";
const ASSET_URL =
  "https://github.com/vulnera-rs/adapter/releases/download/adapter-v0.2.0/" +
  "vulnera-adapter-x86_64-unknown-linux-gnu";
const RELEASES_BODY =
  '[{"tag_name":"adapter-v0.3.0","prerelease":true,"draft":false},' +
  '{"tag_name":"adapter-v0.2.0","prerelease":false,"draft":false}]';

describe("createAdapterProvisioner", () => {
  let tempDir: { path: string; cleanup: () => Promise<void> };
  let httpClient: MockHttpClient;

  beforeEach(async () => {
    tempDir = await createTempDir();
    httpClient = createMockHttpClient({
      responses: {
        [RELEASES_URL]: { body: RELEASES_BODY },
        [ASSET_URL]: { body: Buffer.from("#!/bin/sh\necho adapter\n") },
      },
      defaultResponse: { status: 404 },
    });
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  function create(config: ProvisionerConfigOverrides = {}) {
    return createAdapterProvisioner({
      dataRootDir: tempDir.path,
      platformInfo: createMockPlatformInfo({ platform: "linux", arch: "x64", homeDir: tempDir.path }),
      loggingService: createMockLoggingService(),
      httpClient,
      clock: new ManualClock(1_700_000_000),
      config,
    });
  }

  it("installs the latest stable adapter and returns its command", async () => {
    const provisioner = await create();
    const executable = join(tempDir.path, "server", "vulnera-adapter");

    const command = await provisioner.resolveCommand({
      shellEnv: [
        ["VULNERA_API_URL", "https://api.example.test"],
        ["PATH", "/usr/bin"],
      ],
    });

    expect(command).toEqual({
      command: executable,
      args: [],
      env: [
        ["VULNERA_API_URL", "https://api.example.test"],
        ["VULNERA_LOG", "info"],
      ],
    });
    expect(await readFile(executable, "utf-8")).toBe("#!/bin/sh\necho adapter\n");
    expect((await stat(executable)).mode & 0o111).not.toBe(0);

    const serverDir = join(tempDir.path, "server");
    expect(await readFile(join(serverDir, "installed-version.txt"), "utf-8")).toBe("0.2.0");
    expect(await readFile(join(serverDir, "cached-version.txt"), "utf-8")).toBe("0.2.0");
    expect(await readFile(join(serverDir, "cached-version-timestamp.txt"), "utf-8")).toBe(
      "1700000000"
    );
  });

  it("makes no requests on a second resolution within the TTL", async () => {
    const provisioner = await create();
    const cache = new SessionPathCache();

    await provisioner.resolveCommand({ shellEnv: [], cache });
    const first = httpClient.$.requests.length;
    const command = await provisioner.resolveCommand({ shellEnv: [], cache });

    expect(first).toBe(2);
    expect(httpClient).toHaveRequestCount(2);
    expect(command.command).toBe(join(tempDir.path, "server", "vulnera-adapter"));
  });

  it("applies the settings file from the data root", async () => {
    await writeFile(
      join(tempDir.path, "provisioner.json"),
      JSON.stringify({ cacheTtlSeconds: 42, env: { defaultLogFilter: "warn" } })
    );

    const provisioner = await create();

    expect(provisioner.config.cacheTtlSeconds).toBe(42);
    const command = await provisioner.resolveCommand({
      shellEnv: [["VULNERA_ADAPTER_PATH", "/opt/vulnera-adapter"]],
    });
    expect(command.env).toEqual([["VULNERA_LOG", "warn"]]);
  });

  it("rejects invalid configuration overrides", async () => {
    await expect(create({ repository: "not a repository" })).rejects.toThrow(ConfigError);
  });

  it("rejects an unsupported host platform", async () => {
    const provisioner = await create();

    await expect(
      provisioner.resolveCommand({ shellEnv: [], platform: { platform: "linux", arch: "ppc64" } })
    ).rejects.toThrow(UnsupportedPlatformError);
    expect(httpClient).toHaveNoRequests();
  });

  it("installs the floor version when the release listing is unavailable", async () => {
    httpClient.setResponse(RELEASES_URL, { status: 503 });
    httpClient.setResponse(
      "https://github.com/vulnera-rs/adapter/releases/download/adapter-v0.1.1/" +
        "vulnera-adapter-x86_64-unknown-linux-gnu",
      { body: "floor" }
    );
    const provisioner = await create();

    await provisioner.resolveCommand({ shellEnv: [] });

    expect(
      await readFile(join(tempDir.path, "server", "installed-version.txt"), "utf-8")
    ).toBe("0.1.1");
  });
});
