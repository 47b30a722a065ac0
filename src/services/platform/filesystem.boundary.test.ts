// @vitest-environment node
/**
 * Boundary tests for DefaultFileSystemLayer.
 * Tests filesystem operations against real filesystem with temp directories.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import {
  mkdir as nodeMkdir,
  readFile as nodeReadFile,
  stat,
  writeFile as nodeWriteFile,
} from "node:fs/promises";
import { DefaultFileSystemLayer } from "./filesystem";
import { FileSystemError } from "../errors";
import { createTempDir } from "../test-utils";
import { createSilentLogger } from "../logging/logging.test-utils";

async function captureError(promise: Promise<unknown>): Promise<FileSystemError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FileSystemError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected operation to fail");
}

describe("DefaultFileSystemLayer", () => {
  let fs: DefaultFileSystemLayer;
  let tempDir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    fs = new DefaultFileSystemLayer(createSilentLogger());
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  describe("readFile", () => {
    it("reads file content", async () => {
      const filePath = join(tempDir.path, "installed-version.txt");
      await nodeWriteFile(filePath, "0.2.0\n", "utf-8");

      expect(await fs.readFile(filePath)).toBe("0.2.0\n");
    });

    it("throws ENOENT for non-existent file", async () => {
      const filePath = join(tempDir.path, "missing.txt");

      const error = await captureError(fs.readFile(filePath));

      expect(error.fsCode).toBe("ENOENT");
      expect(error.path).toBe(filePath);
    });

    it("throws EISDIR when reading a directory", async () => {
      const dirPath = join(tempDir.path, "server");
      await nodeMkdir(dirPath);

      const error = await captureError(fs.readFile(dirPath));

      expect(error.fsCode).toBe("EISDIR");
    });
  });

  describe("writeFile", () => {
    it("overwrites existing file", async () => {
      const filePath = join(tempDir.path, "cached-version.txt");
      await nodeWriteFile(filePath, "0.1.0", "utf-8");

      await fs.writeFile(filePath, "0.2.0");

      expect(await nodeReadFile(filePath, "utf-8")).toBe("0.2.0");
    });

    it("throws ENOENT when parent directory does not exist", async () => {
      const filePath = join(tempDir.path, "server", "cached-version.txt");

      const error = await captureError(fs.writeFile(filePath, "0.2.0"));

      expect(error.fsCode).toBe("ENOENT");
    });
  });

  describe("writeFileBuffer", () => {
    it("writes binary content", async () => {
      const filePath = join(tempDir.path, "adapter");
      const content = Buffer.from([0x7f, 0x45, 0x4c, 0x46]);

      await fs.writeFileBuffer(filePath, content);

      expect((await nodeReadFile(filePath)).equals(content)).toBe(true);
    });
  });

  describe("mkdir", () => {
    it("creates nested directories by default", async () => {
      const dirPath = join(tempDir.path, "a", "b", "server");

      await fs.mkdir(dirPath);

      expect((await stat(dirPath)).isDirectory()).toBe(true);
    });

    it("is no-op when directory already exists", async () => {
      const dirPath = join(tempDir.path, "server");
      await nodeMkdir(dirPath);

      await expect(fs.mkdir(dirPath)).resolves.toBeUndefined();
    });

    it("throws EEXIST when a file exists at path", async () => {
      const filePath = join(tempDir.path, "server");
      await nodeWriteFile(filePath, "not a directory");

      const error = await captureError(fs.mkdir(filePath));

      expect(error.fsCode).toBe("EEXIST");
    });
  });

  describe("readdir", () => {
    it("returns type information", async () => {
      await nodeWriteFile(join(tempDir.path, "adapter"), "bin");
      await nodeMkdir(join(tempDir.path, "logs"));

      const entries = await fs.readdir(tempDir.path);
      const byName = new Map(entries.map((entry) => [entry.name, entry]));

      expect(byName.get("adapter")).toEqual({
        name: "adapter",
        isDirectory: false,
        isFile: true,
        isSymbolicLink: false,
      });
      expect(byName.get("logs")?.isDirectory).toBe(true);
    });

    it("throws ENOENT for non-existent directory", async () => {
      const error = await captureError(fs.readdir(join(tempDir.path, "missing")));

      expect(error.fsCode).toBe("ENOENT");
    });

    it("throws ENOTDIR when path is a file", async () => {
      const filePath = join(tempDir.path, "file.txt");
      await nodeWriteFile(filePath, "x");

      const error = await captureError(fs.readdir(filePath));

      expect(error.fsCode).toBe("ENOTDIR");
    });
  });

  describe("rm", () => {
    it("deletes a file", async () => {
      const filePath = join(tempDir.path, "adapter.download");
      await nodeWriteFile(filePath, "partial");

      await fs.rm(filePath);

      const error = await captureError(fs.readFile(filePath));
      expect(error.fsCode).toBe("ENOENT");
    });

    it("throws ENOENT for non-existent path", async () => {
      const error = await captureError(fs.rm(join(tempDir.path, "missing")));

      expect(error.fsCode).toBe("ENOENT");
    });

    it("does not throw with force option for non-existent path", async () => {
      await expect(
        fs.rm(join(tempDir.path, "missing"), { force: true })
      ).resolves.toBeUndefined();
    });

    it("throws ENOTEMPTY for non-empty directory without recursive", async () => {
      const dirPath = join(tempDir.path, "server");
      await nodeMkdir(dirPath);
      await nodeWriteFile(join(dirPath, "adapter"), "bin");

      const error = await captureError(fs.rm(dirPath));

      expect(error.fsCode).toBe("ENOTEMPTY");
    });

    it("deletes directory tree with recursive option", async () => {
      const dirPath = join(tempDir.path, "server");
      await nodeMkdir(dirPath);
      await nodeWriteFile(join(dirPath, "adapter"), "bin");

      await fs.rm(dirPath, { recursive: true });

      const error = await captureError(fs.readdir(dirPath));
      expect(error.fsCode).toBe("ENOENT");
    });
  });

  describe.skipIf(process.platform === "win32")("makeExecutable", () => {
    it("sets mode 755", async () => {
      const filePath = join(tempDir.path, "adapter");
      await nodeWriteFile(filePath, "bin");

      await fs.makeExecutable(filePath);

      expect((await stat(filePath)).mode & 0o777).toBe(0o755);
    });

    it("throws ENOENT for missing file", async () => {
      const error = await captureError(fs.makeExecutable(join(tempDir.path, "missing")));

      expect(error.fsCode).toBe("ENOENT");
    });
  });

  describe("rename", () => {
    it("replaces the destination", async () => {
      const source = join(tempDir.path, "adapter.download");
      const target = join(tempDir.path, "adapter");
      await nodeWriteFile(source, "new");
      await nodeWriteFile(target, "old");

      await fs.rename(source, target);

      expect(await nodeReadFile(target, "utf-8")).toBe("new");
      const error = await captureError(fs.readFile(source));
      expect(error.fsCode).toBe("ENOENT");
    });

    it("throws ENOENT when source does not exist", async () => {
      const error = await captureError(
        fs.rename(join(tempDir.path, "missing"), join(tempDir.path, "target"))
      );

      expect(error.fsCode).toBe("ENOENT");
      expect(error.path).toBe(join(tempDir.path, "missing"));
    });
  });
});
