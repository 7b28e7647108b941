import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { listCommand } from "../../src/cli/commands/list";
import { restoreCommand } from "../../src/cli/commands/restore";
import { createArchive, scanSource } from "../../src/core";
import { makeTempDir, removeDir, writeFiles } from "../helpers";

describe("CLI commands", () => {
  let tempDir: string;
  let sourceDir: string;
  let backupDir: string;
  let archivePath: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("cli");
    sourceDir = path.join(tempDir, "source");
    backupDir = path.join(tempDir, "backups");
    await fs.mkdir(backupDir);
    await writeFiles(sourceDir, { "file1.txt": "content 1", "dir/file2.txt": "content 2" });

    archivePath = path.join(backupDir, "backup_20240115_100000.zip");
    await createArchive(await scanSource(sourceDir, null), archivePath);
    await writeFiles(backupDir, { "backup_20240114_090000.zip": "older", "README.txt": "not an archive" });

    // Silence prompt rendering and table output
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(tempDir);
  });

  describe("list", () => {
    test("prints archives as JSON, newest first", async () => {
      const code = await listCommand(["-b", backupDir, "--format", "json"]);

      expect(code).toBe(0);
      const printed: unknown = JSON.parse(String(vi.mocked(console.log).mock.calls[0]?.[0]));
      expect(printed).toEqual([
        expect.objectContaining({ archiveName: "backup_20240115_100000.zip", archivePath }),
        expect.objectContaining({ archiveName: "backup_20240114_090000.zip", sizeBytes: 5 }),
      ]);
    });

    test("applies --limit", async () => {
      const code = await listCommand(["-b", backupDir, "--format", "json", "-n", "1"]);

      expect(code).toBe(0);
      const printed: unknown = JSON.parse(String(vi.mocked(console.log).mock.calls[0]?.[0]));
      expect(printed).toEqual([expect.objectContaining({ archiveName: "backup_20240115_100000.zip" })]);
    });

    test("prints a table row per archive", async () => {
      const code = await listCommand(["-b", backupDir]);

      expect(code).toBe(0);
      // header, separator, two rows
      expect(console.log).toHaveBeenCalledTimes(4);
      expect(String(vi.mocked(console.log).mock.calls[2]?.[0]).startsWith("backup_20240115_100000.zip")).toBe(true);
    });

    test("fails for a missing backup root", async () => {
      expect(await listCommand(["-b", path.join(tempDir, "nowhere")])).toBe(1);
    });

    test("prints help", async () => {
      expect(await listCommand(["--help"])).toBe(0);
      expect(String(vi.mocked(console.log).mock.calls[0]?.[0])).toContain("zipshot list");
    });
  });

  describe("restore", () => {
    test("restores the given archive into the destination", async () => {
      const destination = path.join(tempDir, "restored");

      const code = await restoreCommand([archivePath, destination]);

      expect(code).toBe(0);
      expect(await fs.readFile(path.join(destination, "file1.txt"), "utf8")).toBe("content 1");
      expect(await fs.readFile(path.join(destination, "dir", "file2.txt"), "utf8")).toBe("content 2");
    });

    test("returns 1 when the archive is unreadable", async () => {
      const bogus = path.join(backupDir, "backup_20240114_090000.zip");

      expect(await restoreCommand([bogus, path.join(tempDir, "restored")])).toBe(1);
    });

    test("returns 1 when the archive does not exist", async () => {
      expect(await restoreCommand([path.join(tempDir, "missing.zip"), path.join(tempDir, "out")])).toBe(1);
    });
  });
});
