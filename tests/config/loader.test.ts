import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { toBackupConfig } from "../../src/config";
import {
  CONFIG_FILE_NAMES,
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
} from "../../src/config/loader";
import { validateConfig } from "../../src/config/validator";
import { makeTempDir, removeDir } from "../helpers";

describe("config loader", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("config");
  });

  afterAll(async () => {
    await removeDir(tempDir);
  });

  const validConfig = {
    version: "1.0",
    sourceRoot: "/var/data",
    backupRoot: "/var/backups",
    intervalMinutes: 15,
    archive: { compression: 9 },
  };

  async function writeConfig(name: string, content: string | object): Promise<string> {
    const configPath = path.join(tempDir, name);
    await fs.writeFile(configPath, typeof content === "string" ? content : JSON.stringify(content));
    return configPath;
  }

  describe("loadConfig", () => {
    test("loads valid YAML config", async () => {
      const configPath = await writeConfig(
        "valid.yaml",
        `
version: "1.0"
sourceRoot: /var/data
backupRoot: /var/backups
intervalMinutes: 15
archive:
  compression: 9
`,
      );

      const config = await loadConfig(configPath);

      expect(config).toEqual({ ...validConfig, sourceRoot: path.resolve("/var/data"), backupRoot: path.resolve("/var/backups") });
    });

    test("loads valid JSON config", async () => {
      const configPath = await writeConfig("valid.json", validConfig);

      const config = await loadConfig(configPath);

      expect(config.intervalMinutes).toBe(15);
      expect(config.archive?.compression).toBe(9);
    });

    test("resolves relative paths from config directory", async () => {
      const configPath = await writeConfig("relative.json", {
        version: "1.0",
        sourceRoot: "./data",
        backupRoot: "../backups",
      });

      const config = await loadConfig(configPath);

      expect(config.sourceRoot).toBe(path.join(tempDir, "data"));
      expect(config.backupRoot).toBe(path.join(path.dirname(tempDir), "backups"));
    });

    test("applies defaults for interval and compression", async () => {
      const configPath = await writeConfig("minimal.yml", "version: '1.0'\nsourceRoot: /a\nbackupRoot: /b\n");

      const config = await loadConfig(configPath);

      expect(config.intervalMinutes).toBe(30);
      expect(config.archive).toEqual({ compression: 6 });
    });

    test("fills compression into an empty archive section", async () => {
      const configPath = await writeConfig("partial.json", {
        version: "1.0",
        sourceRoot: "/a",
        backupRoot: "/b",
        archive: {},
      });

      const config = await loadConfig(configPath);

      expect(config.archive).toEqual({ compression: 6 });
    });

    test("throws ConfigError for missing file", async () => {
      const missing = path.join(tempDir, "missing.yaml");

      await expect(loadConfig(missing)).rejects.toThrow(new ConfigError(`Config file not found: ${missing}`));
    });

    test("throws ConfigError for unsupported format", async () => {
      const configPath = await writeConfig("config.toml", "version = '1.0'");

      await expect(loadConfig(configPath)).rejects.toThrow(
        "Unsupported config file format: .toml. Use .yaml, .yml, or .json",
      );
    });

    test("throws ConfigError for invalid YAML", async () => {
      const configPath = await writeConfig("broken.yaml", "version: [unclosed");

      await expect(loadConfig(configPath)).rejects.toThrow("Failed to parse YAML: ");
    });

    test("throws ConfigError for invalid JSON", async () => {
      const configPath = await writeConfig("broken.json", "{ not json");
      let reason = "";
      try {
        JSON.parse("{ not json");
      } catch (e) {
        reason = e instanceof Error ? e.message : String(e);
      }

      await expect(loadConfig(configPath)).rejects.toThrow(new ConfigError(`Failed to parse JSON: ${reason}`));
    });

    test("throws when the file holds a list", async () => {
      const configPath = await writeConfig("list.yaml", "- one\n- two\n");

      await expect(loadConfig(configPath)).rejects.toThrow(
        `Config file must contain an object: ${configPath}`,
      );
    });

    test("throws for an invalid interval", async () => {
      const configPath = await writeConfig("interval.json", { ...validConfig, intervalMinutes: "often" });

      await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe("validateConfig", () => {
    test("accepts a complete config", () => {
      expect(() => validateConfig(validConfig)).not.toThrow();
    });

    test("accepts a config without archive section", () => {
      const { archive: _archive, ...rest } = validConfig;
      expect(() => validateConfig(rest)).not.toThrow();
    });

    test.each([
      [null, "Config must be an object"],
      [[], "Config must be an object"],
      [{ ...validConfig, version: undefined }, "Config must have a 'version' field"],
      [{ ...validConfig, version: 1 }, "Config must have a 'version' field"],
      [{ ...validConfig, sourceRoot: "" }, "sourceRoot must be a non-empty path"],
      [{ ...validConfig, backupRoot: 42 }, "backupRoot must be a non-empty path"],
      [{ ...validConfig, intervalMinutes: 0 }, "intervalMinutes must be a positive integer"],
      [{ ...validConfig, intervalMinutes: 2.5 }, "intervalMinutes must be a positive integer"],
      [{ ...validConfig, archive: "fast" }, "archive must be an object"],
      [{ ...validConfig, archive: { compression: 10 } }, "archive.compression must be an integer from 0 to 9"],
      [{ ...validConfig, archive: { compression: "max" } }, "archive.compression must be an integer from 0 to 9"],
    ])("rejects %j", (config, message) => {
      expect(() => validateConfig(config)).toThrow(new ConfigError(message));
    });
  });

  describe("findConfigFile", () => {
    test.each(CONFIG_FILE_NAMES)("finds %s", async (name) => {
      const dir = path.join(tempDir, `find-${name}`);
      await fs.mkdir(dir);
      await fs.writeFile(path.join(dir, name), "");

      expect(findConfigFile(dir)).toBe(path.join(dir, name));
    });

    test("returns null when no config found", async () => {
      const dir = path.join(tempDir, "find-none");
      await fs.mkdir(dir);

      expect(findConfigFile(dir)).toBeNull();
    });

    test("prefers yaml over json", async () => {
      const dir = path.join(tempDir, "find-both");
      await fs.mkdir(dir);
      await fs.writeFile(path.join(dir, "zipshot.config.json"), "{}");
      await fs.writeFile(path.join(dir, "zipshot.config.yaml"), "");

      expect(findConfigFile(dir)).toBe(path.join(dir, "zipshot.config.yaml"));
    });

    test("ignores a directory with a config file name", async () => {
      const dir = path.join(tempDir, "find-dir");
      await fs.mkdir(path.join(dir, "zipshot.config.yaml"), { recursive: true });

      expect(findConfigFile(dir)).toBeNull();
    });
  });

  describe("findAndLoadConfig", () => {
    test("loads config from explicit path", async () => {
      const configPath = await writeConfig("explicit.json", validConfig);

      const config = await findAndLoadConfig(configPath);

      expect(config.sourceRoot).toBe(path.resolve("/var/data"));
    });
  });

  describe("toBackupConfig", () => {
    test("flattens compression", () => {
      expect(toBackupConfig(validConfig)).toEqual({
        sourceRoot: "/var/data",
        backupRoot: "/var/backups",
        intervalMinutes: 15,
        compression: 9,
      });
    });

    test("omits compression when not set", () => {
      const { archive: _archive, ...rest } = validConfig;

      expect(toBackupConfig(rest)).toEqual({
        sourceRoot: "/var/data",
        backupRoot: "/var/backups",
        intervalMinutes: 15,
      });
    });
  });
});
