import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";
import { FileConfigStoreAdapter } from "../../../adapters/config/file-config-store.adapter";
import {
  buildSwitchPaths,
  SwitchPaths,
} from "../../../adapters/config/switch-paths";
import { IoError, ParseError } from "../../../shared/errors";

const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");
const FIXED_EPOCH_SECONDS = 1772366400;

describe("FileConfigStoreAdapter", () => {
  let tempDir: string;
  let paths: SwitchPaths;
  let store: FileConfigStoreAdapter;

  beforeEach(async () => {
    tempDir = await fsp.mkdtemp(path.join(os.tmpdir(), "config-store-"));
    paths = buildSwitchPaths(path.join(tempDir, ".claude"));
    store = new FileConfigStoreAdapter(paths, { now: () => FIXED_NOW });
  });

  afterEach(async () => {
    await fsp.rm(tempDir, { recursive: true, force: true });
  });

  describe("load / saveAtomic", () => {
    it("returns an empty config when the file does not exist", async () => {
      await expect(store.load(paths.settingsFile)).resolves.toEqual({ env: {} });
    });

    it("round-trips a config through the settings file", async () => {
      const config = {
        env: {
          ANTHROPIC_AUTH_TOKEN: "test-token",
          ANTHROPIC_BASE_URL: "https://proxy.example.com",
        },
      };

      await store.saveAtomic(paths.settingsFile, config);

      await expect(store.load(paths.settingsFile)).resolves.toEqual(config);
    });

    it("keeps an env key named __proto__ as an ordinary entry", async () => {
      await fsp.mkdir(paths.configDir, { recursive: true });
      await fsp.writeFile(
        paths.settingsFile,
        '{"env":{"__proto__":"x","A":"1"}}',
        "utf-8",
      );

      const loaded = await store.loadSettings();
      expect(Object.entries(loaded.env)).toEqual([
        ["__proto__", "x"],
        ["A", "1"],
      ]);

      await store.saveSettings(loaded);
      await expect(fsp.readFile(paths.settingsFile, "utf-8")).resolves.toBe(
        '{\n  "env": {\n    "__proto__": "x",\n    "A": "1"\n  }\n}\n',
      );
    });

    it("pretty-prints the file and leaves no temp file behind", async () => {
      await store.saveAtomic(paths.settingsFile, { env: { SOME_FLAG: "1" } });

      const raw = await fsp.readFile(paths.settingsFile, "utf-8");
      expect(raw).toBe('{\n  "env": {\n    "SOME_FLAG": "1"\n  }\n}\n');
      const files = await fsp.readdir(paths.configDir);
      expect(files).toEqual(["settings.json"]);
    });

    it("writes an empty object for an empty config", async () => {
      await store.saveAtomic(paths.settingsFile, { env: {} });

      await expect(fsp.readFile(paths.settingsFile, "utf-8")).resolves.toBe(
        "{}\n",
      );
    });

    it("treats a blank settings file as empty", async () => {
      await fsp.mkdir(paths.configDir, { recursive: true });
      await fsp.writeFile(paths.settingsFile, "  \n", "utf-8");

      await expect(store.loadSettings()).resolves.toEqual({ env: {} });
    });

    it("ignores unknown top-level fields", async () => {
      await fsp.mkdir(paths.configDir, { recursive: true });
      await fsp.writeFile(
        paths.settingsFile,
        JSON.stringify({ env: { SOME_FLAG: "1" }, permissions: { allow: [] } }),
        "utf-8",
      );

      await expect(store.loadSettings()).resolves.toEqual({
        env: { SOME_FLAG: "1" },
      });
    });

    it("fails with ParseError on malformed JSON", async () => {
      await fsp.mkdir(paths.configDir, { recursive: true });
      await fsp.writeFile(paths.settingsFile, "{ not json", "utf-8");

      const loading = store.loadSettings();
      await expect(loading).rejects.toBeInstanceOf(ParseError);
      await expect(loading).rejects.toThrow(
        `Failed to parse settings file at ${paths.settingsFile}`,
      );
    });

    it("fails with ParseError when env values are not strings", async () => {
      await fsp.mkdir(paths.configDir, { recursive: true });
      await fsp.writeFile(
        paths.settingsFile,
        JSON.stringify({ env: { API_TIMEOUT_MS: 3000 } }),
        "utf-8",
      );

      await expect(store.loadSettings()).rejects.toBeInstanceOf(ParseError);
    });

    it("fails with IoError when the path cannot be read", async () => {
      const loading = store.load(tempDir);
      await expect(loading).rejects.toBeInstanceOf(IoError);
      await expect(loading).rejects.toThrow(
        `Failed to read config file at ${tempDir}`,
      );
    });

    it("fails with IoError when the parent directory cannot be created", async () => {
      const blocker = path.join(tempDir, "blocker");
      await fsp.writeFile(blocker, "", "utf-8");

      await expect(
        store.saveAtomic(path.join(blocker, "settings.json"), { env: {} }),
      ).rejects.toBeInstanceOf(IoError);
    });
  });

  describe("backups", () => {
    it("reports no backup when the file is absent", async () => {
      await expect(store.loadBackup()).resolves.toEqual({
        isDefaultProvider: false,
      });
      await expect(store.backupExists()).resolves.toBe(false);
    });

    it("writes the backup with metadata and a metadata sidecar", async () => {
      const env = { ANTHROPIC_AUTH_TOKEN: "web-token", SOME_FLAG: "1" };

      await store.saveBackup({ env }, "default");

      const backup = JSON.parse(await fsp.readFile(paths.backupFile, "utf-8"));
      expect(backup).toEqual({
        _metadata: {
          provider: "anthropic",
          created_at: FIXED_EPOCH_SECONDS,
          version: "2.2.0",
        },
        env,
      });
      const sidecar = JSON.parse(
        await fsp.readFile(paths.backupMetadataFile, "utf-8"),
      );
      expect(sidecar).toEqual(backup._metadata);
      await expect(store.backupExists()).resolves.toBe(true);
    });

    it("reads back a saved default backup", async () => {
      await store.saveBackup({ env: { SOME_FLAG: "1" } }, "default");

      await expect(store.loadBackup()).resolves.toEqual({
        isDefaultProvider: true,
        backup: {
          metadata: {
            provider: "anthropic",
            createdAt: FIXED_NOW,
            version: "2.2.0",
          },
          env: { SOME_FLAG: "1" },
        },
      });
    });

    it("overwrites an existing backup", async () => {
      await store.saveBackup({ env: { SOME_FLAG: "1" } }, "default");
      await store.saveBackup({ env: { SOME_FLAG: "2" } }, "default");

      const lookup = await store.loadBackup();
      expect(lookup.backup?.env).toEqual({ SOME_FLAG: "2" });
    });

    it("accepts a backup without created_at", async () => {
      await fsp.mkdir(paths.configDir, { recursive: true });
      await fsp.writeFile(
        paths.backupFile,
        JSON.stringify({
          _metadata: { provider: "anthropic", created_at: null, version: "2.2.0" },
          env: { SOME_FLAG: "1" },
        }),
        "utf-8",
      );

      const lookup = await store.loadBackup();
      expect(lookup.isDefaultProvider).toBe(true);
      expect(lookup.backup?.metadata).toEqual({
        provider: "anthropic",
        version: "2.2.0",
      });
    });

    it("flags a backup tagged with another provider", async () => {
      await store.saveBackup({ env: { SOME_FLAG: "1" } }, "custom");

      const lookup = await store.loadBackup();
      expect(lookup.isDefaultProvider).toBe(false);
      expect(lookup.backup?.metadata.provider).toBe("custom");
    });

    it("treats a legacy bare settings backup as a default backup", async () => {
      await fsp.mkdir(paths.configDir, { recursive: true });
      await fsp.writeFile(
        paths.backupFile,
        JSON.stringify({ env: { ANTHROPIC_AUTH_TOKEN: "web-token" } }),
        "utf-8",
      );

      await expect(store.loadBackup()).resolves.toEqual({
        isDefaultProvider: true,
        backup: {
          metadata: {
            provider: "anthropic",
            createdAt: FIXED_NOW,
            version: "2.2.0",
          },
          env: { ANTHROPIC_AUTH_TOKEN: "web-token" },
        },
      });
    });

    it("stamps legacy backups with the current time by default", async () => {
      const realClockStore = new FileConfigStoreAdapter(paths);
      await fsp.mkdir(paths.configDir, { recursive: true });
      await fsp.writeFile(paths.backupFile, JSON.stringify({ env: {} }), "utf-8");

      const before = Date.now();
      const lookup = await realClockStore.loadBackup();
      const after = Date.now();

      const createdAt = lookup.backup?.metadata.createdAt?.getTime() ?? 0;
      expect(createdAt).toBeGreaterThanOrEqual(before);
      expect(createdAt).toBeLessThanOrEqual(after);
    });

    it("degrades to no backup when the file is malformed", async () => {
      await fsp.mkdir(paths.configDir, { recursive: true });
      await fsp.writeFile(paths.backupFile, "{ broken", "utf-8");

      await expect(store.loadBackup()).resolves.toEqual({
        isDefaultProvider: false,
      });
      await expect(store.backupExists()).resolves.toBe(true);
    });

    it("degrades to no backup when neither shape matches", async () => {
      await fsp.mkdir(paths.configDir, { recursive: true });
      await fsp.writeFile(paths.backupFile, JSON.stringify(["env"]), "utf-8");

      await expect(store.loadBackup()).resolves.toEqual({
        isDefaultProvider: false,
      });
    });
  });

  describe("saved token", () => {
    it("saves the token with owner-only permissions", async () => {
      await store.saveToken("test-token");

      await expect(fsp.readFile(paths.tokenFile, "utf-8")).resolves.toBe(
        "test-token",
      );
      const stat = await fsp.stat(paths.tokenFile);
      if (process.platform === "win32") {
        expect(stat.isFile()).toBe(true);
      } else {
        expect(stat.mode & 0o777).toBe(0o600);
      }
    });

    it("returns the trimmed token", async () => {
      await fsp.mkdir(paths.configDir, { recursive: true });
      await fsp.writeFile(paths.tokenFile, "  test-token \n", "utf-8");

      await expect(store.loadToken()).resolves.toBe("test-token");
    });

    it("returns undefined for a missing or blank token file", async () => {
      await expect(store.loadToken()).resolves.toBeUndefined();

      await fsp.mkdir(paths.configDir, { recursive: true });
      await fsp.writeFile(paths.tokenFile, " \n", "utf-8");
      await expect(store.loadToken()).resolves.toBeUndefined();
    });

    it("removes the token file and tolerates a missing one", async () => {
      await store.saveToken("test-token");

      await store.removeToken();
      await expect(store.loadToken()).resolves.toBeUndefined();
      await expect(store.removeToken()).resolves.toBeUndefined();
    });
  });
});
