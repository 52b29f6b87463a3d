import fs from "fs-extra";
import os from "os";
import path from "path";
import {
  destinationFiles,
  loadConfiguration,
  resolveFiles,
  SHIPPED_CONFIG_DIR,
} from "../../../src/config/configuration";
import { ConfigurationError } from "../../../src/errors";
import { makeTempDir } from "../../helpers/tempDir";

describe("configuration", () => {
  let tempDir: string;
  let configDir: string;
  let userConfigDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("manifest-config-");
    configDir = path.join(tempDir, "config");
    userConfigDir = path.join(tempDir, "user");
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe("loadConfiguration", () => {
    it("should resolve the files section and keep the other sections", async () => {
      await fs.outputJson(path.join(configDir, "files.json"), {
        processes: path.join(tempDir, "processes.json"),
        dropbox: path.join(tempDir, "dropbox.json"),
        "data-dir": path.join(tempDir, "data"),
      });
      await fs.outputJson(path.join(configDir, "schema.json"), { version: 2 });

      const config = await loadConfiguration({ configDir, userConfigDir });

      expect(config.files).toEqual({
        processes: path.join(tempDir, "processes.json"),
        dropbox: path.join(tempDir, "dropbox.json"),
        "data-dir": path.join(tempDir, "data"),
      });
      expect(config.sections).toEqual({ schema: { version: 2 } });
      expect(await fs.pathExists(userConfigDir)).toBe(true);
    });

    it("should let user files override shipped keys", async () => {
      await fs.outputJson(path.join(configDir, "files.json"), {
        processes: "/srv/processes.json",
        dropbox: "/srv/dropbox.json",
        "data-dir": "/srv/data",
      });
      await fs.outputJson(path.join(userConfigDir, "files.json"), {
        "data-dir": "/mnt/data",
      });

      const config = await loadConfiguration({ configDir, userConfigDir });

      expect(config.files["data-dir"]).toBe(path.resolve("/mnt/data"));
      expect(config.files.dropbox).toBe(path.resolve("/srv/dropbox.json"));
    });

    it("should read the shipped configuration regardless of the working directory", async () => {
      const cwd = jest.spyOn(process, "cwd").mockReturnValue(tempDir);

      const config = await loadConfiguration({ userConfigDir });

      expect(SHIPPED_CONFIG_DIR).toBe(path.resolve(__dirname, "..", "..", "..", "config"));
      expect(config.files).toEqual({
        processes: path.join(os.homedir(), ".file-manifest", "processes.json"),
        dropbox: path.join(os.homedir(), ".file-manifest", "dropbox.json"),
        "data-dir": path.join(os.homedir(), ".file-manifest", "data"),
      });
      expect(config.sections).toEqual({});
      cwd.mockRestore();
    });

    it("should fail without a files section", async () => {
      await fs.ensureDir(configDir);

      await expect(loadConfiguration({ configDir, userConfigDir })).rejects.toThrow(
        `No files.json found in ${configDir}`,
      );
    });

    it("should report malformed files", async () => {
      await fs.outputFile(path.join(configDir, "files.json"), "not json");

      await expect(
        loadConfiguration({ configDir, userConfigDir }),
      ).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe("resolveFiles", () => {
    it("should expand the home directory", () => {
      const files = resolveFiles({
        processes: "~/state/processes.json",
        dropbox: "~/state/dropbox.json",
        "data-dir": "~",
      });

      expect(files.processes).toBe(path.join(os.homedir(), "state", "processes.json"));
      expect(files["data-dir"]).toBe(os.homedir());
    });

    it("should require every core entry", () => {
      expect(() => resolveFiles({ processes: "/a", dropbox: "/b" })).toThrow(
        "files.data-dir is required",
      );
    });

    it("should reject entries that are not paths", () => {
      expect(() =>
        resolveFiles({ processes: "/a", dropbox: 3, "data-dir": "/c" }),
      ).toThrow("files.dropbox must be a path");
    });
  });

  describe("destinationFiles", () => {
    it("should leave out directory entries", () => {
      expect(
        destinationFiles({
          processes: "/a/processes.json",
          dropbox: "/a/dropbox.json",
          "data-dir": "/a/data",
          "archive-dir": "/a/archive",
        }),
      ).toEqual(new Set(["/a/processes.json", "/a/dropbox.json"]));
    });
  });
});
