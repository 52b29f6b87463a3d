import fs from "fs-extra";
import path from "path";
import os from "os";
import { JsonObject, JsonValue, ManifestFiles } from "../types";
import { ConfigurationError, errorMessage } from "../errors";
import { isJsonObject, parseJson } from "../utils/json";
import { resolveUserPath } from "../utils/paths";

/**
 * Options for loading configuration files
 */
export interface ConfigurationOptions {
  /**
   * Directory with the shipped `*.json` configuration (default: the `config` directory shipped with the package)
   */
  configDir?: string;

  /**
   * Directory with per-user overrides of the same file names
   * (default: `~/.file-manifest`)
   */
  userConfigDir?: string;
}

export interface ManifestConfiguration {
  files: ManifestFiles;
  /** Every other configuration file, keyed by its basename */
  sections: Record<string, JsonObject>;
}

// Resolves from both src/config and dist/config
export const SHIPPED_CONFIG_DIR = path.join(__dirname, "..", "..", "config");

const REQUIRED_FILES = ["processes", "dropbox", "data-dir"] as const;

/**
 * Reads every configuration file, applies user overrides and resolves the
 * `files` section to absolute paths
 */
export async function loadConfiguration(
  options: ConfigurationOptions = {},
): Promise<ManifestConfiguration> {
  const configDir = options.configDir || SHIPPED_CONFIG_DIR;
  const userConfigDir =
    options.userConfigDir || path.join(os.homedir(), ".file-manifest");

  await fs.ensureDir(userConfigDir);

  const sections: Record<string, JsonObject> = {};
  const names = (await fs.pathExists(configDir))
    ? (await fs.readdir(configDir)).filter((name) => name.endsWith(".json")).sort()
    : [];

  for (const name of names) {
    const key = path.basename(name, ".json");
    const base = await readConfigFile(path.join(configDir, name));
    const overridePath = path.join(userConfigDir, name);
    const override = (await fs.pathExists(overridePath))
      ? await readConfigFile(overridePath)
      : {};
    sections[key] = { ...base, ...override };
  }

  const { files, ...rest } = sections;
  if (!files) {
    throw new ConfigurationError(`No files.json found in ${configDir}`);
  }

  return { files: resolveFiles(files), sections: rest };
}

/**
 * Validates the `files` section and expands every path
 */
export function resolveFiles(files: JsonObject): ManifestFiles {
  const resolved: Record<string, string> = {};
  for (const [key, value] of Object.entries(files)) {
    if (typeof value !== "string") {
      throw new ConfigurationError(`files.${key} must be a path`);
    }
    resolved[key] = resolveUserPath(value);
  }

  const [processes, dropbox, dataDir] = REQUIRED_FILES.map((key) => {
    const value = resolved[key];
    if (!value) {
      throw new ConfigurationError(`files.${key} is required`);
    }
    return value;
  });

  return { ...resolved, processes, dropbox, "data-dir": dataDir };
}

/**
 * Files entries that name destination files rather than directories
 */
export function destinationFiles(files: ManifestFiles): Set<string> {
  return new Set(
    Object.entries(files)
      .filter(([key]) => !key.endsWith("-dir"))
      .map(([, filePath]) => filePath),
  );
}

async function readConfigFile(filePath: string): Promise<JsonObject> {
  let parsed: JsonValue;
  try {
    parsed = parseJson(await fs.readFile(filePath, "utf8"));
  } catch (error: unknown) {
    throw new ConfigurationError(
      `Failed to read ${filePath}: ${errorMessage(error)}`,
    );
  }
  if (!isJsonObject(parsed)) {
    throw new ConfigurationError(`${filePath} must contain a JSON object`);
  }
  return parsed;
}
