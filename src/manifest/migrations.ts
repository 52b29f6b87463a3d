import path from "path";
import { JsonObject, JsonValue } from "../types";
import { ValidationError } from "../errors";
import { isJsonObject } from "../utils/json";
import { buildEntry, encodeEntry } from "./entries";

export interface MigrationResult {
  value: JsonObject;
  /** IDs whose records were rewritten into the current shape */
  migrated: string[];
}

/**
 * Upgrades dropbox entries stored as a bare path string. The ID is kept and a
 * relative path is taken relative to the dropbox root.
 */
export function migrateDropboxManifest(
  value: JsonValue | undefined,
  root: string,
): MigrationResult {
  if (value === undefined) {
    return { value: {}, migrated: [] };
  }
  if (!isJsonObject(value)) {
    throw new ValidationError("Dropbox manifest is not a JSON object");
  }

  const upgraded: JsonObject = {};
  const migrated: string[] = [];
  for (const [id, record] of Object.entries(value)) {
    if (typeof record === "string") {
      upgraded[id] = encodeEntry(buildEntry(path.resolve(root, record), root));
      migrated.push(id);
    } else {
      upgraded[id] = record;
    }
  }
  return { value: upgraded, migrated };
}

/**
 * Upgrades a process `files` list into a manifest keyed by list position.
 * A missing list becomes an empty manifest.
 */
export function migrateProcessFiles(
  files: JsonValue | undefined,
  output: string,
): MigrationResult {
  if (files === undefined) {
    return { value: {}, migrated: [] };
  }
  if (isJsonObject(files)) {
    return { value: files, migrated: [] };
  }
  if (!Array.isArray(files)) {
    throw new ValidationError("Process files must be a list or a manifest");
  }

  const upgraded: JsonObject = {};
  const migrated: string[] = [];
  files.forEach((filename, index) => {
    if (typeof filename !== "string") {
      throw new ValidationError(`Process file ${index} is not a path`);
    }
    const id = String(index);
    upgraded[id] = encodeEntry(buildEntry(path.resolve(output, filename), output));
    migrated.push(id);
  });
  return { value: upgraded, migrated };
}
