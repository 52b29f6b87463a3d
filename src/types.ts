/**
 * JSON values as they are read from and written to destination files
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * A file recorded in a manifest. Entries are replaced wholesale, never edited.
 */
export interface ManifestEntry {
  readonly fullPath: string;
  /** Path relative to the root of the manifest's scope */
  readonly displayName: string;
  readonly description: string;
}

/**
 * On-disk shape of a manifest entry
 */
export interface ManifestEntryRecord extends JsonObject {
  fullname: string;
  display_name: string;
  description: string;
}

/**
 * ID-indexed manifest for one root. IDs are decimal strings of non-negative integers.
 */
export type Manifest = Map<string, ManifestEntry>;

/**
 * Logical destination keys supplied by configuration. Keys ending in
 * `-dir` name directories, every other key names a destination file.
 */
export interface ManifestFiles {
  processes: string;
  dropbox: string;
  "data-dir": string;
  [key: string]: string;
}
