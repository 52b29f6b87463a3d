import fs from "fs-extra";
import path from "path";
import { JsonObject, JsonValue } from "../types";
import { StoreKeyError, StoreParseError, errorMessage } from "../errors";
import { isJsonObject, parseJson } from "../utils/json";

/**
 * In-memory key/value store whose top-level keys are each registered to the
 * destination file they are flushed to. Values are only persisted by save().
 */
export class KeyedFileStore {
  private readonly values = new Map<string, JsonValue>();
  private readonly destinations = new Map<string, string[]>();

  private constructor(destinationFiles: Iterable<string>) {
    for (const destination of destinationFiles) {
      this.destinations.set(destination, []);
    }
  }

  /**
   * Creates a store with an empty registry for every destination
   */
  static create(destinationFiles: Iterable<string>): KeyedFileStore {
    return new KeyedFileStore(destinationFiles);
  }

  /**
   * Creates a store and registers every top-level key found in the
   * destination files that already exist on disk
   *
   * @throws StoreParseError if a destination file is not a JSON object
   */
  static async load(destinationFiles: Iterable<string>): Promise<KeyedFileStore> {
    const store = new KeyedFileStore(destinationFiles);

    for (const destination of store.destinations.keys()) {
      if (!(await fs.pathExists(destination))) {
        continue;
      }
      const stats = await fs.stat(destination);
      if (!stats.isFile()) {
        continue;
      }

      const content = await fs.readFile(destination, "utf8");
      let parsed: JsonValue;
      try {
        parsed = parseJson(content);
      } catch (error: unknown) {
        throw new StoreParseError(
          `Failed to parse ${destination}: ${errorMessage(error)}`,
          destination,
        );
      }
      if (!isJsonObject(parsed)) {
        throw new StoreParseError(
          `Expected a JSON object at the top level of ${destination}`,
          destination,
        );
      }

      for (const [key, value] of Object.entries(parsed)) {
        store.addKey(key, value, destination);
      }
    }

    return store;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): JsonValue | undefined {
    return this.values.get(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  destinationFiles(): string[] {
    return [...this.destinations.keys()];
  }

  /**
   * Destination file a key is registered to, if any
   */
  destinationOf(key: string): string | undefined {
    for (const [destination, keys] of this.destinations) {
      if (keys.includes(key)) return destination;
    }
    return undefined;
  }

  /**
   * Registers a key against a destination and sets its value. A key already
   * registered elsewhere moves to the new destination.
   */
  addKey(key: string, value: JsonValue, destination: string): void {
    const current = this.destinationOf(key);
    if (current !== undefined && current !== destination) {
      const keys = this.destinations.get(current) ?? [];
      this.destinations.set(
        current,
        keys.filter((registered) => registered !== key),
      );
    }

    const keys = this.destinations.get(destination);
    if (!keys) {
      this.destinations.set(destination, [key]);
    } else if (!keys.includes(key)) {
      keys.push(key);
    }
    this.values.set(key, value);
  }

  /**
   * Updates the value of a registered key
   *
   * @throws StoreKeyError if the key was never registered with addKey() or load()
   */
  set(key: string, value: JsonValue): void {
    if (this.destinationOf(key) === undefined) {
      throw new StoreKeyError(key);
    }
    this.values.set(key, value);
  }

  /**
   * Removes a value while keeping its key registered
   */
  unset(key: string): void {
    this.values.delete(key);
  }

  /**
   * Writes every destination file with exactly its registered keys that hold
   * a value. Files are overwritten one after another, not atomically.
   */
  async save(): Promise<void> {
    for (const [destination, keys] of this.destinations) {
      const contents: JsonObject = {};
      for (const key of keys) {
        const value = this.values.get(key);
        if (value !== undefined) {
          contents[key] = value;
        }
      }

      await fs.ensureDir(path.dirname(destination));
      await fs.writeJson(destination, contents, { spaces: "\t" });
    }
  }
}
