import fs from "fs-extra";
import path from "path";
import { Manifest } from "../types";
import { buildEntry } from "../manifest/entries";
import { nextId } from "../manifest/idAllocator";

export interface ReconcileResult {
  manifest: Manifest;
  /** IDs assigned to files found on disk but missing from the manifest */
  added: string[];
  /** IDs dropped because their file no longer exists */
  removed: string[];
}

export interface DirectoryReconcilerOptions {
  silent?: boolean;
}

/**
 * Applies the difference between the files on disk and the files a manifest
 * records. Returns a new manifest; the input is left untouched.
 */
export function diffManifest(
  manifest: Manifest,
  current: ReadonlySet<string>,
  root: string,
): ReconcileResult {
  const next: Manifest = new Map(manifest);
  const recorded = new Set<string>();
  const removed: string[] = [];

  for (const [id, entry] of manifest) {
    if (current.has(entry.fullPath)) {
      recorded.add(entry.fullPath);
    } else {
      next.delete(id);
      removed.push(id);
    }
  }

  const added: string[] = [];
  const unrecorded = [...current].filter((file) => !recorded.has(file)).sort();
  for (const file of unrecorded) {
    const id = nextId(next.keys());
    next.set(id, buildEntry(file, root));
    added.push(id);
  }

  return { manifest: next, added, removed };
}

/**
 * Full-tree scans of a manifest root
 */
export class DirectoryReconciler {
  private silent: boolean;

  constructor(options: DirectoryReconcilerOptions = {}) {
    this.silent = options.silent || false;
  }

  /**
   * Absolute paths of every regular file under the root. A missing root has
   * no files. Symbolic links to files count as files; linked directories are
   * not followed.
   */
  async scan(root: string): Promise<Set<string>> {
    const files = new Set<string>();
    const absoluteRoot = path.resolve(root);
    if (!(await fs.pathExists(absoluteRoot))) {
      return files;
    }
    await this.walk(absoluteRoot, files);
    return files;
  }

  /**
   * Brings a manifest in line with the files currently under its root
   */
  async reconcile(manifest: Manifest, root: string): Promise<ReconcileResult> {
    const current = await this.scan(root);
    const result = diffManifest(manifest, current, path.resolve(root));

    if (!this.silent) {
      for (const id of result.removed) {
        console.log(`🗑️ Deleting file ${id} from manifest`);
      }
      for (const id of result.added) {
        console.log(
          `ℹ️ Assigning file: ${id} --> ${result.manifest.get(id)?.fullPath}`,
        );
      }
    }

    return result;
  }

  private async walk(directory: string, files: Set<string>): Promise<void> {
    const names = await readVanishing(() => fs.readdir(directory));
    if (!names) return;

    for (const name of names) {
      const entryPath = path.join(directory, name);
      const stats = await readVanishing(() => fs.lstat(entryPath));
      if (!stats) continue;

      if (stats.isDirectory()) {
        await this.walk(entryPath, files);
      } else if (stats.isFile()) {
        files.add(entryPath);
      } else if (stats.isSymbolicLink()) {
        const target = await fs.stat(entryPath).catch(() => undefined);
        if (target?.isFile()) {
          files.add(entryPath);
        }
      }
    }
  }
}

/**
 * Runs a filesystem read, returning undefined when the entry was removed
 * (or replaced by a file) while the tree was being walked
 */
async function readVanishing<T>(read: () => Promise<T>): Promise<T | undefined> {
  try {
    return await read();
  } catch (error: unknown) {
    if (
      error instanceof Error &&
      "code" in error &&
      (error.code === "ENOENT" || error.code === "ENOTDIR")
    ) {
      return undefined;
    }
    throw error;
  }
}
