import { watch, FSWatcher } from "chokidar";
import { EventEmitter } from "events";
import { Stats } from "fs";
import path from "path";
import { errorMessage } from "../errors";

/**
 * Handlers for the three kinds of file event under a watched root
 */
export interface WatchHandlers {
  created?(filePath: string): Promise<void> | void;
  deleted?(filePath: string): Promise<void> | void;
  moved?(srcPath: string, destPath: string): Promise<void> | void;
}

export type WatchEvent =
  | { type: "created"; path: string }
  | { type: "deleted"; path: string }
  | { type: "moved"; path: string; destPath: string };

export interface WatchSubscriptionOptions {
  /** Name used in log lines (default: the root's basename) */
  label?: string;
  /**
   * How long an add or unlink waits for its counterpart before it is
   * reported on its own, in milliseconds (default: 100)
   */
  renameWindowMs?: number;
  /** Poll instead of using native events (for network drives) */
  usePolling?: boolean;
  silent?: boolean;
}

export interface WatchStats {
  eventsDispatched: number;
  errors: number;
  startedAt: number | null;
}

/**
 * An add or unlink held back while it waits for its counterpart
 */
interface PendingChange {
  kind: "add" | "unlink";
  path: string;
  inode: string;
  timer: ReturnType<typeof setTimeout>;
}

export const DEFAULT_RENAME_WINDOW_MS = 100;

function inodeOf(stats: Stats | undefined): string | undefined {
  return stats ? `${stats.dev}:${stats.ino}` : undefined;
}

/**
 * Live watcher for one root. chokidar reports a rename as an add of the new
 * path and an unlink of the old one, in either order. Both are held back for
 * a short window and an add and an unlink of the same inode are reported as
 * one move.
 *
 * Emits "handlerError" (error, event) when a handler rejects.
 */
export class WatchSubscription extends EventEmitter {
  private readonly root: string;
  private readonly label: string;
  private readonly renameWindowMs: number;
  private readonly usePolling: boolean;
  private readonly silent: boolean;

  private watcher: FSWatcher | null = null;
  private ready = false;
  private stopped = false;
  private handlers: WatchHandlers[] = [];
  private inodes = new Map<string, string>();
  private pending: PendingChange[] = [];
  private inFlight = new Set<Promise<void>>();
  private stats: WatchStats = {
    eventsDispatched: 0,
    errors: 0,
    startedAt: null,
  };

  constructor(root: string, options: WatchSubscriptionOptions = {}) {
    super();
    this.root = path.resolve(root);
    this.label = options.label || path.basename(this.root);
    this.renameWindowMs = options.renameWindowMs ?? DEFAULT_RENAME_WINDOW_MS;
    this.usePolling = options.usePolling || false;
    this.silent = options.silent || false;
  }

  getStats(): WatchStats {
    return { ...this.stats };
  }

  isWatching(): boolean {
    return this.watcher !== null && !this.stopped;
  }

  /**
   * Registers a set of handlers. Every registered set receives every event.
   */
  subscribe(handlers: WatchHandlers): void {
    this.handlers.push(handlers);
  }

  /**
   * Starts watching and resolves once the initial crawl is done. Files found
   * by the crawl are indexed by inode but not reported.
   */
  async start(): Promise<void> {
    if (this.watcher || this.stopped) {
      return;
    }

    // chokidar's own atomic-write handling would delay unlinks past the window
    const watcher = watch(this.root, {
      persistent: true,
      ignoreInitial: false,
      alwaysStat: true,
      atomic: false,
      followSymlinks: false,
      usePolling: this.usePolling,
    });
    this.watcher = watcher;

    watcher.on("add", (filePath: string, stats?: Stats) => this.onAdd(filePath, stats));
    watcher.on("unlink", (filePath: string) => this.onUnlink(filePath));
    watcher.on("error", (error: unknown) => {
      this.stats.errors++;
      console.error(`❌ Watcher error on ${this.label}:`, errorMessage(error));
    });

    await new Promise<void>((resolve) => {
      watcher.on("ready", () => {
        this.ready = true;
        resolve();
      });
    });

    this.stats.startedAt = Date.now();
    if (!this.silent) {
      console.log(`👀 Watching ${this.label}: ${this.root}`);
    }
  }

  /**
   * Stops the watcher and waits for handlers already running. Changes still
   * held back are reported unpaired; later events are discarded.
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;

    const held = this.pending;
    this.pending = [];
    for (const change of held) {
      clearTimeout(change.timer);
      this.release(change);
    }

    if (this.watcher) {
      await this.watcher.close();
    }

    await Promise.allSettled([...this.inFlight]);

    if (!this.silent) {
      console.log(`✅ Stopped watching ${this.label}`);
    }
  }

  private onAdd(filePath: string, stats?: Stats): void {
    if (this.stopped) return;

    const inode = inodeOf(stats);
    if (inode !== undefined) {
      this.inodes.set(filePath, inode);
    }
    if (!this.ready) return;

    if (inode === undefined) {
      this.dispatch({ type: "created", path: filePath });
      return;
    }

    const unlink = this.takePending("unlink", inode);
    if (unlink) {
      this.dispatch({ type: "moved", path: unlink.path, destPath: filePath });
      return;
    }
    this.hold("add", filePath, inode);
  }

  private onUnlink(filePath: string): void {
    if (this.stopped) return;

    const inode = this.inodes.get(filePath);
    this.inodes.delete(filePath);

    if (inode === undefined) {
      this.dispatch({ type: "deleted", path: filePath });
      return;
    }

    const add = this.takePending("add", inode);
    if (add) {
      this.dispatch({ type: "moved", path: filePath, destPath: add.path });
      return;
    }
    this.hold("unlink", filePath, inode);
  }

  private hold(kind: PendingChange["kind"], filePath: string, inode: string): void {
    const change: PendingChange = {
      kind,
      path: filePath,
      inode,
      timer: setTimeout(() => {
        this.pending = this.pending.filter((candidate) => candidate !== change);
        this.release(change);
      }, this.renameWindowMs),
    };
    this.pending.push(change);
  }

  private takePending(
    kind: PendingChange["kind"],
    inode: string,
  ): PendingChange | undefined {
    const index = this.pending.findIndex(
      (change) => change.kind === kind && change.inode === inode,
    );
    if (index < 0) return undefined;

    const [change] = this.pending.splice(index, 1);
    clearTimeout(change.timer);
    return change;
  }

  private release(change: PendingChange): void {
    this.dispatch({
      type: change.kind === "add" ? "created" : "deleted",
      path: change.path,
    });
  }

  private dispatch(event: WatchEvent): void {
    this.stats.eventsDispatched++;

    for (const handlers of this.handlers) {
      const run = this.invoke(handlers, event).catch((error: unknown) => {
        this.stats.errors++;
        console.error(
          `❌ Failed to handle ${event.type} event for ${event.path} in ${this.label}:`,
          errorMessage(error),
        );
        this.emit("handlerError", error, event);
      });
      this.inFlight.add(run);
      void run.finally(() => this.inFlight.delete(run));
    }
  }

  private async invoke(handlers: WatchHandlers, event: WatchEvent): Promise<void> {
    switch (event.type) {
      case "created":
        await handlers.created?.(event.path);
        break;
      case "deleted":
        await handlers.deleted?.(event.path);
        break;
      case "moved":
        await handlers.moved?.(event.path, event.destPath);
        break;
    }
  }
}
