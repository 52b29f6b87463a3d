#!/usr/bin/env node
/**
 * file-manifest: keeps the dropbox and results manifests in sync
 *
 *   file-manifest [--config <dir>] [--user-config <dir>]
 *                 [--redis-host <host>] [--redis-port <port>] [--poll] [--quiet]
 *
 * Runs until SIGINT or SIGTERM.
 */

import { loadConfiguration } from "./config/configuration";
import { ManifestService } from "./ManifestService";
import { RedisTableStore } from "./tables/RedisTableStore";
import { errorMessage } from "./errors";

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

async function main(args: string[]): Promise<void> {
  const silent = args.includes("--quiet");
  const config = await loadConfiguration({
    configDir: getFlag(args, "--config"),
    userConfigDir: getFlag(args, "--user-config"),
  });

  const tableStore = new RedisTableStore({
    host: getFlag(args, "--redis-host") || "127.0.0.1",
    port: parseInt(getFlag(args, "--redis-port") || "6379", 10),
    password: process.env.REDIS_PASSWORD,
    silent,
  });

  const service = new ManifestService({
    files: config.files,
    tableStore,
    usePolling: args.includes("--poll"),
    silent,
  });

  await service.initialize();
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
