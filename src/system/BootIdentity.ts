import fs from "fs-extra";
import os from "os";

/**
 * Identifies the current boot of the host, so stored PIDs can be recognised
 * as belonging to an earlier one
 */
export interface BootIdentityProvider {
  currentBoot(): Promise<string>;
}

const BOOT_ID_PATH = "/proc/sys/kernel/random/boot_id";

export class SystemBootIdentity implements BootIdentityProvider {
  constructor(private readonly bootIdPath: string = BOOT_ID_PATH) {}

  async currentBoot(): Promise<string> {
    if (await fs.pathExists(this.bootIdPath)) {
      const bootId = (await fs.readFile(this.bootIdPath, "utf8")).trim();
      if (bootId) return bootId;
    }

    const bootedAt = Date.now() - os.uptime() * 1000;
    const minute = 60 * 1000;
    return new Date(Math.round(bootedAt / minute) * minute).toISOString();
  }
}
