import fs from "fs-extra";
import path from "path";
import os from "os";

export async function makeTempDir(prefix: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  return fs.realpath(dir);
}

export async function touch(...files: string[]): Promise<void> {
  for (const file of files) {
    await fs.outputFile(file, "");
  }
}
