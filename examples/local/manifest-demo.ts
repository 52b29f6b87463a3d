// manifest-demo.ts
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ManifestService, RedisTableStore } from '../../src';

(async () => {
  const baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'manifest-demo-'));
  const files = {
    processes: path.join(baseDir, 'processes.json'),
    dropbox: path.join(baseDir, 'dropbox.json'),
    'data-dir': path.join(baseDir, 'data'),
  };

  const service = new ManifestService({
    files,
    tableStore: new RedisTableStore({ host: '127.0.0.1', port: 6379 }),
  });

  try {
    await service.initialize();

    // Drop a file into the archive and let the watcher pick it up
    const sample = path.join(service.getDropboxRoot(), 'sample.final.tsv');
    await fs.outputFile(sample, 'chromosome\tstart\tstop\n');
    await new Promise((resolve) => setTimeout(resolve, 1000));

    // Rename it; the entry keeps its ID
    await fs.move(sample, path.join(service.getDropboxRoot(), 'renamed', 'sample.final.tsv'));
    await new Promise((resolve) => setTimeout(resolve, 1000));

    console.log('📄 Dropbox manifest:');
    console.log(JSON.stringify(await fs.readJson(files.dropbox), null, 2));
  } catch (error) {
    console.error('❌ Demo failed:', error);
  } finally {
    await service.shutdown();
    await fs.remove(baseDir);
  }
})();
