import dotenv from 'dotenv';

import { loadConfig } from '../config/appConfig';
import { ShareManager } from '../services/ShareManager';
import { FileShareStorage } from '../storage/FileShareStorage';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const storage = new FileShareStorage(config.shares.storagePath);
  const manager = new ShareManager(storage, config.shares);

  const removed = await manager.prune();
  if (removed === 0) {
    console.log(`No expired shares in ${storage.path}. Nothing to delete.`);
    return;
  }
  console.log(`Deleted ${removed} expired share(s) from ${storage.path}.`);
}

main().catch((error) => {
  console.error('Failed to prune shares', error);
  process.exitCode = 1;
});
