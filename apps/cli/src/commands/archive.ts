/**
 * Archive Command
 *
 * Show how many ids an archive file holds.
 */

import { DownloadArchive } from '@mediafetch/acquisition';
import { getFileSizeBytes } from '@mediafetch/utils';
import { printError, printKeyValue } from '../lib/output.js';

export async function archiveCommand(file: string): Promise<void> {
  if ((await getFileSizeBytes(file)) === null) {
    printError(`Archive not found: ${file}`);
    process.exit(1);
  }

  const archive = await DownloadArchive.open(file);
  printKeyValue('Archive', archive.path);
  printKeyValue('Entries', archive.size);
}
