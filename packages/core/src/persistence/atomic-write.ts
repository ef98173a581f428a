import { closeSync, fsyncSync, mkdirSync, openSync, renameSync, rmSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';
import { PersistenceError } from './persistence-errors.js';

/**
 * Replace a file's contents via write-to-temp-then-rename.
 *
 * The temp file sits in the same directory so the rename stays on one
 * filesystem; a crash mid-write leaves the previous file intact.
 *
 * @throws PersistenceError when any step fails
 */
export function writeFileAtomicSync(filePath: string, contents: string): void {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  let tempCreated = false;

  try {
    mkdirSync(dirname(filePath), { recursive: true });
    const fd = openSync(tempPath, 'w');
    tempCreated = true;
    try {
      writeSync(fd, contents, null, 'utf8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, filePath);
  } catch (error) {
    if (tempCreated) {
      rmSync(tempPath, { force: true });
    }
    throw new PersistenceError(`Failed to write ${filePath}`, filePath, { cause: error });
  }
}
