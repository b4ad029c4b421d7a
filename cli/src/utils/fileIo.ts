import { readFile, writeFile } from 'node:fs/promises';

/**
 * File access used by CLI commands. Tests pass an in-memory implementation.
 */
export interface FileIo {
  readText(path: string): Promise<string>;
  writeBytes(path: string, data: Uint8Array): Promise<void>;
}

export const nodeFileIo: FileIo = {
  readText: (path) => readFile(path, 'utf8'),
  writeBytes: (path, data) => writeFile(path, data),
};
