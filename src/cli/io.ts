import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

/** Read a UTF-8 document. Missing or unreadable files reject. */
export async function readDocument(filePath: string): Promise<string> {
  return readFile(filePath, 'utf8');
}

/** Write a finished buffer, creating parent directories as needed. */
export async function writeDocument(filePath: string, text: string): Promise<void> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await writeFile(filePath, text, 'utf8');
}
