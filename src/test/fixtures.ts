import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

export function ndjson(...records: object[]): string {
  return records.map(record => JSON.stringify(record)).join('\n') + '\n';
}

export async function createDataDir(
  files: { [name: string]: string },
): Promise<string> {
  let dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ndsql-'));
  for (let [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content, 'utf8');
  }
  return dir;
}

export function removeDataDir(dir: string): Promise<void> {
  return fs.rm(dir, { recursive: true, force: true });
}
