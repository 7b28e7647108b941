import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import AdmZip from "adm-zip";

export async function makeTempDir(label: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `zipshot-${label}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write files relative to root, creating parent directories
 */
export async function writeFiles(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}

export async function setMtime(filePath: string, date: Date): Promise<void> {
  await fs.utimes(filePath, date, date);
}

/**
 * Entry name -> UTF-8 content, in stored order
 */
export function readZipEntries(archivePath: string): Array<[string, string]> {
  return new AdmZip(archivePath)
    .getEntries()
    .map((entry): [string, string] => [entry.entryName, entry.getData().toString("utf8")]);
}

export async function listDir(dir: string): Promise<string[]> {
  return (await fs.readdir(dir)).sort();
}

export async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * A clock returning base + n seconds on the n-th call
 */
export function steppingClock(base: Date): () => Date {
  let calls = 0;
  return () => new Date(base.getTime() + calls++ * 1000);
}

export function secondsAfter(base: Date, seconds: number): Date {
  return new Date(base.getTime() + seconds * 1000);
}
