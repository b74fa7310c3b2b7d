import { readdir } from 'node:fs/promises';
import path from 'node:path';

const imageExtensions = new Set(['.png', '.jpg', '.jpeg']);

export function isScreenshotName(name: string, prefix: string): boolean {
  const lower = name.toLowerCase();
  return (
    lower.startsWith(prefix.toLowerCase()) &&
    imageExtensions.has(path.extname(lower))
  );
}

export async function discoverScreenshots(
  dir: string,
  prefix: string,
): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isScreenshotName(entry.name, prefix))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b))
    .map((name) => path.join(dir, name));
}
