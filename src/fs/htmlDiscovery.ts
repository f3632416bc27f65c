import { promises as fs } from 'fs';
import path from 'path';
import { DEFAULT_OUTPUT_PREFIX } from '../transform/outputNamer.js';

export interface DiscoveryOptions {
  outputPrefix?: string; // files with this prefix are earlier output and skipped
}

/**
 * Every `.html` file under `rootDir`, recursively, in a stable order.
 */
export async function findHtmlFiles(rootDir: string, options: DiscoveryOptions = {}): Promise<string[]> {
  const prefix = options.outputPrefix ?? DEFAULT_OUTPUT_PREFIX;
  const fileList: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.html') && !entry.name.startsWith(prefix)) {
        fileList.push(fullPath);
      }
    }
  };

  await walk(rootDir);
  return fileList;
}
