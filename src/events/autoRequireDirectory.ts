import { readdirSync, statSync } from "node:fs";
import { basename, extname, join } from "node:path";

/**
 * Auto-import all modules in a directory via side-effect `require`.
 * Skips directories, `index.*`, and `.d.ts` files.
 *
 * @param directory Absolute path to the directory to scan.
 * @param label Label used in error logs (e.g. "listeners").
 * @returns Names of the files that loaded.
 */
export function autoRequireDirectory(directory: string, label: string): string[] {
  const loaded: string[] = [];
  for (const entry of readdirSync(directory)) {
    const fullPath = join(directory, entry);
    if (statSync(fullPath).isDirectory()) continue;

    const extension = extname(entry);
    if (extension !== ".ts" && extension !== ".js") continue;

    const fileName = basename(entry);
    if (fileName.startsWith("index.")) continue;
    if (fileName.endsWith(".d.ts")) continue;

    try {
      require(fullPath);
      loaded.push(fileName);
    } catch (error) {
      console.error(`[${label}] Failed to load ${fileName}:`, error);
    }
  }
  return loaded;
}
