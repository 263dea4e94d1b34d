import { JsonEntityDirectory } from './directory.js';

// Process-wide directory instance
let directory: JsonEntityDirectory | null = null;

/**
 * Get or open the directory for a data path
 */
export async function getDirectory(dataPath: string): Promise<JsonEntityDirectory> {
  if (!directory || directory.dataPath !== dataPath) {
    directory = await JsonEntityDirectory.open(dataPath);
  }
  return directory;
}

/**
 * Drop the shared instance; the next getDirectory re-reads from disk
 */
export function closeDirectory(): void {
  directory = null;
}
