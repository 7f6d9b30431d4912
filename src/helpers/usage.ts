import { lstat, readdir } from 'fs/promises';
import { join } from 'path';

const LOCAL_PREFIX = 'local:';

/**
 * Returns the filesystem path of a local repository, or undefined for
 * repositories reached through a backend such as `sftp:` or `s3:`.
 */
export function localRepositoryPath(repository: string): string | undefined {
  if (repository.startsWith(LOCAL_PREFIX)) return repository.slice(LOCAL_PREFIX.length);
  if (/^[a-z][a-z0-9]*:/i.test(repository)) return undefined;
  return repository;
}

/** Apparent size of everything below `directory`, symlinks not followed. */
export async function directorySize(directory: string): Promise<number> {
  const stats = await lstat(directory);
  if (!stats.isDirectory()) return stats.size;

  let total = 0;
  const entries = await readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = join(directory, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(fullPath);
    } else {
      total += (await lstat(fullPath)).size;
    }
  }
  return total;
}
