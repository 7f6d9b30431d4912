import type { TempResources } from './temp';

export const EXCLUDE_FILE_NAME = 'excludes.txt';

export interface ExcludeSet {
  excludeFile?: string;
  excludeIfPresent: string[];
}

/**
 * Writes exclude patterns one per line into a registered temporary file,
 * exactly as configured. Blank entries are skipped. Returns undefined when
 * there is nothing to exclude.
 */
export function writeExcludeFile(patterns: readonly string[], resources: TempResources): string | undefined {
  const lines = patterns.filter(pattern => pattern.trim() !== '');
  if (lines.length === 0) return undefined;
  return resources.writeFile('resticrun-exclude-', EXCLUDE_FILE_NAME, `${lines.join('\n')}\n`);
}

export function buildExcludeSet(
  patterns: readonly string[],
  markers: readonly string[],
  resources: TempResources
): ExcludeSet {
  return {
    excludeFile: writeExcludeFile(patterns, resources),
    excludeIfPresent: markers.filter(marker => marker.trim() !== '')
  };
}
