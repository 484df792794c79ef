import path from 'node:path';
import type { DownloadTarget } from '../types.js';

export const DOWNLOAD_EXTENSION = '.xlsx';

/**
 * Extracts the export type prefix from a server-supplied export name.
 * "Orders-20240101-foo" -> "Orders"
 */
export function extractBaseName(rawName: string): string {
  return rawName.trim().split('-')[0]?.trim() ?? '';
}

/**
 * Derives the deterministic download location for an export entry.
 *
 * The name only depends on the export type and the owner, so a re-run
 * overwrites the previous file instead of accumulating copies.
 * Returns null when the raw name yields no usable file name.
 */
export function deriveDownloadTarget(
  rawName: string,
  owner: string,
  userDownloadPath: string
): DownloadTarget | null {
  const baseName = extractBaseName(rawName);
  if (!baseName || /[\\/]/.test(baseName) || baseName === '.' || baseName === '..') {
    return null;
  }

  const canonicalName = `${baseName}_${owner}`;
  const fileName = `${canonicalName}${DOWNLOAD_EXTENSION}`;

  return {
    baseName,
    canonicalName,
    fileName,
    filePath: path.join(userDownloadPath, fileName),
  };
}
