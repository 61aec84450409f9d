import { ServerVersion } from '../engine/types.js';

/**
 * Parse a ProductVersion string such as "16.0.4135.4"
 */
export function parseServerVersion(productVersion: string): ServerVersion {
  const parts = productVersion.trim().split('.').map(p => parseInt(p, 10));
  if (parts.length < 2 || parts.slice(0, 2).some(n => Number.isNaN(n))) {
    throw new Error(`Unrecognized server version: ${productVersion}`);
  }
  return {
    major: parts[0],
    minor: parts[1],
    build: parts.length > 2 && !Number.isNaN(parts[2]) ? parts[2] : 0,
  };
}

export function formatVersion(version: ServerVersion): string {
  return `${version.major}.${version.minor}.${version.build}`;
}

/**
 * Backups restore forward only: the destination must run the same or a newer
 * major.minor than the instance that took the backup.
 */
export function canRestoreAcross(source: ServerVersion, destination: ServerVersion): boolean {
  if (destination.major !== source.major) {
    return destination.major > source.major;
  }
  return destination.minor >= source.minor;
}

// SQL Server 2005; custom file layouts need the 2005 object model
export const MIN_ADVANCED_LAYOUT_MAJOR = 9;
