import path from 'path';

// SQL Server paths are always Windows paths, whatever the script host runs on
const winPath = path.win32;

/**
 * Whether the path is a UNC path (\\server\share\...) that another host can reach
 */
export function isUncPath(value: string): boolean {
  return /^\\\\[^\\]+\\[^\\]+/.test(value);
}

export function isNetworkShared(paths: string[]): boolean {
  return paths.length > 0 && paths.every(isUncPath);
}

/**
 * Strip trailing separators except for a bare drive root
 */
export function trimTrailingSeparator(value: string): string {
  const trimmed = value.replace(/[\\/]+$/, '');
  if (/^[A-Za-z]:$/.test(trimmed)) {
    return `${trimmed}\\`;
  }
  return trimmed;
}

export function joinPath(directory: string, ...segments: string[]): string {
  return winPath.join(trimTrailingSeparator(directory), ...segments);
}

export function fileName(value: string): string {
  return winPath.basename(value);
}

export function directoryName(value: string): string {
  return winPath.dirname(value);
}

/**
 * Convert a path local to a host into the host's administrative share, e.g.
 * D:\Backups\sales.bak on sql01 becomes \\sql01\D$\Backups\sales.bak.
 * UNC paths are returned unchanged.
 */
export function toAdminSharePath(computerName: string, localPath: string): string {
  if (isUncPath(localPath)) {
    return localPath;
  }
  const match = localPath.match(/^([A-Za-z]):[\\/]?(.*)$/);
  if (!match) {
    throw new Error(`Cannot convert ${localPath} to an administrative share path`);
  }
  const [, drive, rest] = match;
  const tail = rest.replace(/\//g, '\\');
  return tail
    ? `\\\\${computerName}\\${drive.toUpperCase()}$\\${tail}`
    : `\\\\${computerName}\\${drive.toUpperCase()}$`;
}
