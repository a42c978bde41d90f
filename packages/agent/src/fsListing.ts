import { Stats } from "fs";
import { readdir, stat } from "fs/promises";
import { extname, join, resolve, sep } from "path";
import { DirectoryEntry, DriveRecord } from "./types";

export const MAX_LISTING_ENTRIES = 50;
export const MAX_LISTED_DRIVES = 3;

/**
 * Shallow listing of `path`: directories first, then files, each group in
 * case-insensitive name order, capped at `maxEntries`. Entries that vanish or
 * cannot be stat'ed while listing are skipped.
 */
export async function listDirectory(path: string, maxEntries = MAX_LISTING_ENTRIES): Promise<DirectoryEntry[]> {
  const dirents = await readdir(path, { withFileTypes: true });

  const ordered = dirents
    .map((dirent) => ({ name: dirent.name, isDirectory: dirent.isDirectory() }))
    .sort((left, right) => {
      if (left.isDirectory !== right.isDirectory) {
        return left.isDirectory ? -1 : 1;
      }
      return left.name.toLowerCase().localeCompare(right.name.toLowerCase());
    })
    .slice(0, maxEntries);

  const entries = await Promise.all(ordered.map((item) => describeEntry(path, item.name, item.isDirectory)));
  return entries.filter((entry): entry is DirectoryEntry => entry !== null);
}

/**
 * Fills `files` with the listing of the first mount point, for the first few
 * drives only.
 */
export async function attachListings(drives: DriveRecord[], maxDrives = MAX_LISTED_DRIVES): Promise<DriveRecord[]> {
  return Promise.all(
    drives.map(async (drive, index) => {
      const mountPoint = drive.mountPoints[0]?.mountPoint;
      if (index >= maxDrives || !mountPoint) {
        return drive;
      }

      try {
        return { ...drive, files: await listDirectory(mountPoint) };
      } catch {
        return { ...drive, files: [] };
      }
    }),
  );
}

/**
 * Resolves `requested` and returns it when it lies inside one of the drives'
 * mount points, otherwise `null`.
 */
export function resolveInsideMounts(requested: string, drives: readonly DriveRecord[]): string | null {
  const target = resolve("/", requested);

  for (const drive of drives) {
    for (const { mountPoint } of drive.mountPoints) {
      const root = resolve(mountPoint);
      if (target === root || target.startsWith(root.endsWith(sep) ? root : `${root}${sep}`)) {
        return target;
      }
    }
  }

  return null;
}

async function describeEntry(parent: string, name: string, isDirectory: boolean): Promise<DirectoryEntry | null> {
  const fullPath = join(parent, name);

  let info: Stats;
  try {
    info = await stat(fullPath);
  } catch {
    return null;
  }

  if (isDirectory || info.isDirectory()) {
    let size: number;
    try {
      size = (await readdir(fullPath)).length;
    } catch {
      size = 0;
    }
    return { name, path: fullPath, type: "directory", size, modified: Math.floor(info.mtimeMs / 1000) };
  }

  return {
    name,
    path: fullPath,
    type: "file",
    size: info.size,
    modified: Math.floor(info.mtimeMs / 1000),
    extension: extname(name).toLowerCase(),
  };
}
