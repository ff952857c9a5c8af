import fs from 'node:fs';
import path from 'node:path';
import type { Config } from '../shared/config.js';
import { PersistError, errorMessage } from '../shared/errors.js';
import { generateId, resolvePath } from '../shared/utils.js';
import { formatEntries, type PlaylistEntry } from './parse.js';

export interface OutputDirs {
  playlistsDir: string;
  processedDir: string;
}

export interface PartitionFiles {
  available: string;
  unavailable: string;
}

export function resolveOutputDirs(output: Config['output']): OutputDirs {
  return {
    playlistsDir: resolvePath(output.playlists_dir),
    processedDir: resolvePath(output.processed_dir),
  };
}

export function ensureOutputDirs(dirs: OutputDirs): void {
  for (const dir of [dirs.playlistsDir, dirs.processedDir]) {
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (err) {
      throw new PersistError(`Failed to create directory ${dir}: ${errorMessage(err)}`, {
        path: dir,
        cause: errorMessage(err),
      });
    }
  }
}

export interface FileWrite {
  path: string;
  content: string;
}

interface StagedFile {
  path: string;
  tmpPath: string;
  backupPath?: string;
  committed: boolean;
}

function siblingPath(filePath: string, suffix: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${generateId(8)}.${suffix}`);
}

/**
 * Write a group of files so that either all of them are replaced or none is.
 * Every file is first written to a temporary sibling; the targets are only swapped in once all
 * temporaries exist, and a failed swap restores the files already replaced.
 */
export function writeFilesAtomic(files: readonly FileWrite[]): void {
  const staged: StagedFile[] = [];
  let failedPath = '';

  try {
    for (const file of files) {
      failedPath = file.path;
      if (fs.existsSync(file.path) && !fs.statSync(file.path).isFile()) {
        throw new Error('target exists and is not a regular file');
      }
      const entry: StagedFile = { path: file.path, tmpPath: siblingPath(file.path, 'tmp'), committed: false };
      staged.push(entry);
      fs.writeFileSync(entry.tmpPath, file.content, 'utf-8');
    }

    for (const entry of staged) {
      failedPath = entry.path;
      if (fs.existsSync(entry.path)) {
        entry.backupPath = siblingPath(entry.path, 'bak');
        fs.renameSync(entry.path, entry.backupPath);
      }
      fs.renameSync(entry.tmpPath, entry.path);
      entry.committed = true;
    }
  } catch (err) {
    rollBack(staged);
    throw new PersistError(`Failed to write ${failedPath}: ${errorMessage(err)}`, {
      path: failedPath,
      cause: errorMessage(err),
    });
  }

  for (const entry of staged) {
    if (entry.backupPath) fs.rmSync(entry.backupPath, { force: true });
  }
}

function rollBack(staged: readonly StagedFile[]): void {
  for (const entry of [...staged].reverse()) {
    if (entry.committed) fs.rmSync(entry.path, { force: true });
    if (entry.backupPath && fs.existsSync(entry.backupPath)) {
      fs.renameSync(entry.backupPath, entry.path);
    }
    fs.rmSync(entry.tmpPath, { force: true });
  }
}

export function writeFileAtomic(filePath: string, content: string): void {
  writeFilesAtomic([{ path: filePath, content }]);
}

export function playlistPath(dirs: OutputDirs, name: string): string {
  return path.join(dirs.playlistsDir, `${name}.m3u`);
}

export function savePlaylist(dirs: OutputDirs, name: string, text: string): string {
  const filePath = playlistPath(dirs, name);
  writeFileAtomic(filePath, text);
  return filePath;
}

export function partitionPaths(dirs: OutputDirs, name: string): PartitionFiles {
  return {
    available: path.join(dirs.processedDir, `available_${name}.m3u`),
    unavailable: path.join(dirs.processedDir, `unavailable_${name}.m3u`),
  };
}

export function writePartitions(
  dirs: OutputDirs,
  name: string,
  available: readonly PlaylistEntry[],
  unavailable: readonly PlaylistEntry[],
): PartitionFiles {
  const files = partitionPaths(dirs, name);
  writeFilesAtomic([
    { path: files.available, content: formatEntries(available) },
    { path: files.unavailable, content: formatEntries(unavailable) },
  ]);
  return files;
}
