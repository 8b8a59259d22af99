import fs from 'node:fs/promises';
import path from 'node:path';
import { CollaboratorFatal, CollaboratorTransient, FolderNotFound, NameTaken } from '../../errors.js';
import type { StorageCollaborator } from '../types.js';

const FATAL_CODES = new Set(['EACCES', 'EPERM', 'ENOSPC', 'EDQUOT', 'EROFS']);
const TRANSIENT_CODES = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'ETIMEDOUT']);

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function translate(error: unknown, folderPath: string): Error {
  const code = errorCode(error);
  if (code === 'ENOENT') {
    return new FolderNotFound(folderPath);
  }
  if (code && FATAL_CODES.has(code)) {
    return new CollaboratorFatal(`Storage refused write (${code}) in ${folderPath}`, { cause: error });
  }
  if (code && TRANSIENT_CODES.has(code)) {
    return new CollaboratorTransient(`Storage busy (${code}) in ${folderPath}`, { cause: error });
  }
  return error instanceof Error ? error : new Error(String(error));
}

/** Storage backed by a directory tree; folder paths are relative to `root`. */
export class LocalFolderStorage implements StorageCollaborator {
  constructor(private readonly root: string) {}

  private resolve(relative: string): string {
    const full = path.resolve(this.root, relative);
    const rel = path.relative(path.resolve(this.root), full);
    if (rel.startsWith('..') || path.isAbsolute(rel)) {
      throw new CollaboratorFatal(`Path escapes storage root: ${relative}`);
    }
    return full;
  }

  async store(bytes: Uint8Array, folderPath: string, fileName: string): Promise<string> {
    const target = this.resolve(path.posix.join(folderPath, fileName));
    try {
      // 'wx' refuses to replace an existing file.
      await fs.writeFile(target, bytes, { flag: 'wx' });
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        throw new NameTaken(folderPath, fileName, { cause: error });
      }
      throw translate(error, folderPath);
    }
    return path.posix.join(folderPath, fileName);
  }

  async ensureFolder(folderPath: string): Promise<void> {
    try {
      await fs.mkdir(this.resolve(folderPath), { recursive: true });
    } catch (error) {
      throw translate(error, folderPath);
    }
  }

  async exists(folderPath: string, fileName: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(path.posix.join(folderPath, fileName)));
      return true;
    } catch {
      return false;
    }
  }

  async read(destinationPath: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await fs.readFile(this.resolve(destinationPath)));
    } catch (error) {
      throw translate(error, path.posix.dirname(destinationPath));
    }
  }
}
