/**
 * file-service.ts
 * Deterministic, sandboxed file access within projectRoot.
 *
 * Constraints:
 * - MUST NOT read any path outside projectRoot.
 * - All paths are normalized to absolute before I/O.
 * - Returns null for missing or unreadable files rather than throwing.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export class FileService {
  private readonly _root: string;

  constructor(projectRoot: string) {
    this._root = path.resolve(projectRoot);
  }

  /**
   * Read a file as UTF-8 text.
   * Returns null if the file cannot be read (missing, a directory, no
   * permission) or is outside projectRoot.
   */
  readText(relOrAbsPath: string): string | null {
    const resolved = this._resolve(relOrAbsPath);
    if (resolved === null) return null;
    try {
      return fs.readFileSync(resolved, 'utf-8');
    } catch {
      return null;
    }
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private _resolve(relOrAbsPath: string): string | null {
    const abs = path.isAbsolute(relOrAbsPath)
      ? path.normalize(relOrAbsPath)
      : path.resolve(this._root, relOrAbsPath);

    if (!abs.startsWith(this._root + path.sep) && abs !== this._root) {
      return null;
    }
    return abs;
  }
}
