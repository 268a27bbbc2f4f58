/**
 * File Remover Port
 *
 * Removes a file or directory tree. A path that is already gone is not an
 * error.
 */

import { remove } from '../../utils/fs.js';

export interface FileRemover {
  remove(path: string): Promise<void>;
}

export const fsRemover: FileRemover = { remove };
