/**
 * Image store collaborator: resolves a page's source image on disk
 *
 * @module ocr/image-store
 */

import { existsSync } from 'fs';
import { isAbsolute, relative, resolve } from 'path';
import type { Page } from '../../models/page.js';
import { OcrError } from './errors.js';

export interface ImageStore {
  /** Absolute path of the page's source image (read-only) */
  resolveImage(page: Page): string;
}

/**
 * Images live under the data directory at the page's image_path
 */
export class DirectoryImageStore implements ImageStore {
  private readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = resolve(dataDir);
  }

  resolveImage(page: Page): string {
    const absolute = resolve(this.dataDir, page.image_path);
    const rel = relative(this.dataDir, absolute);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      throw new OcrError(`Image path escapes the data directory: ${page.image_path}`, absolute);
    }
    if (!existsSync(absolute)) {
      throw new OcrError(`Image for page ${page.page_id} not found: ${page.image_path}`, absolute);
    }
    return absolute;
  }
}
