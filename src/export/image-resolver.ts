/**
 * Image Resolver
 *
 * Maps image urls written in markdown to readable local files.
 * Relative urls are tried against each search path in order; remote
 * urls are never fetched.
 */

import { stat } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { moduleLogger } from '../logging/logger.js';

const REMOTE_URL = /^(https?:|data:)/i;

export interface ImageResolverOptions {
  /** Directories searched for relative paths. Default: the working directory */
  searchPaths?: readonly string[];
  logger?: Logger;
}

export class ImageResolver {
  private readonly searchPaths: readonly string[];
  private readonly logger: Logger;

  constructor(options: ImageResolverOptions = {}) {
    this.searchPaths = options.searchPaths?.length ? options.searchPaths : ['.'];
    this.logger = moduleLogger('images', options.logger);
  }

  /**
   * Absolute path of the image file, or undefined when none is found.
   */
  async resolve(url: string): Promise<string | undefined> {
    const target = url.trim();
    if (!target || REMOTE_URL.test(target)) {
      this.logger.debug({ url }, 'Remote or empty image url skipped');
      return undefined;
    }

    if (path.isAbsolute(target)) {
      return (await isFile(target)) ? target : undefined;
    }

    const relative = target.replace(/^(\.\/)+/, '');
    for (const dir of this.searchPaths) {
      const candidate = path.resolve(dir, relative);
      if (await isFile(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  /**
   * Resolve every distinct url. The map holds only the urls that resolved.
   */
  async resolveAll(urls: Iterable<string>): Promise<Map<string, string>> {
    const resolved = new Map<string, string>();
    for (const url of new Set(urls)) {
      const file = await this.resolve(url);
      if (file) resolved.set(url, file);
    }
    return resolved;
  }
}

async function isFile(file: string): Promise<boolean> {
  try {
    return (await stat(file)).isFile();
  } catch {
    return false;
  }
}
