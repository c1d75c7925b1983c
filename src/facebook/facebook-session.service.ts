import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { FacebookConfigService } from '@libs/config';

import { FacebookSessionError } from './errors';
import { StoredCookie } from './interfaces';
import {
  isCookieExpired,
  isStoredCookie,
  parseSetCookie,
  toCookieHeader,
} from './utils';

/**
 * Owns the stored Facebook session cookies.
 *
 * The jar is written by the external login step; this service only reads it,
 * refreshes values from Set-Cookie headers and writes them back.
 */
@Injectable()
export class FacebookSessionService implements OnModuleInit {
  private readonly logger = new Logger(FacebookSessionService.name);
  private cookies: StoredCookie[] | null = null;
  private pendingMerge: Promise<void> = Promise.resolve();

  constructor(private readonly facebookConfig: FacebookConfigService) {}

  public async onModuleInit(): Promise<void> {
    const cookies = await this.load();

    if (cookies.length === 0) {
      this.logger.warn(
        `No Facebook session cookies found at ${this.facebookConfig.cookiePath}. Profile fetches will fail until a session is stored.`,
      );
    }
  }

  /**
   * Builds the Cookie header for an authenticated request.
   *
   * @throws FacebookSessionError when no unexpired cookie is stored.
   */
  public async getCookieHeader(): Promise<string> {
    const cookies = (await this.load()).filter(
      (cookie) => !isCookieExpired(cookie),
    );

    if (cookies.length === 0) {
      throw new FacebookSessionError('No stored Facebook session');
    }

    return toCookieHeader(cookies);
  }

  /**
   * Merges Set-Cookie values from a response into the jar and persists it
   * when anything changed. Merges run one at a time in call order.
   */
  public updateFromSetCookie(header: unknown): Promise<void> {
    const updates = parseSetCookie(header);
    if (updates.length === 0) {
      return Promise.resolve();
    }

    const merge = this.pendingMerge.then(() => this.merge(updates));
    this.pendingMerge = merge.catch((error: unknown) => {
      this.logger.warn(
        `Cookie merge failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    });
    return merge;
  }

  /**
   * Drops the cached jar so the next request re-reads it from disk.
   */
  public invalidate(): void {
    this.cookies = null;
  }

  private async merge(
    updates: { name: string; value: string }[],
  ): Promise<void> {
    const current = await this.load();
    const byName = new Map(current.map((cookie) => [cookie.name, cookie]));
    let changed = false;

    for (const { name, value } of updates) {
      const existing = byName.get(name);

      if (!value) {
        changed = byName.delete(name) || changed;
      } else if (existing?.value !== value) {
        byName.set(name, { ...existing, name, value });
        changed = true;
      }
    }

    if (changed) {
      this.cookies = [...byName.values()];
      await this.save(this.cookies);
    }
  }

  private async load(): Promise<StoredCookie[]> {
    if (this.cookies) {
      return this.cookies;
    }

    const path = this.facebookConfig.cookiePath;

    try {
      const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
      const cookies = Array.isArray(parsed) ? parsed.filter(isStoredCookie) : [];

      // keep re-reading until a session shows up
      if (cookies.length > 0) {
        this.cookies = cookies;
      }
      return cookies;
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.debug(`Cookie jar ${path} does not exist`);
      } else {
        this.logger.warn(
          `Cookie load failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
      return [];
    }
  }

  private async save(cookies: StoredCookie[]): Promise<void> {
    const path = this.facebookConfig.cookiePath;

    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, JSON.stringify(cookies, null, 2), 'utf8');
    } catch (error) {
      this.logger.error(
        `Cookie save failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
