/**
 * Label name → id resolution with a per-run cache.
 *
 * System labels are their own ids and never cost an API call. The first
 * lookup of any other name lists the account's labels once and caches every
 * name it sees; names still missing afterwards are cached as "not found" so
 * repeated misses stay local.
 */

import type { Logger } from "../core/index.js";
import type { LabelNameResolver } from "../rules/types.js";
import type { GmailLabel } from "./types.js";

export const SYSTEM_LABELS = [
  "INBOX",
  "UNREAD",
  "IMPORTANT",
  "SENT",
  "DRAFT",
  "TRASH",
  "SPAM",
  "STARRED",
  "CATEGORY_PERSONAL",
  "CATEGORY_SOCIAL",
  "CATEGORY_PROMOTIONS",
  "CATEGORY_UPDATES",
  "CATEGORY_FORUMS",
] as const;

export interface LabelSource {
  listLabels(): Promise<GmailLabel[]>;
}

function cacheKey(name: string): string {
  return name.trim().toLowerCase();
}

export class LabelResolver implements LabelNameResolver {
  private readonly source: LabelSource;
  private readonly logger: Logger;
  private readonly cache = new Map<string, string | null>();
  /** Shared by concurrent lookups so the account is listed at most once. */
  private listing: Promise<void> | null = null;
  private listed = false;
  /** Bumped by `invalidate()`; listings started under an older value are ignored. */
  private generation = 0;

  constructor(source: LabelSource, logger: Logger) {
    this.source = source;
    this.logger = logger;
    this.seedSystemLabels();
  }

  async resolve(name: string): Promise<string | null> {
    const key = cacheKey(name);
    if (!key) return null;

    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    while (!this.listed) {
      await this.listAccountLabels();
    }

    const id = this.cache.get(key) ?? null;
    if (id === null) this.cache.set(key, null);
    return id;
  }

  /**
   * Forget user labels (and misses), e.g. after labels were created
   * mid-run. System labels stay seeded.
   */
  invalidate(): void {
    this.generation++;
    this.listing = null;
    this.cache.clear();
    this.listed = false;
    this.seedSystemLabels();
  }

  private seedSystemLabels(): void {
    for (const id of SYSTEM_LABELS) {
      this.cache.set(cacheKey(id), id);
    }
  }

  private listAccountLabels(): Promise<void> {
    if (this.listing) return this.listing;

    const generation = this.generation;
    const listing = this.source
      .listLabels()
      .then((labels) => {
        if (generation !== this.generation) return;
        for (const label of labels) {
          this.cache.set(cacheKey(label.name), label.id);
        }
        this.listed = true;
        this.logger.debug("Account labels cached", { count: labels.length });
      })
      .finally(() => {
        if (this.listing === listing) this.listing = null;
      });
    this.listing = listing;
    return listing;
  }
}
