//per-collection bootstrap markers, claimed atomically
import Database from 'better-sqlite3';
import type { Collection } from '../models/index.js';

export type BootstrapStatus = 'loading' | 'loaded';
export type ClaimOutcome = 'claimed' | 'reclaimed' | 'loaded' | 'in_progress';

export interface BootstrapMarker {
  collection: Collection;
  status: BootstrapStatus;
  itemCount: number;
  claimedAt: Date;
  completedAt: Date | null;
}

export class BootstrapRepository {
  constructor(private db: Database.Database) {}

  //a 'loading' marker claimed before staleBefore belongs to a load that never finished
  claim(collection: Collection, staleBefore: Date): ClaimOutcome {
    return this.db.transaction((): ClaimOutcome => {
      const now = new Date().toISOString();
      const created = this.db.prepare(`INSERT OR IGNORE INTO bootstrap_markers (collection, status, item_count, claimed_at) VALUES (?, 'loading', 0, ?)`)
        .run(collection, now).changes > 0;
      if (created) return 'claimed';
      const taken = this.db.prepare(`UPDATE bootstrap_markers SET claimed_at = ?, item_count = 0 WHERE collection = ? AND status = 'loading' AND claimed_at < ?`)
        .run(now, collection, staleBefore.toISOString()).changes > 0;
      if (taken) return 'reclaimed';
      return this.find(collection)?.status === 'loaded' ? 'loaded' : 'in_progress';
    })();
  }

  complete(collection: Collection, itemCount: number): void {
    this.db.prepare(`UPDATE bootstrap_markers SET status = 'loaded', item_count = ?, completed_at = ? WHERE collection = ?`)
      .run(itemCount, new Date().toISOString(), collection);
  }

  release(collection: Collection): void {
    this.db.prepare(`DELETE FROM bootstrap_markers WHERE collection = ?`).run(collection);
  }

  find(collection: Collection): BootstrapMarker | undefined {
    const row = this.db.prepare(`SELECT * FROM bootstrap_markers WHERE collection = ?`).get(collection) as MarkerRow | undefined;
    return row ? {
      collection, status: row.status as BootstrapStatus, itemCount: row.item_count,
      claimedAt: new Date(row.claimed_at), completedAt: row.completed_at ? new Date(row.completed_at) : null,
    } : undefined;
  }
}

interface MarkerRow { collection: string; status: string; item_count: number; claimed_at: string; completed_at: string | null; }
