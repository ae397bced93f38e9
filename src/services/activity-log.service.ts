import db, { generateUUID } from '../db.js';
import type { ActivityEntry, ActivityRecord } from '../types.js';

export function recordActivity(entry: ActivityEntry, at: Date = new Date()): string {
  const id = generateUUID();

  db.prepare(`
    INSERT INTO activity_log (id, level, event, destination, message, created_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(id, entry.level, entry.event, entry.destination ?? null, entry.message, at.toISOString());

  return id;
}

/** recordActivity for callers with nowhere to propagate a write failure. */
export function tryRecordActivity(entry: ActivityEntry, at: Date = new Date()): string | null {
  try {
    return recordActivity(entry, at);
  } catch (error) {
    console.error(`[ActivityLog] Could not record ${entry.event}:`, error);
    return null;
  }
}

// Newest first; rowid breaks ties between entries written in the same millisecond.
export function getRecentActivity(
  opts: { level?: ActivityRecord['level']; limit?: number } = {}
): ActivityRecord[] {
  const limit = opts.limit ?? 10;

  if (opts.level) {
    return db.prepare(`
      SELECT * FROM activity_log
      WHERE level = ?
      ORDER BY created_at DESC, rowid DESC
      LIMIT ?
    `).all(opts.level, limit) as ActivityRecord[];
  }

  return db.prepare(`
    SELECT * FROM activity_log
    ORDER BY created_at DESC, rowid DESC
    LIMIT ?
  `).all(limit) as ActivityRecord[];
}

export function pruneActivity(olderThan: Date): number {
  const result = db.prepare('DELETE FROM activity_log WHERE created_at < ?').run(olderThan.toISOString());
  return result.changes;
}

/** Renders error records for the get_logs command. */
export function formatErrorLog(records: ActivityRecord[]): string {
  if (records.length === 0) {
    return 'No errors recorded.';
  }

  const lines = records.map(record => {
    const where = record.destination ? ` [${record.destination}]` : '';
    return `• ${record.created_at} ${record.event}${where}: ${record.message}`;
  });

  return `Last ${records.length} error(s):\n${lines.join('\n')}`;
}
