import type { LogEntry, LogEntryType } from './models';

/**
 * Log System
 *
 * Records notable controller events (pause, speed changes, selection,
 * reset, resize...) in a bounded in-memory log. The log is capped at
 * MAX_LOG_ENTRIES; it is allowed to grow TRIM_BUFFER entries past the cap
 * before the oldest entries are dropped, so trimming does not run on
 * every push.
 */

export const MAX_LOG_ENTRIES = 200;
export const TRIM_BUFFER = 50;

function createLogEntry(
  tick: number,
  type: LogEntryType,
  message: string
): LogEntry {
  return { tick, type, message };
}

export function addLog(
  log: LogEntry[],
  tick: number,
  type: LogEntryType,
  message: string
): LogEntry {
  const entry = createLogEntry(tick, type, message);
  log.push(entry);
  if (log.length > MAX_LOG_ENTRIES + TRIM_BUFFER) {
    trimLog(log);
  }
  return entry;
}

/** Drop the oldest entries until the log fits MAX_LOG_ENTRIES. */
export function trimLog(log: LogEntry[]): void {
  if (log.length <= MAX_LOG_ENTRIES) return;
  log.splice(0, log.length - MAX_LOG_ENTRIES);
}

/**
 * Entries added after the first `seen` of `total` ever recorded. Counts
 * survive trimming, so a reader that has fallen behind the cap gets the
 * whole remaining log.
 */
export function getUnseenEntries(
  log: LogEntry[],
  total: number,
  seen: number
): LogEntry[] {
  const unseen = total - seen;
  if (unseen <= 0) return [];
  return log.slice(Math.max(0, log.length - unseen));
}
