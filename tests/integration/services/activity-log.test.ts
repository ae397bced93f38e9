import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import db from '@/db.js';
import {
  formatErrorLog,
  getRecentActivity,
  pruneActivity,
  recordActivity,
  tryRecordActivity,
} from '@/services/activity-log.service.js';
import { clearDatabase, seedActivity } from '../../fixtures/db.js';

beforeEach(() => {
  clearDatabase();
});

describe('recordActivity', () => {
  it('stores an entry with its timestamp', () => {
    const id = recordActivity(
      { level: 'info', event: 'posted', destination: 'C0DEST', message: 'Posted quote by Test Author' },
      new Date('2026-03-02T03:30:01.000Z')
    );

    expect(getRecentActivity()).toEqual([
      {
        id,
        level: 'info',
        event: 'posted',
        destination: 'C0DEST',
        message: 'Posted quote by Test Author',
        created_at: '2026-03-02T03:30:01.000Z',
      },
    ]);
  });

  it('stores a missing destination as null', () => {
    recordActivity({ level: 'error', event: 'command_failed', message: 'boom' });

    expect(getRecentActivity()[0].destination).toBeNull();
  });
});

describe('getRecentActivity', () => {
  beforeEach(() => {
    seedActivity({ level: 'error', event: 'PublishError', destination: 'C0DEST', message: 'first' }, '2026-03-01T03:30:00.000Z');
    seedActivity({ level: 'info', event: 'posted', destination: 'C0DEST', message: 'second' }, '2026-03-02T03:30:00.000Z');
    seedActivity({ level: 'error', event: 'ContentFetchError', message: 'third' }, '2026-03-03T03:30:00.000Z');
  });

  it('returns newest first', () => {
    expect(getRecentActivity().map(r => r.message)).toEqual(['third', 'second', 'first']);
  });

  it('filters by level', () => {
    expect(getRecentActivity({ level: 'error' }).map(r => r.message)).toEqual(['third', 'first']);
  });

  it('honours the limit', () => {
    expect(getRecentActivity({ limit: 1 }).map(r => r.message)).toEqual(['third']);
  });

  it('orders entries written at the same instant by insertion', () => {
    seedActivity({ level: 'info', event: 'posted', message: 'fourth' }, '2026-03-03T03:30:00.000Z');

    expect(getRecentActivity({ limit: 2 }).map(r => r.message)).toEqual(['fourth', 'third']);
  });
});

describe('pruneActivity', () => {
  it('deletes entries older than the cutoff', () => {
    seedActivity({ level: 'info', event: 'posted', message: 'old' }, '2026-01-01T00:00:00.000Z');
    seedActivity({ level: 'info', event: 'posted', message: 'new' }, '2026-03-01T00:00:00.000Z');

    expect(pruneActivity(new Date('2026-02-01T00:00:00.000Z'))).toBe(1);
    expect(getRecentActivity().map(r => r.message)).toEqual(['new']);
  });
});

describe('formatErrorLog', () => {
  it('says so when there are no errors', () => {
    expect(formatErrorLog([])).toBe('No errors recorded.');
  });

  it('lists errors with their time, kind and destination', () => {
    seedActivity(
      { level: 'error', event: 'PublishError', destination: 'C0DEST', message: 'Failed to publish to C0DEST: channel_not_found' },
      '2026-03-01T03:30:00.000Z'
    );
    seedActivity(
      { level: 'error', event: 'ContentFetchError', message: 'Could not fetch a quote: HTTP 503' },
      '2026-03-02T03:30:00.000Z'
    );

    expect(formatErrorLog(getRecentActivity({ level: 'error' }))).toBe(
      'Last 2 error(s):\n' +
        '• 2026-03-02T03:30:00.000Z ContentFetchError: Could not fetch a quote: HTTP 503\n' +
        '• 2026-03-01T03:30:00.000Z PublishError [C0DEST]: Failed to publish to C0DEST: channel_not_found'
    );
  });
});

describe('tryRecordActivity', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('records like recordActivity', () => {
    const id = tryRecordActivity({ level: 'info', event: 'posted', message: 'ok' });

    expect(getRecentActivity()[0].id).toBe(id);
  });

  it('logs and returns null when the write fails', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(db, 'prepare').mockImplementation(() => {
      throw new Error('SQLITE_FULL: database or disk is full');
    });

    expect(tryRecordActivity({ level: 'error', event: 'command_failed', message: 'boom' })).toBeNull();
    expect(errorSpy).toHaveBeenCalledWith('[ActivityLog] Could not record command_failed:', expect.any(Error));
  });
});
