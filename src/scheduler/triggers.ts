import { DateTime, IANAZone } from 'luxon';
import { InvalidArgumentError, InvalidTriggerError } from '../errors.js';
import type { DailyAtTrigger, RepeatingEveryTrigger, OnceTrigger, Trigger } from './types.js';

const SECONDS_PER_DAY = 86_400;
const MAX_POSTS_PER_DAY = 24;

// First post of a frequency schedule goes out shortly after the command.
export const FREQUENCY_FIRST_FIRE_OFFSET_SECONDS = 10;

const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})$/;

export function parseTimeOfDay(input: string): { hour: number; minute: number } | null {
  const match = TIME_OF_DAY_PATTERN.exec(input.trim());
  if (!match) return null;

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;

  return { hour, minute };
}

export function dailyAt(time: string, timezone: string): DailyAtTrigger {
  const parsed = parseTimeOfDay(time);
  if (!parsed) {
    throw new InvalidTriggerError(`"${time}" is not a valid time. Use HH:MM between 00:00 and 23:59`);
  }

  const trigger: DailyAtTrigger = { kind: 'daily_at', ...parsed, timezone };
  validateTrigger(trigger);
  return trigger;
}

/**
 * Converts "posts per day" into a repeating trigger. Takes the raw operator
 * argument and rejects anything but an integer 1–24.
 */
export function everyNthOfDay(count: unknown): RepeatingEveryTrigger {
  const parsed =
    typeof count === 'number'
      ? count
      : typeof count === 'string' && /^\s*\d+\s*$/.test(count)
        ? Number(count)
        : NaN;

  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_POSTS_PER_DAY) {
    throw new InvalidArgumentError(`Frequency must be a whole number between 1 and ${MAX_POSTS_PER_DAY}`);
  }

  return {
    kind: 'repeating_every',
    intervalSeconds: SECONDS_PER_DAY / parsed,
    firstFireOffsetSeconds: FREQUENCY_FIRST_FIRE_OFFSET_SECONDS,
  };
}

export function once(delaySeconds = 0): OnceTrigger {
  return { kind: 'once', delaySeconds };
}

export function validateTrigger(trigger: Trigger): void {
  switch (trigger.kind) {
    case 'daily_at':
      if (
        !Number.isInteger(trigger.hour) || trigger.hour < 0 || trigger.hour > 23 ||
        !Number.isInteger(trigger.minute) || trigger.minute < 0 || trigger.minute > 59
      ) {
        throw new InvalidTriggerError('Daily time must be between 00:00 and 23:59');
      }
      if (!IANAZone.isValidZone(trigger.timezone)) {
        throw new InvalidTriggerError(`Unknown timezone "${trigger.timezone}"`);
      }
      return;

    case 'repeating_every':
      if (!Number.isFinite(trigger.intervalSeconds) || trigger.intervalSeconds <= 0) {
        throw new InvalidTriggerError('Repeat interval must be greater than zero');
      }
      if (!Number.isFinite(trigger.firstFireOffsetSeconds) || trigger.firstFireOffsetSeconds < 0) {
        throw new InvalidTriggerError('First fire offset cannot be negative');
      }
      return;

    case 'once':
      if (!Number.isFinite(trigger.delaySeconds) || trigger.delaySeconds < 0) {
        throw new InvalidTriggerError('Delay cannot be negative');
      }
      return;

    default: {
      const _exhaustive: never = trigger;
      throw new InvalidTriggerError(`Unknown trigger: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

// The next local HH:MM at or after the start of the minute `from` falls in.
function nextDailyOccurrence(trigger: DailyAtTrigger, from: DateTime): Date {
  const minuteStart = from.setZone(trigger.timezone).startOf('minute');
  const at = { hour: trigger.hour, minute: trigger.minute, second: 0, millisecond: 0 };

  let candidate = minuteStart.set(at);
  if (candidate.toMillis() < minuteStart.toMillis()) {
    candidate = minuteStart.plus({ days: 1 }).set(at);
  }
  return candidate.toJSDate();
}

/** When a freshly armed job fires first. */
export function firstFireAt(trigger: Trigger, now: Date): Date {
  switch (trigger.kind) {
    case 'daily_at':
      return nextDailyOccurrence(trigger, DateTime.fromJSDate(now));
    case 'repeating_every':
      return new Date(now.getTime() + trigger.firstFireOffsetSeconds * 1000);
    case 'once':
      return new Date(now.getTime() + trigger.delaySeconds * 1000);
  }
}

/**
 * When a recurring job fires next, given the instant it was due and the
 * instant it actually fired. Returns null for one-shot triggers.
 */
export function nextFireAfter(trigger: Trigger, dueAt: Date, firedAt: Date): Date | null {
  switch (trigger.kind) {
    case 'daily_at': {
      const nextDay = DateTime.fromJSDate(firedAt, { zone: trigger.timezone }).startOf('day').plus({ days: 1 });
      return nextDailyOccurrence(trigger, nextDay);
    }
    case 'repeating_every': {
      const intervalMs = trigger.intervalSeconds * 1000;
      let next = dueAt.getTime() + intervalMs;
      if (next <= firedAt.getTime()) {
        const missed = Math.floor((firedAt.getTime() - next) / intervalMs) + 1;
        next += missed * intervalMs;
      }
      return new Date(next);
    }
    case 'once':
      return null;
  }
}

/** True when the destination already fired at or after the instant a job is due. */
export function alreadyFiredFor(dueAt: Date, lastFiredAt: Date | null): boolean {
  return lastFiredAt !== null && lastFiredAt.getTime() >= dueAt.getTime();
}

export function describeTrigger(trigger: Trigger): string {
  switch (trigger.kind) {
    case 'daily_at':
      return `daily at ${pad(trigger.hour)}:${pad(trigger.minute)} (${trigger.timezone})`;
    case 'repeating_every':
      return `every ${formatDuration(trigger.intervalSeconds)}`;
    case 'once':
      return trigger.delaySeconds === 0 ? 'once, now' : `once, in ${formatDuration(trigger.delaySeconds)}`;
  }
}

export function formatInstant(instant: Date, timezone: string): string {
  return `${DateTime.fromJSDate(instant, { zone: timezone }).toFormat('yyyy-LL-dd HH:mm')} (${timezone})`;
}

function formatDuration(totalSeconds: number): string {
  const rounded = Math.round(totalSeconds);
  const hours = Math.floor(rounded / 3600);
  const minutes = Math.floor((rounded % 3600) / 60);
  const seconds = rounded % 60;

  const parts: string[] = [];
  if (hours) parts.push(`${hours}h`);
  if (minutes) parts.push(`${minutes}m`);
  if (seconds || parts.length === 0) parts.push(`${seconds}s`);
  return parts.join(' ');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
