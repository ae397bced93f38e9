export interface DailyAtTrigger {
  kind: 'daily_at';
  hour: number;
  minute: number;
  /** IANA timezone the time of day is read in */
  timezone: string;
}

export interface RepeatingEveryTrigger {
  kind: 'repeating_every';
  intervalSeconds: number;
  firstFireOffsetSeconds: number;
}

export interface OnceTrigger {
  kind: 'once';
  delaySeconds: number;
}

export type Trigger = DailyAtTrigger | RepeatingEveryTrigger | OnceTrigger;

export type JobStatus = 'scheduled' | 'firing' | 'cancelled' | 'completed';

export interface Job {
  id: string;
  destination: string;
  trigger: Trigger;
  status: JobStatus;
  nextFireAt: Date;
  lastFiredAt: Date | null;
  createdAt: Date;
}

/** The work a fired job performs — produce content and publish it. */
export type JobAction = (destination: string) => Promise<void>;

export type Clock = () => Date;
