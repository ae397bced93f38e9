import { InvalidArgumentError, InvalidTriggerError } from '../errors.js';
import {
  dailyAt,
  describeTrigger,
  everyNthOfDay,
  formatInstant,
} from '../scheduler/index.js';
import type { Job, Scheduler } from '../scheduler/index.js';
import { formatErrorLog, getRecentActivity } from './activity-log.service.js';
import type { PostService } from './post.service.js';

const LOG_LIMIT = 10;

export const HELP_TEXT = [
  '*Quote poster commands*',
  '• `help` — show this message',
  '• `post_now` — post a quote right away',
  '• `set_time HH:MM` — post once a day at this time',
  '• `set_freq N` — post N times a day (1–24)',
  '• `stop` — stop scheduled posts',
  '• `status` — show the current schedule',
  '• `get_logs` — show recent errors',
].join('\n');

export interface CommandContext {
  userId: string;
  userName?: string;
  /** Channel the command was issued from; previews are shown there */
  channelId: string;
}

export interface CommandRouterOptions {
  scheduler: Scheduler;
  posts: PostService;
  destination: string;
  timezone: string;
  /** Route post_now through the review gate instead of publishing directly */
  postNowReview: boolean;
}

/**
 * Operator commands → schedule changes. Argument errors come back as
 * replies and leave the current schedule as it was.
 */
export class CommandRouter {
  constructor(private readonly options: CommandRouterOptions) {}

  async handle(text: string, ctx: CommandContext): Promise<string> {
    const [rawName = 'help', ...args] = text.trim().split(/\s+/).filter(Boolean);
    const name = rawName.replace(/^\//, '').toLowerCase();

    console.log(`[Command] ${ctx.userName ?? ctx.userId} ran "${name}"${args.length ? ` ${args.join(' ')}` : ''}`);

    try {
      switch (name) {
        case 'help':
        case 'start':
          return HELP_TEXT;
        case 'post_now':
          return await this.postNow(ctx);
        case 'set_time':
          return this.describeArmed(this.setTime(args[0]));
        case 'set_freq':
          return this.describeArmed(this.setFrequency(args[0]));
        case 'stop':
          return this.stop()
            ? '🛑 Scheduled posts stopped.'
            : 'No active schedule — nothing to stop.';
        case 'status':
          return this.status();
        case 'get_logs':
          return formatErrorLog(getRecentActivity({ level: 'error', limit: LOG_LIMIT }));
        default:
          return `Unknown command "${name}". Try \`help\`.`;
      }
    } catch (error) {
      if (error instanceof InvalidTriggerError || error instanceof InvalidArgumentError) {
        return `⚠️ ${error.message}`;
      }
      throw error;
    }
  }

  setTime(time: string | undefined): Job {
    if (!time) {
      throw new InvalidArgumentError('Usage: set_time HH:MM (24-hour clock)');
    }
    return this.options.scheduler.arm(this.options.destination, dailyAt(time, this.options.timezone));
  }

  setFrequency(count: unknown): Job {
    return this.options.scheduler.arm(this.options.destination, everyNthOfDay(count));
  }

  stop(): boolean {
    return this.options.scheduler.cancel(this.options.destination);
  }

  async postNow(ctx: CommandContext): Promise<string> {
    const { scheduler, posts, destination, postNowReview } = this.options;

    if (postNowReview) {
      const outcome = await scheduler.fireNow(destination, async () => {
        await posts.previewFor(destination, ctx.channelId);
      });
      return outcome.ok
        ? '👀 Preview sent — approve it to publish.'
        : `❌ Could not prepare a preview: ${outcome.error.message}`;
    }

    const outcome = await scheduler.fireNow(destination);
    return outcome.ok
      ? `✅ Posted to <#${destination}>.`
      : `❌ Post failed: ${outcome.error.message}. The schedule is unchanged.`;
  }

  status(): string {
    const job = this.options.scheduler.registry.get(this.options.destination);
    if (!job) {
      return 'No active schedule. Use `set_time` or `set_freq` to start one.';
    }

    const firing = job.status === 'firing' ? ' A post is going out right now.' : '';
    return (
      `📅 Posting ${describeTrigger(job.trigger)}.` +
      ` Next post: ${formatInstant(job.nextFireAt, this.options.timezone)}.${firing}`
    );
  }

  private describeArmed(job: Job): string {
    return (
      `✅ Schedule set: ${describeTrigger(job.trigger)}.` +
      ` Next post: ${formatInstant(job.nextFireAt, this.options.timezone)}.`
    );
  }
}
