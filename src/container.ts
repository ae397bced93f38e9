import type { AppConfig } from './config.js';
import { createSlackClient, SlackPublisher } from './integrations/slack.js';
import { getLLMAdapter } from './llm/index.js';
import { JobRegistry, Scheduler } from './scheduler/index.js';
import type { Clock } from './scheduler/index.js';
import { recordActivity } from './services/activity-log.service.js';
import { CommandRouter } from './services/command.service.js';
import { QuoteContentProvider } from './services/content.service.js';
import { PostService } from './services/post.service.js';
import { ReviewGate } from './services/review.service.js';
import type { ContentProvider, Publisher, ReviewNotifier } from './types.js';

export interface Services {
  registry: JobRegistry;
  scheduler: Scheduler;
  reviews: ReviewGate;
  posts: PostService;
  commands: CommandRouter;
}

export interface ServiceOverrides {
  content?: ContentProvider;
  publisher?: Publisher & ReviewNotifier;
  now?: Clock;
}

/**
 * Builds the object graph once at startup. The single JobRegistry is shared
 * by the scheduling loop and the command surface.
 */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const publisher = overrides.publisher ?? new SlackPublisher({
    client: createSlackClient(config.slack.botToken),
  });

  const content = overrides.content ?? new QuoteContentProvider({
    quoteApiUrl: config.quoteApiUrl,
    imageApiUrl: config.imageApiUrl,
    ad: config.ad,
    llm: getLLMAdapter(config.openai),
  });

  const reviews = new ReviewGate({ publisher, notifier: publisher, now: overrides.now });
  const posts = new PostService({ content, publisher, reviews });
  const registry = new JobRegistry();

  const scheduler = new Scheduler({
    registry,
    action: posts.publishTo,
    pollIntervalMs: config.pollIntervalMs,
    now: overrides.now,
    onFireError: (job, error) => {
      recordActivity({
        level: 'error',
        event: error.name,
        destination: job.destination,
        message: error.message,
      });
    },
  });

  const commands = new CommandRouter({
    scheduler,
    posts,
    destination: config.destination,
    timezone: config.defaultSchedule.timezone,
    postNowReview: config.postNowReview,
  });

  return { registry, scheduler, reviews, posts, commands };
}
