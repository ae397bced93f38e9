import express from 'express';
import { createSlackRouter } from './routes/slack.js';
import { errorHandler } from './middleware/error-handler.js';
import { createRateLimiters } from './middleware/rate-limit.js';
import { captureRawBody } from './middleware/slack-auth.js';
import type { CommandRouter } from './services/command.service.js';
import type { ReviewGate } from './services/review.service.js';

export interface AppDependencies {
  commands: CommandRouter;
  reviews: ReviewGate;
  signingSecret: string;
  /** How long a slash command may run before the reply is deferred */
  ackDeadlineMs?: number;
}

/**
 * The HTTP surface: health check plus the two Slack webhooks. Starting the
 * server and the scheduler is left to the caller.
 */
export function createApp(deps: AppDependencies) {
  const app = express();
  const limiters = createRateLimiters();

  // Global rate limiter — applied before all routes
  app.use(limiters.global);

  // Slack posts form-encoded bodies; keep the raw bytes for signature checks
  app.use(express.urlencoded({ extended: true, verify: captureRawBody }));
  app.use(express.json());

  // Health check endpoint
  app.get('/', (_req, res) => {
    res.json({ message: 'Daily Quote Poster' });
  });

  app.use('/slack/commands', limiters.slackCommands);
  app.use('/slack/actions', limiters.slackActions);
  app.use('/slack', createSlackRouter(deps));

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
