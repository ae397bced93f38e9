import rateLimit from 'express-rate-limit';
import type { RequestHandler } from 'express';

export interface RateLimiters {
  global: RequestHandler;
  slackCommands: RequestHandler;
  slackActions: RequestHandler;
}

// One set of counters per app.
export function createRateLimiters(): RateLimiters {
  return {
    // 100 requests per minute per IP.
    global: rateLimit({
      windowMs: 60 * 1000,
      limit: 100,
      standardHeaders: 'draft-7',
      legacyHeaders: false,
      message: { error: 'Too many requests, please try again later.' },
    }),

    // Operator commands are typed by hand; 20 a minute is plenty.
    slackCommands: rateLimit({
      windowMs: 60 * 1000,
      limit: 20,
      standardHeaders: 'draft-7',
      legacyHeaders: false,
      message: { error: 'Command rate limit exceeded.' },
    }),

    // Approve/Reject clicks arrive in bursts when several previews are open.
    slackActions: rateLimit({
      windowMs: 60 * 1000,
      limit: 30,
      standardHeaders: 'draft-7',
      legacyHeaders: false,
      message: { error: 'Slack webhook rate limit exceeded.' },
    }),
  };
}
