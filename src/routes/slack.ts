import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { AlreadyActionedError, PublishError, ReviewNotFoundError, toError } from '../errors.js';
import { respondLater } from '../integrations/slack.js';
import { verifySlackRequest } from '../middleware/slack-auth.js';
import {
  blockActionPayloadSchema,
  slashCommandSchema,
  validate,
  validationDetails,
} from '../middleware/validation.js';
import { tryRecordActivity } from '../services/activity-log.service.js';
import type { CommandRouter } from '../services/command.service.js';
import type { ReviewGate } from '../services/review.service.js';

// Slack drops a reply that takes longer than 3 seconds.
const ACK_DEADLINE_MS = 2_500;

export interface SlackRouterOptions {
  commands: CommandRouter;
  reviews: ReviewGate;
  signingSecret: string;
  ackDeadlineMs?: number;
}

type Settled<T> = { done: true; value: T } | { done: false };

async function settleWithin<T>(promise: Promise<T>, ms: number): Promise<Settled<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<Settled<T>>(resolve => {
    timer = setTimeout(() => resolve({ done: false }), ms);
  });

  try {
    return await Promise.race([promise.then((value): Settled<T> => ({ done: true, value })), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

type ReviewDecision = 'approve' | 'reject';

interface ActionOutcome {
  status: number;
  body: Record<string, unknown>;
  /** Set when an approved post could not be published */
  failure?: string;
}

/** Applies an Approve/Reject click and maps the result to an HTTP reply. */
async function handleAction(
  reviews: ReviewGate,
  decision: ReviewDecision,
  token: string,
  actor: string
): Promise<ActionOutcome> {
  try {
    if (decision === 'approve') {
      const review = await reviews.approve(token, actor);
      tryRecordActivity({
        level: 'info',
        event: 'review_published',
        destination: review.destination,
        message: `Preview ${token} approved by ${actor}`,
      });
      return { status: 200, body: { message: 'Post approved and published' } };
    }

    await reviews.reject(token, actor);
    return { status: 200, body: { message: 'Post rejected' } };
  } catch (error) {
    if (error instanceof ReviewNotFoundError) {
      return { status: 404, body: { error: 'Preview not found or expired' } };
    }

    // A repeated click on an actioned preview.
    if (error instanceof AlreadyActionedError) {
      return { status: 200, body: { message: error.message, already_actioned: true } };
    }

    if (error instanceof PublishError) {
      tryRecordActivity({
        level: 'error',
        event: 'review_publish_failed',
        destination: reviews.get(token)?.destination,
        message: error.message,
      });
      return {
        status: 502,
        body: { error: 'Post approved but failed to publish', details: error.message },
        failure: error.message,
      };
    }

    throw error;
  }
}

export function createSlackRouter(options: SlackRouterOptions): Router {
  const router = Router();
  const ackDeadlineMs = options.ackDeadlineMs ?? ACK_DEADLINE_MS;

  router.use(verifySlackRequest(options.signingSecret));

  // POST /slack/commands
  router.post('/commands', validate(slashCommandSchema), async (req: Request, res: Response, next: NextFunction) => {
    const command = slashCommandSchema.parse(req.body);

    const reply = options.commands.handle(command.text, {
      userId: command.user_id,
      userName: command.user_name,
      channelId: command.channel_id,
    });

    try {
      const settled = await settleWithin(reply, ackDeadlineMs);
      if (settled.done) {
        return res.json({ response_type: 'ephemeral', text: settled.value });
      }
    } catch (error) {
      return next(error);
    }

    // Past the deadline: acknowledge now, answer via response_url.
    res.json({ response_type: 'ephemeral', text: '⏳ Working on it…' });

    const responseUrl = command.response_url;
    reply
      .then(text => (responseUrl ? respondLater(responseUrl, text) : undefined))
      .catch(error => {
        console.error('[Slack] Deferred command reply failed:', error);
        tryRecordActivity({ level: 'error', event: 'command_failed', message: toError(error).message });
      });
  });

  // POST /slack/actions
  router.post('/actions', async (req: Request, res: Response, next: NextFunction) => {
    let raw: unknown;
    try {
      raw = typeof req.body?.payload === 'string' ? JSON.parse(req.body.payload) : req.body?.payload;
    } catch {
      return res.status(400).json({ error: 'Malformed payload' });
    }

    const parsed = blockActionPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Validation failed', details: validationDetails(parsed.error) });
    }

    const payload = parsed.data;
    const [action] = payload.actions;
    const actor = payload.user.name || payload.user.username || payload.user.id;

    let decision: ReviewDecision;
    if (action.action_id.startsWith('approve_')) {
      decision = 'approve';
    } else if (action.action_id.startsWith('reject_')) {
      decision = 'reject';
    } else {
      return res.status(400).json({ error: 'Invalid action' });
    }

    const outcome = handleAction(options.reviews, decision, action.value, actor);

    try {
      const settled = await settleWithin(outcome, ackDeadlineMs);
      if (settled.done) {
        return res.status(settled.value.status).json(settled.value.body);
      }
    } catch (error) {
      return next(error);
    }

    // Still publishing: acknowledge the click, report a failure via response_url.
    res.json({ message: '⏳ Working on it…' });

    const responseUrl = payload.response_url;
    outcome
      .then(result => (result.failure && responseUrl ? respondLater(responseUrl, `❌ ${result.failure}`) : undefined))
      .catch(error => {
        console.error('[Slack] Deferred review action failed:', error);
        tryRecordActivity({ level: 'error', event: 'review_action_failed', message: toError(error).message });
      });
  });

  return router;
}
