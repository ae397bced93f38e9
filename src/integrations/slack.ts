import { WebClient } from '@slack/web-api';
import type {
  ChatPostMessageArguments,
  ChatPostMessageResponse,
  ChatUpdateArguments,
  ChatUpdateResponse,
  FilesUploadV2Arguments,
  KnownBlock,
  WebAPICallResult,
} from '@slack/web-api';
import crypto from 'crypto';
import { CircuitBreaker } from '../circuit-breaker/index.js';
import { PublishError, toError } from '../errors.js';
import type {
  ImageRef,
  PendingReview,
  PublishAck,
  Publisher,
  ReviewMessageRef,
  ReviewNotifier,
} from '../types.js';

// Image payloads can be large; Slack fetches and unfurls them before answering.
const SLACK_TIMEOUT_MS = 60_000;

// Replay window for signed Slack requests.
const MAX_REQUEST_AGE_SECONDS = 300;

const IMAGE_ALT_TEXT = 'Quote of the day';

/** The slice of the Slack Web API this service calls. */
export interface SlackApi {
  chat: {
    postMessage(args: ChatPostMessageArguments): Promise<ChatPostMessageResponse>;
    update(args: ChatUpdateArguments): Promise<ChatUpdateResponse>;
  };
  files: {
    uploadV2(args: FilesUploadV2Arguments): Promise<WebAPICallResult>;
  };
}

export function createSlackClient(token: string): SlackApi {
  return new WebClient(token, { timeout: SLACK_TIMEOUT_MS });
}

export interface SlackPublisherOptions {
  client: SlackApi;
  breaker?: CircuitBreaker;
}

/**
 * Publishes posts to a channel and runs the preview side of the review gate.
 */
export class SlackPublisher implements Publisher, ReviewNotifier {
  private readonly client: SlackApi;
  private readonly breaker: CircuitBreaker;

  constructor(options: SlackPublisherOptions) {
    this.client = options.client;
    this.breaker = options.breaker ?? new CircuitBreaker({
      serviceName: 'slack',
      failureThreshold: 3,
      resetTimeoutMs: 60_000,
      successThreshold: 1,
    });
  }

  async publish(destination: string, image: ImageRef, caption: string): Promise<PublishAck> {
    return this.breaker.execute(async () => {
      try {
        if (image.kind === 'bytes') {
          await this.client.files.uploadV2({
            channel_id: destination,
            file: image.data,
            filename: image.filename,
            initial_comment: caption,
          });
          return { channel: destination, messageTs: '' };
        }

        const result = await this.client.chat.postMessage({
          channel: destination,
          text: caption,
          blocks: [imageBlock(image.url), captionBlock(caption)],
        });

        return {
          channel: result.channel || destination,
          messageTs: result.ts || '',
        };
      } catch (error) {
        console.error('Slack publish error:', error);
        throw new PublishError(`Failed to publish to ${destination}: ${toError(error).message}`, { cause: error });
      }
    });
  }

  async sendPreview(review: PendingReview): Promise<ReviewMessageRef> {
    const blocks: KnownBlock[] = [];

    try {
      if (review.image.kind === 'bytes') {
        await this.client.files.uploadV2({
          channel_id: review.reviewerChannel,
          file: review.image.data,
          filename: review.image.filename,
        });
      } else {
        blocks.push(imageBlock(review.image.url));
      }

      blocks.push(
        captionBlock(review.caption),
        {
          type: 'context',
          elements: [{ type: 'mrkdwn', text: `Preview for <#${review.destination}> — approve to publish` }],
        },
        {
          type: 'actions',
          elements: [
            {
              type: 'button',
              text: { type: 'plain_text', text: 'Approve ✓' },
              style: 'primary',
              value: review.token,
              action_id: `approve_${review.token}`,
            },
            {
              type: 'button',
              text: { type: 'plain_text', text: 'Reject ✗' },
              style: 'danger',
              value: review.token,
              action_id: `reject_${review.token}`,
            },
          ],
        }
      );

      const result = await this.client.chat.postMessage({
        channel: review.reviewerChannel,
        text: 'New post pending approval',
        blocks,
      });

      return {
        channel: result.channel || review.reviewerChannel,
        messageTs: result.ts || '',
      };
    } catch (error) {
      console.error('Slack preview error:', error);
      throw new PublishError('Failed to send preview for approval', { cause: error });
    }
  }

  // Swaps the buttons for a status line so the preview cannot be actioned again.
  async resolvePreview(review: PendingReview, text: string): Promise<void> {
    if (!review.reviewMessage?.messageTs) return;

    const blocks: KnownBlock[] = [];
    if (review.image.kind === 'url') {
      blocks.push(imageBlock(review.image.url));
    }
    blocks.push(captionBlock(review.caption), {
      type: 'context',
      elements: [{ type: 'mrkdwn', text }],
    });

    await this.client.chat.update({
      channel: review.reviewMessage.channel,
      ts: review.reviewMessage.messageTs,
      text,
      blocks,
    });
  }
}

function imageBlock(url: string): KnownBlock {
  return { type: 'image', image_url: url, alt_text: IMAGE_ALT_TEXT };
}

function captionBlock(caption: string): KnownBlock {
  return { type: 'section', text: { type: 'mrkdwn', text: caption } };
}

export function verifySlackSignature(
  slackSignature: string,
  timestamp: string,
  body: string,
  signingSecret: string,
  nowSeconds: number = Math.floor(Date.now() / 1000)
): boolean {
  const requestTime = Number(timestamp);
  if (!Number.isFinite(requestTime)) {
    return false;
  }

  // Prevent replay attacks - reject requests older than 5 minutes
  if (Math.abs(nowSeconds - requestTime) > MAX_REQUEST_AGE_SECONDS) {
    return false;
  }

  const sigBasestring = `v0:${timestamp}:${body}`;
  const expected = Buffer.from(
    'v0=' + crypto.createHmac('sha256', signingSecret).update(sigBasestring).digest('hex')
  );
  const received = Buffer.from(slackSignature);

  // timingSafeEqual throws on length mismatch
  if (expected.length !== received.length) {
    return false;
  }

  return crypto.timingSafeEqual(expected, received);
}

/** Posts a late reply to a slash command through its response_url. */
export async function respondLater(
  responseUrl: string,
  text: string,
  fetchImpl: typeof fetch = fetch
): Promise<void> {
  const response = await fetchImpl(responseUrl, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify({ response_type: 'ephemeral', text }),
    signal: AbortSignal.timeout(10_000),
  });

  if (!response.ok) {
    throw new Error(`Slack response_url returned HTTP ${response.status}`);
  }
}
