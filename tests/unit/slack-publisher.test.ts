import { describe, it, expect, vi } from 'vitest';
import type {
  ChatPostMessageArguments,
  ChatPostMessageResponse,
  ChatUpdateArguments,
  ChatUpdateResponse,
  FilesUploadV2Arguments,
  WebAPICallResult,
} from '@slack/web-api';
import { PublishError } from '@/errors.js';
import { SlackPublisher, respondLater } from '@/integrations/slack.js';
import type { SlackApi } from '@/integrations/slack.js';
import type { PendingReview } from '@/types.js';

const IMAGE_URL = 'https://images.test/prompt/sunrise?nologo=true';
const CAPTION = '❝ Well begun is half done. ❞\n\n~ *Test Author*';

function fakeClient() {
  const postMessage = vi.fn(
    async (args: ChatPostMessageArguments): Promise<ChatPostMessageResponse> => ({
      ok: true,
      channel: args.channel,
      ts: '1772420000.000100',
    })
  );
  const update = vi.fn(async (_args: ChatUpdateArguments): Promise<ChatUpdateResponse> => ({ ok: true }));
  const uploadV2 = vi.fn(async (_args: FilesUploadV2Arguments): Promise<WebAPICallResult> => ({ ok: true }));
  const client: SlackApi = { chat: { postMessage, update }, files: { uploadV2 } };
  return { client, postMessage, update, uploadV2 };
}

function review(overrides: Partial<PendingReview> = {}): PendingReview {
  return {
    token: 'tok-1',
    destination: 'C0DEST',
    image: { kind: 'url', url: IMAGE_URL },
    caption: CAPTION,
    reviewerChannel: 'C0REVIEW',
    status: 'pending',
    reviewMessage: null,
    actionedBy: null,
    createdAt: new Date('2026-03-02T00:00:00Z'),
    ...overrides,
  };
}

describe('SlackPublisher', () => {
  describe('publish', () => {
    it('posts the image and caption as blocks', async () => {
      const { client, postMessage } = fakeClient();
      const publisher = new SlackPublisher({ client });

      const ack = await publisher.publish('C0DEST', { kind: 'url', url: IMAGE_URL }, CAPTION);

      expect(ack).toEqual({ channel: 'C0DEST', messageTs: '1772420000.000100' });
      expect(postMessage).toHaveBeenCalledWith({
        channel: 'C0DEST',
        text: CAPTION,
        blocks: [
          { type: 'image', image_url: IMAGE_URL, alt_text: 'Quote of the day' },
          { type: 'section', text: { type: 'mrkdwn', text: CAPTION } },
        ],
      });
    });

    it('uploads raw image bytes as a file with the caption as comment', async () => {
      const { client, postMessage, uploadV2 } = fakeClient();
      const publisher = new SlackPublisher({ client });
      const data = Buffer.from('png-bytes');

      const ack = await publisher.publish('C0DEST', { kind: 'bytes', data, filename: 'quote.png' }, CAPTION);

      expect(ack).toEqual({ channel: 'C0DEST', messageTs: '' });
      expect(uploadV2).toHaveBeenCalledWith({
        channel_id: 'C0DEST',
        file: data,
        filename: 'quote.png',
        initial_comment: CAPTION,
      });
      expect(postMessage).not.toHaveBeenCalled();
    });

    it('wraps Slack errors in PublishError', async () => {
      const { client, postMessage } = fakeClient();
      postMessage.mockRejectedValueOnce(new Error('channel_not_found'));
      const publisher = new SlackPublisher({ client });

      const attempt = publisher.publish('C0DEST', { kind: 'url', url: IMAGE_URL }, CAPTION);

      await expect(attempt).rejects.toThrow(PublishError);
      await expect(attempt).rejects.toThrow('Failed to publish to C0DEST: channel_not_found');
    });
  });

  describe('sendPreview', () => {
    it('posts the preview with approve and reject buttons to the reviewer channel', async () => {
      const { client, postMessage } = fakeClient();
      const publisher = new SlackPublisher({ client });

      const ref = await publisher.sendPreview(review());

      expect(ref).toEqual({ channel: 'C0REVIEW', messageTs: '1772420000.000100' });
      expect(postMessage).toHaveBeenCalledTimes(1);

      const [args] = postMessage.mock.calls[0];
      expect(args).toMatchObject({
        channel: 'C0REVIEW',
        text: 'New post pending approval',
        blocks: [
          { type: 'image', image_url: IMAGE_URL },
          { type: 'section', text: { type: 'mrkdwn', text: CAPTION } },
          { type: 'context', elements: [{ type: 'mrkdwn', text: 'Preview for <#C0DEST> — approve to publish' }] },
          {
            type: 'actions',
            elements: [
              {
                type: 'button',
                text: { type: 'plain_text', text: 'Approve ✓' },
                style: 'primary',
                value: 'tok-1',
                action_id: 'approve_tok-1',
              },
              {
                type: 'button',
                text: { type: 'plain_text', text: 'Reject ✗' },
                style: 'danger',
                value: 'tok-1',
                action_id: 'reject_tok-1',
              },
            ],
          },
        ],
      });
    });

    it('wraps failures in PublishError', async () => {
      const { client, postMessage } = fakeClient();
      postMessage.mockRejectedValueOnce(new Error('not_in_channel'));
      const publisher = new SlackPublisher({ client });

      await expect(publisher.sendPreview(review())).rejects.toThrow('Failed to send preview for approval');
    });
  });

  describe('resolvePreview', () => {
    it('replaces the buttons with a status line', async () => {
      const { client, update } = fakeClient();
      const publisher = new SlackPublisher({ client });

      await publisher.resolvePreview(
        review({ reviewMessage: { channel: 'C0REVIEW', messageTs: '900.000100' } }),
        '🚫 Rejected by reviewer'
      );

      expect(update).toHaveBeenCalledWith({
        channel: 'C0REVIEW',
        ts: '900.000100',
        text: '🚫 Rejected by reviewer',
        blocks: [
          { type: 'image', image_url: IMAGE_URL, alt_text: 'Quote of the day' },
          { type: 'section', text: { type: 'mrkdwn', text: CAPTION } },
          { type: 'context', elements: [{ type: 'mrkdwn', text: '🚫 Rejected by reviewer' }] },
        ],
      });
    });

    it('does nothing when the preview message is unknown', async () => {
      const { client, update } = fakeClient();
      const publisher = new SlackPublisher({ client });

      await publisher.resolvePreview(review(), 'done');

      expect(update).not.toHaveBeenCalled();
    });
  });
});

describe('respondLater', () => {
  it('posts an ephemeral reply to the response URL', async () => {
    const fetchImpl = vi.fn(async () => new Response(null, { status: 200 }));

    await respondLater('https://hooks.slack.test/commands/1', 'done', fetchImpl);

    expect(fetchImpl).toHaveBeenCalledWith(
      'https://hooks.slack.test/commands/1',
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({ response_type: 'ephemeral', text: 'done' }),
      })
    );
  });

  it('throws when Slack refuses the reply', async () => {
    const fetchImpl = vi.fn(async () => new Response(null, { status: 404 }));

    await expect(respondLater('https://hooks.slack.test/commands/1', 'done', fetchImpl)).rejects.toThrow(
      'Slack response_url returned HTTP 404'
    );
  });
});
