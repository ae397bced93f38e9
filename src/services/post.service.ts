import { recordActivity } from './activity-log.service.js';
import type { ReviewGate } from './review.service.js';
import type { JobAction } from '../scheduler/index.js';
import type { ContentProvider, PendingReview, Publisher } from '../types.js';

export interface PostServiceOptions {
  content: ContentProvider;
  publisher: Publisher;
  reviews: ReviewGate;
}

/**
 * The two things a fire can do with fresh content: publish it straight to
 * the destination, or send it to a reviewer first.
 */
export class PostService {
  constructor(private readonly options: PostServiceOptions) {}

  /** Scheduled action: fetch content and publish it to the destination. */
  readonly publishTo: JobAction = async destination => {
    const content = await this.options.content.fetch();
    const ack = await this.options.publisher.publish(destination, content.image, content.caption);

    recordActivity({
      level: 'info',
      event: 'posted',
      destination,
      message: `Posted quote by ${content.quote.author}${ack.messageTs ? ` (ts ${ack.messageTs})` : ''}`,
    });
  };

  /** Fetches content and sends it to `reviewerChannel` for approval. */
  async previewFor(destination: string, reviewerChannel: string): Promise<PendingReview> {
    const content = await this.options.content.fetch();
    const review = await this.options.reviews.requestReview(destination, content, reviewerChannel);

    recordActivity({
      level: 'info',
      event: 'preview_sent',
      destination,
      message: `Preview ${review.token} sent to ${reviewerChannel}`,
    });

    return review;
  }
}
