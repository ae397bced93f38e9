import { randomUUID } from 'crypto';
import {
  AlreadyActionedError,
  AlreadyPublishedError,
  PublishError,
  ReviewNotFoundError,
  toError,
} from '../errors.js';
import type { Clock } from '../scheduler/index.js';
import type {
  Content,
  PendingReview,
  Publisher,
  ReviewMessageRef,
  ReviewNotifier,
} from '../types.js';

// Previews nobody acted on are dropped after a week.
const DEFAULT_REVIEW_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export interface ReviewGateOptions {
  publisher: Publisher;
  notifier: ReviewNotifier;
  now?: Clock;
  ttlMs?: number;
}

/**
 * Preview-before-publish. Each preview is a PendingReview keyed by a random
 * token that travels in the Approve/Reject button values.
 *
 *   pending ──approve──▶ publishing ──ok──▶ published
 *      │                     └──publish failed──▶ pending
 *      └────reject────▶ rejected
 *
 * approve() marks the review publishing before its first await.
 */
export class ReviewGate {
  private readonly reviews = new Map<string, PendingReview>();
  private readonly publisher: Publisher;
  private readonly notifier: ReviewNotifier;
  private readonly now: Clock;
  private readonly ttlMs: number;

  constructor(options: ReviewGateOptions) {
    this.publisher = options.publisher;
    this.notifier = options.notifier;
    this.now = options.now ?? (() => new Date());
    this.ttlMs = options.ttlMs ?? DEFAULT_REVIEW_TTL_MS;
  }

  create(destination: string, content: Pick<Content, 'image' | 'caption'>, reviewerChannel: string): PendingReview {
    const review: PendingReview = {
      token: randomUUID(),
      destination,
      image: content.image,
      caption: content.caption,
      reviewerChannel,
      status: 'pending',
      reviewMessage: null,
      actionedBy: null,
      createdAt: this.now(),
    };

    this.reviews.set(review.token, review);
    return review;
  }

  /** Creates a review and sends its preview to the reviewer's channel. */
  async requestReview(
    destination: string,
    content: Pick<Content, 'image' | 'caption'>,
    reviewerChannel: string
  ): Promise<PendingReview> {
    const review = this.create(destination, content, reviewerChannel);

    try {
      const message = await this.notifier.sendPreview(review);
      this.attachMessage(review.token, message);
    } catch (error) {
      this.reviews.delete(review.token);
      throw error;
    }

    console.log(`[Review] Preview ${review.token} sent to ${reviewerChannel} for ${destination}`);
    return review;
  }

  attachMessage(token: string, message: ReviewMessageRef): void {
    this.require(token).reviewMessage = message;
  }

  get(token: string): PendingReview | undefined {
    return this.reviews.get(token);
  }

  async approve(token: string, actor: string): Promise<PendingReview> {
    const review = this.require(token);

    if (review.status === 'publishing' || review.status === 'published') {
      throw new AlreadyPublishedError();
    }
    if (review.status !== 'pending') {
      throw new AlreadyActionedError(review.status);
    }

    review.status = 'publishing';

    try {
      await this.publisher.publish(review.destination, review.image, review.caption);
    } catch (error) {
      review.status = 'pending';
      throw error instanceof PublishError
        ? error
        : new PublishError(`Failed to publish approved post: ${toError(error).message}`, { cause: error });
    }

    review.status = 'published';
    review.actionedBy = actor;
    console.log(`[Review] Preview ${token} approved by ${actor} and published to ${review.destination}`);

    await this.resolve(review, `✅ Published to <#${review.destination}> by ${actor}`);
    return review;
  }

  async reject(token: string, actor: string): Promise<PendingReview> {
    const review = this.require(token);

    if (review.status === 'publishing' || review.status === 'published') {
      throw new AlreadyPublishedError();
    }
    if (review.status !== 'pending') {
      throw new AlreadyActionedError(review.status);
    }

    review.status = 'rejected';
    review.actionedBy = actor;
    console.log(`[Review] Preview ${token} rejected by ${actor}`);

    await this.resolve(review, `🚫 Rejected by ${actor}`);
    return review;
  }

  /** Drops previews older than the TTL. Returns how many were removed. */
  prune(): number {
    const cutoff = this.now().getTime() - this.ttlMs;
    let removed = 0;

    for (const [token, review] of this.reviews) {
      if (review.status === 'publishing') continue;
      if (review.createdAt.getTime() < cutoff) {
        this.reviews.delete(token);
        removed++;
      }
    }

    return removed;
  }

  get size(): number {
    return this.reviews.size;
  }

  private require(token: string): PendingReview {
    const review = this.reviews.get(token);
    if (!review) {
      throw new ReviewNotFoundError(token);
    }
    return review;
  }

  // The decision already stands; a failed message edit is only logged.
  private async resolve(review: PendingReview, text: string): Promise<void> {
    try {
      await this.notifier.resolvePreview(review, text);
    } catch (error) {
      console.error(`[Review] Could not update preview ${review.token}:`, error);
    }
  }
}
