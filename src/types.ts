export type ImageRef =
  | { kind: 'url'; url: string }
  | { kind: 'bytes'; data: Buffer; filename: string };

export interface Quote {
  text: string;
  author: string;
}

export interface Content {
  quote: Quote;
  caption: string;
  image: ImageRef;
  /** Prompt the image was generated from */
  imagePrompt: string;
}

export interface ContentProvider {
  fetch(): Promise<Content>;
}

export interface PublishAck {
  channel: string;
  messageTs: string;
}

export interface Publisher {
  publish(destination: string, image: ImageRef, caption: string): Promise<PublishAck>;
}

export type ReviewStatus = 'pending' | 'publishing' | 'published' | 'rejected';

export interface ReviewMessageRef {
  channel: string;
  messageTs: string;
}

export interface PendingReview {
  token: string;
  destination: string;
  image: ImageRef;
  caption: string;
  /** Channel the preview was requested from and is shown in */
  reviewerChannel: string;
  status: ReviewStatus;
  reviewMessage: ReviewMessageRef | null;
  actionedBy: string | null;
  createdAt: Date;
}

/** Delivers previews to a reviewer and resolves them once actioned. */
export interface ReviewNotifier {
  sendPreview(review: PendingReview): Promise<ReviewMessageRef>;
  resolvePreview(review: PendingReview, text: string): Promise<void>;
}

export interface ActivityEntry {
  level: 'info' | 'error';
  event: string;
  destination?: string;
  message: string;
}

export interface ActivityRecord {
  id: string;
  level: 'info' | 'error';
  event: string;
  destination: string | null;
  message: string;
  created_at: string;
}

export interface LLMResponse {
  content: string;
  provider: string;
  model: string;
}
