import type { IncomingMessage, ServerResponse } from 'http';
import type { Request, Response, NextFunction } from 'express';
import { verifySlackSignature } from '../integrations/slack.js';

// Raw request bytes, keyed by request, for signature checks.
const rawBodies = new WeakMap<IncomingMessage, string>();

/** `verify` hook for express.urlencoded. */
export function captureRawBody(req: IncomingMessage, _res: ServerResponse, buf: Buffer): void {
  rawBodies.set(req, buf.toString('utf8'));
}

export function verifySlackRequest(signingSecret: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const signature = req.get('x-slack-signature');
    const timestamp = req.get('x-slack-request-timestamp');

    if (!signature || !timestamp) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    const rawBody = rawBodies.get(req);
    if (rawBody === undefined) {
      res.status(401).json({ error: 'Missing raw body for verification' });
      return;
    }

    if (!verifySlackSignature(signature, timestamp, rawBody, signingSecret)) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    next();
  };
}
