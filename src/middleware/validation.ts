import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ZodSchema } from 'zod';

export function validationDetails(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

export function validate(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      res.status(400).json({
        error: 'Validation failed',
        details: validationDetails(result.error),
      });
      return;
    }

    req.body = result.data;
    next();
  };
}

// Slack slash command, form-encoded
export const slashCommandSchema = z.object({
  command: z.string().optional(),
  text: z.string().default(''),
  user_id: z.string().min(1, 'user_id is required'),
  user_name: z.string().optional(),
  channel_id: z.string().min(1, 'channel_id is required'),
  response_url: z.string().url().optional(),
});

export type SlashCommand = z.infer<typeof slashCommandSchema>;

// The JSON inside the `payload` field of a block_actions request
export const blockActionPayloadSchema = z.object({
  type: z.literal('block_actions'),
  user: z.object({
    id: z.string().min(1),
    name: z.string().optional(),
    username: z.string().optional(),
  }),
  actions: z
    .array(
      z.object({
        action_id: z.string().min(1),
        value: z.string().min(1),
      })
    )
    .min(1, 'No action provided'),
  response_url: z.string().url().optional(),
});

export type BlockActionPayload = z.infer<typeof blockActionPayloadSchema>;
