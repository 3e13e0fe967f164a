import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { ValidationError } from '../errors/mailbox.errors';
import type { MailboxService } from '../services/email/mailbox.service';

const queryFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')
  .optional();

const optionalText = z
  .string()
  .trim()
  .transform((value) => value || undefined)
  .optional();

const listQuerySchema = z.object({
  folder: z.string().trim().min(1).optional(),
  count: z.coerce.number().optional(),
});

const searchQuerySchema = listQuerySchema.extend({
  query: optionalText,
  subject: optionalText,
  from: optionalText,
  hasAttachments: queryFlag,
  unreadOnly: queryFlag,
});

function parseQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.infer<T> {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid query parameter '${issue?.path.join('.') ?? ''}': ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

export class EmailController {
  constructor(private readonly mailbox: MailboxService) {}

  /**
   * List recent emails in a folder
   */
  async list(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { folder, count } = parseQuery(listQuerySchema, req.query);
      const result = await this.mailbox.listEmails(folder, count);
      res.json({ count: result.emails.length, emails: result.emails, text: result.text });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Search emails with progressive fallback
   */
  async search(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const input = parseQuery(searchQuerySchema, req.query);
      const result = await this.mailbox.searchEmails(input);
      res.json({
        strategy: result.strategy,
        count: result.emails.length,
        emails: result.emails,
        text: result.text,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Read one email by Graph message ID
   */
  async read(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.mailbox.readEmail(req.params.id ?? '');
      res.json({ email: result.email, text: result.text });
    } catch (error) {
      next(error);
    }
  }
}
