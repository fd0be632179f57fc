import { readFile } from 'fs/promises';
import nodemailer from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import { z } from 'zod';
import { config } from '../../config';
import { ChannelError } from '../../utils/errors';
import type { ConnectorConfig } from '../scheduleStore';
import type { ChannelSender, MessageMetadata } from './types';

export const smtpConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive().default(587),
  secure: z.boolean().default(false),
  auth: z
    .object({
      user: z.string(),
      pass: z.string(),
    })
    .optional(),
  fromName: z.string().optional(),
  fromEmail: z.string().optional(),
});

export type SmtpConfig = z.infer<typeof smtpConfigSchema>;

export const LOGO_CID = 'email_logo.png';

// Cache transports per connector to avoid re-creating on every send
const transportCache = new Map<string, { transport: nodemailer.Transporter; from: string; cachedAt: number }>();
const CACHE_TTL = 5 * 60 * 1000; // 5 minutes

export function invalidateTransport(connectorId: string): void {
  transportCache.get(connectorId)?.transport.close();
  transportCache.delete(connectorId);
}

function getTransport(connector: ConnectorConfig): { transport: nodemailer.Transporter; from: string } {
  const cached = transportCache.get(connector.id);
  if (cached && Date.now() - cached.cachedAt < CACHE_TTL) {
    return { transport: cached.transport, from: cached.from };
  }

  const parsed = smtpConfigSchema.safeParse(connector.credentials);
  if (!parsed.success) {
    throw new ChannelError('EMAIL', `${connector.name} has invalid SMTP credentials: ${parsed.error.message}`);
  }
  const smtp = parsed.data;

  const transport = nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    auth: smtp.auth,
  });

  const address = smtp.fromEmail || smtp.auth?.user || '';
  const from = smtp.fromName ? `"${smtp.fromName}" <${address}>` : address;

  transportCache.set(connector.id, { transport, from, cachedAt: Date.now() });
  return { transport, from };
}

let logoPromise: Promise<Buffer | null> | null = null;

/**
 * Logo embedded in HTML emails as cid:email_logo.png. Read once per process.
 */
export function loadLogo(logoPath: string = config.email.logoPath): Promise<Buffer | null> {
  if (!logoPath) return Promise.resolve(null);
  if (!logoPromise) {
    logoPromise = readFile(logoPath).catch((err: Error) => {
      console.warn(`[Email] Logo ${logoPath} could not be read: ${err.message}`);
      return null;
    });
  }
  return logoPromise;
}

export class EmailSender implements ChannelSender {
  readonly channel = 'EMAIL' as const;

  constructor(private readonly connector: ConnectorConfig) {}

  get connectorId(): string {
    return this.connector.id;
  }

  async send(to: string, message: string, metadata: MessageMetadata = {}): Promise<void> {
    const { transport, from } = getTransport(this.connector);
    const html = metadata.html ?? true;

    const attachments: Mail.Attachment[] = (metadata.attachments ?? []).map((a) => ({
      filename: a.filename,
      content: a.content,
      contentType: a.contentType,
    }));
    if (html) {
      const logo = await loadLogo();
      if (logo) attachments.push({ filename: 'logo.png', content: logo, cid: LOGO_CID });
    }

    try {
      await transport.sendMail({
        from,
        to,
        subject: metadata.subject ?? '',
        ...(html ? { html: message } : { text: message }),
        attachments,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ChannelError('EMAIL', `${this.connector.name} failed to send email to ${to}: ${reason}`);
    }
    console.log(`[Email] Sent "${metadata.subject ?? ''}" to ${to}`);
  }
}
