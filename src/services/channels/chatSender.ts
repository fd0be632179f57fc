import axios from 'axios';
import { z } from 'zod';
import { ChannelError } from '../../utils/errors';
import type { ConnectorConfig } from '../scheduleStore';
import type { ChannelSender } from './types';

const SLACK_POST_MESSAGE_URL = 'https://slack.com/api/chat.postMessage';

const slackConfigSchema = z.object({
  token: z.string().min(1),
});

const slackResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

/**
 * Slack delivery. `to` is either a room (`#general`, `C0123`) or a member id,
 * which Slack turns into a direct message.
 */
export class ChatSender implements ChannelSender {
  readonly channel = 'CHAT' as const;

  constructor(private readonly connector: ConnectorConfig) {}

  get connectorId(): string {
    return this.connector.id;
  }

  async send(to: string, message: string): Promise<void> {
    const parsed = slackConfigSchema.safeParse(this.connector.credentials);
    if (!parsed.success) {
      throw new ChannelError('CHAT', `${this.connector.name} has no Slack token`);
    }

    let body: z.infer<typeof slackResponseSchema>;
    try {
      const res = await axios.post<unknown>(
        SLACK_POST_MESSAGE_URL,
        { channel: to, text: message },
        {
          headers: {
            Authorization: `Bearer ${parsed.data.token}`,
            'Content-Type': 'application/json; charset=utf-8',
          },
        }
      );
      body = slackResponseSchema.parse(res.data);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ChannelError('CHAT', `${this.connector.name} failed to reach Slack: ${reason}`);
    }

    // Slack reports failures with HTTP 200 and ok=false
    if (!body.ok) {
      throw new ChannelError('CHAT', `${this.connector.name} failed to post to ${to}: ${body.error ?? 'unknown error'}`);
    }
    console.log(`[Chat] Posted to ${to}`);
  }
}
