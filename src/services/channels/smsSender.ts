import axios from 'axios';
import { z } from 'zod';
import { ChannelError } from '../../utils/errors';
import type { ConnectorConfig } from '../scheduleStore';
import type { ChannelSender } from './types';

const twilioConfigSchema = z.object({
  accountSid: z.string().min(1),
  authToken: z.string().min(1),
  fromNumber: z.string().min(1),
});

const vonageConfigSchema = z.object({
  apiKey: z.string().min(1),
  apiSecret: z.string().min(1),
  fromNumber: z.string().min(1),
});

const customWebhookConfigSchema = z.object({
  webhookUrl: z.string().url(),
  headers: z.record(z.string()).optional(),
  method: z.enum(['POST', 'PUT']).optional(),
});

type TwilioConfig = z.infer<typeof twilioConfigSchema>;
type VonageConfig = z.infer<typeof vonageConfigSchema>;
type CustomWebhookConfig = z.infer<typeof customWebhookConfigSchema>;

const vonageResponseSchema = z.object({
  messages: z.array(
    z.object({
      status: z.string(),
      'error-text': z.string().optional(),
    })
  ),
});

async function sendViaTwilio(config: TwilioConfig, to: string, body: string): Promise<void> {
  const url = `https://api.twilio.com/2010-04-01/Accounts/${config.accountSid}/Messages.json`;
  await axios.post(
    url,
    new URLSearchParams({ To: to, From: config.fromNumber, Body: body }).toString(),
    {
      auth: { username: config.accountSid, password: config.authToken },
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    }
  );
}

async function sendViaVonage(config: VonageConfig, to: string, body: string): Promise<void> {
  const res = await axios.post<unknown>('https://rest.nexmo.com/sms/json', {
    api_key: config.apiKey,
    api_secret: config.apiSecret,
    from: config.fromNumber,
    to,
    text: body,
  });

  // Vonage answers 200 even when a message is rejected
  const rejected = vonageResponseSchema.parse(res.data).messages.find((m) => m.status !== '0');
  if (rejected) {
    throw new Error(rejected['error-text'] || `Vonage status ${rejected.status}`);
  }
}

async function sendViaCustomWebhook(config: CustomWebhookConfig, to: string, body: string): Promise<void> {
  const method = config.method || 'POST';
  await axios({
    method,
    url: config.webhookUrl,
    headers: {
      'Content-Type': 'application/json',
      ...config.headers,
    },
    data: { to, body },
  });
}

function describe(err: unknown): string {
  if (axios.isAxiosError(err) && err.response) {
    return `HTTP ${err.response.status}`;
  }
  return err instanceof Error ? err.message : String(err);
}

export class SmsSender implements ChannelSender {
  readonly channel = 'SMS' as const;

  constructor(private readonly connector: ConnectorConfig) {}

  get connectorId(): string {
    return this.connector.id;
  }

  private parse<T>(schema: z.ZodType<T>): T {
    const parsed = schema.safeParse(this.connector.credentials);
    if (!parsed.success) {
      throw new ChannelError('SMS', `${this.connector.name} has invalid ${this.connector.provider} credentials`);
    }
    return parsed.data;
  }

  async send(to: string, message: string): Promise<void> {
    const { provider } = this.connector;
    try {
      switch (provider) {
        case 'twilio':
          await sendViaTwilio(this.parse(twilioConfigSchema), to, message);
          break;
        case 'vonage':
          await sendViaVonage(this.parse(vonageConfigSchema), to, message);
          break;
        case 'custom':
          await sendViaCustomWebhook(this.parse(customWebhookConfigSchema), to, message);
          break;
        default:
          throw new ChannelError('SMS', `Unsupported SMS provider: ${provider}`);
      }
    } catch (err) {
      if (err instanceof ChannelError) throw err;
      throw new ChannelError('SMS', `${this.connector.name} failed to SMS ${to}: ${describe(err)}`);
    }
    console.log(`[SMS] Sent to ${to} via ${provider}`);
  }
}
