import type { ChannelKind } from '../../types/notification';

export interface EmailAttachment {
  filename: string;
  content: Buffer | string;
  contentType?: string;
}

export interface MessageMetadata {
  subject?: string;
  html?: boolean;
  /** Email only. */
  attachments?: EmailAttachment[];
}

/**
 * A configured delivery channel. `send` resolves on delivery and rejects with
 * a ChannelError otherwise.
 */
export interface ChannelSender {
  readonly channel: ChannelKind;
  readonly connectorId: string;
  send(to: string, message: string, metadata?: MessageMetadata): Promise<void>;
}
