import type { ChannelFactory, ChannelSender, MessageMetadata } from '../../src/services/channels';
import type { ConnectorConfig } from '../../src/services/scheduleStore';
import type { ChannelKind } from '../../src/types/notification';
import { ChannelError } from '../../src/utils/errors';

export interface SentMessage {
  channel: ChannelKind;
  connectorId: string;
  to: string;
  message: string;
  metadata?: MessageMetadata;
}

/**
 * Channel factory whose senders record every message instead of delivering it.
 * Addresses listed in `failFor` are rejected; those in `failOnceFor` only on their first send.
 */
export class RecordingChannels {
  readonly sent: SentMessage[] = [];
  readonly failFor = new Set<string>();
  readonly failOnceFor = new Set<string>();
  /** Channels whose factory call throws. */
  readonly unavailable = new Set<ChannelKind>();
  delayMs = 0;

  readonly factory: ChannelFactory = (connector: ConnectorConfig): ChannelSender => {
    if (this.unavailable.has(connector.channel)) {
      throw new ChannelError(connector.channel, `${connector.name} is unreachable`);
    }
    return {
      channel: connector.channel,
      connectorId: connector.id,
      send: async (to: string, message: string, metadata?: MessageMetadata): Promise<void> => {
        if (this.delayMs > 0) await new Promise<void>((resolve) => setTimeout(resolve, this.delayMs));
        if (this.failOnceFor.delete(to) || this.failFor.has(to)) {
          throw new ChannelError(connector.channel, `${connector.name} rejected ${to}`);
        }
        this.sent.push({ channel: connector.channel, connectorId: connector.id, to, message, metadata });
      },
    };
  };

  to(channel: ChannelKind): string[] {
    return this.sent.filter((m) => m.channel === channel).map((m) => m.to);
  }
}
