import type { ConnectorConfig } from '../scheduleStore';
import { ChannelError } from '../../utils/errors';
import { ChatSender } from './chatSender';
import { EmailSender } from './emailSender';
import { SmsSender } from './smsSender';
import type { ChannelSender } from './types';

export type { ChannelSender, MessageMetadata, EmailAttachment } from './types';

export type ChannelFactory = (connector: ConnectorConfig) => ChannelSender;

export const createChannelSender: ChannelFactory = (connector) => {
  switch (connector.channel) {
    case 'EMAIL':
      if (connector.provider !== 'smtp') break;
      return new EmailSender(connector);
    case 'SMS':
      if (connector.provider !== 'twilio' && connector.provider !== 'vonage' && connector.provider !== 'custom') break;
      return new SmsSender(connector);
    case 'CHAT':
      if (connector.provider !== 'slack') break;
      return new ChatSender(connector);
  }
  throw new ChannelError(connector.channel, `${connector.name}: provider ${connector.provider} cannot serve ${connector.channel}`);
};
