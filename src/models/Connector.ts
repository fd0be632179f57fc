import mongoose, { Schema, Document } from 'mongoose';
import { CHANNELS, ChannelKind } from '../types/notification';

export const CONNECTOR_PROVIDERS = ['smtp', 'twilio', 'vonage', 'custom', 'slack'] as const;
export type ConnectorProvider = (typeof CONNECTOR_PROVIDERS)[number];

export interface IConnector extends Document {
  name: string;
  channel: ChannelKind;
  provider: ConnectorProvider;
  config: string; // encrypted at rest, see utils/crypto
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const ConnectorSchema = new Schema<IConnector>(
  {
    name: { type: String, required: true, unique: true, trim: true },
    channel: { type: String, enum: [...CHANNELS], required: true },
    provider: { type: String, enum: [...CONNECTOR_PROVIDERS], required: true },
    config: { type: String, required: true },
    isActive: { type: Boolean, default: true },
  },
  { timestamps: true }
);

ConnectorSchema.index({ channel: 1, isActive: 1 });

export const Connector = mongoose.model<IConnector>('Connector', ConnectorSchema);
