import mongoose, { Schema, Document, Types } from 'mongoose';
import { CHANNELS, ChannelKind } from '../types/notification';

/**
 * Audit record of one successful delivery. Written once, never updated.
 */
export interface INotification extends Document {
  dispatchId:           string;
  contextualTemplateId: Types.ObjectId;
  scheduleId?:          Types.ObjectId | null;
  recipientId?:         string | null;
  connectorId:          Types.ObjectId;
  channel:              ChannelKind;
  address:              string;
  subject?:             string | null;
  sentAt:               Date;
  createdAt:            Date;
}

const NotificationSchema = new Schema<INotification>(
  {
    dispatchId:           { type: String, required: true },
    contextualTemplateId: { type: Schema.Types.ObjectId, ref: 'ContextualTemplate', required: true },
    scheduleId:           { type: Schema.Types.ObjectId, ref: 'NotificationSchedule', default: null },
    recipientId:          { type: String, default: null },
    connectorId:          { type: Schema.Types.ObjectId, ref: 'Connector', required: true },
    channel:              { type: String, enum: [...CHANNELS], required: true },
    address:              { type: String, required: true },
    subject:              { type: String, default: null },
    sentAt:               { type: Date, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

// ── Indexes ──────────────────────────────────────────────────────────────────

// Upsert key: a re-run of the same dispatch never records a delivery twice
NotificationSchema.index(
  { dispatchId: 1, channel: 1, connectorId: 1, recipientId: 1, address: 1 },
  { unique: true }
);

// Schedule history
NotificationSchema.index({ scheduleId: 1, sentAt: -1 });

// Per-recipient history
NotificationSchema.index({ recipientId: 1, sentAt: -1 });

export const Notification = mongoose.model<INotification>('Notification', NotificationSchema);
