import mongoose, { Schema, Document } from 'mongoose';

export interface INotificationTemplate extends Document {
  name: string;
  /** File under the templates directory, e.g. `job/reminder.hbs`. */
  path?: string | null;
  /** Inline Handlebars body, used when no path is set. */
  body?: string | null;
  html: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const NotificationTemplateSchema = new Schema<INotificationTemplate>(
  {
    name: { type: String, required: true, unique: true, trim: true },
    path: { type: String, default: null },
    body: { type: String, default: null },
    html: { type: Boolean, default: true },
  },
  { timestamps: true }
);

export const NotificationTemplate = mongoose.model<INotificationTemplate>(
  'NotificationTemplate',
  NotificationTemplateSchema
);
