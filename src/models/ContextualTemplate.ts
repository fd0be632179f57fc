import mongoose, { Schema, Document, Types } from 'mongoose';

export interface IContextualTemplate extends Document {
  templateId: Types.ObjectId;
  /**
   * Output key -> field reference. `@Job.start_time` style references are read
   * from the recipient's bundle; anything without `@` is copied as-is.
   */
  context: Map<string, string>;
  createdAt: Date;
  updatedAt: Date;
}

const ContextualTemplateSchema = new Schema<IContextualTemplate>(
  {
    templateId: { type: Schema.Types.ObjectId, ref: 'NotificationTemplate', required: true },
    context: { type: Map, of: String, default: {} },
  },
  { timestamps: true }
);

export const ContextualTemplate = mongoose.model<IContextualTemplate>(
  'ContextualTemplate',
  ContextualTemplateSchema
);
