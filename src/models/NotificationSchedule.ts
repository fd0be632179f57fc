import mongoose, { Schema, Document, Types } from 'mongoose';
import {
  END_TRIGGERS,
  RECURRENCE_UNITS,
  START_TRIGGERS,
  TRIGGER_TYPES,
  EndTrigger,
  RecurrenceUnit,
  StartTrigger,
  TriggerType,
} from '../types/notification';

export interface INotificationSchedule extends Document {
  name: string;
  active: boolean;
  recurring: boolean;
  recurrenceUnit: RecurrenceUnit;
  recurrenceCount: number;
  triggerType: TriggerType;
  startTrigger: StartTrigger;
  endTrigger?: EndTrigger | null;
  endAt?: Date | null;
  lastSentAt?: Date | null;

  // Audience filters
  employees: boolean;
  clientsPersons: boolean;
  clientsSchools: boolean;
  clientsCommercialOthers: boolean;
  subjectsBooked: boolean;
  subjectsNotBooked: boolean;
  subjectsParentsBooked: boolean;
  subjectsParentsNotBooked: boolean;

  // Scope used by event routing and the recurrence sweep
  allSubjectGroups: boolean;
  subjectGroupIds: string[];

  contextualTemplateId: Types.ObjectId;
  emailConnectorId?: Types.ObjectId | null;
  smsConnectorId?: Types.ObjectId | null;
  chatConnectorId?: Types.ObjectId | null;
  chatRoom?: string | null;
  chatUsers: boolean;

  createdAt: Date;
  updatedAt: Date;
}

const NotificationScheduleSchema = new Schema<INotificationSchedule>(
  {
    name: { type: String, required: true, unique: true, trim: true },
    active: { type: Boolean, default: true },
    recurring: { type: Boolean, default: false },
    recurrenceUnit: { type: String, enum: [...RECURRENCE_UNITS], default: 'days' },
    recurrenceCount: { type: Number, default: 1, min: 1, max: 1000 },
    triggerType: { type: String, enum: [...TRIGGER_TYPES], required: true },
    startTrigger: { type: String, enum: [...START_TRIGGERS], required: true },
    endTrigger: { type: String, enum: [...END_TRIGGERS, null], default: null },
    endAt: { type: Date, default: null },
    lastSentAt: { type: Date, default: null },

    employees: { type: Boolean, default: false },
    clientsPersons: { type: Boolean, default: false },
    clientsSchools: { type: Boolean, default: false },
    clientsCommercialOthers: { type: Boolean, default: false },
    subjectsBooked: { type: Boolean, default: false },
    subjectsNotBooked: { type: Boolean, default: false },
    subjectsParentsBooked: { type: Boolean, default: false },
    subjectsParentsNotBooked: { type: Boolean, default: false },

    allSubjectGroups: { type: Boolean, default: true },
    subjectGroupIds: { type: [String], default: [] },

    contextualTemplateId: { type: Schema.Types.ObjectId, ref: 'ContextualTemplate', required: true },
    emailConnectorId: { type: Schema.Types.ObjectId, ref: 'Connector', default: null },
    smsConnectorId: { type: Schema.Types.ObjectId, ref: 'Connector', default: null },
    chatConnectorId: { type: Schema.Types.ObjectId, ref: 'Connector', default: null },
    chatRoom: { type: String, default: null },
    chatUsers: { type: Boolean, default: false },
  },
  { timestamps: true }
);

// Event routing: active schedules of a trigger type
NotificationScheduleSchema.index({ active: 1, triggerType: 1, startTrigger: 1 });
// Recurrence sweep
NotificationScheduleSchema.index({ active: 1, recurring: 1, triggerType: 1 });

export const NotificationSchedule = mongoose.model<INotificationSchedule>(
  'NotificationSchedule',
  NotificationScheduleSchema
);
