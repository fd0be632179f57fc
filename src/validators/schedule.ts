import { z } from 'zod';
import { END_TRIGGERS, RECURRENCE_UNITS, START_TRIGGERS, TRIGGER_TYPES } from '../types/notification';

const objectId = z.string().regex(/^[0-9a-fA-F]{24}$/, 'Must be a 24-character hex id');

const scheduleFields = {
  name: z.string().min(1).max(256),
  active: z.boolean(),
  recurring: z.boolean(),
  recurrenceUnit: z.enum(RECURRENCE_UNITS),
  recurrenceCount: z.number().int().min(1).max(1000),
  triggerType: z.enum(TRIGGER_TYPES),
  startTrigger: z.enum(START_TRIGGERS),
  endTrigger: z.enum(END_TRIGGERS).nullable(),
  endAt: z.coerce.date().nullable(),

  employees: z.boolean(),
  clientsPersons: z.boolean(),
  clientsSchools: z.boolean(),
  clientsCommercialOthers: z.boolean(),
  subjectsBooked: z.boolean(),
  subjectsNotBooked: z.boolean(),
  subjectsParentsBooked: z.boolean(),
  subjectsParentsNotBooked: z.boolean(),

  allSubjectGroups: z.boolean(),
  subjectGroupIds: z.array(z.string().min(1)),

  contextualTemplateId: objectId,
  emailConnectorId: objectId.nullable(),
  smsConnectorId: objectId.nullable(),
  chatConnectorId: objectId.nullable(),
  chatRoom: z.string().min(1).nullable(),
  chatUsers: z.boolean(),
};

export const createScheduleSchema = z
  .object(scheduleFields)
  .partial()
  .required({ name: true, triggerType: true, startTrigger: true, contextualTemplateId: true })
  .strict();

// lastSentAt is written only by the dispatcher
export const updateScheduleSchema = z.object(scheduleFields).partial().strict();

export const dispatchRequestSchema = z.object({
  root: z.object({
    kind: z.enum(TRIGGER_TYPES),
    id: z.string().min(1),
  }),
});

export type CreateScheduleInput = z.infer<typeof createScheduleSchema>;
export type UpdateScheduleInput = z.infer<typeof updateScheduleSchema>;
export type DispatchRequest = z.infer<typeof dispatchRequestSchema>;
