import type { Client, Employee, Job, Session, Subject, SubjectGroup, User } from '../validators/entities';

export const TRIGGER_TYPES = ['job', 'subject_group'] as const;
export type TriggerType = (typeof TRIGGER_TYPES)[number];

export const JOB_START_TRIGGERS = [
  'before_job_start',
  'after_job_end',
  'after_job_saved',
  'after_job_location_changed',
] as const;

export const SUBJECT_GROUP_START_TRIGGERS = [
  'after_photos_available',
  'after_subject_group_start',
  'after_subject_group_end',
] as const;

export const START_TRIGGERS = [...JOB_START_TRIGGERS, ...SUBJECT_GROUP_START_TRIGGERS] as const;
export type StartTrigger = (typeof START_TRIGGERS)[number];

export const END_TRIGGERS = ['until_job_start', 'until_subject_group_end'] as const;
export type EndTrigger = (typeof END_TRIGGERS)[number];

export const RECURRENCE_UNITS = ['seconds', 'minutes', 'hours', 'days', 'weeks'] as const;
export type RecurrenceUnit = (typeof RECURRENCE_UNITS)[number];

export const CHANNELS = ['EMAIL', 'SMS', 'CHAT'] as const;
export type ChannelKind = (typeof CHANNELS)[number];

export interface AudienceFilters {
  employees: boolean;
  clientsPersons: boolean;
  clientsSchools: boolean;
  clientsCommercialOthers: boolean;
  subjectsBooked: boolean;
  subjectsNotBooked: boolean;
  subjectsParentsBooked: boolean;
  subjectsParentsNotBooked: boolean;
}

/**
 * Engine view of a schedule, detached from its mongoose document.
 */
export interface ScheduleConfig {
  id: string;
  name: string;
  active: boolean;
  recurring: boolean;
  recurrenceUnit: RecurrenceUnit;
  recurrenceCount: number;
  triggerType: TriggerType;
  startTrigger: StartTrigger;
  endTrigger: EndTrigger | null;
  endAt: Date | null;
  lastSentAt: Date | null;
  filters: AudienceFilters;
  contextualTemplateId: string;
  emailConnectorId: string | null;
  smsConnectorId: string | null;
  chatConnectorId: string | null;
  chatRoom: string | null;
  chatUsers: boolean;
}

export type RootEntity =
  | { kind: 'job'; job: Job }
  | { kind: 'subject_group'; subjectGroup: SubjectGroup };

export type RootRef = { kind: TriggerType; id: string };

/** One recipient plus the related entities their message is rendered against. */
export interface ContextBundle {
  readonly recipient: User;
  readonly job?: Job;
  readonly subjectGroup?: SubjectGroup;
  readonly session?: Session;
  readonly employee?: Employee;
  readonly client?: Client;
  readonly subject?: Subject;
}

export interface WindowDecision {
  eligible: boolean;
  shouldDeactivate: boolean;
  reason: string;
}

export interface TemplateRef {
  id: string;
  name: string;
  path: string | null;
  body: string | null;
  html: boolean;
}

export interface ContextualTemplateConfig {
  id: string;
  template: TemplateRef;
  context: Record<string, string>;
}

export interface ChannelSummary {
  channel: ChannelKind;
  attempted: number;
  sent: number;
}

export type DispatchStatus = 'skipped' | 'empty' | 'inert' | 'dispatched';
