import type { AudienceFilters, ContextualTemplateConfig, ScheduleConfig } from '../../src/types/notification';
import type { Client, Employee, Job, Subject, SubjectGroup, User } from '../../src/validators/entities';
import type { ConnectorConfig } from '../../src/services/scheduleStore';

export const T0 = new Date('2025-03-10T12:00:00.000Z');

export const HOUR = 60 * 60 * 1000;
export const DAY = 24 * HOUR;

export const at = (offsetMs: number): Date => new Date(T0.getTime() + offsetMs);

export const NO_FILTERS: AudienceFilters = {
  employees: false,
  clientsPersons: false,
  clientsSchools: false,
  clientsCommercialOthers: false,
  subjectsBooked: false,
  subjectsNotBooked: false,
  subjectsParentsBooked: false,
  subjectsParentsNotBooked: false,
};

export function makeUser(id: string, overrides: Partial<User> = {}): User {
  return {
    id,
    firstName: `First${id}`,
    lastName: `Last${id}`,
    email: `${id}@example.test`,
    phoneNumber: `+1555000${id.replace(/\D/g, '').padStart(4, '0')}`,
    chatUser: `@${id}`,
    ...overrides,
  };
}

export function makeJob(id: string, overrides: Partial<Job> = {}): Job {
  return {
    id,
    name: `Job ${id}`,
    startTime: at(DAY),
    endTime: at(DAY + 4 * HOUR),
    location: 'Main Studio',
    ...overrides,
  };
}

export function makeSubjectGroup(id: string, overrides: Partial<SubjectGroup> = {}): SubjectGroup {
  return {
    id,
    name: `Group ${id}`,
    startTime: at(-DAY),
    endTime: at(7 * DAY),
    photosAvailable: false,
    client: null,
    ...overrides,
  };
}

export function makeEmployee(id: string, user: User | null): Employee {
  return { id, title: 'Photographer', user };
}

export function makeClient(id: string, category: Client['category'], user: User | null = null): Client {
  return { id, name: `Client ${id}`, category, user };
}

export function makeSubject(id: string, user: User | null = null): Subject {
  return { id, firstName: `Subject${id}`, lastName: 'Doe', user };
}

export function makeSchedule(overrides: Partial<ScheduleConfig> = {}): ScheduleConfig {
  return {
    id: 'schedule-1',
    name: 'Reminder',
    active: true,
    recurring: false,
    recurrenceUnit: 'days',
    recurrenceCount: 1,
    triggerType: 'job',
    startTrigger: 'before_job_start',
    endTrigger: null,
    endAt: null,
    lastSentAt: null,
    filters: NO_FILTERS,
    contextualTemplateId: 'contextual-1',
    emailConnectorId: 'email-1',
    smsConnectorId: null,
    chatConnectorId: null,
    chatRoom: null,
    chatUsers: false,
    ...overrides,
  };
}

export function makeContextualTemplate(overrides: Partial<ContextualTemplateConfig> = {}): ContextualTemplateConfig {
  return {
    id: 'contextual-1',
    template: { id: 'template-1', name: 'Job reminder', path: null, body: 'Hi {{first_name}}', html: false },
    context: { first_name: '@User.first_name' },
    ...overrides,
  };
}

export function makeConnector(id: string, overrides: Partial<ConnectorConfig> = {}): ConnectorConfig {
  return {
    id,
    name: `Connector ${id}`,
    channel: 'EMAIL',
    provider: 'smtp',
    isActive: true,
    credentials: {},
    ...overrides,
  };
}
