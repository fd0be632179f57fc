import type { Client, Employee, Job, Session, Subject, SubjectGroup, User } from '../validators/entities';
import type { ContextBundle } from '../types/notification';
import { ResolutionError } from '../utils/errors';

interface EntityMap {
  User: User;
  SubjectGroup: SubjectGroup;
  Job: Job;
  Session: Session;
  Employee: Employee;
  Client: Client;
  Subject: Subject;
}

export type EntityKind = keyof EntityMap;

type AccessorTable = { [K in EntityKind]: Record<string, (entity: EntityMap[K]) => unknown> };

const fullName = (e: { firstName: string; lastName: string }) => `${e.firstName} ${e.lastName}`.trim();

/**
 * Fields a template may reference, per entity kind. Keys are the names used in
 * `@Kind.field` references.
 */
const ACCESSORS: AccessorTable = {
  User: {
    id: (u) => u.id,
    first_name: (u) => u.firstName,
    last_name: (u) => u.lastName,
    full_name: fullName,
    email: (u) => u.email,
    phone_number: (u) => u.phoneNumber,
    chat_user: (u) => u.chatUser,
  },
  SubjectGroup: {
    id: (g) => g.id,
    name: (g) => g.name,
    start_time: (g) => g.startTime,
    end_time: (g) => g.endTime,
    photos_available: (g) => g.photosAvailable,
  },
  Job: {
    id: (j) => j.id,
    name: (j) => j.name,
    start_time: (j) => j.startTime,
    end_time: (j) => j.endTime,
    location: (j) => j.location,
  },
  Session: {
    id: (s) => s.id,
    start_time: (s) => s.startTime,
    end_time: (s) => s.endTime,
    location: (s) => s.location,
  },
  Employee: {
    id: (e) => e.id,
    title: (e) => e.title,
  },
  Client: {
    id: (c) => c.id,
    name: (c) => c.name,
    category: (c) => c.category,
  },
  Subject: {
    id: (s) => s.id,
    first_name: (s) => s.firstName,
    last_name: (s) => s.lastName,
    full_name: fullName,
  },
};

const SLOTS: { [K in EntityKind]: (bundle: ContextBundle) => EntityMap[K] | undefined } = {
  User: (b) => b.recipient,
  SubjectGroup: (b) => b.subjectGroup,
  Job: (b) => b.job,
  Session: (b) => b.session,
  Employee: (b) => b.employee,
  Client: (b) => b.client,
  Subject: (b) => b.subject,
};

const KIND_ALIASES: Record<string, EntityKind> = {
  GaiaUser: 'User',
};

function isEntityKind(value: string): value is EntityKind {
  return Object.prototype.hasOwnProperty.call(ACCESSORS, value);
}

export type CompiledReference =
  | { type: 'literal'; key: string; value: string }
  | { type: 'field'; key: string; reference: string; kind: EntityKind; field: string; read: (bundle: ContextBundle) => unknown }
  | { type: 'unresolved'; key: string; error: ResolutionError };

export type CompiledContext = readonly CompiledReference[];

function fieldReader<K extends EntityKind>(kind: K, field: string) {
  const accessor = ACCESSORS[kind][field];
  const slot = SLOTS[kind];
  return (bundle: ContextBundle): unknown => {
    const entity = slot(bundle);
    return entity ? accessor(entity) : undefined;
  };
}

export function compileReference(key: string, reference: string): CompiledReference {
  if (!reference.includes('@')) {
    return { type: 'literal', key, value: reference };
  }

  const body = reference.slice(reference.indexOf('@') + 1);
  const dot = body.indexOf('.');
  if (dot <= 0) {
    return { type: 'unresolved', key, error: new ResolutionError(reference, 'expected @Kind.field') };
  }

  const rawKind = body.slice(0, dot);
  const field = body.slice(dot + 1);
  const kind = KIND_ALIASES[rawKind] ?? rawKind;
  if (!isEntityKind(kind)) {
    return { type: 'unresolved', key, error: new ResolutionError(reference, `unknown entity kind "${rawKind}"`) };
  }
  if (!Object.prototype.hasOwnProperty.call(ACCESSORS[kind], field)) {
    return { type: 'unresolved', key, error: new ResolutionError(reference, `${kind} has no field "${field}"`) };
  }

  return { type: 'field', key, reference, kind, field, read: fieldReader(kind, field) };
}

/**
 * Parse every field reference of a contextual template once, ahead of rendering.
 */
export function compileContext(fields: Record<string, string>): CompiledContext {
  return Object.entries(fields).map(([key, reference]) => compileReference(key, reference));
}

export function resolutionErrors(compiled: CompiledContext): ResolutionError[] {
  const errors: ResolutionError[] = [];
  for (const entry of compiled) {
    if (entry.type === 'unresolved') errors.push(entry.error);
  }
  return errors;
}

/**
 * Resolve a compiled context against one bundle. Missing slots and
 * unresolvable references produce null.
 */
export function resolveContext(compiled: CompiledContext, bundle: ContextBundle): Record<string, unknown> {
  const context: Record<string, unknown> = {};
  for (const entry of compiled) {
    switch (entry.type) {
      case 'literal':
        context[entry.key] = entry.value;
        break;
      case 'field':
        context[entry.key] = entry.read(bundle) ?? null;
        break;
      case 'unresolved':
        context[entry.key] = null;
        break;
    }
  }
  return context;
}
