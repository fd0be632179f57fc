import type { AudienceFilters, ContextBundle, RootEntity } from '../types/notification';
import type { Client, Job, Session, Subject, SubjectGroup, User } from '../validators/entities';
import type { RelationshipProvider } from './relationshipProvider';

const BUNDLE_SLOTS = ['job', 'subjectGroup', 'session', 'employee', 'client', 'subject'] as const;

/**
 * Structural identity of a bundle: the id held in every slot.
 */
export function bundleKey(bundle: ContextBundle): string {
  const parts = [`recipient:${bundle.recipient.id}`];
  for (const slot of BUNDLE_SLOTS) {
    parts.push(`${slot}:${bundle[slot]?.id ?? ''}`);
  }
  return parts.join('|');
}

type Related = Omit<ContextBundle, 'recipient'>;

class AudienceAccumulator {
  private readonly bundles = new Map<string, ContextBundle>();

  add(recipient: User, related: Related): void {
    const bundle: ContextBundle = { recipient, ...related };
    const key = bundleKey(bundle);
    if (!this.bundles.has(key)) this.bundles.set(key, bundle);
  }

  toArray(): readonly ContextBundle[] {
    return Object.freeze([...this.bundles.values()]);
  }
}

function wantsClients(f: AudienceFilters): boolean {
  return f.clientsPersons || f.clientsSchools || f.clientsCommercialOthers;
}

function wantsSubjects(f: AudienceFilters): boolean {
  return f.subjectsBooked || f.subjectsParentsBooked || f.subjectsNotBooked || f.subjectsParentsNotBooked;
}

class AudienceWalk {
  private readonly out = new AudienceAccumulator();

  constructor(
    private readonly provider: RelationshipProvider,
    private readonly filters: AudienceFilters
  ) {}

  result(): readonly ContextBundle[] {
    return this.out.toArray();
  }

  async employees(job: Job, subjectGroup?: SubjectGroup): Promise<void> {
    if (!this.filters.employees) return;
    for (const employee of await this.provider.employeesOfJob(job)) {
      if (employee.user) this.out.add(employee.user, { job, employee, subjectGroup });
    }
  }

  async client(client: Client, related: Related): Promise<void> {
    const f = this.filters;
    if (f.clientsPersons && client.category === 'Person') {
      if (client.user) this.out.add(client.user, { ...related, client });
      return;
    }
    const organisation =
      (f.clientsSchools && client.category === 'School') ||
      (f.clientsCommercialOthers && (client.category === 'Commercial' || client.category === 'Other'));
    if (!organisation) return;

    for (const contact of await this.provider.contactsOfClient(client)) {
      this.out.add(contact, { ...related, client });
    }
  }

  async jobClients(job: Job, subjectGroup?: SubjectGroup): Promise<void> {
    if (!wantsClients(this.filters)) return;
    for (const client of await this.provider.clientsOfJob(job)) {
      await this.client(client, { job, subjectGroup });
    }
  }

  /**
   * Emit the subject and/or its parents depending on whether a session is booked.
   * Booked filters need a job, so a missing job only ever takes the unbooked path.
   */
  async subject(subject: Subject, subjectGroup: SubjectGroup, job?: Job, session?: Session | null): Promise<void> {
    const f = this.filters;
    const booked = session != null;
    const toSubject = booked ? f.subjectsBooked : f.subjectsNotBooked;
    const toParents = booked ? f.subjectsParentsBooked : f.subjectsParentsNotBooked;
    const related: Related = session != null
      ? { subject, session, job, subjectGroup }
      : { subject, job, subjectGroup };

    if (toSubject && subject.user) this.out.add(subject.user, related);
    if (toParents) {
      for (const parent of await this.provider.parentsOfSubject(subject)) {
        this.out.add(parent, related);
      }
    }
  }

  async jobSubjects(job: Job): Promise<void> {
    if (!wantsSubjects(this.filters)) return;
    for (const subjectGroup of await this.provider.subjectGroupsOfJob(job)) {
      for (const subject of await this.provider.subjectsOfSubjectGroup(subjectGroup)) {
        await this.subject(subject, subjectGroup, job, await this.provider.bookedSession(job, subject));
      }
    }
  }

  async subjectGroupSubjects(subjectGroup: SubjectGroup, jobs: Job[]): Promise<void> {
    if (!wantsSubjects(this.filters)) return;
    for (const subject of await this.provider.subjectsOfSubjectGroup(subjectGroup)) {
      if (jobs.length === 0) {
        await this.subject(subject, subjectGroup);
        continue;
      }
      for (const job of jobs) {
        await this.subject(subject, subjectGroup, job, await this.provider.bookedSession(job, subject));
      }
    }
  }
}

/**
 * Walk the relationship graph around `root` and return one bundle per
 * (recipient, related entities) combination the schedule's filters select,
 * deduplicated structurally, in order of first emission.
 */
export async function resolveAudience(
  provider: RelationshipProvider,
  filters: AudienceFilters,
  root: RootEntity
): Promise<readonly ContextBundle[]> {
  const walk = new AudienceWalk(provider, filters);

  if (root.kind === 'job') {
    const { job } = root;
    await walk.employees(job);
    await walk.jobClients(job);
    await walk.jobSubjects(job);
    return walk.result();
  }

  const { subjectGroup } = root;
  const jobs = await provider.jobsOfSubjectGroup(subjectGroup);
  for (const job of jobs) {
    await walk.employees(job, subjectGroup);
    await walk.jobClients(job, subjectGroup);
  }
  if (subjectGroup.client && wantsClients(filters)) {
    await walk.client(subjectGroup.client, { subjectGroup });
  }
  await walk.subjectGroupSubjects(subjectGroup, jobs);
  return walk.result();
}
