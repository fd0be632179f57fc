import axios, { AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import { config } from '../config';
import {
  clientSchema,
  employeeSchema,
  jobSchema,
  sessionSchema,
  subjectGroupSchema,
  subjectSchema,
  userSchema,
} from '../validators/entities';
import type { Client, Employee, Job, Session, Subject, SubjectGroup, User } from '../validators/entities';
import type { RootEntity, RootRef } from '../types/notification';

/**
 * Read-only lookups over the studio's entity graph. The engine never writes
 * through this interface.
 */
export interface RelationshipProvider {
  findJob(id: string): Promise<Job | null>;
  findSubjectGroup(id: string): Promise<SubjectGroup | null>;
  employeesOfJob(job: Job): Promise<Employee[]>;
  clientsOfJob(job: Job): Promise<Client[]>;
  subjectGroupsOfJob(job: Job): Promise<SubjectGroup[]>;
  jobsOfSubjectGroup(subjectGroup: SubjectGroup): Promise<Job[]>;
  subjectsOfSubjectGroup(subjectGroup: SubjectGroup): Promise<Subject[]>;
  parentsOfSubject(subject: Subject): Promise<User[]>;
  contactsOfClient(client: Client): Promise<User[]>;
  /** The subject's booked session on the job, or null when not booked. */
  bookedSession(job: Job, subject: Subject): Promise<Session | null>;
}

/**
 * RelationshipProvider backed by the studio REST API.
 */
export class HttpRelationshipProvider implements RelationshipProvider {
  private readonly http: Pick<AxiosInstance, 'get'>;

  constructor(
    baseURL: string = config.entityApi.baseUrl,
    token: string = config.entityApi.token,
    http?: Pick<AxiosInstance, 'get'>
  ) {
    this.http =
      http ??
      axios.create({
        baseURL,
        timeout: config.entityApi.timeoutMs,
        headers: token ? { Authorization: `Bearer ${token}` } : {},
      });
  }

  private async getOne<T extends z.ZodTypeAny>(url: string, schema: T): Promise<z.output<T> | null> {
    try {
      const res = await this.http.get<unknown>(url);
      return schema.parse(res.data);
    } catch (err) {
      if (isAxiosError(err) && err.response?.status === 404) return null;
      throw err;
    }
  }

  private async getMany<T extends z.ZodTypeAny>(url: string, schema: T): Promise<z.output<T>[]> {
    const res = await this.http.get<unknown>(url);
    return z.array(schema).parse(res.data);
  }

  findJob(id: string): Promise<Job | null> {
    return this.getOne(`/jobs/${encodeURIComponent(id)}`, jobSchema);
  }

  findSubjectGroup(id: string): Promise<SubjectGroup | null> {
    return this.getOne(`/subject-groups/${encodeURIComponent(id)}`, subjectGroupSchema);
  }

  employeesOfJob(job: Job): Promise<Employee[]> {
    return this.getMany(`/jobs/${encodeURIComponent(job.id)}/employees`, employeeSchema);
  }

  clientsOfJob(job: Job): Promise<Client[]> {
    return this.getMany(`/jobs/${encodeURIComponent(job.id)}/clients`, clientSchema);
  }

  subjectGroupsOfJob(job: Job): Promise<SubjectGroup[]> {
    return this.getMany(`/jobs/${encodeURIComponent(job.id)}/subject-groups`, subjectGroupSchema);
  }

  jobsOfSubjectGroup(subjectGroup: SubjectGroup): Promise<Job[]> {
    return this.getMany(`/subject-groups/${encodeURIComponent(subjectGroup.id)}/jobs`, jobSchema);
  }

  subjectsOfSubjectGroup(subjectGroup: SubjectGroup): Promise<Subject[]> {
    return this.getMany(`/subject-groups/${encodeURIComponent(subjectGroup.id)}/subjects`, subjectSchema);
  }

  parentsOfSubject(subject: Subject): Promise<User[]> {
    return this.getMany(`/subjects/${encodeURIComponent(subject.id)}/parents`, userSchema);
  }

  contactsOfClient(client: Client): Promise<User[]> {
    return this.getMany(`/clients/${encodeURIComponent(client.id)}/contacts`, userSchema);
  }

  bookedSession(job: Job, subject: Subject): Promise<Session | null> {
    return this.getOne(
      `/jobs/${encodeURIComponent(job.id)}/subjects/${encodeURIComponent(subject.id)}/session`,
      sessionSchema
    );
  }
}

/**
 * Fetch the root entity a dispatch request names, or null when it no longer exists.
 */
export async function loadRoot(provider: RelationshipProvider, ref: RootRef): Promise<RootEntity | null> {
  if (ref.kind === 'job') {
    const job = await provider.findJob(ref.id);
    return job ? { kind: 'job', job } : null;
  }
  const subjectGroup = await provider.findSubjectGroup(ref.id);
  return subjectGroup ? { kind: 'subject_group', subjectGroup } : null;
}
