import { z } from 'zod';

/**
 * Business entities read from the studio API. Ids may arrive as numbers
 * and timestamps as ISO strings; both are normalised here.
 */
const id = z.union([z.string().min(1), z.number()]).transform((v) => String(v));

export const userSchema = z.object({
  id,
  firstName: z.string().default(''),
  lastName: z.string().default(''),
  email: z.string().nullish(),
  phoneNumber: z.string().nullish(),
  chatUser: z.string().nullish(),
});

export const clientCategorySchema = z.enum(['Person', 'School', 'Commercial', 'Other']);

export const clientSchema = z.object({
  id,
  name: z.string(),
  category: clientCategorySchema,
  user: userSchema.nullish(),
});

export const employeeSchema = z.object({
  id,
  title: z.string().nullish(),
  user: userSchema.nullish(),
});

export const subjectSchema = z.object({
  id,
  firstName: z.string().default(''),
  lastName: z.string().default(''),
  user: userSchema.nullish(),
});

export const jobSchema = z.object({
  id,
  name: z.string(),
  startTime: z.coerce.date(),
  endTime: z.coerce.date(),
  location: z.string().nullish(),
});

export const sessionSchema = z.object({
  id,
  startTime: z.coerce.date(),
  endTime: z.coerce.date().nullish(),
  location: z.string().nullish(),
});

export const subjectGroupSchema = z.object({
  id,
  name: z.string(),
  startTime: z.coerce.date(),
  endTime: z.coerce.date(),
  photosAvailable: z.boolean().default(false),
  client: clientSchema.nullish(),
});

export type User = z.infer<typeof userSchema>;
export type ClientCategory = z.infer<typeof clientCategorySchema>;
export type Client = z.infer<typeof clientSchema>;
export type Employee = z.infer<typeof employeeSchema>;
export type Subject = z.infer<typeof subjectSchema>;
export type Job = z.infer<typeof jobSchema>;
export type Session = z.infer<typeof sessionSchema>;
export type SubjectGroup = z.infer<typeof subjectGroupSchema>;
