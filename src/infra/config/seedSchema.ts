import { z } from 'zod';
import { FlatOfferSchema, IsoDateSchema } from '../../core/domain/projectDraft';
import { FlatTypeSchema } from './policySchema';

// Marital status is accepted in any casing ("Single", "MARRIED") and stored lowercase
const MaritalStatusSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['single', 'married']));

// One person row, shared by applicants, officers and managers
export const PersonSeedSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  age: z.number().int().nonnegative(),
  maritalStatus: MaritalStatusSchema,
  password: z.string().min(1),
});

// manager and officers reference people by id or by display name
export const ProjectSeedSchema = z.object({
  name: z.string().min(1),
  neighborhood: z.string().min(1),
  flatTypes: z.array(FlatOfferSchema.extend({ type: FlatTypeSchema })).nonempty(),
  openDate: IsoDateSchema.nullable().default(null),
  closeDate: IsoDateSchema.nullable().default(null),
  manager: z.string().min(1),
  officerSlots: z.number().int().positive(),
  officers: z.array(z.string().min(1)).default([]),
});

export const SeedSchema = z.object({
  applicants: z.array(PersonSeedSchema).default([]),
  officers: z.array(PersonSeedSchema).default([]),
  managers: z.array(PersonSeedSchema).default([]),
  projects: z.array(ProjectSeedSchema).default([]),
});

export type SeedData = z.infer<typeof SeedSchema>;
export type PersonSeed = z.infer<typeof PersonSeedSchema>;
