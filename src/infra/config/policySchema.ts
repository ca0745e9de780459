import { z } from 'zod';
import { DEFAULT_ELIGIBILITY_RULES } from '../../core/domain/eligibility';

export const FlatTypeSchema = z.enum(['2-Room', '3-Room']);

// Age thresholds and the flat types each marital status may take
// Every field defaults to the standard BTO rules, so an empty object is valid
const EligibilitySchema = z
  .object({
    singleMinAge: z.number().int().nonnegative().default(DEFAULT_ELIGIBILITY_RULES.singleMinAge),
    singleFlatTypes: z.array(FlatTypeSchema).default(DEFAULT_ELIGIBILITY_RULES.singleFlatTypes),
    marriedMinAge: z.number().int().nonnegative().default(DEFAULT_ELIGIBILITY_RULES.marriedMinAge),
    marriedFlatTypes: z.array(FlatTypeSchema).default(DEFAULT_ELIGIBILITY_RULES.marriedFlatTypes),
  })
  .default({});

// Complete policy configuration schema
// z.int() requires integer, .positive() requires > 0
export const PolicySchema = z.object({
  eligibility: EligibilitySchema,
  limits: z
    .object({
      maxOfficerSlots: z.number().int().positive().default(10),
    })
    .default({}),
});

// z.infer<typeof Schema> extracts TypeScript type from Zod schema
// This ensures types match the validation rules
export type PolicyConfig = z.infer<typeof PolicySchema>;
