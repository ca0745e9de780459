import { z } from "zod";
import type { ZodError } from "zod";

// Date rolls 2026-02-30 over to March, so the day must survive a round trip
const isCalendarDay = (value: string): boolean => {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
};

// Calendar day in YYYY-MM-DD form
export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a date in YYYY-MM-DD form")
  .refine(isCalendarDay, "Not a real calendar date");

export const FlatOfferSchema = z.object({
  units: z.number().int().nonnegative(),
  price: z.number().int().nonnegative(),
});

// Builds the schema for a manager-entered project; slot ceiling comes from policy
export const createProjectInputSchema = (maxOfficerSlots: number) =>
  z
    .object({
      name: z.string().trim().min(1),
      neighborhood: z.string().trim().min(1),
      flatTypes: z
        .object({
          "2-Room": FlatOfferSchema.optional(),
          "3-Room": FlatOfferSchema.optional(),
        })
        .refine((offers) => Object.values(offers).some(Boolean), "Offer at least one flat type"),
      openDate: IsoDateSchema.nullable(),
      closeDate: IsoDateSchema.nullable(),
      officerSlots: z.number().int().min(1).max(maxOfficerSlots),
    })
    // ISO dates compare correctly as strings
    .refine(
      (input) => !input.openDate || !input.closeDate || input.openDate <= input.closeDate,
      { message: "Closing date must not be before opening date", path: ["closeDate"] },
    );

export type ProjectInput = z.input<ReturnType<typeof createProjectInputSchema>>;

// Flattens zod issues into one line the CLI can print
export const describeIssues = (error: ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; ");
