import { z } from 'zod';

// Age thresholds for each marital status
// z.int() requires integer, .positive() requires > 0
const EligibilitySchema = z.object({
  singleMinAge: z.number().int().positive().default(35),
  marriedMinAge: z.number().int().positive().default(21),
});

// approval: a unit is reserved when the manager approves
// booking: a unit is only taken when the officer books it
const AllocationSchema = z.object({
  reservationPoint: z.enum(['approval', 'booking']).default('approval'),
});

const ProjectsSchema = z.object({
  maxOfficerSlots: z.number().int().positive().default(10),
});

const StorageSchema = z.object({
  dateFormat: z.string().min(1).default('dd/MM/yyyy'),
});

// Complete policy configuration schema
// Every section defaults, so an empty object is a valid policy
export const PolicySchema = z.object({
  eligibility: EligibilitySchema.default({}),
  allocation: AllocationSchema.default({}),
  projects: ProjectsSchema.default({}),
  storage: StorageSchema.default({}),
});

// z.infer<typeof Schema> extracts TypeScript type from Zod schema
// z.input is the shape accepted before defaults are applied
export type PolicyConfig = z.infer<typeof PolicySchema>;
export type PolicyInput = z.input<typeof PolicySchema>;
