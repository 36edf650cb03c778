import { z } from 'zod';

// ---------- Request bodies ----------
export const gadgetSpecSchema = z.object({
  name: z.string().min(1, 'name required'),
  description: z.string().nullable().default(null),
  in_stock: z.boolean(),
});

export const stoneSpecSchema = z.object({
  name: z.string().min(1, 'name required'),
  description: z.string().nullable().default(null),
  acquired: z.boolean(),
});

export const contactSchema = z.object({
  name: z.string().min(1, 'name required'),
  affiliation: z.string().nullable().default(null),
  trust_level: z.number().int().min(1).max(5).default(3), // 5 = highest
});

export const characterSchema = z.object({
  name: z.string().min(1, 'name required'),
  affiliation: z.string().nullable().default(null),
  power_level: z.number().int().default(0),
});

export const intelReportSchema = z.object({
  recipient_email: z.string().email(),
  report_name: z.string().min(1, 'report_name required'),
});

// ---------- Path / query ----------
/** Decimal digits only; "0x1", "1e3", "" and ids past 2^53 are rejected. */
function integerString(bounds: z.ZodNumber = z.number()) {
  return z
    .string()
    .regex(/^-?\d+$/, 'integer required')
    .transform(Number)
    .pipe(bounds.int().safe());
}

export const intParam = integerString();
export const nonNegativeIntParam = integerString(z.number().min(0));

export const paginationQuerySchema = z.object({
  skip: nonNegativeIntParam.default('0'),
  limit: nonNegativeIntParam.default('100'),
});

export const activityQuerySchema = z.object({
  activity_description: z.string().default('Generic activity logged.'),
});

export const emailParam = z.string().email();

// ---------- Catalog seed data ----------
export const gadgetSchema = z.object({
  name: z.string(),
  type: z.string(),
  in_stock: z.boolean(),
  utility_level: z.number().int().optional(),
});

export const stoneSchema = z.object({
  name: z.string(),
  location: z.string(),
  color: z.string(),
  acquired: z.boolean(),
});

export const gadgetSeedSchema = z.array(gadgetSchema.extend({ id: z.number().int() }));
export const stoneSeedSchema = z.array(stoneSchema.extend({ id: z.number().int() }));

export type GadgetSpec = z.infer<typeof gadgetSpecSchema>;
export type StoneSpec = z.infer<typeof stoneSpecSchema>;
export type Contact = z.infer<typeof contactSchema>;
export type Character = z.infer<typeof characterSchema>;
export type IntelReportRequest = z.infer<typeof intelReportSchema>;
export type Pagination = z.infer<typeof paginationQuerySchema>;
export type Gadget = z.infer<typeof gadgetSchema>;
export type Stone = z.infer<typeof stoneSchema>;
