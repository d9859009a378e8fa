import { z } from "zod";

const timeConstraintSchema = z
  .object({
    periods: z
      .array(
        z.object({
          start: z.string().optional(),
          end: z.string().optional(),
        }),
      )
      .optional(),
    weekdays: z.array(z.union([z.number().int(), z.string()])).optional(),
    hours: z.array(z.object({ start: z.string(), end: z.string() })).optional(),
  })
  .strict();

const ignoreRuleSchema = z.object({
  name: z.string(),
  path: z.string().default("*"),
  environments: z.array(z.string()).default([]),
  reason: z.string().optional(),
  validity: timeConstraintSchema.optional(),
  exclusions: timeConstraintSchema.optional(),
});

const productSchema = z.object({
  envs: z
    .record(
      z.string(),
      z.object({ slack_channel_id: z.string().default("") }),
    )
    .default({}),
  oncall: z
    .object({
      slack_channel_id: z.string(),
      pattern: z.string().min(1),
    })
    .optional(),
  alarms: z
    .object({
      ignore: z.array(ignoreRuleSchema).optional(),
    })
    .default({}),
});

export const productsFileSchema = z.object({
  timezone: z.string().optional(),
  business_hours: z
    .object({ start: z.number().int(), end: z.number().int() })
    .optional(),
  products: z.record(z.string(), productSchema),
});

export type ProductsFile = z.infer<typeof productsFileSchema>;
export type IgnoreRuleEntry = z.infer<typeof ignoreRuleSchema>;
export type TimeConstraintEntry = z.infer<typeof timeConstraintSchema>;
