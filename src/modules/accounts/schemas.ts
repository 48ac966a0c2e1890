import { z } from "zod";
import { MAX_CENTS } from "../../common/money";
import { MAX_LOCK_PERIOD_DAYS } from "./account";

const accountIdSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[a-zA-Z0-9_-]+$/, "Account ID must contain only letters, numbers, hyphens, and underscores");

const centsSchema = z.number().int().nonnegative().max(MAX_CENTS);

const baseAccountFields = {
  accountId: accountIdSchema,
  holderName: z.string().trim().min(1).max(255),
  initialBalanceCents: centsSchema.optional()
};

export const createAccountBodySchema = z.discriminatedUnion("accountType", [
  z.object({ accountType: z.literal("basic"), ...baseAccountFields }),
  z.object({
    accountType: z.literal("savings"),
    ...baseAccountFields,
    // Negative rates are accepted and behave as a fee
    interestRatePercent: z.number().finite()
  }),
  z.object({
    accountType: z.literal("current"),
    ...baseAccountFields,
    overdraftLimitCents: centsSchema
  }),
  z.object({
    accountType: z.literal("fixed_deposit"),
    ...baseAccountFields,
    lockPeriodDays: z.number().int().nonnegative().max(MAX_LOCK_PERIOD_DAYS)
  })
]);

export const amountBodySchema = z.object({
  amountCents: z.number().int().positive().max(MAX_CENTS)
});

export const transferBodySchema = amountBodySchema.extend({
  fromAccountId: accountIdSchema,
  toAccountId: accountIdSchema
});

export const accountParamsSchema = z.object({
  id: accountIdSchema
});

export type CreateAccountBody = z.infer<typeof createAccountBodySchema>;
export type AmountBody = z.infer<typeof amountBodySchema>;
export type TransferBody = z.infer<typeof transferBodySchema>;
export type AccountParams = z.infer<typeof accountParamsSchema>;
