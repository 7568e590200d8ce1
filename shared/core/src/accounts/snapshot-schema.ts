/**
 * Runtime validation for persisted account pool snapshots.
 *
 * Snapshots come from a file or Redis written by an earlier process (or by
 * hand), so they are validated on every load before the pool trusts them.
 * Pool-level invariants that depend on configuration (the ad cap) are
 * checked by AccountPool, not here.
 */

import { z } from 'zod';
import type { AccountPoolSnapshot, BybitAccount, GateAccount } from '@p2p-settle/types';
import { ValidationError } from '../error-handling';
import { isDecimalString } from '../utils/decimal-utils';

const AccountIdSchema = z.number().int().positive();
const TimestampSchema = z.number().int().nonnegative();

export const GateAccountSchema = z
  .object({
    id: AccountIdSchema,
    email: z.string().min(1),
    password: z.string(),
    status: z.enum(['active', 'inactive', 'banned']),
    balance: z.string().refine(isDecimalString, 'Balance must be a decimal string'),
    session: z.unknown(),
    sessionExpiresAt: TimestampSchema.nullable(),
    createdAt: TimestampSchema,
    updatedAt: TimestampSchema,
  })
  .transform((account): GateAccount => ({ ...account, session: account.session ?? null }));

export const BybitAccountSchema = z.object({
  id: AccountIdSchema,
  name: z.string().min(1),
  credentials: z.object({
    apiKey: z.string(),
    apiSecret: z.string(),
  }),
  status: z.enum(['available', 'busy', 'disabled']),
  activeAdCount: z.number().int().nonnegative(),
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema,
});

export const AccountPoolSnapshotSchema = z
  .object({
    gateAccounts: z.array(GateAccountSchema),
    bybitAccounts: z.array(BybitAccountSchema),
    updatedAt: TimestampSchema,
  })
  .superRefine((snapshot, ctx) => {
    reportDuplicates(snapshot.gateAccounts.map((a) => a.id), 'gateAccounts', ctx);
    reportDuplicates(snapshot.bybitAccounts.map((a) => a.id), 'bybitAccounts', ctx);
  });

function reportDuplicates(ids: number[], path: string, ctx: z.RefinementCtx): void {
  const seen = new Set<number>();
  ids.forEach((id, index) => {
    if (seen.has(id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate account id ${id}`,
        path: [path, index, 'id'],
      });
    }
    seen.add(id);
  });
}

/**
 * Validate an untrusted value as a snapshot.
 *
 * @throws ValidationError naming every failing path
 */
export function parseAccountPoolSnapshot(value: unknown, source: string): AccountPoolSnapshot {
  const result = AccountPoolSnapshotSchema.safeParse(value);
  if (result.success) {
    const gateAccounts: GateAccount[] = result.data.gateAccounts;
    const bybitAccounts: BybitAccount[] = result.data.bybitAccounts;
    return { gateAccounts, bybitAccounts, updatedAt: result.data.updatedAt };
  }
  const details = result.error.errors
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
  throw new ValidationError(`Invalid account snapshot from ${source}: ${details}`, {
    context: { source },
  });
}
