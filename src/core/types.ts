import { z } from 'zod';
import type { VerdictStatus, VerificationReport, Witness } from '../verification/types.js';

// ===== Configuration =====

export const BagcheckConfigSchema = z.object({
  verifier: z.object({
    /** Rounds of quantifier instantiation per refutation branch. */
    instantiationRounds: z.number().int().min(0).max(16).default(4),
    caseSplitDepth: z.number().int().min(0).max(16).default(4),
    /** Operations with more `when` paths than this are left inconclusive. */
    maxPaths: z.number().int().min(1).default(16),
    counterexample: z.object({
      enabled: z.boolean().default(true),
      samples: z.number().int().min(1).default(400),
      poolSize: z.number().int().min(1).max(8).default(2),
      maxBagSize: z.number().int().min(0).max(8).default(2),
      seed: z.number().int().default(7),
    }).default({}),
  }).default({}),
  executor: z.object({
    /**
     * When to re-check invariants on the working copy before commit.
     * - 'inconclusive': only for operations with an inconclusive or disproven
     *   pair (default).
     * - 'always': after every operation.
     * - 'never': trust the verifier.
     */
    runtimeCheck: z.enum(['inconclusive', 'always', 'never']).default('inconclusive'),
    blockDisproven: z.boolean().default(true),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    pretty: z.boolean().default(false),
  }).default({}),
});

export type BagcheckConfig = z.infer<typeof BagcheckConfigSchema>;

export type BagcheckConfigInput = z.input<typeof BagcheckConfigSchema>;

export type RuntimeCheckMode = BagcheckConfig['executor']['runtimeCheck'];

// ===== Outcomes =====

export interface OperationOutcome {
  operation: string;
  /** Store version after the commit. */
  version: number;
  /** Whether the invariants were re-checked on the working copy. */
  checkedAtRuntime: boolean;
}

// ===== Events =====

export interface BagcheckEvents {
  'verify:pair:decided': { operation: string; invariant: string; status: VerdictStatus; witness?: Witness };
  'verify:schema:loaded': { schema: string; report: VerificationReport };
  'operation:committed': { operation: string; version: number; duration: number };
  'operation:rejected': { operation: string; code: string; message: string };
  'operation:rolled-back': { operation: string; invariants: string[] };
  'invariant:violated': { invariant: string; operation?: string; error?: string };
  'query:executed': { query: string; rows: number; duration: number };
}
