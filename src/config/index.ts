import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { envFlag, envInt } from '../util/env.js';
import { InvalidInputError } from '../util/errors.js';

const DAY = 86_400;

const bpsSchema = z.number().int().min(0).max(10_000);

// BigInt-capable: JSON carries amounts as decimal strings
const amountSchema = z
  .union([z.bigint(), z.string().regex(/^\d+$/, 'expected a non-negative integer string'), z.number().int().nonnegative()])
  .transform((v) => BigInt(v));

const priceSchema = z.object({
  base: z.string().min(1),
  quote: z.string().min(1),
  price: amountSchema,
  decimals: z.number().int().min(0).max(36),
}).strict();

export const configSchema = z.object({
  dbPath: z.string().min(1).default('./data/ledger.db'),
  ledgerAccount: z.string().min(1).default('ledger'),
  treasury: z.string().min(1).default('treasury'),
  interest: z.object({
    aprBps: z.number().int().min(0).default(1000),
    penaltyAprBps: z.number().int().min(0).default(3000),
    secondsPerYear: z.number().int().positive().default(365 * DAY),
  }).strict().default({}),
  risk: z.object({
    maxRatioBps: z.number().int().min(0).default(15_000),
    scoreFree: z.number().int().positive().default(800),
    noCollateralCeiling: amountSchema.default('1000000'),
    requireProof: z.boolean().default(false),
    collateralAssets: z.array(z.string().min(1)).default([]),
  }).strict().default({}),
  reputation: z.object({
    maxScore: z.number().int().positive().default(1000),
    scoreStep: z.number().int().min(0).default(50),
    strict: z.boolean().default(true),
  }).strict().default({}),
  fees: z.object({
    originationFeeBps: bpsSchema.default(50),
    protocolFeeBps: bpsSchema.default(1000),
    defaultBountyBps: bpsSchema.default(500),
  }).strict().default({}),
  durations: z.object({
    minDuration: z.number().int().positive().default(DAY),
    maxDuration: z.number().int().positive().default(365 * DAY),
  }).strict().default({}).refine((d) => d.minDuration <= d.maxDuration, 'minDuration must not exceed maxDuration'),
  gracePeriod: z.number().int().min(0).default(0),
  paused: z.boolean().default(false),
  proofSecret: z.string().min(1).optional(),
  prices: z.array(priceSchema).default([]),
}).strict();

export type LedgerConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG_FILE = path.resolve(process.cwd(), 'config', 'ledger.json');

function stripComments(jsonText: string): string {
  // Allow // and /* */ comments in the config file
  return jsonText
    .replace(/\/\*[\s\S]*?\*\//g, '')
    .replace(/^\s*\/\/.*$/gm, '');
}

function validate(input: unknown, source: string): LedgerConfig {
  const res = configSchema.safeParse(input);
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new InvalidInputError('BadConfig', `${source}: ${issues}`);
  }
  return res.data;
}

function readFile(file: string): unknown {
  if (!fs.existsSync(file)) return {};
  const text = stripComments(fs.readFileSync(file, 'utf8')).trim();
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new InvalidInputError('BadConfig', `${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/** Environment variables win over the file. */
export function applyEnvOverrides(cfg: LedgerConfig, env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const dbPath = env.LEDGER_DB_PATH?.trim();
  const proofSecret = env.LEDGER_PROOF_SECRET?.trim();
  return validate({
    ...cfg,
    dbPath: dbPath || cfg.dbPath,
    interest: {
      ...cfg.interest,
      aprBps: envInt('LEDGER_APR_BPS', env) ?? cfg.interest.aprBps,
      penaltyAprBps: envInt('LEDGER_PENALTY_APR_BPS', env) ?? cfg.interest.penaltyAprBps,
    },
    gracePeriod: envInt('LEDGER_GRACE_PERIOD', env) ?? cfg.gracePeriod,
    paused: envFlag('LEDGER_PAUSED', env) ?? cfg.paused,
    proofSecret: proofSecret || cfg.proofSecret,
  }, 'environment');
}

/**
 * Loads `config/ledger.json` (or `LEDGER_CONFIG`), fills defaults and applies
 * environment overrides. A missing file means all defaults.
 */
export function loadConfig(file: string = process.env.LEDGER_CONFIG ?? DEFAULT_CONFIG_FILE): LedgerConfig {
  const fromFile = validate(readFile(file), file);
  return applyEnvOverrides(fromFile);
}

/** Defaults only; no file, no environment. */
export function defaultConfig(): LedgerConfig {
  return validate({}, 'defaults');
}
