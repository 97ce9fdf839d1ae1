import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';
import { ConfigurationError } from '@migrator/errors';

export const MAINNET_API_URL = 'https://api.hyperliquid.xyz';
export const TESTNET_API_URL = 'https://api.hyperliquid-testnet.xyz';
export const DEFAULT_SIGNATURE_CHAIN_ID_MAINNET = '0xa4b1'; // Arbitrum One
export const DEFAULT_SIGNATURE_CHAIN_ID_TESTNET = '0x66eee'; // Arbitrum Sepolia

export type Network = 'Mainnet' | 'Testnet';
export type ChainId = `0x${string}`;

export function loadEnvFiles(cwd: string = process.cwd()): void {
  dotenvConfig({ path: resolve(cwd, '.env') });
}

function isChainId(value: string): value is ChainId {
  return /^0x[0-9a-fA-F]+$/.test(value);
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const envSchema = z.object({
  HL_ACCOUNT_ADDRESS: z.string().trim().min(1, 'HL_ACCOUNT_ADDRESS is required'),
  HL_SECRET_KEY: optionalString,
  HL_API_URL: z.string().url().default(MAINNET_API_URL),
  HL_SIGNATURE_CHAIN_ID: z
    .string()
    .refine(isChainId, 'HL_SIGNATURE_CHAIN_ID must be a 0x-prefixed hex chain id')
    .optional(),

  PAIR_NAME: z.string().min(1).default('PURR/USDC'),
  BASE_TOKEN: z.string().min(1).default('PURR'),
  QUOTE_TOKEN: z.string().min(1).default('USDC'),

  SETTLEMENT_DELAY_MS: z.coerce.number().int().nonnegative().default(1200),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),
});

export type Env = z.infer<typeof envSchema>;

export interface RunConfig {
  accountAddress: string;
  secretKey?: string;
  apiUrl: string;
  network: Network;
  isTestnet: boolean;
  signatureChainId: ChainId;
  pairName: string;
  baseToken: string;
  quoteToken: string;
  settlementDelayMs: number;
  requestTimeoutMs: number;
  log: {
    level: Env['LOG_LEVEL'];
    format: Env['LOG_FORMAT'];
  };
}

export interface LoadConfigOptions {
  /** A dry run reads balances but never signs, so it does without the secret key. */
  requireSecret?: boolean;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {}
): Readonly<RunConfig> {
  const { requireSecret = true } = options;
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigurationError(`Invalid environment variables: ${fields.join(', ')}`, {
      issues: result.error.format(),
    });
  }

  const parsed = result.data;
  if (requireSecret && !parsed.HL_SECRET_KEY) {
    throw new ConfigurationError('Set HL_ACCOUNT_ADDRESS and HL_SECRET_KEY in your environment.');
  }

  const apiUrl = parsed.HL_API_URL.replace(/\/+$/, '');
  const isTestnet = apiUrl.endsWith('-testnet.xyz');

  const config: RunConfig = {
    accountAddress: parsed.HL_ACCOUNT_ADDRESS,
    secretKey: parsed.HL_SECRET_KEY,
    apiUrl,
    network: isTestnet ? 'Testnet' : 'Mainnet',
    isTestnet,
    signatureChainId:
      parsed.HL_SIGNATURE_CHAIN_ID ??
      (isTestnet ? DEFAULT_SIGNATURE_CHAIN_ID_TESTNET : DEFAULT_SIGNATURE_CHAIN_ID_MAINNET),
    pairName: parsed.PAIR_NAME,
    baseToken: parsed.BASE_TOKEN,
    quoteToken: parsed.QUOTE_TOKEN,
    settlementDelayMs: parsed.SETTLEMENT_DELAY_MS,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    log: {
      level: parsed.LOG_LEVEL,
      format: parsed.LOG_FORMAT,
    },
  };
  return Object.freeze(config);
}
