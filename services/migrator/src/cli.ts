import { parseArgs } from 'util';
import { z } from 'zod';
import type { Decimal } from 'decimal.js';
import { ConfigurationError, describeError } from '@migrator/errors';
import { isDecimalString, toDecimal } from '@migrator/quantize';
import { MIGRATION_MODES, type MigrationMode } from '@migrator/types';

export const USAGE = `Usage: spot-perps-migrator [options]

Sell the base token to the quote token on Spot, transfer the quote token to Perps,
or withdraw it from the venue.

Options:
  --mode <mode>           sell_and_transfer | transfer_only | withdraw (default: sell_and_transfer)
  --base-amount <amount>  amount of the base token to sell (default: all available)
  --quote-amount <amount> amount of the quote token to transfer or withdraw
                          (default for transfers: all available; required for withdraw)
  --dest <address>        destination EVM address for --mode withdraw (Arbitrum)
  --slippage-bps <bps>    price cushion for the IOC sell, bid * (1 - bps/1e4) (default: 30)
  --dry-run               read balances and log every intent without signing anything
  -h, --help              show this message
`;

export interface CliOptions {
  mode: MigrationMode;
  baseAmount?: Decimal;
  quoteAmount?: Decimal;
  destination?: string;
  slippageBps: number;
  dryRun: boolean;
  help: boolean;
}

const positiveAmount = z.string().transform((value, ctx): Decimal => {
  if (!isDecimalString(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a plain decimal number' });
    return z.NEVER;
  }
  const amount = toDecimal(value);
  if (!amount.gt(0)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be greater than 0' });
    return z.NEVER;
  }
  return amount;
});

const argsSchema = z.object({
  mode: z.enum(MIGRATION_MODES).default('sell_and_transfer'),
  'base-amount': positiveAmount.optional(),
  'quote-amount': positiveAmount.optional(),
  dest: z.string().trim().min(1).optional(),
  'slippage-bps': z
    .string()
    .regex(/^\d+$/, 'must be a whole number of basis points')
    .transform(Number)
    .pipe(z.number().int().max(9_999))
    .default('30'),
  'dry-run': z.boolean().default(false),
  help: z.boolean().default(false),
});

export function parseCliArgs(argv: string[]): CliOptions {
  let values: unknown;
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        mode: { type: 'string' },
        'base-amount': { type: 'string' },
        'quote-amount': { type: 'string' },
        dest: { type: 'string' },
        'slippage-bps': { type: 'string' },
        'dry-run': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new ConfigurationError(describeError(error));
  }

  const result = argsSchema.safeParse(values);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `--${issue.path.join('.')} ${issue.message}`);
    throw new ConfigurationError(`Invalid arguments: ${problems.join('; ')}`);
  }

  const args = result.data;
  return {
    mode: args.mode,
    baseAmount: args['base-amount'],
    quoteAmount: args['quote-amount'],
    destination: args.dest,
    slippageBps: args['slippage-bps'],
    dryRun: args['dry-run'],
    help: args.help,
  };
}
