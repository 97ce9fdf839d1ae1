import { loadConfig, loadEnvFiles, type RunConfig } from '@migrator/config';
import { ConfigurationError, isMigrationError } from '@migrator/errors';
import { DryRunGateway, HyperliquidGateway, type SigningGateway } from '@migrator/gateway';
import { createLogger, createServiceLogger, getLogger, setLogger, type Logger } from '@migrator/logger';
import type { MigrationRequest } from '@migrator/types';
import { InfoClient } from '@migrator/venue';
import { parseCliArgs, USAGE } from './cli.js';
import { resolveIntent } from './intent.js';
import { MigrationOrchestrator } from './orchestrator.js';

function buildGateway(config: Readonly<RunConfig>, dryRun: boolean, log: Logger): SigningGateway {
  if (dryRun) {
    return new DryRunGateway(createServiceLogger('dry-run-gateway', log));
  }
  if (!config.secretKey) {
    throw new ConfigurationError('Set HL_ACCOUNT_ADDRESS and HL_SECRET_KEY in your environment.');
  }
  return HyperliquidGateway.connect({
    secretKey: config.secretKey,
    apiUrl: config.apiUrl,
    isTestnet: config.isTestnet,
    signatureChainId: config.signatureChainId,
    timeoutMs: config.requestTimeoutMs,
    logger: createServiceLogger('signing-gateway', log),
  });
}

async function main() {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    process.stdout.write(USAGE);
    return;
  }

  loadEnvFiles();
  const config = loadConfig(process.env, { requireSecret: !options.dryRun });

  const runLogger = createLogger({ ...config.log, name: 'spot-perps-migrator' });
  setLogger(runLogger);
  const logger = createServiceLogger('migrator', runLogger);

  const request: MigrationRequest = {
    mode: options.mode,
    pairName: config.pairName,
    baseToken: config.baseToken,
    quoteToken: config.quoteToken,
    baseAmount: options.baseAmount,
    quoteAmount: options.quoteAmount,
    destination: options.destination,
    slippageBps: options.slippageBps,
  };
  // no venue calls before this
  const intent = resolveIntent(request);

  logger.info(
    { network: config.network, apiUrl: config.apiUrl, account: config.accountAddress, mode: intent.mode },
    'Starting migration'
  );

  const orchestrator = new MigrationOrchestrator({
    info: new InfoClient({
      apiUrl: config.apiUrl,
      timeoutMs: config.requestTimeoutMs,
      logger: createServiceLogger('info-client', runLogger),
    }),
    gateway: buildGateway(config, options.dryRun, runLogger),
    accountAddress: config.accountAddress,
    settlementDelayMs: config.settlementDelayMs,
    logger: createServiceLogger('orchestrator', runLogger),
  });

  const report = await orchestrator.run(intent);
  logger.info({ report }, 'Migration complete');
}

main().catch((err) => {
  const logger = createServiceLogger('migrator', getLogger());
  if (isMigrationError(err)) {
    logger.error(err.toJSON(), err.message);
  } else {
    logger.error({ error: err }, 'Migration failed');
  }
  process.exitCode = 1;
});
