import { PayableToken } from '@payable-ledger/ledger';
import { config } from './config';
import { createApp } from './app';
import { deployHostedContracts, loadGenesisFile } from './genesis';
import { serializeEvent } from './api/controller';
import { Logger } from './utils/logger';

async function bootstrap(): Promise<void> {
  const genesis = loadGenesisFile(config.genesisFile);

  const token = new PayableToken({
    address: config.tokenAddress,
    name: config.tokenName,
    symbol: config.tokenSymbol,
    decimals: config.tokenDecimals,
    genesis: genesis.allocations,
    maxCallDepth: config.maxCallDepth,
  });
  const hosted = deployHostedContracts(token.registry, genesis.contracts);

  token.subscribe((events) => {
    Logger.info('Ledger events committed', { events: events.map(serializeEvent) });
  });

  const app = createApp(token);

  const server = app.listen(config.port, () => {
    Logger.info('Ledger gateway started', {
      port: config.port,
      tokenAddress: token.address,
      totalSupply: token.totalSupply(),
      hostedContracts: hosted.length,
      deployedAddresses: token.registry.addresses(),
      maxCallDepth: config.maxCallDepth,
    });
  });

  const shutdown = async (signal: string): Promise<void> => {
    Logger.info('Shutting down ledger gateway', { signal });
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    } catch (error: unknown) {
      Logger.error('Ledger gateway did not close cleanly', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

bootstrap().catch((error: unknown) => {
  Logger.error('Ledger gateway bootstrap failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
