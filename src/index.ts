#!/usr/bin/env node
import dotenv from 'dotenv';
import { Block } from './core/Block';
import { Transaction } from './core/Transaction';
import { APIServer } from './api/Server';
import { NodeConfig, loadConfig } from './config';
import { SyncCycleResult, SyncErrorEvent } from './consensus/SyncScheduler';
import { LedgerNode, NodeStatus } from './core/Node';
import { Logger } from './utils/logger';

// Load environment variables
dotenv.config();

export class LandLedgerApp {
  private config: NodeConfig;
  private logger: Logger;
  private node: LedgerNode;
  private apiServer: APIServer;

  constructor(config: NodeConfig = loadConfig()) {
    this.config = config;
    this.logger = new Logger({ verbose: config.verbose });
    this.node = new LedgerNode(config, { logger: this.logger });
    this.apiServer = new APIServer(this.node, this.logger.child('api'));
    this.attachLogging();
  }

  private attachLogging(): void {
    this.node.on('node:initialized', (status: NodeStatus) => {
      this.logger.success(`Ledger loaded: ${status.chainLength} block(s), ${status.pendingTransactions} pending, difficulty ${status.difficulty}`);
    });

    this.node.on('node:shutdown', () => {
      this.logger.info('🛑 Ledger node stopped');
    });

    this.node.on('transaction:submitted', (transaction: Transaction) => {
      this.logger.info(`📝 Transaction ${transaction.txid} queued (${transaction.nomorSertifikat})`);
    });

    this.node.on('block:mined', (block: Block) => {
      this.logger.success(`⛏️  Block ${block.index} mined with ${block.transactions.length} transaction(s): ${block.hash}`);
    });

    this.node.on('chain:replaced', (event: { source: string; length: number; committed: number }) => {
      this.logger.info(`🔄 Adopted chain of length ${event.length} from ${event.source}, ${event.committed} pending transaction(s) now committed`);
    });

    this.node.on('peers:registered', (peers: string[]) => {
      this.logger.info(`🤝 Known peers: ${peers.join(', ')}`);
    });

    this.node.on('sync:started', (intervalMs: number) => {
      this.logger.info(`🔗 Peer sync every ${intervalMs}ms`);
    });

    this.node.on('sync:stopped', () => {
      this.logger.debug('Peer sync stopped');
    });

    this.node.on('sync:cycle', (result: SyncCycleResult) => {
      const skipped = (result.consensus?.skipped.length ?? 0) + (result.mempool?.skipped.length ?? 0);
      this.logger.debug(`Sync cycle done: chain length ${result.consensus?.length ?? '?'}, ${result.mempool?.added ?? 0} pooled, ${skipped} peer skip(s)`);
    });

    this.node.on('sync:error', (event: SyncErrorEvent) => {
      this.logger.error(`Background sync failed during ${event.phase}`, event.error);
    });
  }

  public async start(): Promise<void> {
    await this.node.initialize();

    const port = await this.apiServer.start(this.config.port, this.config.host);
    this.logger.info(`🌐 API server listening on ${this.config.host}:${port}`);

    this.node.startSync();
  }

  public async stop(): Promise<void> {
    await this.apiServer.stop();
    await this.node.shutdown();
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger({ verbose: config.verbose });
  const app = new LandLedgerApp(config);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    app.stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error while stopping', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await app.start();
}

// Start the application
if (require.main === module) {
  main().catch((error: unknown) => {
    new Logger().error('Failed to start ledger node', error);
    process.exit(1);
  });
}
