import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { Server as HttpServer } from 'http';
import { z, ZodError } from 'zod';
import { LedgerNode } from '../core/Node';
import { LedgerError, LedgerErrorCode } from '../core/errors';
import { TransactionInputSchema } from '../core/types/ledger.types';
import { HashUtils } from '../crypto/hash';
import { Logger } from '../utils/logger';

const TransactionRequestSchema = TransactionInputSchema.extend({
  file_base64: z.string().min(1).optional()
});

const RegisterNodesSchema = z.object({
  nodes: z.array(z.string()).min(1, 'Please supply a list of nodes')
});

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
  INVALID_ADDRESS: 400,
  CHAIN_LINKAGE: 409,
  VALIDATION_FAILURE: 422,
  NETWORK_UNAVAILABLE: 502,
  PERSISTENCE_FAILURE: 500
};

function hasHttpStatus(error: unknown): error is { status: number; message: string } {
  return typeof error === 'object' && error !== null &&
    'status' in error && typeof error.status === 'number' &&
    'message' in error && typeof error.message === 'string';
}

export class APIServer {
  private app: express.Application;
  private node: LedgerNode;
  private logger: Logger;
  private server: HttpServer | null = null;

  constructor(node: LedgerNode, logger: Logger = new Logger({ scope: 'api' })) {
    this.app = express();
    this.node = node;
    this.logger = logger;
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(helmet());
    this.app.use(cors());
    this.app.use(express.json({ limit: '10mb' }));
    this.app.use(express.urlencoded({ extended: true }));
  }

  private setupRoutes(): void {
    this.app.get('/health', (req, res) => {
      res.json({
        status: 'healthy',
        timestamp: Date.now(),
        ...this.node.getStatus()
      });
    });

    // Peers read these two routes during sync; their shapes are the peer protocol.
    this.app.get('/chain', (req, res) => {
      const chain = this.node.getChain();
      res.json({
        chain: chain.map(block => block.toJSON()),
        length: chain.length
      });
    });

    this.app.get('/mempool', (req, res) => {
      res.json(this.node.getMempool().map(tx => tx.toJSON()));
    });

    this.app.get('/chain/validate', (req, res) => {
      res.json(this.node.validateChain());
    });

    this.app.get('/mine', async (req, res, next) => {
      try {
        const block = await this.node.mine();
        if (!block) {
          return res.status(400).json({ error: 'No pending transactions to mine' });
        }

        res.json({
          message: 'New block mined',
          index: block.index,
          transactions: block.transactions.map(tx => tx.toJSON()),
          proof: block.proof,
          previous_hash: block.previousHash,
          hash: block.hash
        });
      } catch (error) {
        next(error);
      }
    });

    this.app.post('/transactions/new', async (req, res, next) => {
      try {
        const parsed = TransactionRequestSchema.safeParse(req.body);
        if (!parsed.success) {
          return res.status(400).json({
            error: 'Invalid transaction data',
            details: parsed.error.issues.map(issue => issue.message)
          });
        }

        const { file_base64, ...input } = parsed.data;
        const fileHash = file_base64 !== undefined
          ? HashUtils.hashFile(Buffer.from(file_base64, 'base64'))
          : input.file_hash;

        const transaction = await this.node.submitTransaction({ ...input, file_hash: fileHash });
        res.status(201).json({
          message: 'Transaction added to the mempool',
          transaction: transaction.toJSON()
        });
      } catch (error) {
        next(error);
      }
    });

    this.app.get('/transactions/:txid', (req, res) => {
      const found = this.node.findTransaction(req.params.txid);
      if (!found) {
        return res.status(404).json({ error: 'Transaction not found' });
      }

      if (found.status === 'confirmed') {
        return res.json({
          status: found.status,
          transaction: found.transaction.toJSON(),
          block_index: found.blockIndex,
          block_hash: found.blockHash
        });
      }
      res.json({ status: found.status, transaction: found.transaction.toJSON() });
    });

    this.app.post('/nodes/register', (req, res) => {
      const parsed = RegisterNodesSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Please supply a list of nodes' });
      }

      const nodes = this.node.registerPeers(parsed.data.nodes);
      res.status(201).json({
        message: 'New nodes have been added',
        total_nodes: nodes
      });
    });

    this.app.get('/nodes', (req, res) => {
      res.json({ nodes: this.node.getPeers() });
    });

    this.app.get('/nodes/resolve', async (req, res, next) => {
      try {
        const result = await this.node.resolveConflicts();
        res.json({
          message: result.replaced ? 'Our chain was replaced' : 'Our chain is authoritative',
          replaced: result.replaced,
          source: result.source,
          skipped: result.skipped,
          chain: this.node.getChain().map(block => block.toJSON())
        });
      } catch (error) {
        next(error);
      }
    });

    // Error handling middleware
    this.app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (err instanceof LedgerError) {
        const status = STATUS_BY_CODE[err.code];
        if (status >= 500) {
          this.logger.error(`${req.method} ${req.path} failed`, err);
        }
        return res.status(status).json({ error: err.code, message: err.message });
      }
      if (err instanceof ZodError) {
        return res.status(400).json({ error: 'Invalid request', details: err.issues.map(issue => issue.message) });
      }
      if (hasHttpStatus(err) && err.status < 500) {
        return res.status(err.status).json({ error: 'Invalid request', message: err.message });
      }

      this.logger.error(`${req.method} ${req.path} failed`, err);
      res.status(500).json({
        error: 'Internal server error',
        message: err instanceof Error ? err.message : String(err)
      });
    });

    // 404 handler
    this.app.use((req, res) => {
      res.status(404).json({
        error: 'Endpoint not found',
        path: req.path,
        method: req.method
      });
    });
  }

  /**
   * Start listening
   * @returns The bound port, which differs from the requested one when 0 is asked for
   */
  public async start(port: number, host?: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = host ? this.app.listen(port, host) : this.app.listen(port);
      server.once('error', reject);
      server.once('listening', () => {
        server.off('error', reject);
        this.server = server;
        const address = server.address();
        resolve(typeof address === 'object' && address !== null ? address.port : port);
      });
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }
}
