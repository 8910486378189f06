import { expect, use } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import { ConsensusResolver } from '../src/consensus/ConsensusResolver';
import { MempoolSynchronizer } from '../src/consensus/MempoolSynchronizer';
import { Blockchain } from '../src/core/blockchain/Blockchain';
import { TransactionPool } from '../src/core/transaction/TransactionPool';
import { Block } from '../src/core/Block';
import { PersistenceFailureError, ValidationFailureError } from '../src/core/errors';
import { PeerRegistry } from '../src/network/PeerRegistry';
import { Mutex } from '../src/utils/Mutex';
import { MemoryStorage } from './support/MemoryStorage';
import { FakePeerGateway } from './support/FakePeerGateway';
import { certificate, mineChain, quietLogger } from './support/fixtures';

use(chaiAsPromised);

const DIFFICULTY = 2;

describe('sync against peers', () => {
  let storage: MemoryStorage;
  let blockchain: Blockchain;
  let pool: TransactionPool;
  let peers: PeerRegistry;
  let gateway: FakePeerGateway;
  let resolver: ConsensusResolver;
  let synchronizer: MempoolSynchronizer;

  beforeEach(async () => {
    storage = new MemoryStorage();
    blockchain = new Blockchain(storage, DIFFICULTY, quietLogger);
    pool = new TransactionPool(storage, quietLogger);
    peers = new PeerRegistry();
    gateway = new FakePeerGateway();
    await blockchain.loadFromDurable();

    const context = { blockchain, pool, peers, gateway, mutex: new Mutex(), logger: quietLogger };
    resolver = new ConsensusResolver(context);
    synchronizer = new MempoolSynchronizer(context);
  });

  describe('ConsensusResolver', () => {
    it('adopts a longer valid chain from a peer', async () => {
      const remote = mineChain(3, DIFFICULTY);
      peers.register('localhost:5001');
      gateway.setPeer('localhost:5001', { chain: remote });

      const result = await resolver.resolve();

      expect(result.replaced).to.equal(true);
      expect(result.length).to.equal(3);
      expect(result.source).to.equal('localhost:5001');
      expect(blockchain.getChain().map(block => block.hash)).to.deep.equal(remote.map(block => block.hash));
      expect(storage.chain).to.have.length(3);
    });

    it('keeps the local chain when a peer chain has the same length', async () => {
      const localHead = blockchain.head();
      peers.register('localhost:5001');
      gateway.setPeer('localhost:5001', { chain: mineChain(1, DIFFICULTY) });

      const result = await resolver.resolve();

      expect(result.replaced).to.equal(false);
      expect(blockchain.head()).to.equal(localHead);
    });

    it('never adopts a chain that fails validation, however long', async () => {
      const tampered = mineChain(6, DIFFICULTY).map(block => block.toJSON());
      tampered[3].transactions[0].nama = 'Someone Else';
      peers.register('localhost:5001');
      gateway.setPeer('localhost:5001', { chain: tampered.map(record => Block.fromJSON(record)) });

      const result = await resolver.resolve();

      expect(result.replaced).to.equal(false);
      expect(blockchain.getLength()).to.equal(1);
      expect(result.skipped).to.have.length(1);
      expect(result.skipped[0].reason).to.equal('VALIDATION_FAILURE');
    });

    it('rejects a chain whose reported length disagrees with its blocks', async () => {
      peers.register('localhost:5001');
      gateway.setPeer('localhost:5001', { chain: mineChain(2, DIFFICULTY), reportedLength: 9 });

      const result = await resolver.resolve();

      expect(result.replaced).to.equal(false);
      expect(result.skipped.map(skip => skip.reason)).to.deep.equal(['VALIDATION_FAILURE']);
    });

    it('skips unreachable peers and still adopts from the others', async () => {
      peers.register('localhost:5001');
      peers.register('localhost:5002');
      peers.register('localhost:5003');
      gateway.setPeer('localhost:5002', { failure: new ValidationFailureError('bad json') });
      gateway.setPeer('localhost:5003', { chain: mineChain(4, DIFFICULTY) });

      const result = await resolver.resolve();

      expect(result.replaced).to.equal(true);
      expect(result.source).to.equal('localhost:5003');
      expect(result.skipped.map(skip => [skip.peer, skip.reason])).to.deep.equal([
        ['localhost:5001', 'NETWORK_UNAVAILABLE'],
        ['localhost:5002', 'VALIDATION_FAILURE']
      ]);
    });

    it('picks the longest valid chain and the first one on ties', async () => {
      peers.register('localhost:5001');
      peers.register('localhost:5002');
      peers.register('localhost:5003');
      gateway.setPeer('localhost:5001', { chain: mineChain(3, DIFFICULTY, 'one') });
      gateway.setPeer('localhost:5002', { chain: mineChain(5, DIFFICULTY, 'two') });
      gateway.setPeer('localhost:5003', { chain: mineChain(5, DIFFICULTY, 'three') });

      const result = await resolver.resolve();

      expect(result.source).to.equal('localhost:5002');
      expect(blockchain.committedTxids().has('two-5')).to.equal(true);
    });

    it('commits pending transactions that the adopted chain already holds', async () => {
      await pool.add(certificate({ txid: 'shared-2' }));
      await pool.add(certificate({ txid: 'only-local' }));
      peers.register('localhost:5001');
      gateway.setPeer('localhost:5001', { chain: mineChain(3, DIFFICULTY, 'shared') });

      await resolver.resolve();

      expect(pool.snapshot().map(tx => tx.txid)).to.deep.equal(['only-local']);
    });

    it('still commits adopted transactions when the chain write fails', async () => {
      await pool.add(certificate({ txid: 'shared-2' }));
      await pool.add(certificate({ txid: 'only-local' }));
      peers.register('localhost:5001');
      gateway.setPeer('localhost:5001', { chain: mineChain(3, DIFFICULTY, 'shared') });
      storage.failWrites = true;

      await expect(resolver.resolve()).to.be.rejectedWith(PersistenceFailureError);

      expect(blockchain.getLength()).to.equal(3);
      expect(pool.snapshot().map(tx => tx.txid)).to.deep.equal(['only-local']);
    });

    it('does nothing without peers', async () => {
      const result = await resolver.resolve();
      expect(result).to.deep.equal({ replaced: false, length: 1, skipped: [] });
    });
  });

  describe('MempoolSynchronizer', () => {
    it('merges peer pools with the local copy winning on conflicts', async () => {
      await pool.add(certificate({ txid: 'a', luas: '100' }));
      peers.register('localhost:5001');
      gateway.setPeer('localhost:5001', {
        mempool: [certificate({ txid: 'a', luas: '999' }), certificate({ txid: 'b' })]
      });

      const result = await synchronizer.sync();

      expect(result.added).to.equal(1);
      expect(pool.snapshot().map(tx => tx.txid)).to.deep.equal(['a', 'b']);
      expect(pool.get('a')?.luas).to.equal('100');
    });

    it('is idempotent across repeated syncs', async () => {
      peers.register('localhost:5001');
      gateway.setPeer('localhost:5001', { mempool: [certificate({ txid: 'a' }), certificate({ txid: 'b' })] });

      await synchronizer.sync();
      const second = await synchronizer.sync();

      expect(second.added).to.equal(0);
      expect(pool.snapshot().map(tx => tx.txid)).to.deep.equal(['a', 'b']);
    });

    it('skips unreachable peers without failing', async () => {
      peers.register('localhost:5001');
      peers.register('localhost:5002');
      gateway.setPeer('localhost:5002', { mempool: [certificate({ txid: 'b' })] });

      const result = await synchronizer.sync();

      expect(result.added).to.equal(1);
      expect(result.skipped.map(skip => skip.peer)).to.deep.equal(['localhost:5001']);
    });

    it('does not pool transactions that are already on the local chain', async () => {
      await blockchain.replace(mineChain(3, DIFFICULTY, 'mined'));
      peers.register('localhost:5001');
      gateway.setPeer('localhost:5001', { mempool: [certificate({ txid: 'mined-2' }), certificate({ txid: 'fresh' })] });

      await synchronizer.sync();

      expect(pool.snapshot().map(tx => tx.txid)).to.deep.equal(['fresh']);
    });
  });
});
