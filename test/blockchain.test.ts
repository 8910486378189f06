import { expect, use } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import { Blockchain } from '../src/core/blockchain/Blockchain';
import { validateChain } from '../src/core/blockchain/validation';
import { Block } from '../src/core/Block';
import { isValidProof, proofOfWork } from '../src/core/mining/ProofOfWork';
import { ChainLinkageError, PersistenceFailureError, ValidationFailureError } from '../src/core/errors';
import { MemoryStorage } from './support/MemoryStorage';
import { certificate, mineChain, quietLogger } from './support/fixtures';
use(chaiAsPromised);

const DIFFICULTY = 2;

function nextBlock(chain: Blockchain, txid: string): Block {
  const head = chain.head();
  const proof = proofOfWork(head.proof, DIFFICULTY);
  return new Block(head.index + 1, Date.now(), [certificate({ txid })], proof, head.hash);
}

describe('Blockchain', () => {
  let storage: MemoryStorage;
  let chain: Blockchain;

  beforeEach(async () => {
    storage = new MemoryStorage();
    chain = new Blockchain(storage, DIFFICULTY, quietLogger);
    await chain.loadFromDurable();
  });

  describe('genesis', () => {
    it('starts with a single genesis block at index 1 and sentinel previous hash', () => {
      expect(chain.getLength()).to.equal(1);
      expect(chain.genesis().index).to.equal(1);
      expect(chain.genesis().previousHash).to.equal('0');
      expect(chain.genesis().proof).to.equal(0);
      expect(chain.head()).to.equal(chain.genesis());
    });

    it('persists the new genesis when storage is empty', () => {
      expect(storage.chain).to.deep.equal([chain.genesis().toJSON()]);
    });
  });

  describe('append', () => {
    it('appends a block that extends the head and persists the chain', async () => {
      const block = nextBlock(chain, 'tx-a');
      await chain.append(block);

      expect(chain.getLength()).to.equal(2);
      expect(chain.head()).to.equal(block);
      expect(storage.chain?.map(record => record.hash)).to.deep.equal([chain.genesis().hash, block.hash]);
    });

    it('rejects a block whose previous hash is not the head hash', async () => {
      const head = chain.head();
      const block = new Block(2, Date.now(), [], proofOfWork(head.proof, DIFFICULTY), 'f'.repeat(64));

      await expect(chain.append(block)).to.be.rejectedWith(ChainLinkageError);
      expect(chain.getLength()).to.equal(1);
    });

    it('rejects a block whose index does not follow the head', async () => {
      const head = chain.head();
      const block = new Block(3, Date.now(), [], proofOfWork(head.proof, DIFFICULTY), head.hash);

      await expect(chain.append(block)).to.be.rejectedWith(ChainLinkageError);
      expect(chain.getLength()).to.equal(1);
    });

    it('rejects a block whose proof does not meet the difficulty', async () => {
      const head = chain.head();
      let losing = 0;
      while (isValidProof(head.proof, losing, DIFFICULTY)) {
        losing++;
      }

      await expect(chain.append(new Block(2, Date.now(), [], losing, head.hash))).to.be.rejectedWith(ValidationFailureError);
    });

    it('rejects a block whose recorded hash does not match its content', async () => {
      const head = chain.head();
      const block = new Block(2, Date.now(), [], proofOfWork(head.proof, DIFFICULTY), head.hash, 'a'.repeat(64));

      await expect(chain.append(block)).to.be.rejectedWith(ValidationFailureError);
    });

    it('keeps an appended block in memory when the write fails', async () => {
      storage.failWrites = true;
      const block = nextBlock(chain, 'tx-a');

      await expect(chain.append(block)).to.be.rejectedWith(PersistenceFailureError);
      expect(chain.head()).to.equal(block);
    });

    it('builds chains that always pass validation', async () => {
      for (const txid of ['tx-a', 'tx-b', 'tx-c', 'tx-d']) {
        await chain.append(nextBlock(chain, txid));
      }

      const report = chain.validate();
      expect(report.valid).to.equal(true);
      expect(report.length).to.equal(5);
      expect(report.issues).to.deep.equal([]);
    });
  });

  describe('loadFromDurable', () => {
    it('restores a stored chain', async () => {
      await chain.append(nextBlock(chain, 'tx-a'));
      await chain.append(nextBlock(chain, 'tx-b'));

      const restored = new Blockchain(storage, DIFFICULTY, quietLogger);
      await restored.loadFromDurable();

      expect(restored.getChain().map(block => block.hash)).to.deep.equal(chain.getChain().map(block => block.hash));
      expect(restored.committedTxids()).to.deep.equal(new Set(['tx-a', 'tx-b']));
    });

    it('starts over from genesis when the stored chain fails validation', async () => {
      const stored = mineChain(3, DIFFICULTY).map(block => block.toJSON());
      stored[1].transactions[0].luas = '999';
      storage.chain = stored;

      const restored = new Blockchain(storage, DIFFICULTY, quietLogger);
      await restored.loadFromDurable();

      expect(restored.getLength()).to.equal(1);
      expect(storage.chain).to.have.length(1);
    });
  });

  describe('replace', () => {
    it('swaps in a longer valid chain', async () => {
      const longer = mineChain(4, DIFFICULTY);
      await chain.replace(longer);

      expect(chain.getLength()).to.equal(4);
      expect(storage.chain).to.have.length(4);
    });

    it('refuses an invalid chain', async () => {
      const broken = mineChain(3, DIFFICULTY);
      broken[2] = new Block(3, broken[2].timestamp, broken[2].transactions, broken[2].proof, 'bad');

      await expect(chain.replace(broken)).to.be.rejectedWith(ValidationFailureError);
      expect(chain.getLength()).to.equal(1);
    });
  });

  describe('lookups', () => {
    it('finds committed transactions with their block', async () => {
      const block = nextBlock(chain, 'tx-a');
      await chain.append(block);

      const found = chain.findTransaction('tx-a');
      expect(found?.block.index).to.equal(2);
      expect(found?.transaction.txid).to.equal('tx-a');
      expect(chain.findTransaction('missing')).to.equal(null);
      expect(chain.getBlock(2)).to.equal(block);
      expect(chain.getBlock(9)).to.equal(null);
    });
  });
});

describe('validateChain', () => {
  it('reports a tampered block at its own index and leaves its neighbours clean', () => {
    const records = mineChain(5, DIFFICULTY).map(block => block.toJSON());
    records[2].transactions[0].lokasi = 'Desa Lain';

    const report = validateChain(records.map(record => Block.fromJSON(record)), DIFFICULTY);

    expect(report.valid).to.equal(false);
    expect(report.issues.map(issue => [issue.index, issue.reason])).to.deep.equal([[3, 'hash-mismatch']]);
  });

  it('flags a wrong genesis sentinel', () => {
    const chain = mineChain(2, DIFFICULTY);
    const genesis = new Block(1, chain[0].timestamp, [], 0, 'not-zero');

    const report = validateChain([genesis], DIFFICULTY);
    expect(report.issues.map(issue => issue.reason)).to.deep.equal(['genesis-sentinel']);
  });

  it('flags broken linkage and proof', () => {
    const chain = mineChain(3, DIFFICULTY);
    const third = chain[2];
    const relinked = new Block(third.index, third.timestamp, third.transactions, third.proof, chain[0].hash);

    const report = validateChain([chain[0], chain[1], relinked], DIFFICULTY);
    expect(report.issues.map(issue => [issue.index, issue.reason])).to.deep.equal([[3, 'previous-hash']]);
  });

  it('flags a proof that fails at a higher difficulty', () => {
    const chain = mineChain(3, 1);
    const report = validateChain(chain, 6);
    expect(report.issues.every(issue => issue.reason === 'proof-of-work')).to.equal(true);
    expect(report.issues.map(issue => issue.index)).to.deep.equal([2, 3]);
  });

  it('rejects an empty chain', () => {
    expect(validateChain([], DIFFICULTY).issues[0].reason).to.equal('empty-chain');
  });
});
