import { HashUtils } from '../../crypto/hash';

export const DEFAULT_DIFFICULTY = 3;
export const DEFAULT_SEARCH_BATCH = 10_000;

export interface ProofSearch {
  readonly difficulty: number;
  search(lastProof: number): Promise<number>;
}

function assertDifficulty(difficulty: number): void {
  if (!Number.isInteger(difficulty) || difficulty < 0) {
    throw new RangeError(`Difficulty must be a non-negative integer, got ${difficulty}`);
  }
}

function yieldToEventLoop(): Promise<void> {
  return new Promise<void>(resolve => setImmediate(resolve));
}

function targetPrefix(difficulty: number): string {
  return '0'.repeat(difficulty);
}

/**
 * Check whether `proof` solves the puzzle posed by `lastProof`
 * @returns True if sha256(`${lastProof}${proof}`) starts with `difficulty` zeros
 */
export function isValidProof(lastProof: number, proof: number, difficulty: number): boolean {
  return HashUtils.hash(`${lastProof}${proof}`).startsWith(targetPrefix(difficulty));
}

/**
 * Brute-force the smallest non-negative proof for `lastProof`.
 * CPU bound and uninterruptible; expected cost is 16^difficulty digests.
 */
export function proofOfWork(lastProof: number, difficulty: number): number {
  assertDifficulty(difficulty);

  let proof = 0;
  while (!isValidProof(lastProof, proof, difficulty)) {
    proof++;
  }
  return proof;
}

/**
 * Finds the same proof as `proofOfWork`, but checks `batchSize` candidates at a
 * time and yields to the event loop in between so requests and sync keep running.
 */
export class ProofOfWorkMiner implements ProofSearch {
  public readonly difficulty: number;
  private readonly batchSize: number;

  constructor(difficulty: number = DEFAULT_DIFFICULTY, batchSize: number = DEFAULT_SEARCH_BATCH) {
    assertDifficulty(difficulty);
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
    }
    this.difficulty = difficulty;
    this.batchSize = batchSize;
  }

  public async search(lastProof: number): Promise<number> {
    let proof = 0;
    for (;;) {
      await yieldToEventLoop();
      const end = proof + this.batchSize;
      for (; proof < end; proof++) {
        if (isValidProof(lastProof, proof, this.difficulty)) {
          return proof;
        }
      }
    }
  }

  public verify(lastProof: number, proof: number): boolean {
    return isValidProof(lastProof, proof, this.difficulty);
  }
}
