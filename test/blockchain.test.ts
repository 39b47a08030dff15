import { Block } from '../src/core/Block';
import { Blockchain, GENESIS_PAYLOAD } from '../src/core/blockchain';
import { ChainDataError, ChainError, InvalidDifficultyError, MiningAbortedError, SequenceError } from '../src/core/errors';
import { ChainFailureKind, MiningResult } from '../src/core/types/block.types';

const GENESIS_TS = 1700000000000;
const GENESIS_HASH = 'daa977ddc32f01990662021bc43519fb2e63f83ed57221df930cebed9c0d3871';

function buildChain(difficulty: number, count: number): Blockchain {
  const chain = new Blockchain(difficulty, { genesisTimestamp: GENESIS_TS });
  for (let i = 1; i <= count; i++) {
    chain.addBlock({ Patient_ID: `P00${i}`, Diagnosis: 'Flu' }, GENESIS_TS + i * 1000);
  }
  return chain;
}

describe('Blockchain', () => {
  it('starts with an unmined genesis block', () => {
    const chain = new Blockchain(3, { genesisTimestamp: GENESIS_TS });
    const genesis = chain.latest();
    expect(chain.length).toBe(1);
    expect(chain.difficulty).toBe(3);
    expect(genesis.index).toBe(0);
    expect(genesis.previousHash).toBe('0');
    expect(genesis.payload).toBe(GENESIS_PAYLOAD);
    expect(genesis.nonce).toBe(0);
    expect(genesis.hash).toBe(GENESIS_HASH);
    expect(chain.isValid()).toBe(true);
  });

  it('rejects an invalid difficulty', () => {
    expect(() => new Blockchain(-1)).toThrow(InvalidDifficultyError);
    expect(() => new Blockchain(65)).toThrow(InvalidDifficultyError);
  });

  it('mines, links and validates a patient record at difficulty 2', () => {
    const chain = new Blockchain(2, { genesisTimestamp: GENESIS_TS });
    const record = { Patient_ID: 'P001', Diagnosis: 'Flu' };
    const block = new Block(1, 'caller-supplied', GENESIS_TS + 1000, record);

    const result = chain.append(block);

    expect(block.hash.startsWith('00')).toBe(true);
    expect(block.hash).toBe('00be1a129c211531a015d234bb64814b0c838f942698f74729496fd243a33697');
    expect(result.nonce).toBe(507);
    expect(chain.getBlock(1)?.previousHash).toBe(chain.getBlock(0)?.hash);
    expect(chain.isValid()).toBe(true);

    record.Diagnosis = 'Flo';
    expect(chain.isValid()).toBe(false);
  });

  it.each([0, 1, 2, 3, 4])('meets difficulty %i after append', difficulty => {
    const chain = buildChain(difficulty, 2);
    for (const block of chain.getBlocks().slice(1)) {
      expect(block.hash.startsWith('0'.repeat(difficulty))).toBe(true);
    }
    expect(chain.validate({ checkProofOfWork: true })).toEqual({ valid: true });
  });

  it('links every block to its predecessor', () => {
    const chain = buildChain(1, 4);
    const blocks = chain.getBlocks();
    for (let i = 1; i < blocks.length; i++) {
      expect(blocks[i].previousHash).toBe(blocks[i - 1].hash);
    }
    expect(chain.isValid()).toBe(true);
  });

  it('rejects a block that does not continue the sequence', () => {
    const chain = buildChain(0, 1);
    const error = (() => {
      try {
        chain.append(new Block(5, '0', GENESIS_TS, 'out of order'));
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(SequenceError);
    expect(error).toHaveProperty('expected', 2);
    expect(error).toHaveProperty('received', 5);
    expect(chain.length).toBe(2);
  });

  it('builds the next block from the tip', () => {
    const chain = buildChain(0, 1);
    const next = chain.nextBlock({ note: 'x' }, GENESIS_TS + 5000);
    expect(next.index).toBe(2);
    expect(next.previousHash).toBe(chain.latest().hash);
    expect(chain.length).toBe(2);
  });

  it('returns undefined for blocks out of range', () => {
    const chain = buildChain(0, 1);
    expect(chain.getBlock(-1)).toBeUndefined();
    expect(chain.getBlock(2)).toBeUndefined();
    expect(chain.getBlock(0.5)).toBeUndefined();
  });

  it('meets difficulty 5 after append', () => {
    const chain = buildChain(5, 1);
    expect(chain.latest().hash.startsWith('00000')).toBe(true);
    expect(chain.validate({ checkProofOfWork: true })).toEqual({ valid: true });
  }, 60000);

  it('lets a blockMined listener append the next block', () => {
    const chain = new Blockchain(1, { genesisTimestamp: GENESIS_TS });
    chain.once('blockMined', (block: Block) => {
      chain.addBlock({ follows: block.index }, GENESIS_TS + 2000);
    });

    chain.addBlock({ Patient_ID: 'P001' }, GENESIS_TS + 1000);

    expect(chain.length).toBe(3);
    expect(chain.latest().payload).toEqual({ follows: 1 });
    expect(chain.isValid()).toBe(true);
  });

  it('completes the append when a blockMined listener throws', () => {
    const logged = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const failure = new Error('listener failed');
    const chain = new Blockchain(1, { genesisTimestamp: GENESIS_TS });
    chain.on('blockMined', () => {
      throw failure;
    });

    const result = chain.append(chain.nextBlock({ Patient_ID: 'P001' }, GENESIS_TS + 1000));

    expect(result.nonce).toBe(chain.latest().nonce);
    expect(chain.length).toBe(2);
    expect(logged).toHaveBeenCalledWith('❌ [Blockchain] blockMined listener failed for block 1', failure);
    chain.addBlock({ Patient_ID: 'P002' }, GENESIS_TS + 2000);
    expect(chain.length).toBe(3);
    logged.mockRestore();
  });

  it('emits blockMined with the mining result', () => {
    const chain = new Blockchain(1, { genesisTimestamp: GENESIS_TS });
    const seen: Array<[Block, MiningResult]> = [];
    chain.on('blockMined', (block: Block, result: MiningResult) => seen.push([block, result]));

    const block = chain.addBlock({ Patient_ID: 'P001' }, GENESIS_TS + 1000);

    expect(seen).toHaveLength(1);
    expect(seen[0][0]).toBe(block);
    expect(seen[0][1].nonce).toBe(block.nonce);
  });

  describe('validation', () => {
    it('reports a tampered payload as a hash mismatch', () => {
      const record = { Patient_ID: 'P002', Diagnosis: 'Cold' };
      const chain = buildChain(1, 1);
      chain.addBlock(record, GENESIS_TS + 2000);
      chain.addBlock({ Patient_ID: 'P003' }, GENESIS_TS + 3000);

      record.Diagnosis = 'Cough';

      expect(chain.isValid()).toBe(false);
      expect(chain.validate()).toEqual({
        valid: false,
        index: 2,
        failure: ChainFailureKind.HASH_MISMATCH,
        message: 'Block 2 hash does not match its contents'
      });
    });

    it('reports a rewritten timestamp as a hash mismatch', () => {
      const chain = buildChain(1, 2);
      const block = chain.getBlock(1);
      if (!block) throw new Error('missing block');

      expect(Reflect.set(block, 'timestamp', block.timestamp + 1)).toBe(true);

      expect(chain.isValid()).toBe(false);
      expect(chain.validate()).toMatchObject({ valid: false, index: 1, failure: ChainFailureKind.HASH_MISMATCH });
    });

    it('fails when a previous hash is replaced without re-hashing', () => {
      const chain = buildChain(1, 3);
      const block = chain.getBlock(2);
      if (!block) throw new Error('missing block');
      block.previousHash = 'f'.repeat(64);
      expect(chain.isValid()).toBe(false);
    });

    it('reports a re-hashed block pointing elsewhere as broken linkage', () => {
      const chain = buildChain(1, 3);
      const block = chain.getBlock(2);
      if (!block) throw new Error('missing block');
      block.link('f'.repeat(64));

      expect(chain.isValid()).toBe(false);
      expect(chain.validate()).toEqual({
        valid: false,
        index: 2,
        failure: ChainFailureKind.LINKAGE_BROKEN,
        message: 'Block 2 does not reference block 1'
      });
    });

    it('checks proof of work only when asked', () => {
      const easy = new Blockchain(0, { genesisTimestamp: GENESIS_TS });
      easy.addBlock({ Patient_ID: 'P001', Diagnosis: 'Flu' }, GENESIS_TS + 1000);
      expect(easy.latest().hash).toBe('50630a8e852430408d60c239f958580b9cadab7f1818ef3b5610d15f86dd552e');

      const restored = Blockchain.fromJSON({ ...easy.toJSON(), difficulty: 2 });

      expect(restored.validate()).toEqual({ valid: true });
      expect(restored.validate({ checkProofOfWork: true })).toEqual({
        valid: false,
        index: 1,
        failure: ChainFailureKind.INSUFFICIENT_WORK,
        message: 'Block 1 hash has fewer than 2 leading zeros'
      });
    });

    it('never checks the genesis block', () => {
      const chain = new Blockchain(4, { genesisTimestamp: GENESIS_TS });
      expect(chain.validate({ checkProofOfWork: true })).toEqual({ valid: true });
    });
  });

  describe('appendAsync', () => {
    it('mines without blocking and appends', async () => {
      const chain = new Blockchain(2, { genesisTimestamp: GENESIS_TS, miningCheckInterval: 64 });
      const block = chain.nextBlock({ Patient_ID: 'P001', Diagnosis: 'Flu' }, GENESIS_TS + 1000);
      const result = await chain.appendAsync(block);
      expect(result.nonce).toBe(507);
      expect(chain.length).toBe(2);
      expect(chain.isValid()).toBe(true);
    });

    it('leaves the chain untouched when mining is aborted', async () => {
      const chain = new Blockchain(12, { genesisTimestamp: GENESIS_TS });
      const controller = new AbortController();
      const mining = chain.appendAsync(chain.nextBlock('slow', GENESIS_TS + 1000), {
        signal: controller.signal,
        checkInterval: 50
      });

      expect(() => chain.append(chain.nextBlock('concurrent'))).toThrow(ChainError);

      setTimeout(() => controller.abort(), 10);
      await expect(mining).rejects.toThrow(MiningAbortedError);
      expect(chain.length).toBe(1);
      expect(chain.getMiningStats().blocks).toBe(0);
    });
  });

  it('records mining effort for every appended block', () => {
    const chain = buildChain(1, 2);
    const stats = chain.getMiningStats();
    const first = chain.getBlock(1);
    const second = chain.getBlock(2);
    if (!first || !second) throw new Error('missing block');

    expect(stats.blocks).toBe(2);
    expect(stats.records.map(record => record.index)).toEqual([1, 2]);
    expect(stats.records[0].attempts).toBe(first.nonce + 1);
    expect(stats.records[1].timestamp).toBe(GENESIS_TS + 2000);
    expect(stats.totalAttempts).toBe(first.nonce + second.nonce + 2);
    expect(stats.averageAttempts).toBe(stats.totalAttempts / 2);
  });

  it('summarizes the chain', () => {
    const chain = buildChain(0, 1);
    expect(chain.getChainInfo()).toEqual({
      length: 2,
      difficulty: 0,
      latestHash: chain.latest().hash,
      valid: true
    });
  });

  describe('JSON boundary', () => {
    it('restores a chain without re-mining', () => {
      const chain = buildChain(2, 2);
      const restored = Blockchain.fromJSON(JSON.parse(JSON.stringify(chain)));

      expect(restored.toJSON()).toEqual(chain.toJSON());
      expect(restored.difficulty).toBe(2);
      expect(restored.isValid()).toBe(true);
      expect(restored.getMiningStats().blocks).toBe(0);
    });

    it('restores tampered data as an invalid chain', () => {
      const serialized = buildChain(1, 2).toJSON();
      serialized.blocks[1] = { ...serialized.blocks[1], payload: { Patient_ID: 'P999' } };
      expect(Blockchain.fromJSON(serialized).validate()).toMatchObject({
        valid: false,
        index: 1,
        failure: ChainFailureKind.HASH_MISMATCH
      });
    });

    it('rejects malformed chains', () => {
      const serialized = buildChain(0, 2).toJSON();
      expect(() => Blockchain.fromJSON({ blocks: [] , difficulty: 1 })).toThrow('Chain must contain a genesis block');
      expect(() => Blockchain.fromJSON({ difficulty: 1 })).toThrow(ChainDataError);
      expect(() => Blockchain.fromJSON({ ...serialized, difficulty: '2' })).toThrow('Chain difficulty must be a number');
      expect(() => Blockchain.fromJSON({ ...serialized, blocks: [serialized.blocks[0], serialized.blocks[2]] }))
        .toThrow('Block at position 1 has index 2');
      expect(() => Blockchain.fromJSON({ ...serialized, difficulty: 99 }))
        .toThrow(new ChainDataError('Chain difficulty must be an integer between 0 and 64, got 99'));
      expect(() => Blockchain.fromJSON({ ...serialized, difficulty: 1.5 })).toThrow(ChainDataError);
    });
  });
});
