import { Level } from 'level';
import { Blockchain } from './Blockchain';
import { ChainDataError } from '../errors';
import { loadConfig } from '../../config';
import { createLogger } from '../../utils/logger';

const logger = createLogger('ChainStore');

const META_KEY = 'meta:chain';
const blockKey = (index: number): string => `block:${index}`;

interface ChainMeta {
  difficulty: number;
  length: number;
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'LEVEL_NOT_FOUND';
}

function parseEntry(key: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ChainDataError(`Malformed ${key} entry: ${error instanceof Error ? error.message : 'invalid JSON'}`);
  }
}

function parseMeta(raw: string): ChainMeta {
  const meta = parseEntry(META_KEY, raw);
  if (
    typeof meta !== 'object' || meta === null ||
    !('difficulty' in meta) || typeof meta.difficulty !== 'number' ||
    !('length' in meta) || typeof meta.length !== 'number' ||
    !Number.isSafeInteger(meta.length) || meta.length < 0
  ) {
    throw new ChainDataError(`Malformed ${META_KEY} entry`);
  }
  return { difficulty: meta.difficulty, length: meta.length };
}

/**
 * LevelDB persistence for a chain.
 *
 * Key schema:
 * - meta:chain -> { difficulty, length }
 * - block:<index> -> serialized block
 */
export class ChainStore {
  private readonly db: Level<string, string>;

  /**
   * @param location - Database directory (defaults to CHAIN_DB_PATH) or an open Level instance
   */
  constructor(location: string | Level<string, string> = loadConfig().dbPath) {
    this.db = typeof location === 'string' ? new Level<string, string>(location) : location;
  }

  private async read(key: string): Promise<string | undefined> {
    try {
      return await this.db.get(key);
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  public async save(chain: Blockchain): Promise<void> {
    const previous = await this.read(META_KEY);
    const previousLength = previous === undefined ? 0 : parseMeta(previous).length;
    const serialized = chain.toJSON();

    const batch = this.db.batch();
    serialized.blocks.forEach(block => batch.put(blockKey(block.index), JSON.stringify(block)));
    for (let index = serialized.blocks.length; index < previousLength; index++) {
      batch.del(blockKey(index));
    }
    const meta: ChainMeta = { difficulty: serialized.difficulty, length: serialized.blocks.length };
    batch.put(META_KEY, JSON.stringify(meta));
    await batch.write();

    logger.debug(`Saved ${meta.length} blocks`);
  }

  /**
   * @returns The stored chain, or undefined when nothing has been saved
   */
  public async load(): Promise<Blockchain | undefined> {
    const rawMeta = await this.read(META_KEY);
    if (rawMeta === undefined) {
      return undefined;
    }
    const meta = parseMeta(rawMeta);

    const blocks: unknown[] = [];
    for (let index = 0; index < meta.length; index++) {
      const raw = await this.read(blockKey(index));
      if (raw === undefined) {
        throw new ChainDataError(`Missing ${blockKey(index)} in stored chain`);
      }
      blocks.push(parseEntry(blockKey(index), raw));
    }

    logger.debug(`Loaded ${blocks.length} blocks`);
    return Blockchain.fromJSON({ difficulty: meta.difficulty, blocks });
  }

  public async close(): Promise<void> {
    await this.db.close();
  }
}
