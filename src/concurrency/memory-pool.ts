// =============================================================================
// MemoryPool — Fixed-size block allocator over growable ArrayBuffer slabs
// =============================================================================

import { getDefaultLogger } from "../adapters/logging/console-logging.adapter.js";
import { parseConfig } from "../config/runtime-config.js";
import { MemoryPoolConfigSchema } from "../domain/runtime.schema.js";
import type { MemoryPoolConfig, MemoryPoolStats } from "../domain/runtime.schema.js";
import {
  ForeignBlockError,
  InvalidBlockError,
  PoolExhaustedError,
} from "../errors.js";
import type { LoggingPort } from "../ports/logging.port.js";

/**
 * Opaque handle to one block. The generation changes every time the slot is
 * freed, so a handle kept past its deallocate() is recognised as stale.
 */
export interface Block {
  readonly poolId: number;
  readonly slab: number;
  readonly index: number;
  readonly generation: number;
}

export interface MemoryPoolDeps {
  logger?: LoggingPort;
}

interface Slab {
  readonly bytes: ArrayBuffer;
  /** Current generation per block */
  readonly generations: Uint32Array;
  /** 1 while the block is handed out */
  readonly live: Uint8Array;
}

interface FreeSlot {
  readonly slab: number;
  readonly index: number;
}

let nextPoolId = 1;

export class MemoryPool {
  readonly id: number;
  private readonly config: MemoryPoolConfig;
  private readonly slabs: Slab[] = [];
  private readonly freeList: FreeSlot[] = [];
  private readonly logger: LoggingPort;
  private inUse = 0;

  constructor(config: Partial<MemoryPoolConfig> & Pick<MemoryPoolConfig, "blockSize">, deps: MemoryPoolDeps = {}) {
    this.id = nextPoolId++;
    this.config = parseConfig(MemoryPoolConfigSchema, config);
    this.logger = deps.logger ?? getDefaultLogger();
    this.grow();
  }

  /** Hand out a zeroed block, growing by one slab if needed. */
  allocate(): Block {
    const block = this.tryAllocate();
    if (!block) {
      const capacity = this.capacity;
      this.logger.warn("pool:exhausted", { poolId: this.id, capacity });
      throw new PoolExhaustedError(capacity);
    }
    return block;
  }

  /** Like allocate(), but `undefined` once every slab is in use. */
  tryAllocate(): Block | undefined {
    if (this.freeList.length === 0 && !this.grow()) return undefined;

    const free = this.freeList.pop();
    if (!free) return undefined;
    const slab = this.slabs[free.slab];
    slab.live[free.index] = 1;
    this.bytesOf(free.slab, free.index).fill(0);
    this.inUse++;

    return Object.freeze({
      poolId: this.id,
      slab: free.slab,
      index: free.index,
      generation: slab.generations[free.index],
    });
  }

  /** Return a block to the free list. Rejects foreign, stale and double frees. */
  deallocate(block: Block): void {
    const slab = this.checkLive(block);
    slab.live[block.index] = 0;
    slab.generations[block.index] = (slab.generations[block.index] + 1) >>> 0;
    this.freeList.push({ slab: block.slab, index: block.index });
    this.inUse--;
  }

  /** Bytes of a live block. The view must not be used after deallocate(). */
  view(block: Block): Uint8Array {
    this.checkLive(block);
    return this.bytesOf(block.slab, block.index);
  }

  isLive(block: Block): boolean {
    if (block.poolId !== this.id) return false;
    const slab = this.slabs[block.slab];
    return (
      slab !== undefined &&
      block.index >= 0 &&
      block.index < this.config.blocksPerSlab &&
      slab.live[block.index] === 1 &&
      slab.generations[block.index] === block.generation
    );
  }

  getStats(): MemoryPoolStats {
    return {
      blockSize: this.config.blockSize,
      slabCount: this.slabs.length,
      capacity: this.capacity,
      inUse: this.inUse,
      free: this.freeList.length,
    };
  }

  private get capacity(): number {
    return this.slabs.length * this.config.blocksPerSlab;
  }

  private checkLive(block: Block): Slab {
    if (block.poolId !== this.id) throw new ForeignBlockError(this.id, block.poolId);

    const slab = this.slabs[block.slab];
    if (!slab || !Number.isInteger(block.index) || block.index < 0 || block.index >= this.config.blocksPerSlab) {
      throw new InvalidBlockError("out-of-range", block.slab, block.index);
    }
    const generation = slab.generations[block.index];
    if (slab.live[block.index] === 1 && generation === block.generation) return slab;

    // Freed once and not handed out since: the handle is one generation behind
    const doubleFree =
      slab.live[block.index] === 0 && generation === ((block.generation + 1) >>> 0);
    throw new InvalidBlockError(doubleFree ? "double-free" : "stale", block.slab, block.index);
  }

  private bytesOf(slab: number, index: number): Uint8Array {
    const { blockSize } = this.config;
    return new Uint8Array(this.slabs[slab].bytes, index * blockSize, blockSize);
  }

  /** Append one slab and push its blocks onto the free list; false at the limit. */
  private grow(): boolean {
    if (this.slabs.length >= this.config.maxSlabs) return false;

    const { blockSize, blocksPerSlab } = this.config;
    const slabIndex = this.slabs.length;
    this.slabs.push({
      bytes: new ArrayBuffer(blockSize * blocksPerSlab),
      generations: new Uint32Array(blocksPerSlab),
      live: new Uint8Array(blocksPerSlab),
    });
    // Pushed in reverse so allocation walks a fresh slab from index 0
    for (let index = blocksPerSlab - 1; index >= 0; index--) {
      this.freeList.push({ slab: slabIndex, index });
    }

    this.logger.debug("pool:grow", {
      poolId: this.id,
      slabCount: this.slabs.length,
      capacity: this.capacity,
    });
    return true;
  }
}
