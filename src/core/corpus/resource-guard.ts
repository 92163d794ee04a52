import { ResourceExhaustionError } from '../errors.js';

export interface ResourceGuard {
  // Called before each corpus unit; throws ResourceExhaustionError to stop the pass.
  check(unit: string): void;
}

export class NoopResourceGuard implements ResourceGuard {
  check(): void {}
}

export type MemoryProbe = () => number; // bytes in use
export type CollectGarbage = () => void;

const BYTES_PER_MB = 1024 * 1024;

function defaultCollector(): CollectGarbage | undefined {
  // Only present when node runs with --expose-gc
  const gc: unknown = Reflect.get(globalThis, 'gc');
  return typeof gc === 'function' ? () => gc() : undefined;
}

export class MemoryResourceGuard implements ResourceGuard {
  private limitMb: number;
  private probe: MemoryProbe;
  private collect?: CollectGarbage;

  constructor(
    limitMb: number,
    probe: MemoryProbe = () => process.memoryUsage().heapUsed,
    collect: CollectGarbage | undefined = defaultCollector()
  ) {
    this.limitMb = limitMb;
    this.probe = probe;
    this.collect = collect;
  }

  usedMb(): number {
    return this.probe() / BYTES_PER_MB;
  }

  check(unit: string): void {
    if (this.usedMb() <= this.limitMb) return;

    this.collect?.();
    const used = this.usedMb();
    if (used > this.limitMb) {
      throw new ResourceExhaustionError(used, this.limitMb, unit);
    }
  }
}
