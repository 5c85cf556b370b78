import type { SpatialAssignment } from "../models/assignment.js";
import type { BoundaryHandle, RecordStore } from "../store/record-store.js";

export interface BoundaryHandles {
  readonly region: BoundaryHandle;
  readonly district: BoundaryHandle;
}

export interface CacheStatistics {
  readonly boundariesOpen: boolean;
  readonly assignmentCacheSize: number;
  readonly cacheHits: number;
  readonly cacheMisses: number;
}

/**
 * Run-scoped state: the open boundary handles and the geometry-keyed
 * assignment cache. One per run, cleared when the run ends so coordinates
 * never resolve against a previous run's boundaries.
 */
export class RunContext {
  private handles: BoundaryHandles | null = null;
  private readonly assignments = new Map<string, SpatialAssignment>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly store: RecordStore) {}

  /** Describe both boundary datasets once; later calls reuse the handles. */
  async openBoundaries(): Promise<BoundaryHandles> {
    if (this.handles === null) {
      const region = await this.store.describeBoundary("region");
      const district = await this.store.describeBoundary("district");
      this.handles = { region, district };
    }
    return this.handles;
  }

  get boundaries(): BoundaryHandles | null {
    return this.handles;
  }

  lookup(key: string): SpatialAssignment | undefined {
    const cached = this.assignments.get(key);
    if (cached === undefined) this.misses++;
    else this.hits++;
    return cached;
  }

  remember(key: string, assignment: SpatialAssignment): void {
    this.assignments.set(key, assignment);
  }

  getCacheStatistics(): CacheStatistics {
    return {
      boundariesOpen: this.handles !== null,
      assignmentCacheSize: this.assignments.size,
      cacheHits: this.hits,
      cacheMisses: this.misses,
    };
  }

  clear(): void {
    this.handles = null;
    this.assignments.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
