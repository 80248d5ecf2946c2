import type { ProjectionSnapshot } from "@supplygraph/shared";
import { logger } from "../utils/logger.js";

export interface ProjectionOperations {
  create(graphName: string): Promise<{ nodeCount: number; relationshipCount: number }>;
  drop(graphName: string): Promise<void>;
}

export interface ProjectionLease {
  readonly snapshot: ProjectionSnapshot;
  release(): void;
}

interface TrackedProjection {
  snapshot: ProjectionSnapshot;
  leases: number;
  retired: boolean;
}

/**
 * Holds the current algorithm projection as a versioned snapshot.
 *
 * A refresh builds `<base>_v<n>` next to the live projection and swaps the
 * reference once the build has finished, so readers always lease a complete
 * projection. Retired projections are dropped after their last lease is
 * released. Refreshes run one at a time.
 */
export class ProjectionManager {
  private current: TrackedProjection | null = null;
  private version = 0;
  private refreshQueue: Promise<unknown> = Promise.resolve();
  private pendingRefresh: Promise<ProjectionSnapshot> | null = null;
  private readonly retiredDrops = new Set<Promise<void>>();

  constructor(
    private readonly baseName: string,
    private readonly operations: ProjectionOperations
  ) {}

  snapshot(): ProjectionSnapshot | null {
    return this.current?.snapshot ?? null;
  }

  async acquire(): Promise<ProjectionLease> {
    if (!this.current) {
      // Readers that arrive before any projection exists share the queued build.
      await (this.pendingRefresh ?? this.refresh());
    }

    const tracked = this.current;
    if (!tracked) {
      throw new Error("Graph projection is not available");
    }

    tracked.leases += 1;
    let released = false;
    return {
      snapshot: tracked.snapshot,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        tracked.leases -= 1;
        if (tracked.retired && tracked.leases === 0) {
          this.dropRetired(tracked);
        }
      }
    };
  }

  async withProjection<T>(fn: (snapshot: ProjectionSnapshot) => Promise<T>): Promise<T> {
    const lease = await this.acquire();
    try {
      return await fn(lease.snapshot);
    } finally {
      lease.release();
    }
  }

  refresh(): Promise<ProjectionSnapshot> {
    const next = this.refreshQueue.catch(() => undefined).then(() => this.rebuild());
    this.refreshQueue = next;
    this.pendingRefresh = next;
    const clearPending = (): void => {
      if (this.pendingRefresh === next) {
        this.pendingRefresh = null;
      }
    };
    void next.then(clearPending, clearPending);
    return next;
  }

  /** Drops every projection this manager created, waiting for pending drops. */
  async dispose(): Promise<void> {
    const tracked = this.current;
    this.current = null;
    if (tracked) {
      tracked.retired = true;
      if (tracked.leases === 0) {
        this.dropRetired(tracked);
      }
    }
    await Promise.all([...this.retiredDrops]);
  }

  /** Forgets the current projection without dropping it, e.g. after the graph was wiped. */
  invalidate(): void {
    const tracked = this.current;
    this.current = null;
    if (tracked) {
      tracked.retired = true;
      if (tracked.leases === 0) {
        this.dropRetired(tracked);
      }
    }
  }

  private async rebuild(): Promise<ProjectionSnapshot> {
    this.version += 1;
    const graphName = `${this.baseName}_v${this.version}`;
    const counts = await this.operations.create(graphName);
    const snapshot: ProjectionSnapshot = {
      graphName,
      version: this.version,
      nodeCount: counts.nodeCount,
      relationshipCount: counts.relationshipCount,
      createdAt: new Date()
    };

    const previous = this.current;
    this.current = { snapshot, leases: 0, retired: false };
    logger.info(
      { graphName, nodeCount: snapshot.nodeCount, relationshipCount: snapshot.relationshipCount },
      "Graph projection swapped in"
    );

    if (previous) {
      previous.retired = true;
      if (previous.leases === 0) {
        this.dropRetired(previous);
      }
    }

    return snapshot;
  }

  private dropRetired(tracked: TrackedProjection): void {
    const { graphName } = tracked.snapshot;
    const drop = this.operations
      .drop(graphName)
      .catch((error: unknown) => {
        logger.warn({ err: error, graphName }, "Failed to drop retired graph projection");
      })
      .finally(() => {
        this.retiredDrops.delete(drop);
      });
    this.retiredDrops.add(drop);
  }
}
