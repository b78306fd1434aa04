/**
 * Topology store: owns the single current snapshot reference.
 *
 * A refresh collects every source, parses and builds a new snapshot off to
 * the side, then replaces the reference in one assignment. Readers only ever
 * see a complete snapshot. Concurrent refresh calls share the one in flight.
 */

import { parseInventory } from '../inventory/index.js';
import type { Logger } from '../logger/index.js';
import type { CommandName, InventoryOutput } from '../types/inventory.js';
import type { SourceStatus, Topology, TopologySnapshot } from '../types/topology.js';
import { buildTopology } from './builder.js';

export interface InventorySource {
  collect(): Promise<InventoryOutput>;
}

export type SnapshotListener = (snapshot: TopologySnapshot) => void;

export const EMPTY_TOPOLOGY: Topology = Object.freeze({
  blockDevices: [],
  physicalVolumes: [],
  volumeGroups: [],
  logicalVolumes: [],
  diagnostics: { skippedSegments: 0, unresolvedEntities: 0 },
});

function pendingSources(): Record<CommandName, SourceStatus> {
  const pending: SourceStatus = { state: 'pending' };
  return {
    blockDevices: pending,
    physicalVolumes: pending,
    volumeGroups: pending,
    logicalVolumes: pending,
    segments: pending,
    filesystems: pending,
    partitions: pending,
  };
}

export class TopologyStore {
  private current: TopologySnapshot;
  private inFlight: Promise<TopologySnapshot> | null = null;
  private readonly listeners = new Set<SnapshotListener>();
  private readonly source: InventorySource;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(source: InventorySource, logger: Logger, clock: () => number = Date.now) {
    this.source = source;
    this.logger = logger.child({ component: 'store' });
    this.clock = clock;
    this.current = Object.freeze({
      generation: 0,
      takenAt: clock(),
      topology: EMPTY_TOPOLOGY,
      sources: Object.freeze(pendingSources()),
    });
  }

  get snapshot(): TopologySnapshot {
    return this.current;
  }

  isRefreshing(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Start a refresh, or join the one already running
   */
  refresh(): Promise<TopologySnapshot> {
    if (!this.inFlight) {
      this.inFlight = this.runRefresh().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async runRefresh(): Promise<TopologySnapshot> {
    const started = this.clock();
    const output = await this.source.collect();
    const parsed = parseInventory(output);

    for (const [name, issues] of Object.entries(parsed.issues)) {
      if (issues && issues.length > 0) {
        this.logger.debug(`Skipped ${issues.length} malformed ${name} records`, { issues });
      }
    }

    const snapshot: TopologySnapshot = Object.freeze({
      generation: this.current.generation + 1,
      takenAt: this.clock(),
      topology: buildTopology(parsed.records),
      sources: Object.freeze(parsed.sources),
    });
    this.current = snapshot;

    const { topology } = snapshot;
    this.logger.info('Topology refreshed', {
      generation: snapshot.generation,
      durationMs: snapshot.takenAt - started,
      volumeGroups: topology.volumeGroups.length,
      physicalVolumes: topology.physicalVolumes.length,
      logicalVolumes: topology.logicalVolumes.length,
      blockDevices: topology.blockDevices.length,
      skippedSegments: topology.diagnostics.skippedSegments,
      unresolvedEntities: topology.diagnostics.unresolvedEntities,
    });

    for (const listener of this.listeners) {
      listener(snapshot);
    }
    return snapshot;
  }
}
