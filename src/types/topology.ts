/**
 * Reconciled storage topology type definitions
 */

import type { CommandFailure, CommandName } from './inventory.js';

export type IssueKind =
  | 'vg-unresolved'
  | 'member-count-mismatch'
  | 'segment-pv-unresolved'
  | 'segments-incomplete';

export interface ReconciliationIssue {
  readonly kind: IssueKind;
  readonly detail: string;
}

export type PartitionRole = 'Disk' | 'Pri' | 'Extd' | 'Logi' | '---';

export interface BlockDevice {
  readonly name: string;
  readonly path: string;
  readonly parent: string | null;
  readonly sizeBytes: number | null;
  readonly kind: string;
  readonly tableType: string | null;
  readonly partitionType: string | null;
  readonly partitionRole: PartitionRole;
  readonly fsType: string | null;
  readonly label: string | null;
  readonly mountPoint: string | null;
  readonly model: string | null;
  readonly flags: readonly string[];
}

export interface PhysicalVolume {
  readonly id: string;
  readonly devicePath: string;
  readonly vgName: string | null;
  readonly format: string | null;
  readonly sizeBytes: number | null;
  readonly freeBytes: number | null;
  readonly lvCount: number;
  readonly blockDevice: string | null;
  readonly issues: readonly ReconciliationIssue[];
}

export type VolumeGroupKind = 'lvm' | 'unknown' | 'unassigned';

export interface VolumeGroup {
  readonly id: string;
  readonly name: string;
  readonly kind: VolumeGroupKind;
  readonly format: string | null;
  readonly attributes: string | null;
  readonly extentSizeBytes: number | null;
  readonly sizeBytes: number | null;
  readonly freeBytes: number | null;
  readonly reportedPvCount: number | null;
  readonly reportedLvCount: number | null;
  readonly pvIds: readonly string[];
  readonly lvIds: readonly string[];
  readonly issues: readonly ReconciliationIssue[];
}

export interface ExtentStripe {
  readonly pvId: string;
  readonly peStart: number | null;
}

export interface ExtentSegment {
  readonly leStart: number;
  readonly leEnd: number;
  readonly peCount: number;
  readonly peSizeBytes: number | null;
  readonly stripes: readonly ExtentStripe[];
}

export interface FilesystemUsage {
  readonly mountPoint: string;
  readonly sizeBytes: number | null;
  readonly usedBytes: number | null;
  readonly availableBytes: number | null;
}

export interface LogicalVolume {
  readonly id: string;
  readonly name: string;
  readonly vgName: string;
  readonly path: string;
  readonly dmPath: string;
  readonly attributes: string | null;
  readonly sizeBytes: number | null;
  readonly filesystem: FilesystemUsage | null;
  readonly segments: readonly ExtentSegment[];
  readonly skippedSegments: number;
  readonly issues: readonly ReconciliationIssue[];
}

export interface TopologyDiagnostics {
  readonly skippedSegments: number;
  readonly unresolvedEntities: number;
}

export interface Topology {
  readonly blockDevices: readonly BlockDevice[];
  readonly physicalVolumes: readonly PhysicalVolume[];
  readonly volumeGroups: readonly VolumeGroup[];
  readonly logicalVolumes: readonly LogicalVolume[];
  readonly diagnostics: TopologyDiagnostics;
}

export type SourceStatus =
  | { readonly state: 'ok'; readonly records: number; readonly skipped: number }
  | { readonly state: 'failed'; readonly failure: CommandFailure }
  | { readonly state: 'disabled' }
  | { readonly state: 'pending' };

export interface TopologySnapshot {
  readonly generation: number;
  readonly takenAt: number;
  readonly topology: Topology;
  readonly sources: Readonly<Record<CommandName, SourceStatus>>;
}
