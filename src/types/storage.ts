/**
 * Parsed inventory records, one shape per source format.
 * Sizes are bytes; null means the tool reported nothing usable.
 */

export interface BlockDeviceRecord {
  name: string;
  path: string;
  parent: string | null;
  sizeBytes: number | null;
  kind: string;
  tableType: string | null;
  partitionTypeCode: string | null;
  partitionType: string | null;
  fsType: string | null;
  label: string | null;
  mountPoint: string | null;
}

export interface PhysicalVolumeRecord {
  devicePath: string;
  vgName: string | null;
  format: string | null;
  sizeBytes: number | null;
  freeBytes: number | null;
}

export interface VolumeGroupRecord {
  name: string;
  format: string | null;
  attributes: string | null;
  extentSizeBytes: number | null;
  sizeBytes: number | null;
  freeBytes: number | null;
  pvCount: number | null;
  lvCount: number | null;
}

export interface LogicalVolumeRecord {
  vgName: string;
  name: string;
  path: string | null;
  dmPath: string | null;
  attributes: string | null;
  sizeBytes: number | null;
}

export interface StripeRecord {
  device: string;
  peStart: number | null;
}

export interface SegmentRecord {
  vgName: string;
  lvName: string;
  leStart: number;
  peCount: number;
  stripes: StripeRecord[];
}

export interface FilesystemRecord {
  source: string;
  sizeBytes: number | null;
  usedBytes: number | null;
  availableBytes: number | null;
  mountPoint: string;
}

export interface PartitionRecord {
  number: number;
  fsType: string | null;
  name: string | null;
  flags: string[];
}

export interface DiskRecord {
  path: string;
  sizeBytes: number | null;
  transport: string | null;
  tableType: string | null;
  model: string | null;
  partitions: PartitionRecord[];
}

/**
 * Every parsed source of one refresh. A source that failed or was not run is empty.
 */
export interface InventoryRecords {
  blockDevices: BlockDeviceRecord[];
  physicalVolumes: PhysicalVolumeRecord[];
  volumeGroups: VolumeGroupRecord[];
  logicalVolumes: LogicalVolumeRecord[];
  segments: SegmentRecord[];
  filesystems: FilesystemRecord[];
  partitions: DiskRecord[];
}
