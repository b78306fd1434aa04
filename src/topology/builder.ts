/**
 * Topology builder: a pure join of parsed inventory records into one frozen,
 * cross-referenced topology. No I/O happens here.
 *
 * Dangling references never drop an entity. A PV or LV whose VG is missing is
 * kept, tagged `vg-unresolved` and listed under the synthetic `Unknown VG`
 * group; PVs that belong to no VG are listed under `(unassigned)`.
 */

import type { InventoryRecords, LogicalVolumeRecord, SegmentRecord } from '../types/storage.js';
import type {
  BlockDevice,
  ExtentSegment,
  ExtentStripe,
  FilesystemUsage,
  LogicalVolume,
  PhysicalVolume,
  ReconciliationIssue,
  Topology,
  VolumeGroup,
} from '../types/topology.js';
import { partitionNumber, partitionRole } from '../inventory/lsblk.js';
import { lvIdentifier, lvPathAliases, normalizeDevicePath } from './identifiers.js';

export const UNKNOWN_VG_NAME = 'Unknown VG';
export const UNASSIGNED_VG_NAME = '(unassigned)';

const LVM_MEMBER_FS = 'LVM2_member';

export type BuildInput = Partial<InventoryRecords>;

interface SegmentBuild {
  segments: ExtentSegment[];
  skipped: number;
  issues: ReconciliationIssue[];
  pvIds: Set<string>;
}

function byText<T>(key: (item: T) => string): (a: T, b: T) => number {
  return (a, b) => {
    const left = key(a);
    const right = key(b);
    return left < right ? -1 : left > right ? 1 : 0;
  };
}

function uniqueBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  return items.filter(item => {
    const id = key(item);
    if (seen.has(id)) return false;
    seen.add(id);
    return true;
  });
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function buildBlockDevices(input: BuildInput, pvPaths: ReadonlySet<string>): BlockDevice[] {
  const disks = new Map((input.partitions ?? []).map(disk => [normalizeDevicePath(disk.path), disk]));

  return uniqueBy(input.blockDevices ?? [], record => normalizeDevicePath(record.path)).map(record => {
    const path = normalizeDevicePath(record.path);
    const flags = new Set<string>();

    let model: string | null = null;
    if (record.kind === 'disk') {
      model = disks.get(path)?.model ?? null;
    } else if (record.parent !== null) {
      const number = partitionNumber(record.name);
      const partition = disks.get(normalizeDevicePath(record.parent))?.partitions.find(p => p.number === number);
      partition?.flags.forEach(flag => flags.add(flag));
    }
    if (pvPaths.has(path) || record.fsType === LVM_MEMBER_FS) {
      flags.add('lvm');
    }

    return {
      name: record.name,
      path,
      parent: record.parent,
      sizeBytes: record.sizeBytes,
      kind: record.kind,
      tableType: record.tableType,
      partitionType: record.partitionType,
      partitionRole: partitionRole(record),
      fsType: record.fsType,
      label: record.label,
      mountPoint: record.mountPoint,
      model,
      flags: [...flags].sort(),
    };
  });
}

/**
 * Hidden sub-LVs (RAID images, mirror legs, thin pool data) are reported in
 * brackets: `[lv_rimage_0]`
 */
function hiddenLvName(name: string): string | null {
  const match = name.match(/^\[(.+)\]$/);
  return match?.[1] ?? null;
}

function byLeStart(a: SegmentRecord, b: SegmentRecord): number {
  return a.leStart - b.leStart;
}

/**
 * Order, validate and resolve one LV's segments.
 * Zero-length segments and segments overlapping an earlier one are dropped and counted.
 * A stripe on a sub-LV is replaced by that sub-LV's own placement on PVs.
 */
function buildSegments(
  records: readonly SegmentRecord[],
  extentSizeBytes: number | null,
  vgPvIds: ReadonlySet<string>,
  expandSubLv: (device: string) => ExtentStripe[] | null
): SegmentBuild {
  const result: SegmentBuild = { segments: [], skipped: 0, issues: [], pvIds: new Set() };
  const unresolved = new Set<string>();
  let nextLe = 0;
  let gap = false;

  const ordered = [...records].sort(byLeStart);
  for (const record of ordered) {
    if (record.peCount === 0 || record.leStart < nextLe) {
      result.skipped++;
      continue;
    }
    if (record.leStart > nextLe) gap = true;

    const stripes = record.stripes.flatMap(stripe => {
      const placed = expandSubLv(stripe.device) ?? [
        { pvId: normalizeDevicePath(stripe.device), peStart: stripe.peStart },
      ];
      for (const { pvId } of placed) {
        if (vgPvIds.has(pvId)) {
          result.pvIds.add(pvId);
        } else {
          unresolved.add(pvId);
        }
      }
      return placed;
    });

    result.segments.push({
      leStart: record.leStart,
      leEnd: record.leStart + record.peCount - 1,
      peCount: record.peCount,
      peSizeBytes: extentSizeBytes,
      stripes,
    });
    nextLe = record.leStart + record.peCount;
  }

  if (gap) {
    result.issues.push({ kind: 'segments-incomplete', detail: 'logical extents are not contiguous' });
  }
  for (const pvId of unresolved) {
    result.issues.push({ kind: 'segment-pv-unresolved', detail: `${pvId} is not a PV of this VG` });
  }
  return result;
}

function filesystemFor(
  aliases: readonly string[],
  mounts: ReadonlyMap<string, FilesystemUsage>,
  lsblkMounts: ReadonlyMap<string, string>
): FilesystemUsage | null {
  for (const alias of aliases) {
    const usage = mounts.get(alias);
    if (usage) return usage;
  }
  for (const alias of aliases) {
    const mountPoint = lsblkMounts.get(alias);
    if (mountPoint !== undefined) {
      return { mountPoint, sizeBytes: null, usedBytes: null, availableBytes: null };
    }
  }
  return null;
}

function countMismatch(kind: string, reported: number | null, found: number): ReconciliationIssue[] {
  if (reported === null || reported === found) return [];
  return [{ kind: 'member-count-mismatch', detail: `reports ${reported} ${kind}, found ${found}` }];
}

export function buildTopology(input: BuildInput): Topology {
  const vgRecords = uniqueBy(input.volumeGroups ?? [], vg => vg.name);
  const vgByName = new Map(vgRecords.map(vg => [vg.name, vg]));

  const pvRecords = uniqueBy(input.physicalVolumes ?? [], pv => normalizeDevicePath(pv.devicePath))
    .map(pv => ({ ...pv, id: normalizeDevicePath(pv.devicePath) }))
    .sort(byText(pv => pv.id));
  const pvIdsByVg = new Map<string, string[]>();
  for (const pv of pvRecords) {
    if (pv.vgName === null) continue;
    const members = pvIdsByVg.get(pv.vgName) ?? [];
    members.push(pv.id);
    pvIdsByVg.set(pv.vgName, members);
  }

  const blockDevices = buildBlockDevices(input, new Set(pvRecords.map(pv => pv.id)));
  const blockDevicePaths = new Set(blockDevices.map(device => device.path));
  const lsblkMounts = new Map<string, string>();
  for (const device of blockDevices) {
    if (device.mountPoint !== null) lsblkMounts.set(device.path, device.mountPoint);
  }

  const mounts = new Map<string, FilesystemUsage>();
  for (const fs of input.filesystems ?? []) {
    const source = fs.source.startsWith('/') ? normalizeDevicePath(fs.source) : fs.source;
    if (mounts.has(source)) continue;
    mounts.set(source, {
      mountPoint: fs.mountPoint,
      sizeBytes: fs.sizeBytes,
      usedBytes: fs.usedBytes,
      availableBytes: fs.availableBytes,
    });
  }

  const segmentsByLv = new Map<string, SegmentRecord[]>();
  const hiddenLvs = new Set<string>();
  for (const segment of input.segments ?? []) {
    const hidden = hiddenLvName(segment.lvName);
    const id = lvIdentifier(segment.vgName, hidden ?? segment.lvName);
    if (hidden !== null) hiddenLvs.add(id);
    const list = segmentsByLv.get(id) ?? [];
    list.push(segment);
    segmentsByLv.set(id, list);
  }

  // Follow a stripe naming an LV of the same group down to the PVs under it
  const subLvStripes = (vgName: string, device: string, seen: ReadonlySet<string>): ExtentStripe[] | null => {
    if (device.includes('/')) return null;
    const id = lvIdentifier(vgName, hiddenLvName(device) ?? device);
    const records = segmentsByLv.get(id);
    if (!records || seen.has(id)) return null;
    const visited = new Set(seen).add(id);
    return [...records]
      .sort(byLeStart)
      .flatMap(record =>
        record.stripes.flatMap(
          stripe =>
            subLvStripes(vgName, stripe.device, visited) ?? [
              { pvId: normalizeDevicePath(stripe.device), peStart: stripe.peStart },
            ]
        )
      );
  };

  let skippedSegments = 0;
  const claimedLvs = new Set<string>();
  const lvsReferencingPv = new Map<string, Set<string>>();

  const lvRecords = uniqueBy(input.logicalVolumes ?? [], lv => lvIdentifier(lv.vgName, lv.name)).sort(
    byText(lv => lvIdentifier(lv.vgName, lv.name))
  );
  const logicalVolumes: LogicalVolume[] = lvRecords.map((record: LogicalVolumeRecord) => {
    const id = lvIdentifier(record.vgName, record.name);
    const vg = vgByName.get(record.vgName);
    const [vgPath, mapperPath] = lvPathAliases(record.vgName, record.name);
    const path = record.path !== null ? normalizeDevicePath(record.path) : (vgPath ?? '');
    const dmPath = record.dmPath !== null ? normalizeDevicePath(record.dmPath) : (mapperPath ?? '');

    const built = buildSegments(
      segmentsByLv.get(id) ?? [],
      vg?.extentSizeBytes ?? null,
      new Set(pvIdsByVg.get(record.vgName) ?? []),
      device => subLvStripes(record.vgName, device, new Set([id]))
    );
    claimedLvs.add(id);
    skippedSegments += built.skipped;
    for (const pvId of built.pvIds) {
      const lvs = lvsReferencingPv.get(pvId) ?? new Set<string>();
      lvs.add(id);
      lvsReferencingPv.set(pvId, lvs);
    }

    const issues: ReconciliationIssue[] = [];
    if (!vg) {
      issues.push({ kind: 'vg-unresolved', detail: `volume group ${record.vgName} not found` });
    }
    issues.push(...built.issues);

    const aliases = [...new Set([dmPath, path, ...lvPathAliases(record.vgName, record.name)])];
    return {
      id,
      name: record.name,
      vgName: record.vgName,
      path,
      dmPath,
      attributes: record.attributes,
      sizeBytes: record.sizeBytes,
      filesystem: filesystemFor(aliases, mounts, lsblkMounts),
      segments: built.segments,
      skippedSegments: built.skipped,
      issues,
    };
  });

  // Segments left over belong to no known LV; hidden sub-LVs are not listed on their own
  for (const [id, orphans] of segmentsByLv) {
    if (claimedLvs.has(id) || hiddenLvs.has(id)) continue;
    skippedSegments += orphans.length;
  }

  const physicalVolumes: PhysicalVolume[] = pvRecords.map(pv => {
    const issues: ReconciliationIssue[] = [];
    if (pv.vgName !== null && !vgByName.has(pv.vgName)) {
      issues.push({ kind: 'vg-unresolved', detail: `volume group ${pv.vgName} not found` });
    }
    return {
      id: pv.id,
      devicePath: pv.id,
      vgName: pv.vgName,
      format: pv.format,
      sizeBytes: pv.sizeBytes,
      freeBytes: pv.freeBytes,
      lvCount: lvsReferencingPv.get(pv.id)?.size ?? 0,
      blockDevice: blockDevicePaths.has(pv.id) ? pv.id : null,
      issues,
    };
  });

  const volumeGroups: VolumeGroup[] = vgRecords
    .map(record => {
      const pvIds = physicalVolumes.filter(pv => pv.vgName === record.name).map(pv => pv.id);
      const lvIds = logicalVolumes.filter(lv => lv.vgName === record.name).map(lv => lv.id);
      return {
        id: record.name,
        name: record.name,
        kind: 'lvm' as const,
        format: record.format,
        attributes: record.attributes,
        extentSizeBytes: record.extentSizeBytes,
        sizeBytes: record.sizeBytes,
        freeBytes: record.freeBytes,
        reportedPvCount: record.pvCount,
        reportedLvCount: record.lvCount,
        pvIds,
        lvIds,
        issues: [
          ...countMismatch('PVs', record.pvCount, pvIds.length),
          ...countMismatch('LVs', record.lvCount, lvIds.length),
        ],
      };
    })
    .sort(byText(vg => vg.name));

  const unresolvedPvs = physicalVolumes.filter(pv => pv.vgName !== null && !vgByName.has(pv.vgName));
  const unresolvedLvs = logicalVolumes.filter(lv => !vgByName.has(lv.vgName));
  if (unresolvedPvs.length > 0 || unresolvedLvs.length > 0) {
    volumeGroups.push(syntheticGroup(UNKNOWN_VG_NAME, 'unknown', unresolvedPvs, unresolvedLvs));
  }
  const unassignedPvs = physicalVolumes.filter(pv => pv.vgName === null);
  if (unassignedPvs.length > 0) {
    volumeGroups.push(syntheticGroup(UNASSIGNED_VG_NAME, 'unassigned', unassignedPvs, []));
  }

  const unresolvedEntities = [...physicalVolumes, ...volumeGroups, ...logicalVolumes].filter(
    entity => entity.issues.length > 0
  ).length;

  return deepFreeze({
    blockDevices,
    physicalVolumes,
    volumeGroups,
    logicalVolumes,
    diagnostics: { skippedSegments, unresolvedEntities },
  });
}

function syntheticGroup(
  name: string,
  kind: 'unknown' | 'unassigned',
  pvs: readonly PhysicalVolume[],
  lvs: readonly LogicalVolume[]
): VolumeGroup {
  return {
    id: name,
    name,
    kind,
    format: null,
    attributes: null,
    extentSizeBytes: null,
    sizeBytes: null,
    freeBytes: null,
    reportedPvCount: null,
    reportedLvCount: null,
    pvIds: pvs.map(pv => pv.id),
    lvIds: lvs.map(lv => lv.id),
    issues: [],
  };
}

/**
 * Lookup helpers over a built topology
 */
export function membersOf(topology: Topology, vg: VolumeGroup): { pvs: PhysicalVolume[]; lvs: LogicalVolume[] } {
  const pvIds = new Set(vg.pvIds);
  const lvIds = new Set(vg.lvIds);
  return {
    pvs: topology.physicalVolumes.filter(pv => pvIds.has(pv.id)),
    lvs: topology.logicalVolumes.filter(lv => lvIds.has(lv.id)),
  };
}
