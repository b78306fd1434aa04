/**
 * Frame renderer. Draws the three panels, or the too-small notice, into a
 * surface. Every character goes through `BoundedWriter`.
 */

import { describeCommandFailure } from '../errors/index.js';
import type { CommandName } from '../types/inventory.js';
import type {
  BlockDevice,
  LogicalVolume,
  PhysicalVolume,
  SourceStatus,
  TopologySnapshot,
  VolumeGroup,
} from '../types/topology.js';
import type { PanelId, UiState } from '../types/ui.js';
import { membersOf } from '../topology/builder.js';
import { formatSize } from '../utils/data-size.js';
import type { CellStyle, Surface } from '../terminal/frame-buffer.js';
import { BoundedWriter, insetRegion, type Region, type WriteStats } from './bounded.js';
import { formatColumns, type Column } from './format.js';
import { KEY_HINTS } from './keybindings.js';
import { TOO_SMALL_NOTICE, type Layout } from './layout.js';
import { PANEL_ORDER } from './state.js';

export interface RenderOptions {
  refreshing: boolean;
}

interface Line {
  text: string;
  style?: CellStyle;
}

const PANEL_TITLES: Record<PanelId, string> = {
  VolumeGroupList: 'Volume Groups',
  PhysicalVolumeDetail: 'Physical Volumes',
  BlockDeviceList: 'Block Devices',
};

const VG_COLUMNS: Column[] = [{ width: 2 }, { width: 13 }, { width: 10, align: 'right' }, { width: 10, align: 'right' }];

const PV_COLUMNS: Column[] = [
  { width: 2 },
  { width: 9 },
  { width: 10, align: 'right' },
  { width: 3, align: 'right' },
  { width: 10, align: 'right' },
  { width: 16 },
];

const DEVICE_COLUMNS: Column[] = [
  { width: 2 },
  { width: 10 },
  { width: 10, align: 'right' },
  { width: 5 },
  { width: 4 },
  { width: 5 },
  { width: 11 },
  { width: 10 },
  { width: 12 },
];

const SEGMENT_COLUMNS: Column[] = [
  { width: 8, align: 'right' },
  { width: 8, align: 'right' },
  { width: 8, align: 'right' },
  { width: 9, align: 'right' },
  { width: 10 },
  { width: 8, align: 'right' },
];

const SELECTED_FOCUSED: CellStyle = { inverse: true };
const BOLD: CellStyle = { bold: true };

/**
 * Message shown in place of a panel's column header when its source has nothing to show
 */
export function sourceMessage(status: SourceStatus): string | null {
  switch (status.state) {
    case 'ok':
    case 'disabled':
      return null;
    case 'pending':
      return 'loading...';
    case 'failed':
      return status.failure.kind === 'PermissionDenied'
        ? 'permission denied (run as root)'
        : `unavailable: ${describeCommandFailure(status.failure)}`;
  }
}

function marker(selected: boolean, issues: readonly unknown[]): string {
  return `${selected ? '>' : ' '}${issues.length > 0 ? '?' : ' '}`;
}

function rowStyle(selected: boolean, focused: boolean): CellStyle | undefined {
  return selected && focused ? SELECTED_FOCUSED : undefined;
}

function drawBox(writer: BoundedWriter, screen: Region, region: Region, title: string, focused: boolean): void {
  const inner = Math.max(0, region.width - 2);
  const bottom = region.top + region.height - 1;
  writer.write(screen, region.top, region.left, `┌${'─'.repeat(inner)}┐`);
  for (let row = region.top + 1; row < bottom; row++) {
    writer.write(screen, row, region.left, '│');
    writer.write(screen, row, region.left + region.width - 1, '│');
  }
  writer.write(screen, bottom, region.left, `└${'─'.repeat(inner)}┘`);

  const titleRegion: Region = { top: region.top, left: region.left + 2, width: Math.max(0, region.width - 4), height: 1 };
  writer.write(titleRegion, 0, 0, ` ${title} `, focused ? BOLD : undefined);
}

function writeLines(writer: BoundedWriter, region: Region, firstRow: number, lines: readonly Line[]): void {
  lines.forEach((line, index) => {
    writer.write(region, firstRow + index, 0, line.text, line.style);
  });
}

function skippedRecords(snapshot: TopologySnapshot): number {
  let skipped = snapshot.topology.diagnostics.skippedSegments;
  for (const status of Object.values(snapshot.sources)) {
    if (status.state === 'ok') skipped += status.skipped;
  }
  return skipped;
}

function sourceLine(label: string, sources: TopologySnapshot['sources'], name: CommandName): Line | null {
  const message = sourceMessage(sources[name]);
  return message === null ? null : { text: `${label} ${message}` };
}

function logicalVolumeLines(lv: LogicalVolume, snapshot: TopologySnapshot): Line[] {
  const lines: Line[] = [
    { text: `${lv.issues.length > 0 ? '? ' : ''}LV ${lv.name}  ${formatSize(lv.sizeBytes)}`, style: BOLD },
  ];

  const fs = lv.filesystem;
  lines.push({
    text: fs
      ? `  Mount: ${fs.mountPoint}  Used: ${formatSize(fs.usedBytes)}  Avail: ${formatSize(fs.availableBytes)}`
      : '  Mount: not mounted',
  });
  for (const issue of lv.issues) {
    lines.push({ text: `  ? ${issue.detail}` });
  }

  const unavailable = sourceLine('  Segments', snapshot.sources, 'segments');
  if (unavailable) {
    lines.push(unavailable);
    return lines;
  }
  if (lv.segments.length === 0) {
    lines.push({ text: '  (no segments)' });
    return lines;
  }

  lines.push({
    text: `  ${formatColumns(['LE Start', 'LE End', 'PE Count', 'PE Size', 'PVs', 'PE Start'], SEGMENT_COLUMNS)}`,
    style: { dim: true },
  });
  for (const segment of lv.segments) {
    segment.stripes.forEach((stripe, index) => {
      const extents =
        index === 0
          ? [String(segment.leStart), String(segment.leEnd), String(segment.peCount), formatSize(segment.peSizeBytes)]
          : ['', '', '', ''];
      const peStart = stripe.peStart === null ? 'N/A' : String(stripe.peStart);
      lines.push({ text: `  ${formatColumns([...extents, shortDevice(stripe.pvId), peStart], SEGMENT_COLUMNS)}` });
    });
    if (segment.stripes.length === 0) {
      const extents = [String(segment.leStart), String(segment.leEnd), String(segment.peCount)];
      lines.push({ text: `  ${formatColumns([...extents, formatSize(segment.peSizeBytes), '-', 'N/A'], SEGMENT_COLUMNS)}` });
    }
  }
  return lines;
}

function volumeGroupDetailLines(vg: VolumeGroup, snapshot: TopologySnapshot): Line[] {
  const { topology } = snapshot;
  const lines: Line[] = [{ text: vg.name, style: BOLD }];

  if (vg.kind === 'lvm') {
    lines.push({
      text: `Format: ${vg.format ?? 'Unknown'}  Attr: ${vg.attributes ?? 'Unknown'}  Extent: ${formatSize(vg.extentSizeBytes)}`,
    });
    lines.push({ text: `Size: ${formatSize(vg.sizeBytes)}  Free: ${formatSize(vg.freeBytes)}` });
    lines.push({ text: `PVs: ${vg.pvIds.length}  LVs: ${vg.lvIds.length}` });
  } else if (vg.kind === 'unknown') {
    lines.push({ text: 'Members whose volume group was not reported' });
  } else {
    lines.push({ text: 'Physical volumes outside any volume group' });
  }
  for (const issue of vg.issues) {
    lines.push({ text: `? ${issue.detail}` });
  }

  const { lvs } = membersOf(topology, vg);
  const unavailable = sourceLine('LVs', snapshot.sources, 'logicalVolumes');
  if (unavailable) {
    lines.push(unavailable);
  } else if (lvs.length > 0) {
    lines.push({ text: `LVs: ${lvs.map(lv => lv.name).join(', ')}` });
  }
  for (const lv of lvs) {
    lines.push(...logicalVolumeLines(lv, snapshot));
  }
  return lines;
}

function renderVolumeGroups(
  writer: BoundedWriter,
  region: Region,
  state: UiState,
  snapshot: TopologySnapshot,
  focused: boolean
): void {
  const inner = insetRegion(region);
  const panel = state.panels.VolumeGroupList;
  const groups = state.topology.volumeGroups;

  const message = sourceMessage(snapshot.sources.volumeGroups);
  writer.write(
    inner,
    0,
    0,
    message ?? formatColumns(['', 'VG', 'Size', 'Free'], VG_COLUMNS),
    message ? undefined : { dim: true }
  );

  if (groups.length === 0) {
    writer.write(inner, 1, 0, '  (no volume groups)');
  }
  for (let row = 0; row < panel.viewport; row++) {
    const index = panel.scroll + row;
    const vg = groups[index];
    if (!vg) break;
    const selected = index === panel.selection;
    const text = formatColumns(
      [
        marker(selected, vg.kind === 'unknown' ? ['unresolved'] : vg.issues),
        vg.name,
        formatSize(vg.sizeBytes),
        formatSize(vg.freeBytes),
      ],
      VG_COLUMNS
    );
    writer.writeLine(inner, row + 1, text, rowStyle(selected, focused));
  }

  const selected = groups[panel.selection];
  if (selected) {
    writeLines(writer, inner, panel.viewport + 2, volumeGroupDetailLines(selected, snapshot));
  }
}

function renderPhysicalVolumes(
  writer: BoundedWriter,
  region: Region,
  state: UiState,
  snapshot: TopologySnapshot,
  focused: boolean
): void {
  const inner = insetRegion(region);
  const panel = state.panels.PhysicalVolumeDetail;
  const vg = state.topology.volumeGroups[state.panels.VolumeGroupList.selection];
  const pvs: PhysicalVolume[] = vg ? membersOf(state.topology, vg).pvs : [];

  const message = sourceMessage(snapshot.sources.physicalVolumes);
  writer.write(
    inner,
    0,
    0,
    message ?? formatColumns(['', 'Device', 'Size', 'LVs', 'Free', 'VG'], PV_COLUMNS),
    message ? undefined : { dim: true }
  );

  if (pvs.length === 0 && message === null) {
    writer.write(inner, 1, 0, '  (no physical volumes)');
  }
  for (let row = 0; row < panel.viewport; row++) {
    const index = panel.scroll + row;
    const pv = pvs[index];
    if (!pv) break;
    const selected = index === panel.selection;
    const text = formatColumns(
      [
        marker(selected, pv.issues),
        shortDevice(pv.devicePath),
        formatSize(pv.sizeBytes),
        String(pv.lvCount),
        formatSize(pv.freeBytes),
        pv.vgName ?? '-',
      ],
      PV_COLUMNS
    );
    writer.writeLine(inner, row + 1, text, rowStyle(selected, focused));
  }
}

function shortDevice(path: string): string {
  return path.startsWith('/dev/') ? path.slice('/dev/'.length) : path;
}

function deviceFlags(device: BlockDevice): string {
  if (device.flags.length === 0) return '-';
  return device.flags.map(flag => (flag === 'lvm' ? 'LVM' : flag)).join(',');
}

/**
 * Disks rarely carry a filesystem label; their model fills the column instead
 */
function deviceLabel(device: BlockDevice): string {
  return device.label ?? (device.kind === 'disk' ? device.model : null) ?? '-';
}

function renderBlockDevices(
  writer: BoundedWriter,
  region: Region,
  state: UiState,
  snapshot: TopologySnapshot,
  focused: boolean
): void {
  const inner = insetRegion(region);
  const panel = state.panels.BlockDeviceList;
  const devices = state.topology.blockDevices;

  const message = sourceMessage(snapshot.sources.blockDevices);
  writer.write(
    inner,
    0,
    0,
    message ?? formatColumns(['', 'Device', 'Size', 'Type', 'Part', 'Table', 'FS', 'Label', 'Flags'], DEVICE_COLUMNS),
    message ? undefined : { dim: true }
  );

  for (let row = 0; row < panel.viewport; row++) {
    const index = panel.scroll + row;
    const device = devices[index];
    if (!device) break;
    const selected = index === panel.selection;
    const text = formatColumns(
      [
        marker(selected, []),
        device.name,
        formatSize(device.sizeBytes),
        device.kind,
        device.partitionRole,
        device.tableType ?? '-',
        device.fsType ?? '-',
        deviceLabel(device),
        deviceFlags(device),
      ],
      DEVICE_COLUMNS
    );
    writer.writeLine(inner, row + 1, text, rowStyle(selected, focused));
  }
}

function renderStatus(writer: BoundedWriter, region: Region, snapshot: TopologySnapshot, options: RenderOptions): void {
  const bar: Region = {
    top: region.top + region.height - 1,
    left: region.left + 2,
    width: Math.max(0, region.width - 4),
    height: 1,
  };
  const parts = [options.refreshing ? 'refreshing' : null, `skipped ${skippedRecords(snapshot)}`, KEY_HINTS];
  writer.write(bar, 0, 0, ` ${parts.filter(part => part !== null).join(' | ')} `);
}

function panelTitle(id: PanelId, state: UiState): string {
  if (id !== 'PhysicalVolumeDetail') return PANEL_TITLES[id];
  const vg = state.topology.volumeGroups[state.panels.VolumeGroupList.selection];
  return vg ? `${PANEL_TITLES[id]}: ${vg.name}` : PANEL_TITLES[id];
}

/**
 * Draw one frame and report what the writer did
 */
export function renderFrame(
  surface: Surface,
  layout: Layout,
  state: UiState,
  snapshot: TopologySnapshot,
  options: RenderOptions
): WriteStats {
  const writer = new BoundedWriter(surface);

  if (layout.kind === 'too-small') {
    writer.write(layout.screen, 0, 0, TOO_SMALL_NOTICE);
    return writer.getStats();
  }

  const { screen, panels } = layout;
  for (const id of PANEL_ORDER) {
    drawBox(writer, screen, panels[id], panelTitle(id, state), state.focus === id);
  }

  renderVolumeGroups(writer, panels.VolumeGroupList, state, snapshot, state.focus === 'VolumeGroupList');
  renderPhysicalVolumes(writer, panels.PhysicalVolumeDetail, state, snapshot, state.focus === 'PhysicalVolumeDetail');
  renderBlockDevices(writer, panels.BlockDeviceList, state, snapshot, state.focus === 'BlockDeviceList');
  renderStatus(writer, panels.VolumeGroupList, snapshot, options);

  return writer.getStats();
}
