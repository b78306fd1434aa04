/**
 * Screen layout: the VG panel takes the left half at full height, the right
 * half is split between the PV panel (top) and the block device panel (bottom).
 */

import type { PanelId } from '../types/ui.js';
import { insetRegion, type Region } from './bounded.js';

export const MIN_COLUMNS = 80;
export const MIN_ROWS = 10;
export const TOO_SMALL_NOTICE = `Terminal too small. Please resize to at least ${MIN_COLUMNS}x${MIN_ROWS}.`;

export type Layout =
  | { readonly kind: 'too-small'; readonly screen: Region }
  | {
      readonly kind: 'panels';
      readonly screen: Region;
      readonly panels: Readonly<Record<PanelId, Region>>;
      readonly viewports: Readonly<Record<PanelId, number>>;
    };

/**
 * Visible VG list rows: a third of the panel below its header row, the rest
 * is left for the selected group's details
 */
export function volumeGroupListRows(panel: Region): number {
  return Math.max(1, Math.floor((insetRegion(panel).height - 1) / 3));
}

/**
 * Visible rows of a plain list panel: its inner height minus the header row
 */
export function listRows(panel: Region): number {
  return Math.max(1, insetRegion(panel).height - 1);
}

export function computeLayout(columns: number, rows: number): Layout {
  const screen: Region = { top: 0, left: 0, width: Math.max(0, columns), height: Math.max(0, rows) };
  if (columns < MIN_COLUMNS || rows < MIN_ROWS) {
    return { kind: 'too-small', screen };
  }

  const leftWidth = Math.floor(columns / 2);
  const rightWidth = columns - leftWidth;
  const topHeight = Math.floor(rows / 2);

  const panels: Record<PanelId, Region> = {
    VolumeGroupList: { top: 0, left: 0, width: leftWidth, height: rows },
    PhysicalVolumeDetail: { top: 0, left: leftWidth, width: rightWidth, height: topHeight },
    BlockDeviceList: { top: topHeight, left: leftWidth, width: rightWidth, height: rows - topHeight },
  };

  return {
    kind: 'panels',
    screen,
    panels,
    viewports: {
      VolumeGroupList: volumeGroupListRows(panels.VolumeGroupList),
      PhysicalVolumeDetail: listRows(panels.PhysicalVolumeDetail),
      BlockDeviceList: listRows(panels.BlockDeviceList),
    },
  };
}
