/**
 * Panel, focus and navigation type definitions
 */

import type { Topology } from './topology.js';

export type PanelId = 'VolumeGroupList' | 'PhysicalVolumeDetail' | 'BlockDeviceList';

export interface PanelState {
  readonly selection: number;
  readonly scroll: number;
  /** Visible item rows, as last reported by the layout */
  readonly viewport: number;
}

export interface UiState {
  readonly focus: PanelId;
  readonly panels: Readonly<Record<PanelId, PanelState>>;
  readonly topology: Topology;
}

export type UiAction =
  | { readonly type: 'cycle-focus' }
  | { readonly type: 'move-selection'; readonly delta: number }
  | { readonly type: 'refresh'; readonly topology: Topology }
  | { readonly type: 'resize'; readonly viewports: Readonly<Record<PanelId, number>> };
