/**
 * Panel/focus state machine. Pure: every transition returns a new state.
 */

import type { Topology } from '../types/topology.js';
import type { PanelId, PanelState, UiAction, UiState } from '../types/ui.js';

export const PANEL_ORDER: readonly PanelId[] = ['VolumeGroupList', 'PhysicalVolumeDetail', 'BlockDeviceList'];

const INITIAL_PANEL: PanelState = { selection: 0, scroll: 0, viewport: 1 };

export function createInitialState(topology: Topology): UiState {
  return {
    focus: 'VolumeGroupList',
    panels: {
      VolumeGroupList: INITIAL_PANEL,
      PhysicalVolumeDetail: INITIAL_PANEL,
      BlockDeviceList: INITIAL_PANEL,
    },
    topology,
  };
}

export function nextPanel(panel: PanelId): PanelId {
  const index = PANEL_ORDER.indexOf(panel);
  return PANEL_ORDER[(index + 1) % PANEL_ORDER.length] ?? 'VolumeGroupList';
}

/**
 * Identifiers of a panel's items, in display order. The PV panel lists the
 * members of the VG selected in `vgSelection`.
 */
export function panelItemKeys(topology: Topology, panel: PanelId, vgSelection: number): readonly string[] {
  switch (panel) {
    case 'VolumeGroupList':
      return topology.volumeGroups.map(vg => vg.id);
    case 'PhysicalVolumeDetail':
      return topology.volumeGroups[vgSelection]?.pvIds ?? [];
    case 'BlockDeviceList':
      return topology.blockDevices.map(device => device.path);
  }
}

export function selectedKey(state: UiState, panel: PanelId): string | null {
  const keys = panelItemKeys(state.topology, panel, state.panels.VolumeGroupList.selection);
  return keys[state.panels[panel].selection] ?? null;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Clamp the selection into [0, count-1] (0 when empty) and move scroll by the
 * least amount that keeps the selection inside the viewport
 */
export function fitPanel(panel: PanelState, count: number, selection: number = panel.selection): PanelState {
  const viewport = Math.max(1, panel.viewport);
  const nextSelection = clamp(selection, 0, Math.max(0, count - 1));

  let scroll = panel.scroll;
  if (nextSelection < scroll) {
    scroll = nextSelection;
  } else if (nextSelection >= scroll + viewport) {
    scroll = nextSelection - viewport + 1;
  }
  scroll = clamp(scroll, 0, Math.max(0, count - viewport));

  if (nextSelection === panel.selection && scroll === panel.scroll) return panel;
  return { ...panel, selection: nextSelection, scroll };
}

function withPanel(state: UiState, id: PanelId, panel: PanelState): UiState {
  if (state.panels[id] === panel) return state;
  return { ...state, panels: { ...state.panels, [id]: panel } };
}

function moveSelection(state: UiState, delta: number): UiState {
  const focus = state.focus;
  const vgSelection = state.panels.VolumeGroupList.selection;
  const count = panelItemKeys(state.topology, focus, vgSelection).length;
  const current = state.panels[focus];
  const moved = withPanel(state, focus, fitPanel(current, count, current.selection + delta));

  if (focus !== 'VolumeGroupList' || moved === state) return moved;

  // The PV panel lists members of the selected VG; keep its selection in range
  const pvCount = panelItemKeys(moved.topology, 'PhysicalVolumeDetail', moved.panels.VolumeGroupList.selection).length;
  return withPanel(moved, 'PhysicalVolumeDetail', fitPanel(moved.panels.PhysicalVolumeDetail, pvCount));
}

/**
 * Keep a panel's index when its selected identifier survives the refresh,
 * otherwise return to the top
 */
function refreshPanel(panel: PanelState, previousKey: string | null, keys: readonly string[]): PanelState {
  if (previousKey !== null && keys.includes(previousKey)) {
    return fitPanel(panel, keys.length);
  }
  return { ...panel, selection: 0, scroll: 0 };
}

function refresh(state: UiState, topology: Topology): UiState {
  const previousVg = selectedKey(state, 'VolumeGroupList');
  const previousPv = selectedKey(state, 'PhysicalVolumeDetail');
  const previousDevice = selectedKey(state, 'BlockDeviceList');

  const vgPanel = refreshPanel(state.panels.VolumeGroupList, previousVg, panelItemKeys(topology, 'VolumeGroupList', 0));
  const pvPanel = refreshPanel(
    state.panels.PhysicalVolumeDetail,
    previousPv,
    panelItemKeys(topology, 'PhysicalVolumeDetail', vgPanel.selection)
  );
  const devicePanel = refreshPanel(
    state.panels.BlockDeviceList,
    previousDevice,
    panelItemKeys(topology, 'BlockDeviceList', 0)
  );

  return {
    ...state,
    topology,
    panels: { VolumeGroupList: vgPanel, PhysicalVolumeDetail: pvPanel, BlockDeviceList: devicePanel },
  };
}

function resize(state: UiState, viewports: Readonly<Record<PanelId, number>>): UiState {
  let next = state;
  const vgSelection = state.panels.VolumeGroupList.selection;
  for (const id of PANEL_ORDER) {
    const panel = { ...next.panels[id], viewport: Math.max(1, viewports[id]) };
    const count = panelItemKeys(state.topology, id, vgSelection).length;
    next = withPanel(next, id, fitPanel(panel, count));
  }
  return next;
}

export function reduceUiState(state: UiState, action: UiAction): UiState {
  switch (action.type) {
    case 'cycle-focus':
      return { ...state, focus: nextPanel(state.focus) };
    case 'move-selection':
      return moveSelection(state, action.delta);
    case 'refresh':
      return refresh(state, action.topology);
    case 'resize':
      return resize(state, action.viewports);
  }
}
