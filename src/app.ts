import type { Config } from './config/schema.js';
import { toError } from './errors/index.js';
import type { Logger } from './logger/index.js';
import type { Terminal } from './terminal/screen.js';
import { FrameBuffer } from './terminal/frame-buffer.js';
import { TopologyStore, type InventorySource } from './topology/store.js';
import type { TopologySnapshot } from './types/topology.js';
import type { UiAction, UiState } from './types/ui.js';
import { actionForCommand, resolveInspectorCommand } from './ui/keybindings.js';
import { computeLayout } from './ui/layout.js';
import { renderFrame } from './ui/render.js';
import { createInitialState, reduceUiState } from './ui/state.js';

/**
 * Inspector
 * Owns the UI state and connects the store, the renderer and the terminal
 */
export class Inspector {
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly terminal: Terminal;
  private readonly store: TopologyStore;
  private state: UiState;
  private timer: NodeJS.Timeout | null = null;
  private unsubscribe: (() => void) | null = null;
  private readonly quitListeners: Array<() => void> = [];
  private failedFrames = 0;

  constructor(config: Config, logger: Logger, terminal: Terminal, source: InventorySource) {
    this.config = config;
    this.logger = logger.child({ component: 'inspector' });
    this.terminal = terminal;
    this.store = new TopologyStore(source, logger);
    this.state = createInitialState(this.store.snapshot.topology);
  }

  /**
   * Draw the loading frame, start the first refresh and the refresh timer
   */
  start(): Promise<void> {
    this.unsubscribe = this.store.subscribe(snapshot => this.applySnapshot(snapshot));
    this.terminal.onKey(key => this.handleKey(key));
    this.terminal.onResize(() => this.render());

    const interval = this.config.ui.refreshIntervalMs;
    if (interval > 0) {
      this.timer = setInterval(() => {
        void this.refresh();
      }, interval);
      this.timer.unref();
    }

    return this.refresh();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  onQuit(listener: () => void): void {
    this.quitListeners.push(listener);
  }

  getState(): UiState {
    return this.state;
  }

  get snapshot(): TopologySnapshot {
    return this.store.snapshot;
  }

  handleKey(key: string): void {
    const command = resolveInspectorCommand(key);
    if (!command) return;

    if (command === 'quit') {
      this.logger.debug('Quit requested', { key });
      for (const listener of this.quitListeners) listener();
      return;
    }
    if (command === 'refresh') {
      void this.refresh();
      return;
    }

    const action = actionForCommand(command);
    if (action) this.dispatch(action);
  }

  /**
   * Refresh the topology. Key presses keep working while it runs; the
   * refreshed snapshot is applied when it lands and the frame is redrawn
   * once more after the refresh settles.
   */
  refresh(): Promise<void> {
    const pending = this.store.refresh().then(
      () => this.render(),
      (error: unknown) => {
        this.logger.error('Refresh failed', toError(error));
        this.render();
      }
    );
    this.render();
    return pending;
  }

  render(): void {
    const { columns, rows } = this.terminal;
    const layout = computeLayout(columns, rows);
    if (layout.kind === 'panels') {
      this.state = reduceUiState(this.state, { type: 'resize', viewports: layout.viewports });
    }

    const frame = new FrameBuffer(columns, rows);
    const stats = renderFrame(frame, layout, this.state, this.store.snapshot, {
      refreshing: this.store.isRefreshing(),
    });
    if (stats.failed > 0) {
      this.failedFrames++;
      this.logger.warn('Frame drawn with failed writes', { failed: stats.failed, failedFrames: this.failedFrames });
    }

    try {
      this.terminal.draw(frame);
    } catch (error) {
      this.logger.error('Failed to draw frame', toError(error));
    }
  }

  private dispatch(action: UiAction): void {
    this.state = reduceUiState(this.state, action);
    this.render();
  }

  private applySnapshot(snapshot: TopologySnapshot): void {
    this.dispatch({ type: 'refresh', topology: snapshot.topology });
  }
}
