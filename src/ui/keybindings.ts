import type { UiAction } from '../types/ui.js';

export type InspectorCommand = 'cycle-focus' | 'move-up' | 'move-down' | 'refresh' | 'quit';

const COMMAND_BY_KEY: Readonly<Record<string, InspectorCommand>> = Object.freeze({
  tab: 'cycle-focus',
  up: 'move-up',
  k: 'move-up',
  down: 'move-down',
  j: 'move-down',
  r: 'refresh',
  q: 'quit',
  escape: 'quit',
  'C-c': 'quit',
});

/**
 * Keys arrive as terminal key names (`tab`, `up`, `C-c`, ...)
 */
export function resolveInspectorCommand(key: string): InspectorCommand | undefined {
  return Object.prototype.hasOwnProperty.call(COMMAND_BY_KEY, key) ? COMMAND_BY_KEY[key] : undefined;
}

/**
 * State transition of a navigation command; refresh and quit are handled by the app loop
 */
export function actionForCommand(command: InspectorCommand): UiAction | null {
  switch (command) {
    case 'cycle-focus':
      return { type: 'cycle-focus' };
    case 'move-up':
      return { type: 'move-selection', delta: -1 };
    case 'move-down':
      return { type: 'move-selection', delta: 1 };
    case 'refresh':
    case 'quit':
      return null;
  }
}

export const KEY_HINTS = 'Tab:panel j/k:move r:refresh q:quit';
