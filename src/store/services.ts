import type { Simulator } from '../simulation/simulator.ts';
import type { HistoryManager } from '../history/history-manager.ts';
import type { ClipboardManager } from '../clipboard/clipboard-manager.ts';

/** The stateful collaborators the store's actions drive */
export interface StateManagerServices {
  simulator: Simulator;
  history: HistoryManager;
  clipboard: ClipboardManager;
}
