import type { ComponentUpdate } from '../types/messages.js';
import type { Logger } from '../logger.js';
import type { DisplayBoard } from './display-board.js';

/** Apply one component update to the board. Unknown components are logged and dropped. */
export function routeUpdate(update: ComponentUpdate, board: DisplayBoard, logger: Logger): void {
  switch (update.component) {
    case 'stats':
      board.applyStats(update.data);
      return;
    case 'users':
      board.applyUserCount(update.data);
      return;
    case 'unknown':
      logger.info(update.name ? `unknown component update: ${update.name}` : 'update without a component name');
      return;
  }
}
