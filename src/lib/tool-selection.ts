import {logger} from 'genkit/logging';
import type {ToolId} from '@/lib/tools';

/**
 * Which tool the UI shows. `'none'` is the dashboard. The UI owns this value
 * and passes it back in; nothing here keeps it between calls.
 */
export type ToolSelection = 'none' | ToolId;

export type SelectionEvent = {type: 'select'; tool: ToolId} | {type: 'back'};

export const INITIAL_SELECTION: ToolSelection = 'none';

// Tools are only reachable from the dashboard; anything else leaves the state as it was.
export function nextSelection(current: ToolSelection, event: SelectionEvent): ToolSelection {
  switch (event.type) {
    case 'select':
      if (current === 'none') return event.tool;
      logger.debug(`Ignoring selection of ${event.tool} while ${current} is open`);
      return current;
    case 'back':
      return 'none';
  }
}
