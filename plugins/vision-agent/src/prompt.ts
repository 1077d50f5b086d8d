import { describeAction } from './actions.js';
import { NORMALIZED_SIZE } from './coordinates.js';
import type { Turn } from './types.js';

export const SYSTEM_PROMPT = `You are a GUI automation assistant. Use mouse and keyboard to interact with a browser.

* This is an interface to a browser GUI. You control it by replying with exactly one JSON action.
* The screen's resolution is ${NORMALIZED_SIZE}x${NORMALIZED_SIZE}. All coordinates use this grid.
* Whenever you intend to click on an element, consult the screenshot to determine the coordinates.
* If clicking failed to activate an element, adjust the position so the cursor tip falls on the element.
* Click buttons, links and icons in the CENTER of the element, never on the edges.
* Some actions take time to complete; wait and observe the result when needed.

Available actions:

* \`left_click\`: Click the left mouse button at (x, y).
* \`double_click\`: Double-click the left mouse button at (x, y).
* \`triple_click\`: Triple-click at (x, y), selecting a whole line or paragraph.
* \`right_click\`: Click the right mouse button at (x, y).
* \`middle_click\`: Click the middle mouse button at (x, y).
* \`mouse_move\`: Move the cursor to (x, y) without clicking.
* \`left_click_drag\`: Press at \`start_coordinate\` (or the current cursor position) and drag to \`coordinate\`.
* \`type\`: Type a string. The focused field is cleared first.
* \`key\`: Press keys together, releasing in reverse order, e.g. ["Control", "c"] or ["Enter"].
* \`scroll\`: Scroll "up" or "down" by \`amount\` on the grid; 1000 is one full screen.
* \`wait\`: Wait \`time\` seconds for the page to load or update.
* \`answer\`: Give the final answer to the task as \`text\`.
* \`terminate\`: End the task and report its status as "success" or "failure".`;

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
  /** Base64-encoded images attached to the message. */
  images?: string[];
}

/** Render the retained turns as the "previous actions" block of the prompt. */
export function renderHistory(history: readonly Turn[]): string {
  if (history.length === 0) return '';
  const lines = history.map((turn) => {
    const line = describeAction(turn.action);
    return turn.error ? `${line} -> failed: ${turn.error}` : line;
  });
  return `Previous actions taken:\n${lines.join('\n')}`;
}

export function buildUserContent(task: string, history: readonly Turn[], notes: readonly string[]): string {
  const sections: string[] = [];
  const previous = renderHistory(history);
  if (previous) sections.push(previous);
  if (notes.length > 0) sections.push(notes.map((note) => `Note: ${note}`).join('\n'));
  sections.push(`Task: ${task}`);
  return sections.join('\n\n');
}

export function buildMessages(
  task: string,
  history: readonly Turn[],
  notes: readonly string[],
  screenshotBase64: string,
): ChatMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    {
      role: 'user',
      content: buildUserContent(task, history, notes),
      images: [screenshotBase64],
    },
  ];
}

export function correctiveNote(reason: string): string {
  return `Your previous reply was rejected (${reason}). Reply with exactly one JSON action object and nothing else.`;
}

export function repetitionNote(times: number): string {
  return `The same action has been repeated ${times} times on this page without progress. Try a different action.`;
}
