/** A point on the model's 1000×1000 grid. */
export type NormalizedPoint = [x: number, y: number];

export interface Point {
  x: number;
  y: number;
}

export interface Viewport {
  width: number;
  height: number;
}

// ---------- Actions ----------

export type PointerActionKind =
  | 'left_click'
  | 'double_click'
  | 'triple_click'
  | 'right_click'
  | 'middle_click'
  | 'mouse_move';

export interface PointerAction {
  action: PointerActionKind;
  coordinate: NormalizedPoint;
}

export interface DragAction {
  action: 'left_click_drag';
  coordinate: NormalizedPoint;
  /** Drag origin; when absent the drag starts at the last pointer position. */
  start_coordinate?: NormalizedPoint;
}

export interface TypeAction {
  action: 'type';
  text: string;
}

export interface KeyAction {
  action: 'key';
  keys: string[];
}

export interface ScrollAction {
  action: 'scroll';
  direction: 'up' | 'down';
  /** Normalized magnitude: 1000 scrolls one viewport height. */
  amount: number;
}

export interface WaitAction {
  action: 'wait';
  /** Seconds. */
  time: number;
}

export interface AnswerAction {
  action: 'answer';
  text: string;
}

export interface TerminateAction {
  action: 'terminate';
  status?: 'success' | 'failure';
}

export type Action =
  | PointerAction
  | DragAction
  | TypeAction
  | KeyAction
  | ScrollAction
  | WaitAction
  | AnswerAction
  | TerminateAction;

export type ActionKind = Action['action'];

export type TerminalAction = AnswerAction | TerminateAction;

export function isTerminalAction(action: Action): action is TerminalAction {
  return action.action === 'answer' || action.action === 'terminate';
}

// ---------- Session data ----------

export interface Observation {
  /** PNG screenshot of the viewport. */
  image: Buffer;
  url: string;
  viewport: Viewport;
}

export interface Turn {
  readonly observation: Observation;
  readonly action: Action;
  readonly reasoning?: string;
  /** Set when the browser could not perform the action. */
  readonly error?: string;
}

export type SessionStatus = 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'STEP_LIMIT_REACHED';

export type TerminalStatus = Exclude<SessionStatus, 'RUNNING'>;
