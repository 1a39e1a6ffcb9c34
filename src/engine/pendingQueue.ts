import { PreconditionError } from "../errors.js";
import { MAX_ACTIONABLE_PENDING_ACTIONS } from "../constants.js";
import { decodePendingAction, encodePendingAction } from "../abi/pendingActions.js";
import type { Address, PendingAction } from "./types.js";

/**
 * FIFO of pending actions addressed by absolute raw index.
 *
 * The live range is [head, tail); cells inside it can be empty after
 * out-of-order removals. Both ends skip past empty cells, so `head` and
 * `tail - 1` are live whenever the queue is not empty. Removing the last
 * action frees its raw index for the next one.
 */
export interface QueueState {
  /** ring storage, capacity is a power of two */
  cells: (Uint8Array | null)[];
  head: number;
  tail: number;
  /** validator -> raw index of their pending action */
  userIndex: Map<Address, number>;
}

export interface QueuedAction {
  action: PendingAction;
  rawIndex: number;
}

/**
 * Timing rules that decide when anyone may validate an action.
 */
export interface ActionabilityWindows {
  lowLatencyDelay: bigint;
  lowLatencyValidatorDeadline: bigint;
  onChainValidatorDeadline: bigint;
  pendingActionExpiry: bigint;
}

const INITIAL_CAPACITY = 16;

export function createQueue(): QueueState {
  return { cells: new Array<Uint8Array | null>(INITIAL_CAPACITY).fill(null), head: 0, tail: 0, userIndex: new Map() };
}

export function queueLength(queue: QueueState): number {
  return queue.tail - queue.head;
}

function slot(queue: QueueState, rawIndex: number): number {
  return rawIndex & (queue.cells.length - 1);
}

function cellAt(queue: QueueState, rawIndex: number): Uint8Array | null {
  if (rawIndex < queue.head || rawIndex >= queue.tail) return null;
  return queue.cells[slot(queue, rawIndex)] ?? null;
}

function grow(queue: QueueState): void {
  const cells = new Array<Uint8Array | null>(queue.cells.length * 2).fill(null);
  for (let i = queue.head; i < queue.tail; i++) {
    cells[i & (cells.length - 1)] = queue.cells[slot(queue, i)] ?? null;
  }
  queue.cells = cells;
}

export function addPendingAction(queue: QueueState, user: Address, action: PendingAction): number {
  const existing = queue.userIndex.get(user);
  if (existing !== undefined) {
    throw new PreconditionError("PendingActionAlreadyExists", `${user} has a pending action at ${existing}`);
  }
  if (queueLength(queue) === queue.cells.length) grow(queue);
  const rawIndex = queue.tail;
  queue.cells[slot(queue, rawIndex)] = encodePendingAction(action);
  queue.tail += 1;
  queue.userIndex.set(user, rawIndex);
  return rawIndex;
}

export function getPendingActionAt(queue: QueueState, rawIndex: number): PendingAction | undefined {
  const cell = cellAt(queue, rawIndex);
  return cell === null ? undefined : decodePendingAction(cell);
}

export function getUserPendingAction(queue: QueueState, user: Address): QueuedAction | undefined {
  const rawIndex = queue.userIndex.get(user);
  if (rawIndex === undefined) return undefined;
  const action = getPendingActionAt(queue, rawIndex);
  return action && { action, rawIndex };
}

/**
 * Empties the cell at `rawIndex`, which must hold `user`'s action, then
 * moves both ends of the live range past empty cells.
 */
export function removePendingAction(queue: QueueState, rawIndex: number, user: Address): void {
  if (queue.userIndex.get(user) !== rawIndex || cellAt(queue, rawIndex) === null) {
    throw new PreconditionError("NoPendingAction", `${user} has no pending action at ${rawIndex}`);
  }
  queue.cells[slot(queue, rawIndex)] = null;
  queue.userIndex.delete(user);

  while (queue.head < queue.tail && queue.cells[slot(queue, queue.head)] === null) {
    queue.head += 1;
  }
  while (queue.tail > queue.head && queue.cells[slot(queue, queue.tail - 1)] === null) {
    queue.tail -= 1;
  }
}

export function isExpired(action: PendingAction, now: bigint, windows: ActionabilityWindows): boolean {
  return now > action.timestamp + windows.pendingActionExpiry;
}

/**
 * Whether anyone other than the validator may validate the action at `now`.
 * While the low-latency oracle window is open the exclusivity deadline is
 * short; afterwards the on-chain deadline applies.
 */
export function isActionable(action: PendingAction, now: bigint, windows: ActionabilityWindows): boolean {
  if (isExpired(action, now, windows)) return false;
  const deadline =
    now <= action.timestamp + windows.lowLatencyDelay
      ? action.timestamp + windows.lowLatencyValidatorDeadline
      : action.timestamp + windows.onChainValidatorDeadline;
  return now > deadline;
}

/**
 * Actionable actions from the head, skipping those of `excludeUser`. Visits
 * at most MAX_ACTIONABLE_PENDING_ACTIONS live records; expired records are
 * passed over without counting. Never mutates.
 */
export function getActionablePendingActions(
  queue: QueueState,
  now: bigint,
  windows: ActionabilityWindows,
  excludeUser?: Address,
  limit = Number.MAX_SAFE_INTEGER,
): QueuedAction[] {
  const found: QueuedAction[] = [];
  let visited = 0;
  for (let rawIndex = queue.head; rawIndex < queue.tail && found.length < limit; rawIndex++) {
    const cell = cellAt(queue, rawIndex);
    if (cell === null) continue;
    const action = decodePendingAction(cell);
    if (isExpired(action, now, windows)) continue;
    if (++visited > MAX_ACTIONABLE_PENDING_ACTIONS) break;
    if (excludeUser !== undefined && (action.validator === excludeUser || action.to === excludeUser)) continue;
    if (isActionable(action, now, windows)) found.push({ action, rawIndex });
  }
  return found;
}

export function getActionablePendingAction(
  queue: QueueState,
  excludeUser: Address | undefined,
  now: bigint,
  windows: ActionabilityWindows,
): QueuedAction | undefined {
  return getActionablePendingActions(queue, now, windows, excludeUser, 1)[0];
}
