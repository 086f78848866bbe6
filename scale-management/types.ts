/**
 * Scale Management Types
 * Device registry records, supervisor state machine and observer contracts
 */

// ─────────────────────────────────────────────────────────────────────────────
// Devices
// ─────────────────────────────────────────────────────────────────────────────

export interface ScaleDevice {
  address: string;
  name: string;
}

/**
 * Diagnostic fields decoded from one notification payload
 */
export interface WeightDetails {
  rawHigh: number;
  rawLow: number;
  signFlag: number;
}

export type DecodedPayload =
  | { weight: number; details: WeightDetails }
  | { weight: null; details: Record<string, never> };

export type WeightCallback = (address: string, weight: number, details: WeightDetails) => void;

// ─────────────────────────────────────────────────────────────────────────────
// Supervisor State Machine
// ─────────────────────────────────────────────────────────────────────────────

export enum SupervisorState {
  IDLE = 'idle',
  RESOLVING = 'resolving',
  CONNECTING = 'connecting',
  SUBSCRIBING = 'subscribing',
  LISTENING = 'listening',
  TEARING_DOWN = 'tearing_down',
  WAITING = 'waiting',
  TERMINATED = 'terminated',
}

/**
 * Valid state transitions
 * Any transition not in this map is invalid and will throw.
 * Once a connection exists every exit goes through TEARING_DOWN.
 */
export const TRANSITION_RULES: Record<SupervisorState, SupervisorState[]> = {
  [SupervisorState.IDLE]: [
    SupervisorState.RESOLVING,
    SupervisorState.TERMINATED,
  ],
  [SupervisorState.RESOLVING]: [
    SupervisorState.CONNECTING,
    SupervisorState.WAITING,
    SupervisorState.TERMINATED,
  ],
  [SupervisorState.CONNECTING]: [
    SupervisorState.SUBSCRIBING,
    SupervisorState.TEARING_DOWN,  // Connected handle that is not actually connected
    SupervisorState.WAITING,
    SupervisorState.TERMINATED,
  ],
  [SupervisorState.SUBSCRIBING]: [
    SupervisorState.LISTENING,
    SupervisorState.TEARING_DOWN,
  ],
  [SupervisorState.LISTENING]: [
    SupervisorState.TEARING_DOWN,
  ],
  [SupervisorState.TEARING_DOWN]: [
    SupervisorState.WAITING,
    SupervisorState.TERMINATED,
  ],
  [SupervisorState.WAITING]: [
    SupervisorState.RESOLVING,
    SupervisorState.TERMINATED,
  ],
  [SupervisorState.TERMINATED]: [],
};

export function isValidTransition(from: SupervisorState, to: SupervisorState): boolean {
  return TRANSITION_RULES[from].includes(to);
}

export interface SupervisorStateChange {
  address: string;
  previous: SupervisorState;
  next: SupervisorState;
  timestamp: number;
}

/**
 * Timing policy for one supervisor, all in milliseconds.
 * scanIntervalMs 0 selects continuous streaming.
 */
export interface SupervisorTiming {
  scanIntervalMs: number;
  offIntervalMs: number;
  listenWindowMs: number;
  resolveTimeoutMs: number;
  pollIntervalMs: number;
  teardownTimeoutMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Runtime / Registry Records
// ─────────────────────────────────────────────────────────────────────────────

export interface DeviceRuntimeState {
  lastWeight: number | null;
  zeroSuppressed: boolean;
}

export interface ManagedDevice extends ScaleDevice {
  state: SupervisorState;
  lastSeen: number | null;
  lastWeight: number | null;
  connectionAttempts: number;
  lastError: string | null;
}

export interface WeightEvent {
  address: string;
  weight: number;
  details: WeightDetails;
  timestamp: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export class InvalidTransitionError extends Error {
  constructor(
    public readonly address: string,
    public readonly fromState: SupervisorState,
    public readonly toState: SupervisorState
  ) {
    super(`Invalid transition for scale ${address}: ${fromState} → ${toState}`);
    this.name = 'InvalidTransitionError';
  }
}
