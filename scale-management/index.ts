/**
 * Scale Management Module
 * Supervised connections, weight cache and observers for kitchen scales
 */

export {
  SupervisorState,
  TRANSITION_RULES,
  isValidTransition,
  InvalidTransitionError,
} from './types';

export type {
  ScaleDevice,
  WeightDetails,
  DecodedPayload,
  WeightCallback,
  SupervisorStateChange,
  SupervisorTiming,
  DeviceRuntimeState,
  ManagedDevice,
  WeightEvent,
} from './types';

export { decodePayload, formatPayload } from './PayloadDecoder';
export { ZeroSuppressionFilter } from './ZeroSuppressionFilter';
export { WeightCache } from './WeightCache';
export { ObserverRegistry } from './ObserverRegistry';
export { StopRequestedError, waitForSignal, waitOrStop, untilStopped } from './StopSignal';
export { DeviceSupervisor } from './DeviceSupervisor';
export type { DeviceSupervisorOptions, SupervisorEvents } from './DeviceSupervisor';
export { ScaleManager, DEFAULT_TIMING } from './ScaleManager';
export type { ScaleManagerOptions, ScaleManagerEvents } from './ScaleManager';
