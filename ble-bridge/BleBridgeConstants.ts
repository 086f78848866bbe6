/**
 * BLE Bridge Constants - kitchen scale link timing
 */

export const BLE_CONFIG = {
  // Advertised local name of supported scales (matched case-insensitively)
  DEVICE_NAME_PATTERN: 'sencorfood',

  // Scanning parameters
  SCAN_TIMEOUT: 5000,          // Discovery scan duration
  RESOLVE_TIMEOUT: 10000,      // Bounded wait for one address to advertise
  NOBLE_READY_TIMEOUT: 15000,  // Adapter must reach poweredOn within this

  // RSSI threshold for discovery filtering
  // -90 dBm keeps a scale on the next room's counter visible
  MIN_RSSI: -90,

  // node-ble polls BlueZ for newly discovered devices
  NODE_BLE_DISCOVERY_POLL: 500,
} as const;

export const TIMING = {
  LISTEN_WINDOW: 10000,        // Periodic mode: max wait for one propagated reading
  LIVENESS_POLL_INTERVAL: 1000, // Continuous mode: connection liveness check
  TEARDOWN_TIMEOUT: 5000,      // Per unsubscribe/close during teardown
  DEFAULT_SCAN_INTERVAL: 0,    // Seconds; 0 = continuous streaming
  DEFAULT_OFF_INTERVAL: 30,    // Seconds to wait after a failed cycle
} as const;

// Notification payload layout (big-endian magnitude at offset 2, sign flag at 7)
export const PAYLOAD_LAYOUT = {
  MIN_LENGTH: 4,
  RAW_HIGH_OFFSET: 2,
  RAW_LOW_OFFSET: 3,
  SIGN_OFFSET: 7,
  NEGATIVE_FLAG: 0x01,
} as const;
