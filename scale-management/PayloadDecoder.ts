/**
 * Weight Payload Decoder
 *
 * Notification layout:
 * - bytes 2..3: unsigned big-endian magnitude in grams
 * - byte 7 (optional): sign flag, 0x01 = negative
 */

import { PAYLOAD_LAYOUT } from '../ble-bridge/BleBridgeConstants';
import { DecodedPayload } from './types';

export function decodePayload(bytes: Uint8Array): DecodedPayload {
  if (bytes.length < PAYLOAD_LAYOUT.MIN_LENGTH) {
    return { weight: null, details: {} };
  }

  const rawHigh = bytes[PAYLOAD_LAYOUT.RAW_HIGH_OFFSET] ?? 0;
  const rawLow = bytes[PAYLOAD_LAYOUT.RAW_LOW_OFFSET] ?? 0;
  const signFlag = bytes.length > PAYLOAD_LAYOUT.SIGN_OFFSET ? bytes[PAYLOAD_LAYOUT.SIGN_OFFSET] ?? 0 : 0;

  const rawWeight = (rawHigh << 8) | rawLow;
  const weight = signFlag === PAYLOAD_LAYOUT.NEGATIVE_FLAG ? -rawWeight : rawWeight;

  return { weight, details: { rawHigh, rawLow, signFlag } };
}

// One-line dump of a notification for trace logging
export function formatPayload(bytes: Uint8Array, now: Date = new Date()): string {
  const parts = [
    `[${now.toISOString()}] HEX: ${Buffer.from(bytes).toString('hex')}`,
    `RAW: [${Array.from(bytes).join(', ')}]`,
  ];

  const { weight } = decodePayload(bytes);
  if (weight !== null) {
    parts.push(`WEIGHT: ${weight}`);
  }
  return parts.join(' | ');
}
