import type { HierarchyIdentity } from '@fleetmon/shared';
import { InvalidAddressError } from '@fleetmon/shared';

export type Octets = [number, number, number, number];

const OCTET_PATTERN = /^(0|[1-9]\d{0,2})$/;

const SOC_BAND = 10;
const BOARD_BAND = 100;

/**
 * Parse a dotted-decimal IPv4 address. Rejects anything other than four
 * decimal octets in 0-255; multi-digit octets may not carry leading zeros.
 */
export function parseIPv4(address: string): Octets {
  const parts = address.split('.');
  if (parts.length !== 4) {
    throw new InvalidAddressError(address);
  }

  const octets = parts.map((part) => {
    if (!OCTET_PATTERN.test(part)) {
      throw new InvalidAddressError(address);
    }
    const value = Number(part);
    if (value > 255) {
      throw new InvalidAddressError(address);
    }
    return value;
  });

  return [octets[0], octets[1], octets[2], octets[3]];
}

function bandId(octets: Octets, band: number): string {
  const group = Math.floor(octets[3] / band) * band;
  return `${octets[0]}.${octets[1]}.${octets[2]}.${group}`;
}

/** SoC group: last octet banded by tens (200-209 -> .200, 210-219 -> .210). */
export function deriveSocId(address: string): string {
  return bandId(parseIPv4(address), SOC_BAND);
}

/** Board group: last octet banded by hundreds (200-255 -> .200). */
export function deriveBoardId(address: string): string {
  return bandId(parseIPv4(address), BOARD_BAND);
}

export function deriveIdentity(address: string): HierarchyIdentity {
  const octets = parseIPv4(address);
  return {
    socId: bandId(octets, SOC_BAND),
    boardId: bandId(octets, BOARD_BAND),
  };
}

/**
 * A SoC id is itself a valid address, and banding it by hundreds yields the
 * same board as banding the original node address.
 */
export function boardIdForSocId(socId: string): string {
  return deriveBoardId(socId);
}

export function isValidIPv4(address: string): boolean {
  try {
    parseIPv4(address);
    return true;
  } catch (err) {
    if (err instanceof InvalidAddressError) return false;
    throw err;
  }
}
