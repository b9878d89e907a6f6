/**
 * MAC address normalization
 *
 * Canonical form is uppercase hex octets joined by colons ("08:3A:88:11:22:33").
 * Colon, dash, dot and bare-hex inputs are accepted.
 */

const SEPARATORS = /[:\-.\s]/g;
const HEX = /^[0-9A-F]+$/;

function toOctets(value: string): string[] | null {
  const hex = value.replace(SEPARATORS, '').toUpperCase();
  if (hex.length === 0 || hex.length % 2 !== 0 || !HEX.test(hex)) {
    return null;
  }

  // Separated input must use two-digit groups ("8:3a:88" is rejected)
  if (/[:\-]/.test(value)) {
    const groups = value.trim().split(/[:\-]/);
    if (groups.some((group) => group.length !== 2)) {
      return null;
    }
  }

  const octets: string[] = [];
  for (let i = 0; i < hex.length; i += 2) {
    octets.push(hex.slice(i, i + 2));
  }
  return octets;
}

/**
 * Normalize a full 6-octet BSSID, or null when it is not one
 */
export function normalizeBssid(value: string): string | null {
  const octets = toOctets(value);
  return octets !== null && octets.length === 6 ? octets.join(':') : null;
}

/**
 * Normalize a 1 to 6 octet MAC prefix, or null when invalid
 */
export function normalizeMacPrefix(value: string): string | null {
  const octets = toOctets(value);
  return octets !== null && octets.length >= 1 && octets.length <= 6 ? octets.join(':') : null;
}
