import { isAbsolute } from 'node:path';

import { InvalidPathError } from '../errors.js';

const FILE_SCHEME = 'file://';
const HEX_DIGITS = '0123456789ABCDEF';

const utf8 = new TextDecoder('utf-8', { fatal: true });

// Letters, digits and -_.~/ pass through untouched.
const isUnreservedByte = (byte: number): boolean =>
  (byte >= 0x30 && byte <= 0x39) ||
  (byte >= 0x41 && byte <= 0x5a) ||
  (byte >= 0x61 && byte <= 0x7a) ||
  byte === 0x2d ||
  byte === 0x2e ||
  byte === 0x5f ||
  byte === 0x7e ||
  byte === 0x2f;

const hexValue = (code: number): number | undefined => {
  if (code >= 0x30 && code <= 0x39) {
    return code - 0x30;
  }
  if (code >= 0x41 && code <= 0x46) {
    return code - 0x41 + 10;
  }
  if (code >= 0x61 && code <= 0x66) {
    return code - 0x61 + 10;
  }
  return undefined;
};

function percentEncodePath(filePath: string): string {
  let encoded = '';
  for (const byte of Buffer.from(filePath, 'utf8')) {
    if (isUnreservedByte(byte)) {
      encoded += String.fromCharCode(byte);
    } else {
      encoded += `%${HEX_DIGITS[byte >> 4]}${HEX_DIGITS[byte & 0x0f]}`;
    }
  }
  return encoded;
}

function percentDecodePath(encoded: string): string | undefined {
  const source = Buffer.from(encoded, 'utf8');
  const decoded: number[] = [];
  for (let i = 0; i < source.length; i += 1) {
    const byte = source[i];
    if (byte !== 0x25) {
      decoded.push(byte);
      continue;
    }
    if (i + 2 >= source.length) {
      return undefined;
    }
    const high = hexValue(source[i + 1]);
    const low = hexValue(source[i + 2]);
    if (high === undefined || low === undefined) {
      return undefined;
    }
    decoded.push((high << 4) | low);
    i += 2;
  }

  try {
    return utf8.decode(Uint8Array.from(decoded));
  } catch {
    return undefined;
  }
}

/**
 * Builds the `file://` URI the sidecar expects for an absolute path.
 */
export function toFileUri(filePath: string): string {
  if (!isAbsolute(filePath)) {
    throw new InvalidPathError(filePath);
  }
  return `${FILE_SCHEME}${percentEncodePath(filePath)}`;
}

/**
 * Inverse of {@link toFileUri}. Input that does not decode cleanly is
 * returned with only the scheme stripped.
 */
export function fromFileUri(uri: string): string {
  const path = uri.startsWith(FILE_SCHEME)
    ? uri.slice(FILE_SCHEME.length)
    : uri;
  return percentDecodePath(path) ?? path;
}
