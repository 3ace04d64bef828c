/**
 * Envelope wire format
 *
 *   v1.<nonce>.<ciphertext>.<tag>
 *
 * Segments are unpadded base64url; "." is outside that alphabet, so the split
 * is unambiguous. Lengths are checked here, before any bytes reach a MAC or
 * a cipher.
 */

import * as constants from './constants.js';
import { EnvelopeParseError } from './errors.js';

export interface Envelope {
  nonce: Uint8Array;
  ciphertext: Uint8Array; // includes the 16-byte Poly1305 tag
  tag: Uint8Array; // HMAC-SHA256
}

const BASE64URL = /^[A-Za-z0-9_-]+$/;

const VERSION_BYTES = new TextEncoder().encode(constants.ENVELOPE_VERSION);

function encodeSegment(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64url');
}

/**
 * Strict base64url decode: rejects foreign characters and non-canonical
 * trailing bits, which Buffer would otherwise accept silently.
 */
function decodeSegment(name: string, segment: string): Uint8Array {
  if (!BASE64URL.test(segment)) {
    throw new EnvelopeParseError(`Envelope ${name} is not base64url`);
  }
  const bytes = Buffer.from(segment, 'base64url');
  if (bytes.toString('base64url') !== segment) {
    throw new EnvelopeParseError(`Envelope ${name} is not canonically encoded`);
  }
  return new Uint8Array(bytes);
}

/**
 * Bytes covered by the HMAC tag: version || nonce || ciphertext
 */
export function macInput(nonce: Uint8Array, ciphertext: Uint8Array): Uint8Array {
  const out = new Uint8Array(VERSION_BYTES.length + nonce.length + ciphertext.length);
  out.set(VERSION_BYTES, 0);
  out.set(nonce, VERSION_BYTES.length);
  out.set(ciphertext, VERSION_BYTES.length + nonce.length);
  return out;
}

/**
 * Associated data bound into the AEAD
 */
export function aeadAssociatedData(): Uint8Array {
  return VERSION_BYTES;
}

export function encodeEnvelope(envelope: Envelope): string {
  return [
    constants.ENVELOPE_VERSION,
    encodeSegment(envelope.nonce),
    encodeSegment(envelope.ciphertext),
    encodeSegment(envelope.tag),
  ].join(constants.ENVELOPE_SEPARATOR);
}

export function decodeEnvelope(value: string): Envelope {
  const segments = value.split(constants.ENVELOPE_SEPARATOR);
  if (segments.length !== constants.ENVELOPE_SEGMENT_COUNT) {
    throw new EnvelopeParseError(
      `Envelope has ${segments.length} segments (expected ${constants.ENVELOPE_SEGMENT_COUNT})`
    );
  }

  const [version, nonceSegment, ciphertextSegment, tagSegment] = segments;
  if (version !== constants.ENVELOPE_VERSION) {
    throw new EnvelopeParseError('Unsupported envelope version');
  }

  const nonce = decodeSegment('nonce', nonceSegment);
  if (nonce.length !== constants.AEAD_NONCE_LENGTH) {
    throw new EnvelopeParseError(
      `Invalid nonce length: expected ${constants.AEAD_NONCE_LENGTH}, got ${nonce.length}`
    );
  }

  const ciphertext = decodeSegment('ciphertext', ciphertextSegment);
  if (ciphertext.length < constants.AEAD_TAG_LENGTH) {
    throw new EnvelopeParseError(
      `Ciphertext too short: ${ciphertext.length} bytes (minimum ${constants.AEAD_TAG_LENGTH})`
    );
  }

  const tag = decodeSegment('tag', tagSegment);
  if (tag.length !== constants.MAC_TAG_LENGTH) {
    throw new EnvelopeParseError(
      `Invalid tag length: expected ${constants.MAC_TAG_LENGTH}, got ${tag.length}`
    );
  }

  return { nonce, ciphertext, tag };
}
