/**
 * Value encoders: application value <-> payload bytes
 *
 * Decoding failures are DecodeErrors, never crypto errors: by the time a
 * payload reaches an encoder its envelope has already been verified.
 */

import { decode as cborDecode, encode as cborEncode } from 'cbor-x';
import { DecodeError, errorMessage } from '@cookie-vault/crypto';

export interface ValueEncoder<T> {
  encode(value: T): Uint8Array;
  decode(payload: Uint8Array): T;
}

/**
 * Anything with a zod-style `parse`. Use it to check the decoded shape or to
 * hydrate plain data into a class instance.
 */
export interface Schema<T> {
  parse(input: unknown): T;
}

type Parse<T> = (input: unknown) => T;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

function applySchema<T>(parse: Parse<T>, input: unknown): T {
  try {
    return parse(input);
  } catch (error) {
    throw new DecodeError(`Payload does not match the expected shape: ${errorMessage(error)}`, { cause: error });
  }
}

function utf8(payload: Uint8Array): string {
  try {
    return textDecoder.decode(payload);
  } catch (error) {
    throw new DecodeError('Payload is not valid UTF-8', { cause: error });
  }
}

export class JsonEncoder<T> implements ValueEncoder<T> {
  constructor(private readonly parse: Parse<T>) {}

  encode(value: T): Uint8Array {
    let text: string | undefined;
    try {
      text = JSON.stringify(value);
    } catch (error) {
      throw new DecodeError(`Value cannot be encoded as JSON: ${errorMessage(error)}`, { cause: error });
    }
    // JSON.stringify(undefined) and friends return undefined
    if (text === undefined) {
      throw new DecodeError('Value cannot be encoded as JSON');
    }
    return textEncoder.encode(text);
  }

  decode(payload: Uint8Array): T {
    if (payload.length === 0) {
      throw new DecodeError('Payload is empty');
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(utf8(payload));
    } catch (error) {
      if (error instanceof DecodeError) throw error;
      throw new DecodeError(`Payload is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }
    return applySchema(this.parse, parsed);
  }
}

export function createJsonEncoder(): JsonEncoder<unknown>;
export function createJsonEncoder<T>(schema: Schema<T>): JsonEncoder<T>;
export function createJsonEncoder<T>(schema?: Schema<T>): JsonEncoder<T> | JsonEncoder<unknown> {
  if (schema) {
    return new JsonEncoder<T>((input) => schema.parse(input));
  }
  return new JsonEncoder<unknown>((input) => input);
}

/**
 * Identity encoder for values that already are strings.
 * The empty string is a valid value: it encodes to an empty payload.
 */
export class NullEncoder implements ValueEncoder<string> {
  encode(value: string): Uint8Array {
    return textEncoder.encode(value);
  }

  decode(payload: Uint8Array): string {
    return utf8(payload);
  }
}

/**
 * Compact binary encoding via CBOR; same schema hook as the JSON encoder.
 */
export class CborEncoder<T> implements ValueEncoder<T> {
  constructor(private readonly parse: Parse<T>) {}

  encode(value: T): Uint8Array {
    try {
      return new Uint8Array(cborEncode(value));
    } catch (error) {
      throw new DecodeError(`Value cannot be encoded as CBOR: ${errorMessage(error)}`, { cause: error });
    }
  }

  decode(payload: Uint8Array): T {
    if (payload.length === 0) {
      throw new DecodeError('Payload is empty');
    }
    let decoded: unknown;
    try {
      decoded = cborDecode(payload);
    } catch (error) {
      throw new DecodeError(`Payload is not valid CBOR: ${errorMessage(error)}`, { cause: error });
    }
    return applySchema(this.parse, decoded);
  }
}

export function createCborEncoder(): CborEncoder<unknown>;
export function createCborEncoder<T>(schema: Schema<T>): CborEncoder<T>;
export function createCborEncoder<T>(schema?: Schema<T>): CborEncoder<T> | CborEncoder<unknown> {
  if (schema) {
    return new CborEncoder<T>((input) => schema.parse(input));
  }
  return new CborEncoder<unknown>((input) => input);
}
