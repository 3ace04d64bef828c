/**
 * @cookie-vault/crypto
 * Key derivation and authenticated encryption for cookie envelopes
 */

export * from './constants.js';
export * from './errors.js';
export * from './logger.js';
export * from './primitives.js';
export * from './key-derivation.js';
export * from './wire.js';
export * from './message-encryptor.js';
