import {
  CookieNotFoundError,
  DecodeError,
  EnvelopeParseError,
  IntegrityError,
} from '@cookie-vault/crypto';
import { createJsonEncoder, NullEncoder } from '../encoders.js';
import { SecureCookieStore } from '../secure-cookie-store.js';
import { FakeRequest, followUp, RecordingResponse, testEncryptor } from './helpers.js';

describe('SecureCookieStore', () => {
  let store: SecureCookieStore<unknown>;

  beforeAll(async () => {
    store = new SecureCookieStore(await testEncryptor(), createJsonEncoder());
  });

  test('set then get returns the stored value', () => {
    const response = new RecordingResponse();
    store.set(response, 'sess', { path: '/' }, { uid: 42 });

    expect(store.get(followUp(response), 'sess')).toEqual({ uid: 42 });
  });

  test('set returns the cookie it emitted, attributes attached', () => {
    const response = new RecordingResponse();
    const cookie = store.set(
      response,
      'sess',
      { path: '/app', domain: 'example.com', secure: true, httpOnly: true, sameSite: 'strict', maxAge: 60 },
      { uid: 1 }
    );

    expect(response.cookies).toEqual([cookie]);
    expect(cookie).toMatchObject({
      name: 'sess',
      path: '/app',
      domain: 'example.com',
      secure: true,
      httpOnly: true,
      sameSite: 'strict',
      maxAge: 60,
    });
    expect(cookie.value).toMatch(/^v1\./);
  });

  test('set without attributes emits a bare cookie', () => {
    const response = new RecordingResponse();
    const cookie = store.set(response, 'sess', undefined, 'x');

    expect(cookie.name).toBe('sess');
    expect(cookie.path).toBeUndefined();
    expect(cookie.domain).toBeUndefined();
  });

  test('failed encoding leaves the response untouched', () => {
    const response = new RecordingResponse();

    expect(() => store.set(response, 'sess', { path: '/' }, undefined)).toThrow(DecodeError);
    expect(response.cookies).toHaveLength(0);
  });

  test('get on a request without the cookie is NotFound', () => {
    let caught: unknown;
    try {
      store.get(new FakeRequest({ cookies: { other: 'x' } }), 'sess');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CookieNotFoundError);
    expect(caught instanceof CookieNotFoundError && caught.reason).toBe('missing');
  });

  test('empty cookie value is NotFound', () => {
    expect(() => store.get(new FakeRequest({ cookies: { sess: '' } }), 'sess')).toThrow(CookieNotFoundError);
  });

  test('propagates the specific rejection kind', () => {
    const response = new RecordingResponse();
    const { value } = store.set(response, 'sess', {}, { uid: 42 });
    const [version, nonce, ciphertext, tag] = value.split('.');
    const forged = [version, nonce, ciphertext, tag.startsWith('A') ? `B${tag.slice(1)}` : `A${tag.slice(1)}`].join(
      '.'
    );

    expect(() => store.get(new FakeRequest({ cookies: { sess: 'garbage' } }), 'sess')).toThrow(EnvelopeParseError);
    expect(() => store.get(new FakeRequest({ cookies: { sess: forged } }), 'sess')).toThrow(IntegrityError);
  });

  test('authentic cookie with an undecodable payload is a DecodeError', async () => {
    const strings = new SecureCookieStore(await testEncryptor(), new NullEncoder());
    const response = new RecordingResponse();
    strings.set(response, 'sess', {}, 'not json');

    expect(() => store.get(followUp(response), 'sess')).toThrow(DecodeError);
  });

  test('an empty string value can be set and read back', async () => {
    const strings = new SecureCookieStore(await testEncryptor(), new NullEncoder());
    const response = new RecordingResponse();
    const cookie = strings.set(response, 'sess', { path: '/' }, '');

    expect(cookie.value).not.toBe('');
    expect(strings.get(followUp(response), 'sess')).toBe('');
  });

  test('delete emits an empty, expired cookie', () => {
    const response = new RecordingResponse();
    const cookie = store.delete(response, 'sess', { path: '/', domain: 'example.com', secure: true });

    expect(response.cookies).toEqual([cookie]);
    expect(cookie.name).toBe('sess');
    expect(cookie.value).toBe('');
    expect(cookie.maxAge).toBe(-1);
    expect(cookie.path).toBe('/');
    expect(cookie.domain).toBe('example.com');
  });

  test('delete works without prior state or attributes', () => {
    const response = new RecordingResponse();
    const cookie = store.delete(response, 'sess');

    expect(cookie.value).toBe('');
    expect(cookie.maxAge).toBe(-1);
  });
});
