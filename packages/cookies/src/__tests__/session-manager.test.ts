import {
  ConfigError,
  CookieNotFoundError,
  EnvelopeParseError,
  IntegrityError,
  isRejectedCookie,
  SessionValidationError,
} from '@cookie-vault/crypto';
import { createHostCookiePolicy } from '../cookie-policy.js';
import { createJsonEncoder, type Schema } from '../encoders.js';
import type { CookieRequest } from '../http.js';
import { SecureCookieStore } from '../secure-cookie-store.js';
import type { Session } from '../session.js';
import { CookieSessionManager, createCookieSessionManager } from '../session-manager.js';
import { FakeRequest, followUp, RecordingResponse, TEST_ITERATIONS, testEncryptor } from './helpers.js';

class AgentSession implements Session {
  constructor(
    readonly uid: number,
    readonly userAgent: string
  ) {}

  validate(request: CookieRequest): void {
    if (request.header('user-agent') !== this.userAgent) {
      throw new Error('user agent changed');
    }
  }

  toJSON() {
    return { uid: this.uid, userAgent: this.userAgent };
  }
}

const agentSessionSchema: Schema<AgentSession> = {
  parse(input) {
    if (
      typeof input === 'object' &&
      input !== null &&
      'uid' in input &&
      'userAgent' in input &&
      typeof input.uid === 'number' &&
      typeof input.userAgent === 'string'
    ) {
      return new AgentSession(input.uid, input.userAgent);
    }
    throw new Error('not an agent session');
  },
};

const BROWSER = { 'User-Agent': 'test-browser/1.0' };

describe('CookieSessionManager', () => {
  let manager: CookieSessionManager<AgentSession>;

  beforeAll(async () => {
    const store = new SecureCookieStore(await testEncryptor(), createJsonEncoder(agentSessionSchema));
    manager = new CookieSessionManager(store, {
      cookieName: 'sess',
      policy: createHostCookiePolicy({ domain: 'example.com' }),
    });
  });

  test('update then current returns the validated session', () => {
    const response = new RecordingResponse();
    manager.update(response, new FakeRequest({ headers: BROWSER }), new AgentSession(42, 'test-browser/1.0'));

    const session = manager.current(followUp(response, { headers: BROWSER }));
    expect(session).toBeInstanceOf(AgentSession);
    expect(session.uid).toBe(42);
  });

  test('current without a cookie surfaces NotFound', () => {
    expect(() => manager.current(new FakeRequest())).toThrow(CookieNotFoundError);
  });

  test('session failing its own validation is rejected', () => {
    const response = new RecordingResponse();
    manager.update(response, new FakeRequest(), new AgentSession(42, 'test-browser/1.0'));

    expect(() => manager.current(followUp(response, { headers: { 'User-Agent': 'other/2.0' } }))).toThrow(
      'Session rejected: user agent changed'
    );
    expect(() => manager.current(followUp(response))).toThrow(SessionValidationError);
  });

  test('lookup reports absent, valid and invalid states', () => {
    const response = new RecordingResponse();
    manager.update(response, new FakeRequest(), new AgentSession(7, 'test-browser/1.0'));

    expect(manager.lookup(new FakeRequest())).toEqual({ state: 'absent' });

    const valid = manager.lookup(followUp(response, { headers: BROWSER }));
    expect(valid.state).toBe('valid');
    expect(valid.state === 'valid' && valid.session.uid).toBe(7);

    const rejected = manager.lookup(followUp(response, { headers: { 'User-Agent': 'other/2.0' } }));
    expect(rejected.state).toBe('invalid');
    expect(rejected.state === 'invalid' && rejected.error).toBeInstanceOf(SessionValidationError);

    const forged = manager.lookup(new FakeRequest({ cookies: { sess: 'v1.AAAA.AAAA.AAAA' }, headers: BROWSER }));
    expect(forged.state).toBe('invalid');
    expect(forged.state === 'invalid' && forged.error).toBeInstanceOf(EnvelopeParseError);
    expect(forged.state === 'invalid' && isRejectedCookie(forged.error)).toBe(true);
  });

  test('lookup treats an empty cookie as absent', () => {
    expect(manager.lookup(new FakeRequest({ cookies: { sess: '' } }))).toEqual({ state: 'absent' });
  });

  test('update on a loopback host yields a non-Secure, domain-less root cookie', () => {
    const cookie = manager.update(
      new RecordingResponse(),
      new FakeRequest({ host: 'localhost:8080' }),
      new AgentSession(1, 'test-browser/1.0')
    );

    expect(cookie.secure).toBe(false);
    expect(cookie.domain).toBeUndefined();
    expect(cookie.path).toBe('/');
  });

  test('update on a public host yields a Secure cookie on the configured domain', () => {
    const cookie = manager.update(
      new RecordingResponse(),
      new FakeRequest({ host: 'app.example.com' }),
      new AgentSession(1, 'test-browser/1.0')
    );

    expect(cookie.secure).toBe(true);
    expect(cookie.domain).toBe('example.com');
    expect(cookie.path).toBe('/');
  });

  test('clear expires the cookie with the policy attributes', () => {
    const response = new RecordingResponse();
    const cookie = manager.clear(response, new FakeRequest({ host: 'app.example.com' }));

    expect(cookie).toMatchObject({ name: 'sess', value: '', maxAge: -1, domain: 'example.com', path: '/' });
    expect(manager.lookup(followUp(response))).toEqual({ state: 'absent' });
  });

  test('a session from another secret is invalid', async () => {
    const foreign = new SecureCookieStore(
      await testEncryptor('test-secret-other'),
      createJsonEncoder(agentSessionSchema)
    );
    const response = new RecordingResponse();
    foreign.set(response, 'sess', {}, new AgentSession(1, 'test-browser/1.0'));

    const lookup = manager.lookup(followUp(response, { headers: BROWSER }));
    expect(lookup.state === 'invalid' && lookup.error).toBeInstanceOf(IntegrityError);
  });

  test('rejects an empty cookie name', async () => {
    const store = new SecureCookieStore(await testEncryptor(), createJsonEncoder(agentSessionSchema));
    expect(() => new CookieSessionManager(store, { cookieName: '' })).toThrow(ConfigError);
  });

  test('createCookieSessionManager wires configuration', async () => {
    const configured = await createCookieSessionManager(
      {
        secret: 'test-secret',
        iterations: TEST_ITERATIONS,
        cookieName: '_configured',
        cookieDomain: 'example.com',
        maxAge: 120,
        sameSite: 'strict',
      },
      createJsonEncoder(agentSessionSchema)
    );

    const response = new RecordingResponse();
    const cookie = configured.update(
      response,
      new FakeRequest({ host: 'app.example.com' }),
      new AgentSession(3, 'test-browser/1.0')
    );

    expect(cookie).toMatchObject({
      name: '_configured',
      domain: 'example.com',
      secure: true,
      maxAge: 120,
      sameSite: 'strict',
    });
    expect(configured.current(followUp(response, { headers: BROWSER })).uid).toBe(3);
  });
});

