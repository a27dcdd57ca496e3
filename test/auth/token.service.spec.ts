import { SignJWT } from 'jose';
import { InvalidTokenException } from '../../src/auth/auth.errors';
import { Role } from '../../src/auth/enums/role.enum';
import { TokenService } from '../../src/auth/token.service';
import { makeConfig, makeLogger } from '../support/context';

const SECRET = 'test-secret-0123456789';
// 2026-01-01T00:00:00Z
const ISSUED_AT = new Date(Date.UTC(2026, 0, 1));
const IAT = 1767225600;

function makeService(secret = SECRET, ttlMinutes = 60) {
  return new TokenService(makeConfig({ JWT_SECRET: secret, JWT_TTL_MINUTES: ttlMinutes }), makeLogger());
}

async function reasonOf(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof InvalidTokenException) return error.reason;
    throw error;
  }
  return undefined;
}

describe('TokenService', () => {
  it('issues a token whose claims verify before expiry', async () => {
    const service = makeService();
    const issued = await service.issue('alice', Role.USER, ISSUED_AT);

    expect(issued.expiresIn).toBe(3600);
    expect(issued.expiresAt).toBe(IAT + 3600);

    await expect(service.verify(issued.token, ISSUED_AT)).resolves.toEqual({
      username: 'alice',
      role: Role.USER,
      issuedAt: IAT,
      expiresAt: IAT + 3600
    });
  });

  it('accepts a token one second before exp and rejects it at exp', async () => {
    const service = makeService();
    const { token } = await service.issue('bob', Role.ADMIN, ISSUED_AT);

    const lastValidSecond = new Date((IAT + 3599) * 1000);
    const expiry = new Date((IAT + 3600) * 1000);

    await expect(service.verify(token, lastValidSecond)).resolves.toMatchObject({ role: Role.ADMIN });
    expect(await reasonOf(service.verify(token, expiry))).toBe('EXPIRED');
  });

  it('uses the configured lifetime', async () => {
    const service = makeService(SECRET, 5);
    const issued = await service.issue('alice', Role.USER, ISSUED_AT);
    expect(issued.expiresIn).toBe(300);
    expect(await reasonOf(service.verify(issued.token, new Date((IAT + 300) * 1000)))).toBe('EXPIRED');
  });

  it('rejects a token signed with another secret', async () => {
    const { token } = await makeService('another-secret-0123456789').issue('alice', Role.USER, ISSUED_AT);
    expect(await reasonOf(makeService().verify(token, ISSUED_AT))).toBe('INVALID_SIGNATURE');
  });

  it('rejects a token whose payload was edited', async () => {
    const { token } = await makeService().issue('alice', Role.USER, ISSUED_AT);
    const [header, , signature] = token.split('.');
    const forged = Buffer.from(
      JSON.stringify({ role: 'admin', sub: 'alice', iat: IAT, exp: IAT + 3600 })
    ).toString('base64url');

    expect(await reasonOf(makeService().verify(`${header}.${forged}.${signature}`, ISSUED_AT))).toBe(
      'INVALID_SIGNATURE'
    );
  });

  it('rejects input that is not a JWT', async () => {
    expect(await reasonOf(makeService().verify('not-a-token'))).toBe('MALFORMED');
  });

  it('rejects a correctly signed token without a known role', async () => {
    const key = new TextEncoder().encode(SECRET);
    const token = await new SignJWT({ role: 'superuser' })
      .setProtectedHeader({ alg: 'HS256' })
      .setSubject('mallory')
      .setIssuedAt(IAT)
      .setExpirationTime(IAT + 60)
      .sign(key);

    expect(await reasonOf(makeService().verify(token, ISSUED_AT))).toBe('MALFORMED');
  });

  it('rejects tokens signed with a different HMAC algorithm', async () => {
    const key = new TextEncoder().encode(SECRET);
    const token = await new SignJWT({ role: 'user' })
      .setProtectedHeader({ alg: 'HS512' })
      .setSubject('alice')
      .setIssuedAt(IAT)
      .setExpirationTime(IAT + 60)
      .sign(key);

    expect(await reasonOf(makeService().verify(token, ISSUED_AT))).toBe('MALFORMED');
  });

  it('rejects a token without exp', async () => {
    const key = new TextEncoder().encode(SECRET);
    const token = await new SignJWT({ role: 'user' })
      .setProtectedHeader({ alg: 'HS256' })
      .setSubject('alice')
      .setIssuedAt(IAT)
      .sign(key);

    expect(await reasonOf(makeService().verify(token, ISSUED_AT))).toBe('MALFORMED');
  });

  it('refuses to start without a secret', () => {
    expect(() => new TokenService(makeConfig({}), makeLogger())).toThrow('JWT_SECRET is not configured');
  });
});
