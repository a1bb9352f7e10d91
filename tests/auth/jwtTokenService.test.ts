import jwt from 'jsonwebtoken';
import { JwtTokenService } from '../../src/auth/jwtTokenService';
import logger from '../../src/utils/logger';

jest.mock('../../src/utils/logger');

const settings = { jwtSecret: 'test-secret', jwtIssuer: 'test', tokenLifetimeSeconds: 3600 };

describe('JwtTokenService', () => {
  const service = new JwtTokenService(settings);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  test('verifies the tokens it issues', async () => {
    const token = service.issueToken('alice', ['User'], { tenant: 'blue' });
    const user = await service.verifyToken(token);
    expect(user?.name).toBe('alice');
    expect(user?.roles).toEqual(['User']);
    expect(user?.claims).toMatchObject({ sub: 'alice', iss: 'test', tenant: 'blue' });
    expect(Number(user?.claims.exp) - Number(user?.claims.iat)).toBe(3600);
  });

  test('rejects a token signed with another secret', async () => {
    const token = new JwtTokenService({ ...settings, jwtSecret: 'other-secret' }).issueToken('alice', []);
    await expect(service.verifyToken(token)).resolves.toBeNull();
    expect(logger.debug).toHaveBeenCalledWith('Token rejected', { error: 'invalid signature' });
  });

  test('rejects another issuer, an expired token and garbage', async () => {
    const foreign = new JwtTokenService({ ...settings, jwtIssuer: 'elsewhere' }).issueToken('alice', []);
    const expired = jwt.sign({ name: 'alice', exp: Math.floor(Date.now() / 1000) - 60 }, 'test-secret', {
      issuer: 'test',
    });
    await expect(service.verifyToken(foreign)).resolves.toBeNull();
    await expect(service.verifyToken(expired)).resolves.toBeNull();
    await expect(service.verifyToken('not.a.token')).resolves.toBeNull();
  });

  test('merges role and roles claims and falls back to sub for the name', async () => {
    const token = jwt.sign({ role: 'Admin', roles: ['Admin', 'User', 7] }, 'test-secret', {
      issuer: 'test',
      subject: 'bob',
    });
    const user = await service.verifyToken(token);
    expect(user?.name).toBe('bob');
    expect(user?.roles).toEqual(['Admin', 'User']);
  });

  test('a token without a name or subject is not a user', async () => {
    const token = jwt.sign({ roles: ['User'] }, 'test-secret', { issuer: 'test' });
    await expect(service.verifyToken(token)).resolves.toBeNull();
  });
});
