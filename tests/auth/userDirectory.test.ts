import { UserDirectory } from '../../src/auth/userDirectory';

describe('UserDirectory', () => {
  const directory = new UserDirectory([
    { username: 'Alice', password: 'test-password', roles: ['User'] },
    { username: 'admin', password: 'test-admin', roles: ['Admin', 'User'] },
  ]);

  test('matches the user name ignoring case', () => {
    expect(directory.authenticate('alice', 'test-password')).toEqual({ name: 'Alice', roles: ['User'] });
  });

  test('requires the exact password', () => {
    expect(directory.authenticate('alice', 'Test-password')).toBeUndefined();
    expect(directory.authenticate('alice', '')).toBeUndefined();
  });

  test('unknown users are rejected', () => {
    expect(directory.authenticate('mallory', 'test-password')).toBeUndefined();
  });

  test('returns a copy of the roles', () => {
    const first = directory.authenticate('admin', 'test-admin');
    first?.roles.push('Root');
    expect(directory.authenticate('admin', 'test-admin')?.roles).toEqual(['Admin', 'User']);
  });
});
