import { timingSafeEqual, createHash } from 'crypto';

export interface DirectoryUser {
  username: string;
  password: string;
  roles: string[];
}

// sha256 first so both sides have the same length
function sameSecret(a: string, b: string): boolean {
  const left = createHash('sha256').update(a).digest();
  const right = createHash('sha256').update(b).digest();
  return timingSafeEqual(left, right);
}

/**
 * Fixed set of accounts behind the sample login endpoints.
 */
export class UserDirectory {
  private readonly users = new Map<string, DirectoryUser>();

  constructor(users: DirectoryUser[]) {
    for (const user of users) this.users.set(user.username.toLowerCase(), user);
  }

  /** Username match ignores case; the password must match exactly. */
  authenticate(username: string, password: string): { name: string; roles: string[] } | undefined {
    const user = this.users.get(username.toLowerCase());
    if (!user || !sameSecret(user.password, password)) return undefined;
    return { name: user.username, roles: [...user.roles] };
  }
}
