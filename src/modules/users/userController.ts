// src/modules/users/userController.ts
import { z } from 'zod';
import { defineController, ControllerBuilder } from '../../core/controllerRegistry';
import { params } from '../../core/params';
import { required, t } from '../../core/valueTypes';
import { ok, unauthorized } from '../../entities/actionResult';
import { JwtTokenService } from '../../auth/jwtTokenService';
import { UserDirectory } from '../../auth/userDirectory';
import { SecurityLogger } from '../../security/securityLogger';

export const loginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export const updateUserSchema = z.object({
  displayName: z.string().min(1).optional(),
  email: z.string().email().optional(),
  age: z.number().int().min(0).optional(),
});

export interface UserControllerDeps {
  tokens: JwtTokenService;
  users: UserDirectory;
  tokenLifetimeSeconds: number;
  security: SecurityLogger;
}

export function createUserController({
  tokens,
  users,
  tokenLifetimeSeconds,
  security,
}: UserControllerDeps): ControllerBuilder {
  return defineController({ name: 'UserController', route: 'api/[controller]' })
    .get('', params(), () => ({ message: 'Welcome to the user API' }))

    .get(
      'info',
      params().context(),
      (ctx) => ({
        message: 'Public information, no authentication required',
        clientIp: ctx.clientIp,
        requestId: ctx.requestId,
      }),
      { allowAnonymous: true },
    )

    .get(
      'security',
      params().context(),
      (ctx) => ({
        message: 'Security settings are only visible to administrators',
        user: ctx.user?.name,
        roles: ctx.user?.roles ?? [],
      }),
      { authorize: { roles: ['Admin'] } },
    )

    .post('login', params().body(t.shape(loginSchema, 'login request')).context(), (body, ctx) => {
      const account = users.authenticate(body.username, body.password);
      if (!account) {
        security.failedLogin(body.username, ctx.clientIp, ctx.request.path);
        return unauthorized({ error: 'Invalid username or password' });
      }
      security.successfulLogin(account.name, ctx.clientIp, ctx.request.path);
      return ok({
        token: tokens.issueToken(account.name, account.roles),
        tokenType: 'Bearer',
        expiresIn: tokenLifetimeSeconds,
        user: { name: account.name, roles: account.roles },
      });
    })

    // echoes any JSON document; the source header is optional
    .put(
      '{user_id}',
      params()
        .route('user_id', required(t.string()))
        .body(t.json())
        .header('x_request_source', t.string(), { optional: true }),
      (userId, body, source) => ({
        userId,
        received: body,
        source: source ?? 'unknown',
      }),
    )

    .patch(
      '{userId}',
      params().route('userId', required(t.string())).body(t.shape(updateUserSchema, 'user update')),
      (userId, update) => ({
        userId,
        updatedFields: Object.keys(update),
        user: update,
      }),
    )

    .get(
      'search',
      params()
        .query('q', t.string(), { default: '' })
        .query('page', t.integer(), { default: 1 })
        .query('page_size', t.integer(), { default: 20 })
        .query('active', t.nullable(t.boolean())),
      (q, page, pageSize, active) => ({
        query: q,
        page,
        pageSize,
        active: active ?? null,
        results: [],
      }),
    )

    .get(
      'whoami',
      params().header('x_client_name', t.string(), { optional: true }).context(),
      (clientName, ctx) => ({
        name: ctx.user?.name,
        roles: ctx.user?.roles ?? [],
        isAdmin: ctx.isInRole('Admin'),
        clientName: clientName ?? null,
      }),
      { authorize: {} },
    );
}
