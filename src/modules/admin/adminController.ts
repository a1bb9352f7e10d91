// src/modules/admin/adminController.ts
import { z } from 'zod';
import { defineController, ControllerBuilder } from '../../core/controllerRegistry';
import { HttpContext } from '../../core/httpContext';
import { params } from '../../core/params';
import { required, t } from '../../core/valueTypes';
import { forbidden, notFound, ok, unauthorized } from '../../entities/actionResult';
import { JwtTokenService } from '../../auth/jwtTokenService';
import { UserDirectory } from '../../auth/userDirectory';
import { RateLimiter } from '../../security/rateLimiter';
import { SecurityLogger } from '../../security/securityLogger';
import { formatWireDate } from '../../utils/dateFormatter';
import { loginSchema } from '../users/userController';

const ADMIN_ROLE = 'Admin';

const blacklistSchema = z.object({
  reason: z.string().min(1).optional(),
});

export interface AdminControllerDeps {
  rateLimiter: RateLimiter;
  tokens: JwtTokenService;
  users: UserDirectory;
  security: SecurityLogger;
}

function performedBy(ctx: HttpContext): string {
  return ctx.user?.name ?? 'unknown';
}

/**
 * Rate limiter administration. Every action needs the Admin role except login.
 */
export function createAdminController({
  rateLimiter,
  tokens,
  users,
  security,
}: AdminControllerDeps): ControllerBuilder {
  const ipParam = () => params().route('ip', required(t.string()));

  return defineController({
    name: 'AdminController',
    route: 'api/[controller]',
    authorize: { roles: [ADMIN_ROLE] },
  })
    .post(
      'login',
      params().body(t.shape(loginSchema, 'login request')).context(),
      (body, ctx) => {
        const account = users.authenticate(body.username, body.password);
        if (!account) {
          security.failedLogin(body.username, ctx.clientIp, ctx.request.path);
          return unauthorized({ error: 'Invalid username or password' });
        }
        if (!account.roles.includes(ADMIN_ROLE)) {
          security.failedLogin(account.name, ctx.clientIp, ctx.request.path);
          return forbidden({ error: 'Administrator role required' });
        }
        security.successfulLogin(account.name, ctx.clientIp, ctx.request.path);
        return ok({ token: tokens.issueToken(account.name, account.roles), tokenType: 'Bearer' });
      },
      { allowAnonymous: true },
    )

    .get('statistics', params(), () => rateLimiter.getStatistics())

    .get('blocked', params(), () =>
      rateLimiter.getBlockedIps().map((record) => ({
        ip: record.ip,
        blockedAt: formatWireDate(record.blockedAt),
        blockedUntil: formatWireDate(record.blockedUntil),
        reason: record.reason,
        violationCount: record.violationCount,
      })),
    )

    .get(
      'status/{ip}',
      ipParam().query('path', t.string(), { default: '/' }),
      (ip, path) => {
        const status = rateLimiter.getStatus(ip, path ?? '/');
        return {
          ...status,
          resetAt: status.resetAt ? formatWireDate(status.resetAt) : null,
          blockedUntil: status.blockedUntil ? formatWireDate(status.blockedUntil) : null,
        };
      },
    )

    .post('unblock/{ip}', ipParam(), async (ip) => {
      const lifted = await rateLimiter.unblock(ip);
      return lifted ? ok({ message: `IP ${ip} unblocked` }) : notFound({ error: `IP ${ip} is not blocked` });
    })

    .post('whitelist/{ip}', ipParam().context(), async (ip, ctx) => {
      await rateLimiter.addToWhitelist(ip, performedBy(ctx));
      return { message: `IP ${ip} added to whitelist` };
    })

    .delete('whitelist/{ip}', ipParam().context(), (ip, ctx) =>
      rateLimiter.removeFromWhitelist(ip, performedBy(ctx))
        ? ok({ message: `IP ${ip} removed from whitelist` })
        : notFound({ error: `IP ${ip} is not whitelisted` }),
    )

    .post(
      'blacklist/{ip}',
      ipParam().optionalBody(t.shape(blacklistSchema, 'blacklist request')).context(),
      async (ip, body, ctx) => {
        await rateLimiter.addToBlacklist(ip, body?.reason ?? 'Manually blacklisted', performedBy(ctx));
        return { message: `IP ${ip} added to blacklist` };
      },
    )

    .delete('blacklist/{ip}', ipParam().context(), async (ip, ctx) => {
      const removed = await rateLimiter.removeFromBlacklist(ip, performedBy(ctx));
      return removed
        ? ok({ message: `IP ${ip} removed from blacklist` })
        : notFound({ error: `IP ${ip} is not blacklisted` });
    });
}
