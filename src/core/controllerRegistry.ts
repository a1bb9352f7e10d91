/**
 * Route Registry
 *
 * Controllers are declared once at startup with `defineController` and indexed
 * by their route prefix. Lookup picks the most specific prefix (most segments,
 * then longest text) whose segments lead the request path; the rest of the
 * path is matched against the controller's action templates.
 *
 * @example
 * ```ts
 * const users = defineController({ name: 'UserController', route: 'api/[controller]' })
 *   .get('info', params().context(), (ctx) => ({ ip: ctx.clientIp }), { allowAnonymous: true })
 *   .put('{user_id}', params().route('user_id', t.string()).body(t.json()), updateUser);
 *
 * registry.register(users); // prefix "api/user"
 * ```
 *
 * @module core/controllerRegistry
 */
import { Binder, ParamList } from './params';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface AuthorizeRequirement {
  /** The caller needs at least one of these roles. Empty or absent means any authenticated caller. */
  roles?: string[];
}

export interface ActionOptions {
  authorize?: AuthorizeRequirement;
  allowAnonymous?: boolean;
}

export interface ControllerAction {
  readonly method: HttpMethod;
  readonly template: string;
  readonly segments: readonly string[];
  readonly plan: ParamList<unknown[]>;
  readonly options: ActionOptions;
  /** Binds every argument, then hands back the call; binding failures surface before the handler runs. */
  prepare(bind: Binder): () => unknown;
}

export interface ControllerDefinition {
  readonly name: string;
  readonly route: string;
  readonly authorize?: AuthorizeRequirement;
  readonly actions: readonly ControllerAction[];
}

export interface ControllerMatch {
  controller: ControllerDefinition;
  prefix: string;
  /** Unmatched tail, always starting with `/`. */
  subPath: string;
}

export interface ActionMatch {
  action: ControllerAction;
  routeParams: Record<string, string>;
}

/** Splits a path into segments, ignoring leading and trailing slashes. */
export function splitPath(path: string): string[] {
  const trimmed = path.replace(/^\/+|\/+$/g, '');
  return trimmed === '' ? [] : trimmed.split('/');
}

/** `api/[controller]` on `UserController` → `api/user` */
export function normalizeRoutePrefix(route: string, controllerName: string): string {
  const name = controllerName.toLowerCase().replace(/controller$/, '');
  return route
    .trim()
    .toLowerCase()
    .replace(/\[controller\]/g, name)
    .replace(/^\/+|\/+$/g, '');
}

function placeholderName(segment: string): string | undefined {
  const match = /^\{([^{}]+)\}$/.exec(segment);
  return match?.[1];
}

/**
 * Matches a sub-path against template segments. Placeholders capture any one
 * segment, literals compare without case, and the counts must be equal.
 */
export function matchRouteTemplate(
  segments: readonly string[],
  subPath: string,
): Record<string, string> | undefined {
  const parts = splitPath(subPath);
  if (parts.length !== segments.length) return undefined;
  const captured: Record<string, string> = {};
  for (let i = 0; i < segments.length; i++) {
    const name = placeholderName(segments[i]);
    if (name !== undefined) {
      captured[name] = parts[i];
    } else if (segments[i].toLowerCase() !== parts[i].toLowerCase()) {
      return undefined;
    }
  }
  return captured;
}

export class ControllerBuilder implements ControllerDefinition {
  private readonly list: ControllerAction[] = [];

  constructor(
    readonly name: string,
    readonly route: string,
    readonly authorize?: AuthorizeRequirement,
  ) {}

  get actions(): readonly ControllerAction[] {
    return this.list;
  }

  get<A extends unknown[]>(
    template: string,
    plan: ParamList<A>,
    handler: (...args: A) => unknown,
    options?: ActionOptions,
  ): this {
    return this.action('GET', template, plan, handler, options);
  }

  post<A extends unknown[]>(
    template: string,
    plan: ParamList<A>,
    handler: (...args: A) => unknown,
    options?: ActionOptions,
  ): this {
    return this.action('POST', template, plan, handler, options);
  }

  put<A extends unknown[]>(
    template: string,
    plan: ParamList<A>,
    handler: (...args: A) => unknown,
    options?: ActionOptions,
  ): this {
    return this.action('PUT', template, plan, handler, options);
  }

  patch<A extends unknown[]>(
    template: string,
    plan: ParamList<A>,
    handler: (...args: A) => unknown,
    options?: ActionOptions,
  ): this {
    return this.action('PATCH', template, plan, handler, options);
  }

  delete<A extends unknown[]>(
    template: string,
    plan: ParamList<A>,
    handler: (...args: A) => unknown,
    options?: ActionOptions,
  ): this {
    return this.action('DELETE', template, plan, handler, options);
  }

  private action<A extends unknown[]>(
    method: HttpMethod,
    template: string,
    plan: ParamList<A>,
    handler: (...args: A) => unknown,
    options: ActionOptions = {},
  ): this {
    this.list.push({
      method,
      template,
      segments: splitPath(template),
      plan,
      options,
      prepare: (bind) => {
        const args = plan.bind(bind);
        return () => handler(...args);
      },
    });
    return this;
  }
}

export function defineController(options: {
  name: string;
  route: string;
  authorize?: AuthorizeRequirement;
}): ControllerBuilder {
  return new ControllerBuilder(options.name, options.route, options.authorize);
}

/**
 * First action, in declaration order, with the request's verb and a template
 * that fits the sub-path.
 */
export function findAction(
  controller: ControllerDefinition,
  method: string,
  subPath: string,
): ActionMatch | undefined {
  const verb = method.toUpperCase();
  for (const action of controller.actions) {
    if (action.method !== verb) continue;
    const routeParams = matchRouteTemplate(action.segments, subPath);
    if (routeParams) return { action, routeParams };
  }
  return undefined;
}

export class ControllerRegistry {
  private readonly controllers = new Map<string, ControllerDefinition>();
  // most specific first; rebuilt on every registration
  private ordered: { prefix: string; segments: string[]; controller: ControllerDefinition }[] = [];

  register(controller: ControllerDefinition): string {
    const prefix = normalizeRoutePrefix(controller.route, controller.name);
    const existing = this.controllers.get(prefix);
    if (existing) {
      throw new Error(
        `Route prefix '${prefix}' of ${controller.name} is already registered by ${existing.name}`,
      );
    }
    this.controllers.set(prefix, controller);
    this.ordered = [...this.controllers.entries()]
      .map(([key, value]) => ({ prefix: key, segments: splitPath(key), controller: value }))
      .sort((a, b) => b.segments.length - a.segments.length || b.prefix.length - a.prefix.length);
    return prefix;
  }

  findController(path: string): ControllerMatch | undefined {
    const requestSegments = splitPath(path.toLowerCase());
    for (const entry of this.ordered) {
      if (requestSegments.length < entry.segments.length) continue;
      const leads = entry.segments.every((segment, i) => segment === requestSegments[i]);
      if (!leads) continue;
      const rest = requestSegments.slice(entry.segments.length);
      return { controller: entry.controller, prefix: entry.prefix, subPath: '/' + rest.join('/') };
    }
    return undefined;
  }

  getRegisteredRoutes(): string[] {
    return [...this.controllers.keys()];
  }

  get size(): number {
    return this.controllers.size;
  }
}
