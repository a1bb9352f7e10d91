/**
 * Parameter binding plans.
 *
 * A plan lists, in call order, where each handler argument comes from. Plans
 * are built with a chain so the handler's argument tuple is inferred:
 *
 * @example
 * ```ts
 * params()
 *   .route('user_id', t.string())
 *   .body(t.shape(updateUserSchema))
 *   .header('x_request_source', t.string(), { optional: true })
 * // handler: (userId: string | undefined, body: UpdateUser, source: string | undefined) => unknown
 * ```
 *
 * @module core/params
 */
import { ParamType, required, t } from './valueTypes';
import { FileValidationOptions } from '../security/fileValidator';
import type { HttpContext } from './httpContext';

export type ParamSource = 'body' | 'header' | 'query' | 'form' | 'file' | 'route' | 'context';

export interface ParamSpec<T> {
  /** Argument name; also the route placeholder it falls back to. */
  readonly name: string;
  readonly source: ParamSource;
  /** Header, query, form or file name when it differs from `name`. */
  readonly key?: string;
  readonly type: ParamType<T>;
  readonly fallback?: { readonly value: T };
  /** Missing headers and bodies are errors unless optional. */
  readonly optional: boolean;
  readonly validate?: FileValidationOptions;
}

export interface ParamOptions<T> {
  key?: string;
  default?: T;
  optional?: boolean;
}

/** Resolves one parameter for the request being dispatched. */
export type Binder = <T>(spec: ParamSpec<T>) => T;

function spec<T>(
  name: string,
  source: ParamSource,
  type: ParamType<T>,
  options: ParamOptions<T> & { validate?: FileValidationOptions } = {},
): ParamSpec<T> {
  return {
    name,
    source,
    key: options.key,
    type,
    fallback: 'default' in options && options.default !== undefined ? { value: options.default } : undefined,
    optional: options.optional ?? false,
    validate: options.validate,
  };
}

export class ParamList<A extends unknown[]> {
  constructor(
    readonly specs: readonly ParamSpec<unknown>[],
    private readonly resolveAll: (bind: Binder) => A,
  ) {}

  private add<T>(next: ParamSpec<T>): ParamList<[...A, T]> {
    const previous = this.resolveAll;
    return new ParamList<[...A, T]>([...this.specs, next], (bind) => [...previous(bind), bind(next)]);
  }

  /** Resolves every argument in declaration order; the first failure aborts. */
  bind(bind: Binder): A {
    return this.resolveAll(bind);
  }

  get hasBody(): boolean {
    return this.specs.some((s) => s.source === 'body');
  }

  get hasFormOrFile(): boolean {
    return this.specs.some((s) => s.source === 'form' || s.source === 'file');
  }

  /** Structured request body; a missing or empty body is a client error. */
  body<T>(type: ParamType<T>, options: { name?: string; default?: NonNullable<T> } = {}) {
    return this.add(spec(options.name ?? 'body', 'body', required(type), options));
  }

  /** Structured request body that may be absent. */
  optionalBody<T>(type: ParamType<T>, options: { name?: string; default?: T } = {}) {
    return this.add(spec(options.name ?? 'body', 'body', type, { ...options, optional: true }));
  }

  header<T>(name: string, type: ParamType<T>, options?: ParamOptions<T>) {
    return this.add(spec(name, 'header', type, options));
  }

  query<T>(name: string, type: ParamType<T>, options?: ParamOptions<T>) {
    return this.add(spec(name, 'query', type, options));
  }

  form<T>(name: string, type: ParamType<T>, options?: ParamOptions<T>) {
    return this.add(spec(name, 'form', type, options));
  }

  file<T>(name: string, type: ParamType<T>, options?: ParamOptions<T> & { validate?: FileValidationOptions }) {
    return this.add(spec(name, 'file', type, options));
  }

  /** Untagged parameter bound from the route placeholder of the same name. */
  route<T>(name: string, type: ParamType<T>, options?: { default?: T }) {
    return this.add(spec(name, 'route', type, options));
  }

  context(): ParamList<[...A, HttpContext]> {
    return this.add(spec('context', 'context', t.context()));
  }
}

export function params(): ParamList<[]> {
  return new ParamList<[]>([], () => []);
}
