/**
 * Parameter Resolver
 *
 * Turns a parsed request into the argument list of a handler. The request
 * body is inspected once per request (JSON document, urlencoded form or
 * multipart fields) and every declared parameter is then bound from that
 * snapshot in a fixed order of precedence:
 *
 *   file (multipart only) → form (non-JSON only) → body → header → query
 *   → request context → route placeholder → declared default → zero value
 *
 * @module core/parameterResolver
 */
import { ClientInputError, errorMessage } from '../entities/errors';
import { FormFieldCollection, FormFile } from '../entities/formFile';
import { validateFile } from '../security/fileValidator';
import { getContentType, getHeader, getQuery } from '../utils/httpHelpers';
import { HttpContext } from './httpContext';
import { parseMultipart } from './multipartParser';
import { Binder, ParamList, ParamSpec } from './params';
import { ConversionError, JsonValue, convertString } from './valueTypes';

export interface RequestSnapshot {
  rawBody: string;
  contentType: string;
  /** JSON content type, or a handler that declares a body parameter. */
  isJsonRequest: boolean;
  document?: JsonValue;
  /** urlencoded fields, lowercased names */
  formFields?: Map<string, string>;
  multipart?: FormFieldCollection;
}

function decodeFormComponent(text: string): string {
  try {
    return decodeURIComponent(text.replace(/\+/g, ' '));
  } catch (err) {
    throw new ClientInputError(`Invalid form encoding: ${errorMessage(err)}`);
  }
}

/**
 * Parses an application/x-www-form-urlencoded body. Names are case-insensitive
 * and the last occurrence of a name wins.
 */
export function parseUrlEncoded(text: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const pair of text.split('&')) {
    if (!pair) continue;
    const eq = pair.indexOf('=');
    const name = eq === -1 ? pair : pair.slice(0, eq);
    const value = eq === -1 ? '' : pair.slice(eq + 1);
    fields.set(decodeFormComponent(name).toLowerCase(), decodeFormComponent(value));
  }
  return fields;
}

/** The name as declared, then with `_` and `-` swapped either way. */
function nameVariants(name: string): string[] {
  return [...new Set([name, name.replace(/_/g, '-'), name.replace(/-/g, '_')])];
}

function fallbackOrZero<T>(spec: ParamSpec<T>): T {
  if (spec.fallback) return spec.fallback.value;
  try {
    return spec.type.zero();
  } catch (err) {
    // required types have no zero value
    if (err instanceof ConversionError) {
      throw new ClientInputError(`Missing value for parameter '${spec.name}': ${err.message}`);
    }
    throw err;
  }
}

export class ParameterResolver {
  /**
   * Reads the request body according to its content type. Only the parsing the
   * plan can use is done: form decoding is skipped for plans without form or
   * file parameters.
   */
  snapshot(
    ctx: HttpContext,
    plan: { readonly hasBody: boolean; readonly hasFormOrFile: boolean },
  ): RequestSnapshot {
    const body = ctx.request.body ?? Buffer.alloc(0);
    const contentType = getContentType(ctx.request);
    const lowerType = contentType.toLowerCase();
    const snapshot: RequestSnapshot = {
      rawBody: body.toString('utf8'),
      contentType,
      isJsonRequest: lowerType.includes('application/json') || plan.hasBody,
    };

    if (snapshot.isJsonRequest && snapshot.rawBody.trim() !== '') {
      try {
        const document: JsonValue = JSON.parse(snapshot.rawBody);
        snapshot.document = document;
      } catch (err) {
        throw new ClientInputError(`Invalid JSON format: ${errorMessage(err)}`);
      }
    }

    if (plan.hasFormOrFile) {
      if (lowerType.includes('multipart/form-data')) {
        snapshot.multipart = parseMultipart(body, contentType);
      } else if (lowerType.includes('application/x-www-form-urlencoded')) {
        snapshot.formFields = parseUrlEncoded(snapshot.rawBody);
      }
    }

    return snapshot;
  }

  resolve<A extends unknown[]>(plan: ParamList<A>, ctx: HttpContext): A {
    const snapshot = this.snapshot(ctx, plan);
    return plan.bind(this.createBinder(snapshot, ctx));
  }

  createBinder(snapshot: RequestSnapshot, ctx: HttpContext): Binder {
    return <T>(spec: ParamSpec<T>): T => this.bindOne(spec, snapshot, ctx);
  }

  private bindOne<T>(spec: ParamSpec<T>, snapshot: RequestSnapshot, ctx: HttpContext): T {
    switch (spec.source) {
      case 'file':
        if (snapshot.multipart) return this.bindFile(spec, snapshot.multipart, ctx);
        break;
      case 'form':
        if (!snapshot.isJsonRequest) return this.bindForm(spec, snapshot);
        break;
      case 'body':
        return this.bindBody(spec, snapshot);
      case 'header':
        return this.bindHeader(spec, ctx);
      case 'query':
        return this.bindQuery(spec, ctx);
      default:
        break;
    }

    if (spec.type.fromContext) return spec.type.fromContext(ctx);

    const wanted = spec.name.toLowerCase();
    const routeKey = Object.keys(ctx.routeParams).find((key) => key.toLowerCase() === wanted);
    if (routeKey !== undefined) return this.convert(spec, ctx.routeParams[routeKey]);

    return fallbackOrZero(spec);
  }

  private convert<T>(spec: ParamSpec<T>, raw: string): T {
    try {
      return convertString(raw, spec.type);
    } catch (err) {
      if (err instanceof ConversionError) {
        throw new ClientInputError(
          `Invalid value '${raw}' for parameter '${spec.name}' (expected ${spec.type.label}): ${err.message}`,
        );
      }
      throw err;
    }
  }

  private bindBody<T>(spec: ParamSpec<T>, snapshot: RequestSnapshot): T {
    const { document } = snapshot;
    if (document === undefined || (document === null && spec.optional)) {
      if (spec.fallback) return spec.fallback.value;
      if (spec.optional) return spec.type.zero();
      throw new ClientInputError(`Missing required body parameter '${spec.name}'`);
    }
    if (!spec.type.fromDocument) {
      throw new ClientInputError(`Body parameter '${spec.name}' cannot be read as ${spec.type.label}`);
    }
    try {
      return spec.type.fromDocument(document);
    } catch (err) {
      if (err instanceof ConversionError) {
        throw new ClientInputError(`Invalid body parameter '${spec.name}': ${err.message}`);
      }
      throw err;
    }
  }

  private bindHeader<T>(spec: ParamSpec<T>, ctx: HttpContext): T {
    const candidates = nameVariants(spec.key ?? spec.name);
    for (const name of candidates) {
      const value = getHeader(ctx.request, name);
      if (value) return this.convert(spec, value);
    }
    if (spec.fallback) return spec.fallback.value;
    if (spec.optional) return spec.type.zero();
    throw new ClientInputError(`Missing required header. Tried: ${candidates.join(', ')}`);
  }

  // A missing or empty query parameter is never an error; it becomes the default or zero value.
  private bindQuery<T>(spec: ParamSpec<T>, ctx: HttpContext): T {
    for (const name of nameVariants(spec.key ?? spec.name)) {
      const value = getQuery(ctx.request, name);
      if (value) return this.convert(spec, value);
    }
    return fallbackOrZero(spec);
  }

  private bindForm<T>(spec: ParamSpec<T>, snapshot: RequestSnapshot): T {
    const key = spec.key ?? spec.name;
    const lookup = (name: string): string | undefined => {
      const field = snapshot.multipart?.get(name);
      if (field) return field.isFile ? undefined : field.value;
      return snapshot.formFields?.get(name.toLowerCase());
    };

    const field = snapshot.multipart?.get(key);
    if (field?.isFile && spec.type.fromFile) return spec.type.fromFile(field);

    // empty text counts as missing
    const raw = lookup(key);
    if (raw) return this.convert(spec, raw);

    const fieldCount = (snapshot.multipart?.size ?? 0) + (snapshot.formFields?.size ?? 0);
    if (spec.type.fromFormFields && fieldCount > 0) {
      try {
        return spec.type.fromFormFields(lookup, key);
      } catch (err) {
        if (err instanceof ConversionError) {
          throw new ClientInputError(`Invalid form data for parameter '${spec.name}': ${err.message}`);
        }
        throw err;
      }
    }
    return fallbackOrZero(spec);
  }

  private bindFile<T>(spec: ParamSpec<T>, multipart: FormFieldCollection, ctx: HttpContext): T {
    const field = multipart.get(spec.key ?? spec.name);
    if (!field || !field.isFile || !spec.type.fromFile) return fallbackOrZero(spec);

    if (spec.validate) {
      const result = validateFile(FormFile.fromField(field), spec.validate);
      if (!result.valid) {
        throw new ClientInputError(`File validation failed: ${result.errors.join('; ')}`);
      }
      for (const warning of result.warnings) {
        ctx.logger.warn('Uploaded file flagged', { field: field.name, fileName: field.fileName, warning });
      }
    }

    try {
      return spec.type.fromFile(field);
    } catch (err) {
      if (err instanceof ConversionError) {
        throw new ClientInputError(`Invalid file parameter '${spec.name}': ${err.message}`);
      }
      throw err;
    }
  }
}
