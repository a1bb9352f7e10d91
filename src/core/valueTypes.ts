/**
 * Value types for parameter binding.
 *
 * A value type knows how to produce a typed argument from the places a request
 * carries data: raw strings (headers, query, route, urlencoded form), parsed JSON
 * documents, multipart file parts and the request context itself. `zero()` is
 * what a missing optional value becomes: a real zero for value-like types,
 * `undefined` for everything else.
 *
 * @module core/valueTypes
 */
import { z } from 'zod';
import { FormField, FormFile } from '../entities/formFile';
import { errorMessage } from '../entities/errors';
import type { HttpContext } from './httpContext';
import logger from '../utils/logger';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type ValueKind =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'uuid'
  | 'enum'
  | 'nullable'
  | 'json'
  | 'shape'
  | 'bytes'
  | 'formFile'
  | 'formField'
  | 'context';

export interface ParamType<T> {
  readonly kind: ValueKind;
  /** Target type name used in conversion error messages. */
  readonly label: string;
  zero(): T;
  fromString?(raw: string): T;
  fromDocument?(doc: JsonValue): T;
  fromFile?(field: FormField): T;
  /** Builds a model from individually named form fields. */
  fromFormFields?(lookup: (key: string) => string | undefined, prefix?: string): T;
  fromContext?(ctx: HttpContext): T;
}

/** Raised by value types; the resolver wraps it into a ClientInputError naming the parameter. */
export class ConversionError extends Error {}

type ZodShapeSchema = z.AnyZodObject;

const EMPTY_UUID = '00000000-0000-0000-0000-000000000000';
const UUID_PATTERN = /^\{?([0-9a-f]{8})-?([0-9a-f]{4})-?([0-9a-f]{4})-?([0-9a-f]{4})-?([0-9a-f]{12})\}?$/i;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INTEGER_PATTERN = /^[+-]?\d+$/;

function describe(doc: JsonValue): string {
  if (doc === null) return 'null';
  if (Array.isArray(doc)) return 'array';
  return typeof doc;
}

function parseBoolean(raw: string): boolean | undefined {
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return undefined;
}

function isJsonObject(doc: JsonValue): doc is { [key: string]: JsonValue } {
  return typeof doc === 'object' && doc !== null && !Array.isArray(doc);
}

export function looksLikeJson(raw: string): boolean {
  const text = raw.trim();
  return (text.startsWith('{') && text.endsWith('}')) || (text.startsWith('[') && text.endsWith(']'));
}

function zodMessage(err: z.ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseWithSchema<S extends ZodShapeSchema>(schema: S, input: Record<string, unknown>): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) throw new ConversionError(zodMessage(result.error));
  return result.data;
}

// Strips optional/nullable/default wrappers to find what a form string should become.
function innerSchema(schema: z.ZodTypeAny): z.ZodTypeAny {
  let current = schema;
  for (;;) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      current = current.removeDefault();
    } else {
      return current;
    }
  }
}

function coerceFormValue(schema: z.ZodTypeAny, raw: string): unknown {
  const inner = innerSchema(schema);
  if (inner instanceof z.ZodNumber) {
    return NUMBER_PATTERN.test(raw.trim()) ? Number(raw) : raw;
  }
  if (inner instanceof z.ZodBoolean) {
    return parseBoolean(raw) ?? raw;
  }
  if (inner instanceof z.ZodEnum) {
    const options: readonly string[] = inner.options;
    return options.find((option) => option.toLowerCase() === raw.toLowerCase()) ?? raw;
  }
  return raw;
}

const FILE_MODEL_FIELDS: Record<string, (file: FormFile) => unknown> = {
  filename: (file) => file.fileName,
  contenttype: (file) => file.contentType,
  data: (file) => file.toBuffer(),
  content: (file) => file.toBuffer(),
  filedata: (file) => file.toBuffer(),
  size: (file) => file.length,
  length: (file) => file.length,
};

export const t = {
  string(): ParamType<string | undefined> {
    return {
      kind: 'string',
      label: 'string',
      zero: () => undefined,
      fromString: (raw) => raw,
      fromDocument: (doc) => {
        if (typeof doc === 'string') return doc;
        if (typeof doc === 'number' || typeof doc === 'boolean') return String(doc);
        throw new ConversionError(`expected a string, got ${describe(doc)}`);
      },
      fromFile: (field) => field.fileName,
    };
  },

  number(): ParamType<number> {
    const fromString = (raw: string): number => {
      if (!NUMBER_PATTERN.test(raw.trim())) throw new ConversionError(`'${raw}' is not a number`);
      return Number(raw);
    };
    return {
      kind: 'number',
      label: 'number',
      zero: () => 0,
      fromString,
      fromDocument: (doc) => {
        if (typeof doc === 'number') return doc;
        if (typeof doc === 'string') return fromString(doc);
        throw new ConversionError(`expected a number, got ${describe(doc)}`);
      },
    };
  },

  integer(): ParamType<number> {
    const fromString = (raw: string): number => {
      const value = Number(raw.trim());
      if (!INTEGER_PATTERN.test(raw.trim()) || !Number.isSafeInteger(value)) {
        throw new ConversionError(`'${raw}' is not an integer`);
      }
      return value;
    };
    return {
      kind: 'integer',
      label: 'integer',
      zero: () => 0,
      fromString,
      fromDocument: (doc) => {
        if (typeof doc === 'number' && Number.isSafeInteger(doc)) return doc;
        if (typeof doc === 'string') return fromString(doc);
        throw new ConversionError(`expected an integer, got ${describe(doc)}`);
      },
    };
  },

  boolean(): ParamType<boolean> {
    const fromString = (raw: string): boolean => {
      const value = parseBoolean(raw);
      if (value === undefined) throw new ConversionError(`'${raw}' is not a boolean`);
      return value;
    };
    return {
      kind: 'boolean',
      label: 'boolean',
      zero: () => false,
      fromString,
      fromDocument: (doc) => {
        if (typeof doc === 'boolean') return doc;
        if (typeof doc === 'string') return fromString(doc);
        throw new ConversionError(`expected a boolean, got ${describe(doc)}`);
      },
    };
  },

  /** Canonical lowercase hyphenated form; braces and the 32-digit form are accepted. */
  uuid(): ParamType<string> {
    const fromString = (raw: string): string => {
      const match = UUID_PATTERN.exec(raw.trim());
      if (!match) throw new ConversionError(`'${raw}' is not a UUID`);
      return match.slice(1, 6).join('-').toLowerCase();
    };
    return {
      kind: 'uuid',
      label: 'uuid',
      zero: () => EMPTY_UUID,
      fromString,
      fromDocument: (doc) => {
        if (typeof doc === 'string') return fromString(doc);
        throw new ConversionError(`expected a UUID string, got ${describe(doc)}`);
      },
    };
  },

  /**
   * Case-insensitive member match. A numeric string selects by position.
   */
  enumOf<V extends string>(values: readonly [V, ...V[]]): ParamType<V> {
    const fromString = (raw: string): V => {
      const wanted = raw.trim().toLowerCase();
      const byName = values.find((value) => value.toLowerCase() === wanted);
      if (byName !== undefined) return byName;
      if (INTEGER_PATTERN.test(wanted)) {
        const byIndex = values[Number(wanted)];
        if (byIndex !== undefined) return byIndex;
      }
      throw new ConversionError(`'${raw}' is not one of ${values.join(', ')}`);
    };
    return {
      kind: 'enum',
      label: `enum(${values.join('|')})`,
      zero: () => values[0],
      fromString,
      fromDocument: (doc) => {
        if (typeof doc === 'string') return fromString(doc);
        if (typeof doc === 'number') return fromString(String(doc));
        throw new ConversionError(`expected one of ${values.join(', ')}, got ${describe(doc)}`);
      },
    };
  },

  nullable<T>(inner: ParamType<T>): ParamType<T | undefined> {
    const { fromString, fromDocument } = inner;
    return {
      kind: 'nullable',
      label: `${inner.label}?`,
      zero: () => undefined,
      fromString: fromString ? (raw) => (raw.trim() === '' ? undefined : fromString(raw)) : undefined,
      fromDocument: fromDocument ? (doc) => (doc === null ? undefined : fromDocument(doc)) : undefined,
    };
  },

  /** Pass-through structured document. */
  json(): ParamType<JsonValue | undefined> {
    return {
      kind: 'json',
      label: 'json',
      zero: () => undefined,
      fromString: (raw) => {
        try {
          const doc: JsonValue = JSON.parse(raw);
          return doc;
        } catch (err) {
          throw new ConversionError(`'${raw}' is not valid JSON: ${errorMessage(err)}`);
        }
      },
      fromDocument: (doc) => doc,
    };
  },

  /**
   * Concrete shape described by a zod object schema. Incoming keys are matched
   * to schema keys ignoring case; the schema then validates the values.
   */
  shape<S extends ZodShapeSchema>(schema: S, label = 'object'): ParamType<z.infer<S> | undefined> {
    const keys = Object.keys(schema.shape);
    const fromDocument = (doc: JsonValue): z.infer<S> => {
      if (!isJsonObject(doc)) throw new ConversionError(`expected an object, got ${describe(doc)}`);
      const byLowerKey = new Map(Object.entries(doc).map(([key, value]) => [key.toLowerCase(), value]));
      const input: Record<string, unknown> = {};
      for (const key of keys) {
        const value = byLowerKey.get(key.toLowerCase());
        if (value !== undefined) input[key] = value;
      }
      return parseWithSchema(schema, input);
    };
    return {
      kind: 'shape',
      label,
      zero: () => undefined,
      fromDocument,
      fromString: (raw) => {
        let doc: JsonValue;
        try {
          doc = JSON.parse(raw);
        } catch (err) {
          throw new ConversionError(`'${raw}' is not valid JSON: ${errorMessage(err)}`);
        }
        return fromDocument(doc);
      },
      fromFile: (field) => {
        const file = FormFile.fromField(field);
        const input: Record<string, unknown> = {};
        for (const key of keys) {
          const read = FILE_MODEL_FIELDS[key.toLowerCase()];
          if (read) input[key] = read(file);
        }
        return parseWithSchema(schema, input);
      },
      fromFormFields: (lookup, prefix) => {
        const input: Record<string, unknown> = {};
        for (const key of keys) {
          const raw = (prefix ? lookup(`${prefix}.${key}`) : undefined) ?? lookup(key);
          if (raw === undefined) continue;
          try {
            input[key] = coerceFormValue(schema.shape[key], raw);
          } catch (err) {
            logger.warn('Could not coerce form field', { field: key, error: errorMessage(err) });
          }
        }
        return parseWithSchema(schema, input);
      },
    };
  },

  /** Raw bytes: a file part's payload, or base64 text. */
  bytes(): ParamType<Buffer | undefined> {
    return {
      kind: 'bytes',
      label: 'bytes',
      zero: () => undefined,
      fromString: (raw) => Buffer.from(raw, 'base64'),
      fromDocument: (doc) => {
        if (typeof doc === 'string') return Buffer.from(doc, 'base64');
        throw new ConversionError(`expected base64 text, got ${describe(doc)}`);
      },
      fromFile: (field) => Buffer.from(field.data ?? Buffer.alloc(0)),
    };
  },

  formFile(): ParamType<FormFile | undefined> {
    return {
      kind: 'formFile',
      label: 'file',
      zero: () => undefined,
      fromFile: (field) => FormFile.fromField(field),
    };
  },

  formField(): ParamType<FormField | undefined> {
    return {
      kind: 'formField',
      label: 'form field',
      zero: () => undefined,
      fromFile: (field) => field,
    };
  },

  context(): ParamType<HttpContext> {
    return {
      kind: 'context',
      label: 'context',
      zero: () => {
        throw new ConversionError('request context is only available while dispatching');
      },
      fromContext: (ctx) => ctx,
    };
  },
};

function present<T>(value: T, label: string): NonNullable<T> {
  if (value === undefined || value === null) throw new ConversionError(`a ${label} value is required`);
  return value;
}

/**
 * Narrows a reference-like type to one that never yields an absent value.
 * Used for body parameters, which are required unless declared optional.
 */
export function required<T>(inner: ParamType<T>): ParamType<NonNullable<T>> {
  const { fromString, fromDocument, fromFile, fromFormFields, fromContext, label } = inner;
  return {
    kind: inner.kind,
    label,
    zero: () => present(inner.zero(), label),
    fromString: fromString ? (raw) => present(fromString(raw), label) : undefined,
    fromDocument: fromDocument ? (doc) => present(fromDocument(doc), label) : undefined,
    fromFile: fromFile ? (field) => present(fromFile(field), label) : undefined,
    fromFormFields: fromFormFields
      ? (lookup, prefix) => present(fromFormFields(lookup, prefix), label)
      : undefined,
    fromContext: fromContext ? (ctx) => present(fromContext(ctx), label) : undefined,
  };
}

/**
 * Generic string conversion: empty text is the zero value, strings pass through,
 * JSON-looking text is tried as a structured value before the type's own parser.
 */
export function convertString<T>(raw: string, type: ParamType<T>): T {
  if (raw === '') return type.zero();
  if (type.kind === 'string' && type.fromString) return type.fromString(raw);
  if (type.fromDocument && looksLikeJson(raw)) {
    try {
      const doc: JsonValue = JSON.parse(raw);
      return type.fromDocument(doc);
    } catch (err) {
      logger.debug('JSON-looking value did not convert as a document, falling back', {
        target: type.label,
        error: errorMessage(err),
      });
    }
  }
  if (!type.fromString) throw new ConversionError(`${type.label} cannot be read from text`);
  return type.fromString(raw);
}
