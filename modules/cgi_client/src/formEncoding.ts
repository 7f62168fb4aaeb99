export const FORM_MIME_TYPE = 'application/x-www-form-urlencoded';
export const DEFAULT_MIME_TYPE = 'text/plain';

export type FormScalar = string | number | boolean;

/**
 * Query or form parameters. A record maps each key to a value or a list
 * of values; a pair list keeps keys in the caller's order.
 */
export type FormParams =
  | Readonly<Record<string, FormScalar | readonly FormScalar[]>>
  | ReadonlyArray<readonly [string, FormScalar]>;

export type PostData = string | Uint8Array | FormParams;

export interface EncodedBody {
  body: Buffer;
  contentType: string;
}

export function encodeForm(params: FormParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of formEntries(params)) {
    search.append(key, String(value));
  }
  return search.toString();
}

export function decodeForm(encoded: string): Array<[string, string]> {
  return Array.from(new URLSearchParams(encoded));
}

/**
 * Raw text or bytes are sent as they are under `mime`. Parameters are
 * form-encoded and always sent as `application/x-www-form-urlencoded`.
 */
export function encodePostData(data: PostData, mime: string = DEFAULT_MIME_TYPE): EncodedBody {
  if (typeof data === 'string') {
    return { body: Buffer.from(data, 'utf-8'), contentType: mime };
  }
  if (data instanceof Uint8Array) {
    return { body: Buffer.from(data), contentType: mime };
  }
  return { body: Buffer.from(encodeForm(data), 'utf-8'), contentType: FORM_MIME_TYPE };
}

function* formEntries(params: FormParams): Generator<readonly [string, FormScalar]> {
  if (isPairList(params)) {
    yield* params;
    return;
  }
  for (const [key, value] of Object.entries(params)) {
    if (isScalarList(value)) {
      for (const item of value) {
        yield [key, item];
      }
      continue;
    }
    yield [key, value];
  }
}

function isPairList(params: FormParams): params is ReadonlyArray<readonly [string, FormScalar]> {
  return Array.isArray(params);
}

function isScalarList(value: FormScalar | readonly FormScalar[]): value is readonly FormScalar[] {
  return Array.isArray(value);
}
