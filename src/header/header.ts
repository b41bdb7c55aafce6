/** Characters allowed in an HTTP header field name (RFC 9110 `token`). */
const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Canonical form of a header key: the first letter and any letter following a hyphen are
 * upper case, the rest lower case (`content-type` becomes `Content-Type`).
 *
 * Keys containing characters that are not valid in a header name are returned unchanged.
 */
export function canonicalHeaderKey(key: string): string {
  if (!TOKEN.test(key)) {
    return key;
  }

  let upper = true;
  let canonical = '';
  for (const char of key) {
    canonical += upper ? char.toUpperCase() : char.toLowerCase();
    upper = char === '-';
  }

  return canonical;
}

/**
 * Header collection mapping canonical keys to their ordered list of values.
 */
export class RequestHeaders {
  #entries = new Map<string, string[]>();

  /** Replaces any existing values associated with `key` with the single `value`. */
  set(key: string, value: string): this {
    this.#entries.set(canonicalHeaderKey(key), [value]);
    return this;
  }

  /** Appends `value` to the values associated with `key`. */
  add(key: string, value: string): this {
    const canonical = canonicalHeaderKey(key);
    const values = this.#entries.get(canonical);
    if (values) {
      values.push(value);
    } else {
      this.#entries.set(canonical, [value]);
    }

    return this;
  }

  /** First value associated with `key`, or `null`. */
  get(key: string): string | null {
    return this.#entries.get(canonicalHeaderKey(key))?.[0] ?? null;
  }

  /** All values associated with `key`, in the order they were added. */
  values(key: string): string[] {
    return [...(this.#entries.get(canonicalHeaderKey(key)) ?? [])];
  }

  has(key: string): boolean {
    return this.#entries.has(canonicalHeaderKey(key));
  }

  delete(key: string): boolean {
    return this.#entries.delete(canonicalHeaderKey(key));
  }

  /** `[key, values]` pairs in insertion order of the keys. */
  *entries(): IterableIterator<[string, string[]]> {
    for (const [key, values] of this.#entries) {
      yield [key, [...values]];
    }
  }

  /**
   * Builds a WHATWG {@link Headers} instance, appending every value.
   * Throws a `TypeError` for names or values `Headers` rejects.
   */
  toHeaders(): Headers {
    const headers = new Headers();
    for (const [key, values] of this.#entries) {
      for (const value of values) {
        headers.append(key, value);
      }
    }

    return headers;
  }
}
