/**
 * List kinds: comma-separated text, accumulated across repeated tags.
 */

import { InvalidKindError, ok, type ArgumentKind } from "@argwright/sdk";

export interface ListOptions {
  /** Element separator. Default: "," */
  delimiter?: string;
}

export function list<T, E>(element: ArgumentKind<T, E>, options: ListOptions = {}): ArgumentKind<T[], E> {
  const delimiter = options.delimiter ?? ",";
  const name = `list<${element.name}>`;

  if (!element.consumes) {
    throw new InvalidKindError(name, "list elements must take a value");
  }
  if (delimiter.length === 0) {
    throw new InvalidKindError(name, "delimiter must not be empty");
  }

  return {
    name,
    consumes: true,
    fromValue(raw) {
      if (raw === undefined) return undefined;
      const values: T[] = [];
      for (const piece of raw.split(delimiter)) {
        const converted = element.fromValue(piece);
        if (converted === undefined) return undefined;
        if (!converted.ok) return converted;
        values.push(converted.value);
      }
      return ok(values);
    },
    accumulate(previous, next) {
      return [...previous, ...next];
    },
    copy(values) {
      return [...values];
    },
  };
}
