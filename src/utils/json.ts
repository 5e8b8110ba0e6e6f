/**
 * A JSON value whose objects may be `Map`s. Maps serialize as JSON objects in
 * insertion order, which plain objects cannot guarantee for integer-like keys
 * such as "2024".
 */
export type OrderedJsonValue =
  | string
  | number
  | boolean
  | null
  | OrderedJsonValue[]
  | Map<string, OrderedJsonValue>
  | OrderedJsonObject;

export interface OrderedJsonObject {
  [key: string]: OrderedJsonValue | undefined;
}

/**
 * Serializes a value like `JSON.stringify(value, null, indent)`, except that
 * `Map` entries keep their insertion order. Object properties that are
 * `undefined` are omitted. An empty `indent` gives compact output.
 */
export function stringifyOrdered(value: OrderedJsonValue, indent = ""): string {
  return write(value, indent, "");
}

function write(value: OrderedJsonValue, indent: string, depth: string): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }

  const entries: string[] = [];
  const inner = depth + indent;
  const separator = indent ? ": " : ":";

  if (Array.isArray(value)) {
    for (const item of value) {
      entries.push(write(item, indent, inner));
    }
    return wrap("[", "]", entries, indent, depth);
  }

  const pairs: Iterable<[string, OrderedJsonValue | undefined]> =
    value instanceof Map ? value.entries() : Object.entries(value);
  for (const [key, item] of pairs) {
    if (item === undefined) continue;
    entries.push(`${JSON.stringify(key)}${separator}${write(item, indent, inner)}`);
  }
  return wrap("{", "}", entries, indent, depth);
}

function wrap(
  open: string,
  close: string,
  entries: string[],
  indent: string,
  depth: string,
): string {
  if (entries.length === 0) return open + close;
  if (!indent) return open + entries.join(",") + close;
  const inner = depth + indent;
  return `${open}\n${inner}${entries.join(`,\n${inner}`)}\n${depth}${close}`;
}
