import { stringifyOrdered } from "../utils/json";
import type { TableData } from "./types";

export const JSON_TABLE_OPEN = ":::json_table\n";
export const JSON_TABLE_CLOSE = "\n:::\n\n";

/**
 * Serializes every row of a table on its own: a row object for positional
 * tables, a `"key": {...}` member for keyed ones.
 */
export function serializeTableRows(data: TableData): string[] {
  if (data.layout === "positional") {
    return data.rows.map((row) => stringifyOrdered(row));
  }
  return Array.from(
    data.rows,
    ([key, row]) => `${JSON.stringify(key)}: ${stringifyOrdered(row)}`,
  );
}

/**
 * Wraps serialized rows in the JSON container for the layout and the
 * `:::json_table` fence.
 */
export function formatJsonTable(layout: TableData["layout"], rows: string[]): string {
  const [open, close] = layout === "positional" ? ["[", "]"] : ["{", "}"];
  const body = rows.length > 0 ? `${open}\n${rows.join(",\n")}\n${close}` : open + close;
  return JSON_TABLE_OPEN + body + JSON_TABLE_CLOSE;
}

