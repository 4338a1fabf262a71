import { Item } from "./scan.js";

export interface TableFormatOptions {
  /** Columns to put first, in this order, when the items have them. */
  priority?: string[];
  width?: number;
  limit?: number;
}

function cell(value: unknown, width: number): string {
  let text: string;
  if (value === undefined || value === null) {
    text = "";
  } else if (typeof value === "object") {
    text = JSON.stringify(value, (_, v: unknown) => (v instanceof Set ? [...v] : v));
  } else {
    text = String(value);
  }
  return text.slice(0, width).padEnd(width);
}

/**
 * Renders items as a fixed-width text table. Columns come from the first
 * item's attributes; every value is cut to `width` characters.
 */
export function formatTable(items: Item[], opts: TableFormatOptions = {}): string[] {
  const width = opts.width ?? 15;
  const limit = opts.limit ?? 100;

  if (items.length === 0) {
    return ["=== NO ITEMS TO DISPLAY ==="];
  }

  const attributes = Object.keys(items[0]);
  const priority = (opts.priority ?? []).filter((column) => attributes.includes(column));
  const columns = [...priority, ...attributes.filter((column) => !priority.includes(column))];

  const header = columns.map((column) => cell(column, width)).join(" | ");
  const lines = [header, "-".repeat(header.length)];
  for (const item of items.slice(0, limit)) {
    lines.push(columns.map((column) => cell(item[column], width)).join(" | "));
  }
  if (items.length > limit) {
    lines.push("", `... and ${items.length - limit} more items (showing ${limit} of ${items.length} total)`);
  }
  return lines;
}
