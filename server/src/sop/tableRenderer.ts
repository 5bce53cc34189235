/**
 * Markdown table rendering. Rows come out in exactly the order given.
 */

export type TableCell = string | number;

export interface TableArtifact {
  title: string;
  header: string[];
  rows: TableCell[][];
}

export interface TableRenderOptions {
  /**
   * Escape "|" and line breaks inside cells so free text cannot break the table.
   * Off reproduces the legacy output byte for byte.
   */
  escapeCells: boolean;
}

export const DEFAULT_TABLE_OPTIONS: TableRenderOptions = {
  escapeCells: true,
};

export function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r\n|\n|\r/g, "<br>");
}

export function formatCell(value: TableCell, opts: TableRenderOptions): string {
  const text = String(value);
  return opts.escapeCells ? escapeCell(text) : text;
}

export function renderTable(table: TableArtifact, options: Partial<TableRenderOptions> = {}): string {
  const opts: TableRenderOptions = { ...DEFAULT_TABLE_OPTIONS, ...options };
  const lines: string[] = [];

  lines.push(table.title);
  lines.push("");
  lines.push("| " + table.header.join(" | ") + " |");
  lines.push("|" + table.header.map(() => "---").join("|") + "|");
  for (const row of table.rows) {
    lines.push("| " + row.map(cell => formatCell(cell, opts)).join(" | ") + " |");
  }

  return lines.join("\n");
}
