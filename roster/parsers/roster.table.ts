import { readFileSync } from "fs";
import { load } from "cheerio";
import type { TableRow } from "../roster.types.js";

/**
 * Rows of the spreadsheet-style roster export (an HTML table served with an
 * .xls name). Header cells are zipped with each row's cells; rows without
 * `td` cells are skipped.
 */
export function parseRosterTable(html: string): TableRow[] {
  const $ = load(html);
  const headers = $("th").map((_i, th) => $(th).text().trim()).get();

  const rows: TableRow[] = [];
  $("tr").each((_i, tr) => {
    const cells = $(tr).find("td");
    if (!cells.length) return;
    const row: TableRow = {};
    cells.each((j, td) => {
      if (j >= headers.length) return;
      // direct text only; nested markup such as <br> is dropped
      row[headers[j]] = $(td).contents().filter((_k, node) => node.nodeType === 3).text().trim();
    });
    rows.push(row);
  });
  return rows;
}

export function parseRosterTableFile(file: string): TableRow[] {
  return parseRosterTable(readFileSync(file, "utf8"));
}
