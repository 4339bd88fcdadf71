import { basename, dirname } from "path";
import type { MatchResult } from "../pipeline/types";

export interface ColumnWidths {
  name: number;
  folder: number;
  filename: number;
}

const DEFAULT_COLUMN_WIDTHS: ColumnWidths = {
  name: 24,
  folder: 16,
  filename: 30,
};

function fit(value: string, width: number): string {
  return value.length > width ? value.slice(0, width - 3) + "..." : value.padEnd(width);
}

/**
 * Format one ranked match as a table row.
 */
export function formatMatchRow(rank: number, result: MatchResult, columns: ColumnWidths = DEFAULT_COLUMN_WIDTHS): string {
  const name = fit(result.name, columns.name);
  const similarity = `${result.similarityScore.toFixed(1)}%`.padEnd(11);
  const distance = result.distance.toFixed(4).padEnd(10);

  let folder = "".padEnd(columns.folder);
  let filename = "(no image)";
  if (result.imagePath) {
    folder = fit(basename(dirname(result.imagePath)), columns.folder);
    filename = basename(result.imagePath);
    if (filename.length > columns.filename) {
      filename = filename.slice(0, columns.filename - 3) + "...";
    }
  }

  return ` ${String(rank).padStart(2)}  ${name} ${similarity}${distance}${folder} ${filename}`;
}

/**
 * Print a formatted table of ranked matches
 */
export function printMatchTable(results: MatchResult[], columns: ColumnWidths = DEFAULT_COLUMN_WIDTHS): void {
  console.log(` #   ${"Name".padEnd(columns.name)} Similarity Distance  ${"Folder".padEnd(columns.folder)} Image`);
  console.log("─".repeat(30 + columns.name + columns.folder + columns.filename));

  results.forEach((result, index) => {
    console.log(formatMatchRow(index + 1, result, columns));
  });
}
