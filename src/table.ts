import type { MovieRecord } from "./types.js";

export const MOVIE_HEADERS = ["ID", "Title", "Release Date"];

// [start, end] code point ranges a terminal draws two columns wide
const WIDE: Array<[number, number]> = [
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe30, 0xfe4f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f300, 0x1f64f],
  [0x1f900, 0x1f9ff],
  [0x20000, 0x3fffd],
];

// combining marks, zero-width spaces and joiners, variation selectors
const ZERO: Array<[number, number]> = [
  [0x0300, 0x036f],
  [0x200b, 0x200f],
  [0xfe00, 0xfe0f],
];

const inRanges = (cp: number, ranges: Array<[number, number]>) => ranges.some(([lo, hi]) => cp >= lo && cp <= hi);

/** Terminal columns a string occupies. Other scripts count one column per code point. */
export function displayWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (inRanges(cp, ZERO)) continue;
    width += inRanges(cp, WIDE) ? 2 : 1;
  }
  return width;
}

function pad(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - displayWidth(text)));
}

/**
 * Render rows as a boxed grid:
 *
 *   +----+-------+
 *   | ID | Title |
 *   +====+=======+
 *   | 1  | Heat  |
 *   +----+-------+
 */
export function renderGrid(headers: string[], rows: Array<Array<string | number>>): string {
  const cells = rows.map((r) => headers.map((_, i) => String(r[i] ?? "").replace(/\s*\n\s*/g, " ")));
  const widths = headers.map((h, i) => Math.max(displayWidth(h), ...cells.map((r) => displayWidth(r[i]))));

  const rule = (ch: string) => "+" + widths.map((w) => ch.repeat(w + 2)).join("+") + "+";
  const line = (values: string[]) => "| " + values.map((v, i) => pad(v, widths[i])).join(" | ") + " |";

  const out = [rule("-"), line(headers), rule("=")];
  for (const r of cells) {
    out.push(line(r), rule("-"));
  }
  return out.join("\n");
}

export function renderMovieTable(movies: MovieRecord[]): string {
  return renderGrid(
    MOVIE_HEADERS,
    movies.map((m) => [m.id, m.title, m.release_date])
  );
}
