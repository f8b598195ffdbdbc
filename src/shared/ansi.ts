/**
 * ANSI styling shared by the logger, the startup banner and the CLI.
 */

const sgr =
  (...codes: string[]) =>
  (s: string): string =>
    `\x1b[${codes.join(";")}m${s}\x1b[0m`;

/** Black or white text on a colored block, padded by one space */
const badge =
  (background: string, foreground: string) =>
  (s: string): string =>
    sgr(background, foreground)(` ${s} `);

export const bold = sgr("1");
export const dim = sgr("2");

export const red = sgr("31");
export const green = sgr("32");
export const yellow = sgr("33");
export const magenta = sgr("35");
export const cyan = sgr("36");
export const gray = sgr("90");
export const white = sgr("97");

export const bgRed = badge("41", "97");
export const bgGreen = badge("42", "30");
export const bgYellow = badge("43", "30");
export const bgMagenta = badge("45", "97");
export const bgCyan = badge("46", "30");

/** Visible length of a styled string */
const visibleLength = (s: string): number => s.replace(/\x1b\[[\d;]*m/g, "").length;

/** Framed block of rows, as used by the startup banner and the CLI logo */
export const box = (rows: readonly string[], width = 41): string => {
  const edge = (left: string, right: string): string => bold(cyan(`  ${left}${"─".repeat(width)}${right}`));
  const side = bold(cyan("│"));
  const body = ["", ...rows, ""].map(
    (row) => `  ${side}   ${row}${" ".repeat(Math.max(0, width - 3 - visibleLength(row)))}${side}`,
  );
  return [edge("┌", "┐"), ...body, edge("└", "┘")].join("\n");
};
