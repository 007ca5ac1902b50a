/**
 * Terminal output for the hostpanel CLI. Colors are off when NO_COLOR is set
 * or stdout is not a terminal, so piped output stays plain text.
 */
const NO_COLOR = process.env.NO_COLOR !== undefined;
const IS_TTY = process.stdout.isTTY === true;
const COLORS_ENABLED = !NO_COLOR && IS_TTY;

const ANSI = {
  RESET: "\x1b[0m",
  BOLD: "\x1b[1m",
  DIM: "\x1b[2m",
  GREEN: "\x1b[32m",
  RED: "\x1b[31m",
  YELLOW: "\x1b[33m",
  CYAN: "\x1b[36m",
};

export function bold(text: string): string { return COLORS_ENABLED ? `${ANSI.BOLD}${text}${ANSI.RESET}` : text; }
export function green(text: string): string { return COLORS_ENABLED ? `${ANSI.GREEN}${text}${ANSI.RESET}` : text; }
export function red(text: string): string { return COLORS_ENABLED ? `${ANSI.RED}${text}${ANSI.RESET}` : text; }
export function yellow(text: string): string { return COLORS_ENABLED ? `${ANSI.YELLOW}${text}${ANSI.RESET}` : text; }
export function cyan(text: string): string { return COLORS_ENABLED ? `${ANSI.CYAN}${text}${ANSI.RESET}` : text; }
export function dim(text: string): string { return COLORS_ENABLED ? `${ANSI.DIM}${text}${ANSI.RESET}` : text; }
export function log(msg: string): void { console.log(msg); }
export function info(msg: string): void { console.log(`${cyan("ℹ")} ${msg}`); }
export function warn(msg: string): void { console.log(`${yellow("⚠")} ${msg}`); }
export function error(msg: string): void { console.error(`${red("✖")} ${msg}`); }

/**
 * Pad each cell to its column's widest entry. The last column is left
 * unpadded so lines carry no trailing spaces; color the cells afterwards.
 */
export function padColumns(rows: string[][]): string[][] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, column) => {
      widths[column] = Math.max(widths[column] ?? 0, cell.length);
    });
  }
  return rows.map((row) => row.map((cell, column) => (column === row.length - 1 ? cell : cell.padEnd(widths[column] ?? 0))));
}

export function spinner(msg: string): { stop: (finalMsg?: string) => void } {
  const frames = ["|", "/", "-", "\\"];
  let frameIndex = 0;
  let intervalId: ReturnType<typeof setInterval> | null = null;

  if (IS_TTY) {
    intervalId = setInterval(() => {
      const frame = frames[frameIndex];
      frameIndex = (frameIndex + 1) % frames.length;
      process.stdout.write(`\r${cyan(frame)} ${msg}`);
    }, 80);
  } else {
    console.log(msg);
  }

  return {
    stop(finalMsg?: string): void {
      if (intervalId) {
        clearInterval(intervalId);
      }
      if (IS_TTY) {
        process.stdout.write("\r\x1b[K");
      }
      if (finalMsg) {
        console.log(finalMsg);
      }
    },
  };
}
