// Minimal ANSI palette; honours NO_COLOR, FORCE_COLOR and non-TTY output.

const STYLES = {
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  blue: [34, 39],
  magenta: [35, 39],
  cyan: [36, 39],
  white: [37, 39],
  gray: [90, 39],
  bold: [1, 22],
  dim: [2, 22],
} as const satisfies Record<string, readonly [number, number]>;

type StyleName = keyof typeof STYLES;
type Colorizer = (text: string) => string;

const isColorDisabled = (): boolean =>
  Boolean(
    process.env.NO_COLOR ||
      process.env.FORCE_COLOR === "0" ||
      (!process.stdout.isTTY && !process.env.FORCE_COLOR) ||
      (process.env.CI && !process.env.FORCE_COLOR)
  );

const style = ([open, close]: readonly [number, number]): Colorizer =>
  (text: string) => (isColorDisabled() ? text : `\x1b[${open}m${text}\x1b[${close}m`);

export const lightColors = {
  red: style(STYLES.red),
  green: style(STYLES.green),
  yellow: style(STYLES.yellow),
  blue: style(STYLES.blue),
  magenta: style(STYLES.magenta),
  cyan: style(STYLES.cyan),
  white: style(STYLES.white),
  gray: style(STYLES.gray),
  bold: style(STYLES.bold),
  dim: style(STYLES.dim),
  // eslint-disable-next-line no-control-regex
  strip: (text: string): string => text.replace(/\x1b\[[0-9;]*m/g, ""),
} satisfies Record<StyleName | "strip", Colorizer>;

