const ESC = '\x1b[';
const RESET = `${ESC}0m`;

type Paint = (s: string) => string;

export type Palette = {
  bold: Paint;
  dim: Paint;
  red: Paint;
  green: Paint;
  yellow: Paint;
  cyan: Paint;
  banner: Paint;
};

function sgr(code: string, enabled: boolean): Paint {
  return (s) => (enabled ? `${ESC}${code}m${s}${RESET}` : s);
}

export function createPalette(enabled: boolean): Palette {
  return {
    bold: sgr('1', enabled),
    dim: sgr('2', enabled),
    red: sgr('31', enabled),
    green: sgr('32', enabled),
    yellow: sgr('33', enabled),
    cyan: sgr('36', enabled),
    // bold white on blue
    banner: sgr('1;37;44', enabled),
  };
}
