const RESET = "\u001b[0m";

export interface Palette {
  add: string;
  addHighlight: string;
  remove: string;
  removeHighlight: string;
  muted: string;
  lineNumber: string;
}

export const unifiedPalette: Palette = {
  add: "\u001b[32m",
  addHighlight: "\u001b[30;42m",
  remove: "\u001b[31m",
  removeHighlight: "\u001b[30;41m",
  muted: "\u001b[90m",
  lineNumber: "\u001b[1m",
};

// 256-colour pastels; highlights reverse the same colour.
export const sideBySidePalette: Palette = {
  add: "\u001b[38;5;157m",
  addHighlight: "\u001b[38;5;157;7m",
  remove: "\u001b[38;5;217m",
  removeHighlight: "\u001b[38;5;217;7m",
  muted: "\u001b[90m",
  lineNumber: "\u001b[1m",
};

export type StyleName = keyof Palette;

export type Painter = (text: string, style: StyleName | undefined) => string;

export function createPainter(palette: Palette, ansi: boolean): Painter {
  return (text, style) => {
    if (!ansi || style === undefined || text.length === 0) {
      return text;
    }
    return `${palette[style]}${text}${RESET}`;
  };
}
