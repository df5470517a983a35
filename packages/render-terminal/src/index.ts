import type { DiffDocument } from "@lineweave/core";
import { renderSideBySide, sideBySideLayout } from "./side-by-side.js";
import { createPainter, sideBySidePalette, unifiedPalette } from "./styles.js";
import { renderUnified } from "./unified.js";

export interface TerminalRenderOptions {
  format?: "ansi" | "plain";
  layout?: "unified" | "side-by-side";
  /** Terminal columns available to the side-by-side layout. */
  width?: number;
  tabSize?: number;
}

export const DEFAULT_TERMINAL_WIDTH = 120;
export const DEFAULT_TAB_SIZE = 4;

const hasChanges = (document: DiffDocument) =>
  document.blocks.some(
    (block) => block.type !== "equal" && block.type !== "gap"
  );

export function renderTerminal(
  document: DiffDocument,
  options: TerminalRenderOptions = {}
) {
  if (!hasChanges(document)) {
    return "No line changes detected.";
  }
  const ansi = options.format !== "plain";
  if (options.layout === "side-by-side") {
    const layout = sideBySideLayout(
      document,
      options.width ?? DEFAULT_TERMINAL_WIDTH,
      options.tabSize ?? DEFAULT_TAB_SIZE
    );
    return renderSideBySide(
      document,
      layout,
      createPainter(sideBySidePalette, ansi)
    );
  }
  return renderUnified(document.blocks, createPainter(unifiedPalette, ansi));
}

export type { Palette, StyleName } from "./styles.js";
export { sideBySidePalette, unifiedPalette } from "./styles.js";
export type { Span } from "./wrap.js";
export { expandTabs, wrapSpans } from "./wrap.js";
