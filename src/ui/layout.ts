import type { Rect } from "./canvas.js";

export type Size = { width: number; height: number };

/** Layouts the main area can take; the help overlay is drawn on top of one of them. */
export type PaneView = "editor" | "solution" | "expanded-output";

export type Layout = {
  header: Rect;
  main: Rect;
  editor: Rect | null;
  solution: Rect | null;
  output: Rect;
  progress: Rect;
  status: Rect;
};

export const HEADER_HEIGHT = 1;
// Output box plus the progress and status rows.
export const FOOTER_HEIGHT = 10;
const MIN_MAIN = 3;

export function computeLayout(size: Size, view: PaneView): Layout {
  const width = Math.max(1, size.width);
  const height = Math.max(3, size.height);

  const footer = Math.min(FOOTER_HEIGHT, Math.max(2, height - HEADER_HEIGHT - MIN_MAIN));
  const mainHeight = Math.max(0, height - HEADER_HEIGHT - footer);
  const outputHeight = footer - 2;

  const header = { x: 0, y: 0, width, height: HEADER_HEIGHT };
  const main = { x: 0, y: HEADER_HEIGHT, width, height: mainHeight };
  const output = { x: 0, y: HEADER_HEIGHT + mainHeight, width, height: outputHeight };
  const progress = { x: 0, y: height - 2, width, height: 1 };
  const status = { x: 0, y: height - 1, width, height: 1 };

  switch (view) {
    case "editor":
      return { header, main, editor: main, solution: null, output, progress, status };
    case "solution": {
      const left = Math.floor(width / 2);
      return {
        header,
        main,
        editor: { ...main, width: left },
        solution: { ...main, x: left, width: width - left },
        output,
        progress,
        status,
      };
    }
    case "expanded-output":
      return {
        header,
        main,
        editor: null,
        solution: null,
        output: { ...main, height: mainHeight + outputHeight },
        progress,
        status,
      };
  }
}

/** A `width` x `height` rect centred in `outer`, shrunk to fit. */
export function centerRect(outer: Rect, width: number, height: number): Rect {
  const w = Math.min(width, outer.width);
  const h = Math.min(height, outer.height);
  return {
    x: outer.x + Math.floor((outer.width - w) / 2),
    y: outer.y + Math.floor((outer.height - h) / 2),
    width: w,
    height: h,
  };
}
