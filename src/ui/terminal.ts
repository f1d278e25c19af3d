import blessed from "neo-blessed";
import type { Widgets } from "neo-blessed";

import type { KeyInput } from "../editor/state.js";
import type { StyledLine } from "./canvas.js";
import { normalizeKey } from "./keys.js";
import type { Size } from "./layout.js";
import type { Frame } from "./render.js";
import { hex } from "./theme.js";

export type TerminalHandlers = {
  key(key: KeyInput): void;
  resize(size: Size): void;
  /** Ctrl+C. */
  interrupt(): void;
};

/** Blessed tag markup for a frame; every segment closes its own tags. */
export function toTagged(lines: readonly StyledLine[]): string {
  return lines
    .map((line) =>
      line
        .map(({ text, style }) => {
          const open = [
            style.fg ? `{${hex(style.fg)}-fg}` : "",
            style.bg ? `{${hex(style.bg)}-bg}` : "",
            style.bold ? "{bold}" : "",
            style.underline ? "{underline}" : "",
          ].join("");
          const body = blessed.escape(text);
          return open ? `${open}${body}{/}` : body;
        })
        .join(""),
    )
    .join("\n");
}

/** A single full-screen tagged box the frame is painted into. */
export class Terminal {
  private readonly screen: Widgets.Screen;
  private readonly view: Widgets.BoxElement;

  constructor(title: string) {
    this.screen = blessed.screen({ smartCSR: true, title, fullUnicode: true });
    this.view = blessed.box({ top: 0, left: 0, width: "100%", height: "100%", tags: true });
    this.screen.append(this.view);
  }

  get size(): Size {
    const { width, height } = this.screen;
    return {
      width: typeof width === "number" ? width : (process.stdout.columns ?? 80),
      height: typeof height === "number" ? height : (process.stdout.rows ?? 24),
    };
  }

  listen(handlers: TerminalHandlers) {
    this.screen.on("keypress", (ch: string | undefined, key: Widgets.Events.IKeyEventArg | undefined) => {
      if (key?.full === "C-c") {
        handlers.interrupt();
        return;
      }
      const input = normalizeKey(ch, key);
      if (input) handlers.key(input);
    });
    this.screen.on("resize", () => handlers.resize(this.size));
  }

  draw(frame: Frame) {
    this.view.setContent(toTagged(frame.lines));
    this.screen.render();
    const { program } = this.screen;
    if (frame.cursor) {
      program.cup(frame.cursor.y, frame.cursor.x);
      program.showCursor();
    } else {
      program.hideCursor();
    }
  }

  destroy() {
    this.screen.destroy();
  }
}
