import type { Editor } from "../editor/editor.js";
import type { KeyInput } from "../editor/state.js";
import type { WatcherError } from "../errors.js";
import type { ExerciseDescriptor } from "../exercises/types.js";
import type { RunResult } from "../runner/types.js";
import type { PaneView, Size } from "../ui/layout.js";
import type { Tone } from "../ui/theme.js";

export type View = PaneView | "help";

export type SessionEvent =
  | { type: "key"; key: KeyInput }
  | { type: "file-changed"; path: string }
  | { type: "run-finished"; exerciseId: string; generation: number; result: RunResult }
  | { type: "check-all-finished"; generation: number; failed: string[] }
  | { type: "watch-error"; error: WatcherError }
  | { type: "resize"; size: Size };

export type OutputPanel = {
  title: string;
  lines: string[];
  tone: Tone;
};

export type StatusMessage = { text: string; tone: Tone };

export type SessionState = {
  index: number;
  exercise: ExerciseDescriptor;
  editor: Editor;
  solution: Editor | null;
  result: RunResult | null;
  generation: number;
  runStartedAt: number | null;
  // True while every exercise is re-run after the last one passes.
  checkingAll: boolean;
  output: OutputPanel;
  outputScroll: number;
  view: View;
  // Pane view to return to when help closes.
  underHelp: PaneView;
  watchEnabled: boolean;
  autoAdvance: boolean;
  status: StatusMessage | null;
  viewport: Size;
  startedAt: number;
  quitting: boolean;
};

/** Everything the renderer reads. Produced by the controller after each event. */
export type SessionSnapshot = Readonly<{
  exercise: ExerciseDescriptor;
  total: number;
  doneCount: number;
  exerciseDone: boolean;
  editor: Editor;
  solution: Editor | null;
  paneView: PaneView;
  helpOpen: boolean;
  output: OutputPanel;
  outputScroll: number;
  running: boolean;
  runStartedAt: number | null;
  startedAt: number;
  status: StatusMessage | null;
  watchEnabled: boolean;
  autoAdvance: boolean;
}>;
