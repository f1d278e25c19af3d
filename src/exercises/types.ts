export type RunMode = "check" | "test" | "lint";

export type ExerciseDescriptor = Readonly<{
  id: string;
  name: string;
  /** Absolute path of the working copy the user edits. */
  path: string;
  ordinal: number;
  hint: string;
  /** Always starts with "check"; "test" and "lint" follow when the exercise needs them. */
  modes: readonly RunMode[];
  /** Directory the toolchain runs in; the course root unless the manifest says otherwise. */
  cwd: string;
}>;

/** Read-only supplier of the curriculum. */
export type ExerciseSource = {
  readonly exercises: readonly ExerciseDescriptor[];
  readonly finalMessage: string;
  originalText(id: string): Promise<string>;
  solutionText(id: string): Promise<string | null>;
};
