// CSI sequences (colours, cursor moves) and OSC sequences (titles, hyperlinks).
const ANSI = /\x1b\[[0-?]*[ -/]*[@-~]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)|\x1b[@-Z\\-_]/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI, "");
}

/** Split captured output into display lines without leading/trailing blank lines. */
export function toLines(text: string): string[] {
  const lines = stripAnsi(text)
    .split(/\r?\n/)
    .map((l) => l.replace(/\r/g, "").trimEnd());
  let start = 0;
  let end = lines.length;
  while (start < end && !lines[start]) start++;
  while (end > start && !lines[end - 1]) end--;
  return lines.slice(start, end);
}

/** Accumulates stdout and stderr in arrival order, keeping at most `limit` bytes. */
export class OutputCollector {
  private chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer | string) {
    const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = this.truncated || buf.length > 0;
      return;
    }
    const kept = buf.length > room ? buf.subarray(0, room) : buf;
    if (kept.length < buf.length) this.truncated = true;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  text(): string {
    const all = Buffer.concat(this.chunks);
    // The cut may land inside a multi-byte character.
    const end = this.truncated ? completeLength(all) : all.length;
    return all.subarray(0, end).toString("utf8");
  }
}

/** Length of `buf` without a trailing, incomplete UTF-8 sequence. */
function completeLength(buf: Buffer): number {
  let start = buf.length - 1;
  while (start > 0 && buf.length - start < 4 && (buf[start] & 0xc0) === 0x80) start--;
  if (start < 0) return 0;
  const lead = buf[start];
  const size = lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;
  return start + size > buf.length ? start : buf.length;
}
