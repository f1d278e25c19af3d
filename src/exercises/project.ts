import fs from "node:fs";
import path from "node:path";

import { MANIFEST_FILE_NAME } from "./catalog.js";

/** Walk up from `startPath` to the first directory holding a course manifest. */
export function findCourseRoot(startPath: string): string | null {
  let cur = path.resolve(startPath);
  while (true) {
    if (fs.existsSync(path.join(cur, MANIFEST_FILE_NAME))) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) return null;
    cur = parent;
  }
}
