// src/core/utils/assets.ts
import { fileURLToPath } from "node:url";
import path from "node:path";

// src/core/utils and dist/core/utils are both three levels below the root.
const PROJECT_ROOT = fileURLToPath(new URL("../../../", import.meta.url));

/** Absolute path of a file shipped with the project (shaders, fonts). */
export function projectFile(...segments: string[]): string {
  return path.join(PROJECT_ROOT, ...segments);
}
