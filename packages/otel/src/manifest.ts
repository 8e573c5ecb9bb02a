import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

/** Name and version of the host application, taken from its package.json */
export interface Manifest {
  name?: string;
  version?: string;
}

const manifestSchema = z.object({
  name: z.string().optional().catch(undefined),
  version: z.string().optional().catch(undefined),
});

/**
 * Read the host application's package.json. The manifest is optional
 * metadata: a missing, unreadable or malformed file yields `{}`.
 */
export function readManifest(
  path: string = join(process.cwd(), "package.json"),
): Manifest {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch {
    return {};
  }

  const result = manifestSchema.safeParse(raw);
  return result.success ? result.data : {};
}
