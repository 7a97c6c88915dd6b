/**
 * Seed file loading.
 *
 * A seed is a JSON document describing the emulator's machines,
 * directory users and existing assignments.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { InMemoryBrokerSeed } from "@vdi-assign/broker";

export const SeedSchema = z.object({
  machines: z
    .array(
      z.object({
        uid: z.string().min(1),
        machineName: z.string().min(1),
        desktopGroupName: z.string(),
      }),
    )
    .default([]),
  users: z.array(z.string().min(1)).default([]),
  assignments: z.record(z.array(z.string().min(1))).default({}),
});

export function parseSeed(raw: unknown): InMemoryBrokerSeed {
  return SeedSchema.parse(raw);
}

/**
 * Read and validate a seed file.
 *
 * @throws {SyntaxError} if the file is not JSON
 * @throws {z.ZodError} if it does not match SeedSchema
 */
export async function loadSeed(path: string): Promise<InMemoryBrokerSeed> {
  const text = await readFile(path, "utf8");
  const raw: unknown = JSON.parse(text);
  return parseSeed(raw);
}
