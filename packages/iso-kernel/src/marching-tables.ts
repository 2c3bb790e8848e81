/**
 * Marching cubes lookup tables (Bourke), loaded from marching-tables.json.
 *
 * edgeTable[config] is a 12-bit mask of crossed edges; triTable[config] lists
 * edge indices, three per triangle. Both are indexed by the 8-bit corner
 * configuration.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const configCount = 256;

const TablesSchema = z.object({
  edgeTable: z.array(z.number().int().min(0).max(0xfff)).length(configCount),
  triTable: z
    .array(
      z
        .array(z.number().int().min(0).max(11))
        .max(15)
        .refine((edges) => edges.length % 3 === 0, 'edge list length must be a multiple of 3'),
    )
    .length(configCount),
});

export type MarchingTables = z.infer<typeof TablesSchema>;

/** Validate raw table data. Throws with the zod issue list on malformed input. */
export function parseMarchingTables(raw: unknown): MarchingTables {
  const result = TablesSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Marching cubes table is malformed: ${issues}`);
  }
  for (let config = 0; config < configCount; config++) {
    for (const edge of result.data.triTable[config]) {
      if (!(result.data.edgeTable[config] & (1 << edge))) {
        throw new Error(
          `Marching cubes table is inconsistent: config ${config} uses edge ${edge} not set in edgeTable`
        );
      }
    }
  }
  return result.data;
}

let cached: MarchingTables | undefined;

/** Tables shipped beside this module, parsed once. */
export function marchingTables(): MarchingTables {
  if (!cached) {
    const text = readFileSync(new URL('./marching-tables.json', import.meta.url), 'utf8');
    cached = parseMarchingTables(JSON.parse(text));
  }
  return cached;
}
