/**
 * Loads dataset versions into the in-memory catalog from a JSON file.
 * Used with STORAGE_DRIVER=memory, where no upstream builder exists.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { InMemoryDatasetCatalog } from './dataset.catalog.js';

const HeldOutExampleSchema = z.object({
  id: z.string().min(1),
  prompt: z.string().min(1),
  reference: z.string(),
  context: z.array(z.string()).default([]),
  expectRefusal: z.boolean().default(false),
});

const DatasetSeedSchema = z.object({
  versions: z.array(
    z.object({
      id: z.string().min(1),
      tenantId: z.string().min(1),
      projectId: z.string().min(1),
      status: z.enum(['building', 'ready', 'needs_review', 'failed']),
      stats: z.record(z.number()).default({}),
      heldOut: z.array(HeldOutExampleSchema).default([]),
    })
  ),
});

export async function seedDatasetCatalog(catalog: InMemoryDatasetCatalog, file: string): Promise<number> {
  const seed = DatasetSeedSchema.parse(JSON.parse(await readFile(file, 'utf8')));
  for (const v of seed.versions) {
    catalog.put(
      {
        id: v.id,
        tenantId: v.tenantId,
        projectId: v.projectId,
        status: v.status,
        stats: {
          exampleCount: v.stats.exampleCount ?? 0,
          trainCount: v.stats.trainCount ?? 0,
          validationCount: v.stats.validationCount ?? 0,
          heldOutCount: v.stats.heldOutCount ?? v.heldOut.length,
          ...v.stats,
        },
      },
      v.heldOut
    );
  }
  return seed.versions.length;
}
