/**
 * Environment configuration for the server's starting settings.
 *
 *   ISOMESH_SHAPE            sphere | box | torus | cone      (torus)
 *   ISOMESH_ALGORITHM        blocky | marching-cubes | surface-nets
 *   ISOMESH_VOXEL_SIZE       0.025 – 0.25                     (0.1)
 *   ISOMESH_ISO_LEVEL        number                           (0)
 *   ISOMESH_SMOOTH_SHADING   true | false                     (true)
 */

import { z } from 'zod';
import {
  DEFAULT_SETTINGS,
  DEFAULT_SHAPES,
  MESH_ALGORITHMS,
  SHAPE_KINDS,
  type PipelineSettings,
} from '@isomesh/kernel';

export const MIN_VOXEL_SIZE = 0.025;
export const MAX_VOXEL_SIZE = 0.25;

const EnvSchema = z.object({
  ISOMESH_SHAPE: z.enum(SHAPE_KINDS).default('torus'),
  ISOMESH_ALGORITHM: z.enum(MESH_ALGORITHMS).default(DEFAULT_SETTINGS.algorithm),
  ISOMESH_VOXEL_SIZE: z.coerce.number().min(MIN_VOXEL_SIZE).max(MAX_VOXEL_SIZE).default(DEFAULT_SETTINGS.voxelSize),
  ISOMESH_ISO_LEVEL: z.coerce.number().finite().default(DEFAULT_SETTINGS.isoLevel),
  ISOMESH_SMOOTH_SHADING: z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform((v) => v === 'true' || v === '1'),
});

/** Parse starting settings from the environment. Throws listing every bad variable. */
export function loadConfig(env: Record<string, string | undefined> = process.env): PipelineSettings {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid isomesh configuration: ${issues}`);
  }
  const c = result.data;
  return {
    shape: DEFAULT_SHAPES[c.ISOMESH_SHAPE],
    transform: DEFAULT_SETTINGS.transform,
    voxelSize: c.ISOMESH_VOXEL_SIZE,
    isoLevel: c.ISOMESH_ISO_LEVEL,
    algorithm: c.ISOMESH_ALGORITHM,
    smoothShading: c.ISOMESH_SMOOTH_SHADING,
  };
}
