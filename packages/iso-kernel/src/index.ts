// Public API
export type { Vec3, BoundingBox } from './vec3.js';
export { vec3 } from './vec3.js';
export { InvalidShapeConfiguration } from './errors.js';

// Shapes
export type { ShapeKind, ShapeParams, ShapeParamMap, ShapeReadback, DistanceField, Primitive } from './shape.js';
export { Shape, SHAPE_KINDS, DEFAULT_SHAPES, PRIMITIVES, localDistance, localBounds, describeShape } from './shape.js';

// Transforms
export type { Affine, Axis, TransformParams } from './transform.js';
export { Transform, IDENTITY_TRANSFORM } from './transform.js';

// Voxel grid
export type { GridReadback } from './voxel-grid.js';
export { VoxelGrid, OUTSIDE_VALUE, DEFAULT_VOXEL_SIZE, MAX_VOXEL_COUNT } from './voxel-grid.js';

// Meshes
export type { TriangleMesh, SmoothingFlag, PackedMesh } from './mesh.js';
export { createMesh, vertexCount, triangleCount, setSmoothing, packMesh, MeshWriter } from './mesh.js';

// Mesh builders
export type { MeshAlgorithm, MeshBuilder } from './mesh-builder.js';
export { buildMesh, MESH_BUILDERS, MESH_ALGORITHMS, DEFAULT_ALGORITHM } from './mesh-builder.js';
export { blocky } from './blocky.js';
export { marchingCubes } from './marching-cubes.js';
export { surfaceNets } from './surface-nets.js';

// Diagnostics
export type { MeshStats } from './diagnostics.js';
export {
  countDegenerateTriangles, meshBounds, meshVolume, meshStats,
  DEFAULT_DEGENERATE_THRESHOLD,
} from './diagnostics.js';

// Pipeline
export type { PipelineSettings, SettingsPatch, UpdateResult } from './pipeline.js';
export { IsosurfacePipeline, DEFAULT_SETTINGS } from './pipeline.js';
