/**
 * MCP Tool Registrations — 14 tools driving the isosurface pipeline.
 *
 * Every mutating tool returns the full session readback (settings, shape,
 * grid, mesh counts, stage timings) so the agent always knows the current
 * state after every operation.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { MESH_ALGORITHMS, DEFAULT_DEGENERATE_THRESHOLD, type Vec3 } from '@isomesh/kernel';
import * as session from './session.js';
import { MIN_VOXEL_SIZE, MAX_VOXEL_SIZE } from './config.js';

export function registerTools(server: McpServer): void {

  // ─── Shapes (4) ─────────────────────────────────────────────

  server.tool(
    'set_sphere',
    'Replace the shape with a sphere centered at the local origin. The current transform is kept.',
    {
      radius: z.number().positive().describe('Radius in world units'),
    },
    async ({ radius }) => {
      const result = session.update({ shape: { kind: 'sphere', radius } });
      return { content: [{ type: 'text', text: JSON.stringify(result) }] };
    }
  );

  server.tool(
    'set_box',
    'Replace the shape with an axis-aligned box centered at the local origin. The current transform is kept.',
    {
      width: z.number().positive().describe('Width (X extent)'),
      height: z.number().positive().describe('Height (Y extent)'),
      depth: z.number().positive().describe('Depth (Z extent)'),
    },
    async ({ width, height, depth }) => {
      const result = session.update({ shape: { kind: 'box', width, height, depth } });
      return { content: [{ type: 'text', text: JSON.stringify(result) }] };
    }
  );

  server.tool(
    'set_torus',
    'Replace the shape with a torus lying in the local XZ plane around the Y axis. The current transform is kept.',
    {
      major_radius: z.number().positive().describe('Distance from the center to the tube center'),
      minor_radius: z.number().positive().describe('Tube radius'),
    },
    async ({ major_radius, minor_radius }) => {
      const result = session.update({
        shape: { kind: 'torus', majorRadius: major_radius, minorRadius: minor_radius },
      });
      return { content: [{ type: 'text', text: JSON.stringify(result) }] };
    }
  );

  server.tool(
    'set_cone',
    'Replace the shape with a cone along the local Y axis: apex at +height/2, base disc at -height/2. The current transform is kept.',
    {
      radius: z.number().positive().describe('Base radius'),
      height: z.number().positive().describe('Apex-to-base height'),
    },
    async ({ radius, height }) => {
      const result = session.update({ shape: { kind: 'cone', radius, height } });
      return { content: [{ type: 'text', text: JSON.stringify(result) }] };
    }
  );

  // ─── Transform (1) ──────────────────────────────────────────

  server.tool(
    'set_transform',
    'Set any subset of the shape transform. Omitted components keep their value. Rotations are degrees, applied X, then Y, then Z. Scale components are clamped to at least 0.001.',
    {
      translate_x: z.number().optional().describe('Translation X'),
      translate_y: z.number().optional().describe('Translation Y'),
      translate_z: z.number().optional().describe('Translation Z'),
      rotate_x: z.number().optional().describe('Rotation about X in degrees'),
      rotate_y: z.number().optional().describe('Rotation about Y in degrees'),
      rotate_z: z.number().optional().describe('Rotation about Z in degrees'),
      scale_x: z.number().optional().describe('Scale along X'),
      scale_y: z.number().optional().describe('Scale along Y'),
      scale_z: z.number().optional().describe('Scale along Z'),
    },
    async (params) => {
      const { translation: t, rotation: r, scale: s } = session.state().settings.transform;
      const translation: Vec3 = [params.translate_x ?? t[0], params.translate_y ?? t[1], params.translate_z ?? t[2]];
      const rotation: Vec3 = [params.rotate_x ?? r[0], params.rotate_y ?? r[1], params.rotate_z ?? r[2]];
      const scale = session.clampScale([params.scale_x ?? s[0], params.scale_y ?? s[1], params.scale_z ?? s[2]]);
      const result = session.update({ transform: { translation, rotation, scale } });
      return { content: [{ type: 'text', text: JSON.stringify(result) }] };
    }
  );

  // ─── Sampling & meshing (4) ─────────────────────────────────

  server.tool(
    'set_voxel_size',
    'Set the voxel edge length. The grid is refitted and resampled, then the mesh rebuilt. Smaller is finer and slower.',
    {
      voxel_size: z.number().min(MIN_VOXEL_SIZE).max(MAX_VOXEL_SIZE)
        .describe(`Voxel edge length (${MIN_VOXEL_SIZE}–${MAX_VOXEL_SIZE})`),
    },
    async ({ voxel_size }) => {
      const result = session.update({ voxelSize: voxel_size });
      return { content: [{ type: 'text', text: JSON.stringify(result) }] };
    }
  );

  server.tool(
    'set_iso_level',
    'Set the field value treated as the surface. Negative shrinks the mesh, positive grows it. Only the mesh is rebuilt.',
    {
      iso_level: z.number().describe('Iso-level (0 = exact shape surface)'),
    },
    async ({ iso_level }) => {
      const result = session.update({ isoLevel: iso_level });
      return { content: [{ type: 'text', text: JSON.stringify(result) }] };
    }
  );

  server.tool(
    'set_algorithm',
    'Choose the meshing algorithm: blocky (voxel faces), marching-cubes (interpolated triangles), or surface-nets (averaged dual vertices). Only the mesh is rebuilt.',
    {
      algorithm: z.enum(MESH_ALGORITHMS).describe('Meshing algorithm'),
    },
    async ({ algorithm }) => {
      const result = session.update({ algorithm });
      return { content: [{ type: 'text', text: JSON.stringify(result) }] };
    }
  );

  server.tool(
    'set_smooth_shading',
    'Mark every triangle smooth (shared vertex normals) or flat. Rewrites the existing flags without rebuilding.',
    {
      smooth: z.boolean().describe('true for smooth shading, false for flat'),
    },
    async ({ smooth }) => {
      const result = session.update({ smoothShading: smooth });
      return { content: [{ type: 'text', text: JSON.stringify(result) }] };
    }
  );

  // ─── Inspection (4) ─────────────────────────────────────────

  server.tool(
    'get_state',
    'Return the current settings, shape, grid and mesh summary without changing anything.',
    {},
    async () => {
      return { content: [{ type: 'text', text: JSON.stringify(session.state()) }] };
    }
  );

  server.tool(
    'get_mesh_stats',
    'Measure the current mesh: vertex/triangle counts, degenerate triangles, bounds and enclosed volume.',
    {
      degenerate_threshold: z.number().min(0).max(1).default(DEFAULT_DEGENERATE_THRESHOLD)
        .describe('A triangle is degenerate when its shortest edge is at most voxel_size × threshold'),
    },
    async ({ degenerate_threshold }) => {
      const stats = session.stats(degenerate_threshold);
      const result = { type: 'mesh_stats', degenerate_threshold, ...stats };
      return { content: [{ type: 'text', text: JSON.stringify(result) }] };
    }
  );

  server.tool(
    'evaluate_point',
    'Evaluate the shape distance field at a world-space point. Negative is inside.',
    {
      x: z.number().describe('World X'),
      y: z.number().describe('World Y'),
      z: z.number().describe('World Z'),
    },
    async ({ x, y, z: pz }) => {
      const result = session.evaluatePoint([x, y, pz]);
      return { content: [{ type: 'text', text: JSON.stringify(result) }] };
    }
  );

  server.tool(
    'get_voxel',
    'Read one sampled voxel. Coordinates outside the grid return the far-outside sentinel 10000.',
    {
      x: z.number().int().describe('Voxel X index'),
      y: z.number().int().describe('Voxel Y index'),
      z: z.number().int().describe('Voxel Z index'),
    },
    async ({ x, y, z: vz }) => {
      const result = session.voxel(x, y, vz);
      return { content: [{ type: 'text', text: JSON.stringify(result) }] };
    }
  );

  // ─── Session (1) ────────────────────────────────────────────

  server.tool(
    'reset',
    'Restore the starting settings and rebuild.',
    {},
    async () => {
      return { content: [{ type: 'text', text: JSON.stringify(session.reset()) }] };
    }
  );
}
