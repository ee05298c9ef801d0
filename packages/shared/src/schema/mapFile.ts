import { z } from 'zod';

const coordinate = z.number().finite();

// Authoring tools write points either as [x, y] pairs or as { x, y } objects
export const PointSchema = z.union([
  z.tuple([coordinate, coordinate]).transform(([x, y]) => ({ x, y })),
  z.object({ x: coordinate, y: coordinate }).transform(({ x, y }) => ({ x, y })),
]);

export const MapIdsSchema = z.object({
  startLocationId: z.number().int(),
  destinationZoneId: z.number().int(),
});

// `path` is kept loose here: segment-level problems become warnings during flattening
export const MapFileSchema = z.object({
  name: z.string().min(1).optional(),
  ids: MapIdsSchema,
  outpostPath: z.array(PointSchema).default([]),
  path: z.array(z.unknown()),
});

export type MapFile = z.infer<typeof MapFileSchema>;
