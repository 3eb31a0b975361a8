import { z } from "zod";

export const PositionSchema = z.object({
  x: z.number().int().nonnegative(),
  y: z.number().int().nonnegative(),
});

export type Position = z.infer<typeof PositionSchema>;

/**
 * Fixed layout a level is generated on: grid dimensions plus the ordered
 * waypoints the walker visits.
 */
export const MapSkeletonSchema = z
  .object({
    name: z.string().min(1),
    width: z.number().int().min(8, "Width must be at least 8"),
    height: z.number().int().min(8, "Height must be at least 8"),
    waypoints: z
      .array(PositionSchema)
      .min(1, "A map skeleton needs at least one waypoint"),
    spawn: PositionSchema.optional(),
  })
  .superRefine((data, ctx) => {
    data.waypoints.forEach((point, index) => {
      if (point.x >= data.width || point.y >= data.height) {
        ctx.addIssue({
          code: "custom",
          message: `Waypoint (${point.x}, ${point.y}) lies outside the ${data.width}x${data.height} grid`,
          path: ["waypoints", index],
        });
      }
    });
    if (
      data.spawn &&
      (data.spawn.x >= data.width || data.spawn.y >= data.height)
    ) {
      ctx.addIssue({
        code: "custom",
        message: "Spawn lies outside the grid",
        path: ["spawn"],
      });
    }
  });

export type MapSkeleton = z.infer<typeof MapSkeletonSchema>;
