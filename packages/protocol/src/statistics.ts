/**
 * Platform-wide counters
 */

import { z } from "zod";

export const PlatformStatisticsSchema = z.object({
  projects: z.number().int().nonnegative(),
  versions: z.number().int().nonnegative(),
  files: z.number().int().nonnegative(),
  authors: z.number().int().nonnegative(),
});
export type PlatformStatistics = z.infer<typeof PlatformStatisticsSchema>;
