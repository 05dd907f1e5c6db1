/**
 * Tag lists: the vocabularies projects and versions are labelled with
 */

import { z } from "zod";
import { ProjectTypeSchema, TimestampSchema } from "./common.ts";

/** `icon` is inline SVG markup */
export const CategorySchema = z.object({
  icon: z.string(),
  name: z.string(),
  project_type: ProjectTypeSchema,
  header: z.string(),
});
export type Category = z.infer<typeof CategorySchema>;

export const LoaderSchema = z.object({
  icon: z.string(),
  name: z.string(),
  supported_project_types: z.array(ProjectTypeSchema),
});
export type Loader = z.infer<typeof LoaderSchema>;

export const GameVersionTagSchema = z.object({
  version: z.string(),
  version_type: z.enum(["release", "snapshot", "alpha", "beta"]),
  date: TimestampSchema,
  major: z.boolean(),
});
export type GameVersionTag = z.infer<typeof GameVersionTagSchema>;

/** Entry of the license list; `short` is the SPDX identifier */
export const LicenseTagSchema = z.object({
  short: z.string(),
  name: z.string(),
});
export type LicenseTag = z.infer<typeof LicenseTagSchema>;

export const LicenseTextSchema = z.object({
  title: z.string(),
  body: z.string(),
});
export type LicenseText = z.infer<typeof LicenseTextSchema>;

export const DonationPlatformSchema = z.object({
  short: z.string(),
  name: z.string(),
});
export type DonationPlatform = z.infer<typeof DonationPlatformSchema>;

/** Plain-string tag lists: report types, project types, side types */
export const StringTagsSchema = z.array(z.string());

/**
 * Forge update-checker manifest. `promos` maps `{game version}-latest` and
 * `{game version}-recommended` to mod versions.
 */
export const ForgeUpdatesSchema = z.object({
  homepage: z.string(),
  promos: z.record(z.string(), z.string()),
});
export type ForgeUpdates = z.infer<typeof ForgeUpdatesSchema>;
