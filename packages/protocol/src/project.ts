/**
 * Project schemas
 *
 * Decoded projects keep the wire's snake_case keys; only `color` changes
 * shape (RGB integer on the wire, Color once decoded).
 */

import { type Codec, colorToRgbInt, parseWith } from "@modrinth-kit/codec";
import { z } from "zod";
import {
  ColorSchema,
  ModrinthIdSchema,
  MonetizationStatusSchema,
  ProjectStatusSchema,
  ProjectTypeSchema,
  RequestedProjectStatusSchema,
  SideSupportSchema,
  TimestampSchema,
} from "./common.ts";

// ============================================================================
// Nested Objects
// ============================================================================

export const DonationLinkSchema = z.object({
  id: z.string(),
  platform: z.string(),
  url: z.string(),
});
export type DonationLink = z.infer<typeof DonationLinkSchema>;

export const LicenseSchema = z.object({
  id: z.string(),
  name: z.string(),
  url: z.string().nullable(),
});
export type License = z.infer<typeof LicenseSchema>;

export const GalleryItemSchema = z.object({
  url: z.string(),
  raw_url: z.string(),
  featured: z.boolean(),
  title: z.string().nullable(),
  description: z.string().nullable(),
  created: TimestampSchema,
  ordering: z.number().int(),
});
export type GalleryItem = z.infer<typeof GalleryItemSchema>;

/** Message left by a moderator when rejecting or withholding a project */
export const ModeratorMessageSchema = z.object({
  message: z.string(),
  body: z.string().nullable(),
});
export type ModeratorMessage = z.infer<typeof ModeratorMessageSchema>;

// ============================================================================
// Project
// ============================================================================

export const ProjectSchema = z.object({
  id: ModrinthIdSchema,
  slug: z.string(),
  project_type: ProjectTypeSchema,
  team: ModrinthIdSchema,
  organization: ModrinthIdSchema.nullable(),
  title: z.string(),
  description: z.string(),
  body: z.string(),
  body_url: z.string().nullable(),
  published: TimestampSchema,
  updated: TimestampSchema,
  approved: TimestampSchema.nullable(),
  queued: TimestampSchema.nullable(),
  status: ProjectStatusSchema,
  requested_status: RequestedProjectStatusSchema.nullable(),
  moderator_message: ModeratorMessageSchema.nullable(),
  license: LicenseSchema,
  client_side: SideSupportSchema,
  server_side: SideSupportSchema,
  downloads: z.number().int().nonnegative(),
  followers: z.number().int().nonnegative(),
  categories: z.array(z.string()),
  additional_categories: z.array(z.string()),
  game_versions: z.array(z.string()),
  loaders: z.array(z.string()),
  versions: z.array(ModrinthIdSchema),
  icon_url: z.string().nullable(),
  issues_url: z.string().nullable(),
  source_url: z.string().nullable(),
  wiki_url: z.string().nullable(),
  discord_url: z.string().nullable(),
  donation_urls: z.array(DonationLinkSchema),
  gallery: z.array(GalleryItemSchema),
  color: ColorSchema.nullable(),
  thread_id: ModrinthIdSchema,
  monetization_status: MonetizationStatusSchema,
});
export type Project = z.output<typeof ProjectSchema>;
export type ProjectJson = z.input<typeof ProjectSchema>;

/**
 * @throws MalformedFieldError at the first invalid field
 */
export function decodeProject(raw: unknown, path = "project"): Project {
  return parseWith(ProjectSchema, raw, path);
}

export function encodeProject(project: Project): ProjectJson {
  return { ...project, color: project.color === null ? null : colorToRgbInt(project.color) };
}

export const ProjectCodec: Codec<Project, ProjectJson> = { decode: decodeProject, encode: encodeProject };

/** Response of the slug/ID availability check */
export const ProjectIdCheckSchema = z.object({ id: ModrinthIdSchema });
export type ProjectIdCheck = z.infer<typeof ProjectIdCheckSchema>;

// ============================================================================
// Search
// ============================================================================

/**
 * One search result. Hits are a flattened, denormalised view of a project,
 * not a Project.
 */
export const SearchHitSchema = z.object({
  project_id: ModrinthIdSchema,
  slug: z.string(),
  project_type: ProjectTypeSchema,
  author: z.string(),
  title: z.string(),
  description: z.string(),
  categories: z.array(z.string()),
  display_categories: z.array(z.string()),
  versions: z.array(z.string()),
  downloads: z.number().int().nonnegative(),
  follows: z.number().int().nonnegative(),
  icon_url: z.string().nullable(),
  date_created: TimestampSchema,
  date_modified: TimestampSchema,
  latest_version: z.string().nullable(),
  license: z.string(),
  client_side: SideSupportSchema,
  server_side: SideSupportSchema,
  gallery: z.array(z.string()),
  featured_gallery: z.string().nullable(),
  color: ColorSchema.nullable(),
});
export type SearchHit = z.output<typeof SearchHitSchema>;
export type SearchHitJson = z.input<typeof SearchHitSchema>;

export const SearchResultSchema = z.object({
  hits: z.array(SearchHitSchema),
  offset: z.number().int().nonnegative(),
  limit: z.number().int().nonnegative(),
  total_hits: z.number().int().nonnegative(),
});
export type SearchResult = z.output<typeof SearchResultSchema>;
export type SearchResultJson = z.input<typeof SearchResultSchema>;

export function decodeSearchResult(raw: unknown, path = "search"): SearchResult {
  return parseWith(SearchResultSchema, raw, path);
}

export function encodeSearchResult(result: SearchResult): SearchResultJson {
  return {
    ...result,
    hits: result.hits.map((hit) => ({ ...hit, color: hit.color === null ? null : colorToRgbInt(hit.color) })),
  };
}
