/**
 * Version schemas
 *
 * `version_number` is the one field whose decoded shape differs from the
 * wire: a `major.minor.patch` string becomes a VersionNumber.
 */

import { type Codec, formatVersionNumber, parseWith } from "@modrinth-kit/codec";
import { z } from "zod";
import {
  DependencyTypeSchema,
  FileTypeSchema,
  ModrinthIdSchema,
  RequestedVersionStatusSchema,
  Sha1HashSchema,
  Sha512HashSchema,
  TimestampSchema,
  VersionNumberSchema,
  VersionStatusSchema,
  VersionTypeSchema,
} from "./common.ts";
import { encodeProject, ProjectSchema } from "./project.ts";

// ============================================================================
// Files and Dependencies
// ============================================================================

export const HashMappingSchema = z.object({
  sha1: Sha1HashSchema,
  sha512: Sha512HashSchema,
});
export type HashMapping = z.infer<typeof HashMappingSchema>;

export const VersionFileSchema = z.object({
  hashes: HashMappingSchema,
  url: z.string(),
  filename: z.string(),
  primary: z.boolean(),
  size: z.number().int().nonnegative(),
  file_type: FileTypeSchema.nullable(),
});
export type VersionFile = z.infer<typeof VersionFileSchema>;

/**
 * A dependency names a version, a project, or (for embedded files) only a
 * file name
 */
export const VersionDependencySchema = z.object({
  version_id: ModrinthIdSchema.nullable(),
  project_id: ModrinthIdSchema.nullable(),
  file_name: z.string().nullable(),
  dependency_type: DependencyTypeSchema,
});
export type VersionDependency = z.infer<typeof VersionDependencySchema>;

// ============================================================================
// Version
// ============================================================================

export const VersionSchema = z.object({
  id: ModrinthIdSchema,
  project_id: ModrinthIdSchema,
  author_id: ModrinthIdSchema,
  name: z.string(),
  version_number: VersionNumberSchema,
  changelog: z.string().nullable(),
  changelog_url: z.string().nullable(),
  dependencies: z.array(VersionDependencySchema),
  game_versions: z.array(z.string()),
  version_type: VersionTypeSchema,
  loaders: z.array(z.string()),
  featured: z.boolean(),
  status: VersionStatusSchema,
  requested_status: RequestedVersionStatusSchema.nullable(),
  date_published: TimestampSchema,
  downloads: z.number().int().nonnegative(),
  files: z.array(VersionFileSchema),
});
export type Version = z.output<typeof VersionSchema>;
export type VersionJson = z.input<typeof VersionSchema>;

/**
 * @throws MalformedFieldError at the first invalid field
 */
export function decodeVersion(raw: unknown, path = "version"): Version {
  return parseWith(VersionSchema, raw, path);
}

export function encodeVersion(version: Version): VersionJson {
  return { ...version, version_number: formatVersionNumber(version.version_number) };
}

export const VersionCodec: Codec<Version, VersionJson> = { decode: decodeVersion, encode: encodeVersion };

/** Versions keyed by the file hash they were looked up with */
export const VersionsByHashSchema = z.record(z.string(), VersionSchema);
export type VersionsByHash = z.output<typeof VersionsByHashSchema>;

export function decodeVersionsByHash(raw: unknown, path = "versions"): VersionsByHash {
  return parseWith(VersionsByHashSchema, raw, path);
}

// ============================================================================
// Project Dependencies
// ============================================================================

/** Every project and version a project depends on */
export const ProjectDependenciesSchema = z.object({
  projects: z.array(ProjectSchema),
  versions: z.array(VersionSchema),
});
export type ProjectDependencies = z.output<typeof ProjectDependenciesSchema>;
export type ProjectDependenciesJson = z.input<typeof ProjectDependenciesSchema>;

export function decodeProjectDependencies(raw: unknown, path = "dependencies"): ProjectDependencies {
  return parseWith(ProjectDependenciesSchema, raw, path);
}

export function encodeProjectDependencies(dependencies: ProjectDependencies): ProjectDependenciesJson {
  return {
    projects: dependencies.projects.map(encodeProject),
    versions: dependencies.versions.map(encodeVersion),
  };
}
