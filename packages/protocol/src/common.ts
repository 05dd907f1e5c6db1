/**
 * Common schema definitions: identifiers, hashes, timestamps and enums
 */

import {
  colorFromRgbInt,
  type JsonValue,
  MalformedVersionNumberError,
  parseVersionNumber,
  type VersionNumber,
} from "@modrinth-kit/codec";
import { z } from "zod";

// ============================================================================
// ID Format Patterns
// ============================================================================

/**
 * Permanent ID: 8 base62 characters
 * Example: AABBCCDD
 */
export const MODRINTH_ID_REGEX = /^[0-9A-Za-z]{8}$/;

/**
 * Project slug or username; changeable
 * Example: sodium
 */
export const SLUG_REGEX = /^[\w!@$()`.+,"\-']{3,64}$/;

export const SHA1_HASH_REGEX = /^[0-9a-f]{40}$/;
export const SHA512_HASH_REGEX = /^[0-9a-f]{128}$/;

// ============================================================================
// Zod Schemas for IDs
// ============================================================================

export const ModrinthIdSchema = z.string().regex(MODRINTH_ID_REGEX, "Invalid ID format");
export const SlugSchema = z.string().regex(SLUG_REGEX, "Invalid slug format");
export const Sha1HashSchema = z.string().regex(SHA1_HASH_REGEX, "Invalid sha1 hash");
export const Sha512HashSchema = z.string().regex(SHA512_HASH_REGEX, "Invalid sha512 hash");
export const HashSchema = z.union([Sha1HashSchema, Sha512HashSchema]);
export const HashAlgorithmSchema = z.enum(["sha1", "sha512"]);

/** Either an ID or a slug; the API accepts both wherever a project is named */
export const ProjectRefSchema = z.string().min(1);

/**
 * ISO-8601 timestamp with offset, kept as the server's string
 * Example: 2024-03-09T17:21:44.102938Z
 */
export const TimestampSchema = z.string().datetime({ offset: true });

// ============================================================================
// Projects
// ============================================================================

export const ProjectTypeSchema = z.enum(["mod", "modpack", "resourcepack", "shader"]);
export type ProjectType = z.infer<typeof ProjectTypeSchema>;

export const ProjectStatusSchema = z.enum([
  "approved",
  "archived",
  "rejected",
  "draft",
  "unlisted",
  "processing",
  "withheld",
  "scheduled",
  "private",
  "unknown",
]);
export type ProjectStatus = z.infer<typeof ProjectStatusSchema>;

/** Statuses a project owner may ask moderators for */
export const RequestedProjectStatusSchema = z.enum(["approved", "archived", "unlisted", "private", "draft"]);
export type RequestedProjectStatus = z.infer<typeof RequestedProjectStatusSchema>;

export const SideSupportSchema = z.enum(["required", "optional", "unsupported", "unknown"]);
export type SideSupport = z.infer<typeof SideSupportSchema>;

export const MonetizationStatusSchema = z.enum(["monetized", "demonetized", "force-demonetized"]);
export type MonetizationStatus = z.infer<typeof MonetizationStatusSchema>;

// ============================================================================
// Versions
// ============================================================================

export const VersionTypeSchema = z.enum(["release", "beta", "alpha"]);
export type VersionType = z.infer<typeof VersionTypeSchema>;

export const VersionStatusSchema = z.enum(["listed", "archived", "draft", "unlisted", "scheduled", "unknown"]);
export type VersionStatus = z.infer<typeof VersionStatusSchema>;

export const RequestedVersionStatusSchema = z.enum(["listed", "archived", "draft", "unlisted"]);
export type RequestedVersionStatus = z.infer<typeof RequestedVersionStatusSchema>;

export const DependencyTypeSchema = z.enum(["required", "optional", "incompatible", "embedded"]);
export type DependencyType = z.infer<typeof DependencyTypeSchema>;

export const FileTypeSchema = z.enum(["required-resource-pack", "optional-resource-pack"]);
export type FileType = z.infer<typeof FileTypeSchema>;

// ============================================================================
// Users, Threads, Reports, Notifications
// ============================================================================

export const UserRoleSchema = z.enum(["admin", "moderator", "developer"]);
export type UserRole = z.infer<typeof UserRoleSchema>;

export const PayoutWalletSchema = z.enum(["paypal", "venmo"]);
export type PayoutWallet = z.infer<typeof PayoutWalletSchema>;

export const PayoutWalletTypeSchema = z.enum(["email", "phone", "user_handle"]);
export type PayoutWalletType = z.infer<typeof PayoutWalletTypeSchema>;

export const ThreadTypeSchema = z.enum(["project", "report", "direct_message"]);
export type ThreadType = z.infer<typeof ThreadTypeSchema>;

export const ReportItemTypeSchema = z.enum(["project", "user", "version", "unknown"]);
export type ReportItemType = z.infer<typeof ReportItemTypeSchema>;

export const NotificationTypeSchema = z.enum(["project_update", "team_invite", "status_change", "moderator_message"]);
export type NotificationType = z.infer<typeof NotificationTypeSchema>;

// ============================================================================
// Packed Scalars
// ============================================================================

/** 0xRRGGBB on the wire, a Color once decoded */
export const ColorSchema = z.number().int().min(0).max(0xffffff).transform(colorFromRgbInt);

/** `major.minor.patch` on the wire, a VersionNumber once decoded */
export const VersionNumberSchema = z.string().transform((raw, ctx): VersionNumber => {
  try {
    return parseVersionNumber(raw);
  } catch (error) {
    if (!(error instanceof MalformedVersionNumberError)) {
      throw error;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error.message,
      params: { malformedVersionNumber: { input: error.input, reason: error.reason } },
    });
    return z.NEVER;
  }
});

/** Bitfields are non-negative integers */
export const BitfieldIntSchema = z.number().int().nonnegative().safe();

// ============================================================================
// Raw JSON
// ============================================================================

/** Any JSON value, kept as-is */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(z.string(), JsonValueSchema)])
);

export const JsonObjectSchema = z.record(z.string(), JsonValueSchema);
