/**
 * Project write payloads: single patch, creation, and bulk patch
 *
 * Every key is tri-state. Keys the server can clear accept null
 * (`OptionalField`); the rest may only be omitted or set (`PatchField`).
 */

import {
  ABSENT,
  BulkAdjustment,
  decodeBulkAdjustment,
  encodeBulkAdjustment,
  encodeField,
  expectObject,
  type JsonObject,
  MalformedFieldError,
  type OptionalField,
  type PatchField,
  requireField,
  schemaCodec,
} from "@modrinth-kit/codec";
import { z } from "zod";
import {
  ProjectStatusSchema,
  type ProjectStatus,
  ProjectTypeSchema,
  type ProjectType,
  RequestedProjectStatusSchema,
  type RequestedProjectStatus,
  SideSupportSchema,
  type SideSupport,
} from "./common.ts";
import { clearableKey, patchKey, StringCodec, StringListCodec } from "./fields.ts";
import { type DonationLink, DonationLinkSchema } from "./project.ts";

const ProjectTypeCodec = schemaCodec(ProjectTypeSchema);
const SideSupportCodec = schemaCodec(SideSupportSchema);
const ProjectStatusCodec = schemaCodec(ProjectStatusSchema);
const RequestedStatusCodec = schemaCodec(RequestedProjectStatusSchema);
const DonationLinkCodec = schemaCodec(DonationLinkSchema);
const DonationLinksCodec = schemaCodec(z.array(DonationLinkSchema));

// ============================================================================
// Shared Fields
// ============================================================================

/** Keys shared by the single-project patch and the creation payload */
export interface ProjectFields {
  slug: PatchField<string>;
  title: PatchField<string>;
  description: PatchField<string>;
  categories: PatchField<string[]>;
  client_side: PatchField<SideSupport>;
  server_side: PatchField<SideSupport>;
  body: PatchField<string>;
  status: PatchField<ProjectStatus>;
  requested_status: OptionalField<RequestedProjectStatus>;
  additional_categories: PatchField<string[]>;
  issues_url: OptionalField<string>;
  source_url: OptionalField<string>;
  wiki_url: OptionalField<string>;
  discord_url: OptionalField<string>;
  donation_urls: PatchField<DonationLink[]>;
  license_id: PatchField<string>;
  license_url: OptionalField<string>;
}

const EMPTY_PROJECT_FIELDS: ProjectFields = {
  slug: ABSENT,
  title: ABSENT,
  description: ABSENT,
  categories: ABSENT,
  client_side: ABSENT,
  server_side: ABSENT,
  body: ABSENT,
  status: ABSENT,
  requested_status: ABSENT,
  additional_categories: ABSENT,
  issues_url: ABSENT,
  source_url: ABSENT,
  wiki_url: ABSENT,
  discord_url: ABSENT,
  donation_urls: ABSENT,
  license_id: ABSENT,
  license_url: ABSENT,
};

function decodeProjectFields(o: JsonObject, path: string): ProjectFields {
  return {
    slug: patchKey(o, "slug", StringCodec, path),
    title: patchKey(o, "title", StringCodec, path),
    description: patchKey(o, "description", StringCodec, path),
    categories: patchKey(o, "categories", StringListCodec, path),
    client_side: patchKey(o, "client_side", SideSupportCodec, path),
    server_side: patchKey(o, "server_side", SideSupportCodec, path),
    body: patchKey(o, "body", StringCodec, path),
    status: patchKey(o, "status", ProjectStatusCodec, path),
    requested_status: clearableKey(o, "requested_status", RequestedStatusCodec, path),
    additional_categories: patchKey(o, "additional_categories", StringListCodec, path),
    issues_url: clearableKey(o, "issues_url", StringCodec, path),
    source_url: clearableKey(o, "source_url", StringCodec, path),
    wiki_url: clearableKey(o, "wiki_url", StringCodec, path),
    discord_url: clearableKey(o, "discord_url", StringCodec, path),
    donation_urls: patchKey(o, "donation_urls", DonationLinksCodec, path),
    license_id: patchKey(o, "license_id", StringCodec, path),
    license_url: clearableKey(o, "license_url", StringCodec, path),
  };
}

function encodeProjectFields(out: JsonObject, fields: ProjectFields): void {
  encodeField(out, "slug", fields.slug, StringCodec);
  encodeField(out, "title", fields.title, StringCodec);
  encodeField(out, "description", fields.description, StringCodec);
  encodeField(out, "categories", fields.categories, StringListCodec);
  encodeField(out, "client_side", fields.client_side, SideSupportCodec);
  encodeField(out, "server_side", fields.server_side, SideSupportCodec);
  encodeField(out, "body", fields.body, StringCodec);
  encodeField(out, "status", fields.status, ProjectStatusCodec);
  encodeField(out, "requested_status", fields.requested_status, RequestedStatusCodec);
  encodeField(out, "additional_categories", fields.additional_categories, StringListCodec);
  encodeField(out, "issues_url", fields.issues_url, StringCodec);
  encodeField(out, "source_url", fields.source_url, StringCodec);
  encodeField(out, "wiki_url", fields.wiki_url, StringCodec);
  encodeField(out, "discord_url", fields.discord_url, StringCodec);
  encodeField(out, "donation_urls", fields.donation_urls, DonationLinksCodec);
  encodeField(out, "license_id", fields.license_id, StringCodec);
  encodeField(out, "license_url", fields.license_url, StringCodec);
}

// ============================================================================
// ProjectPatch
// ============================================================================

export interface ProjectPatch extends ProjectFields {
  moderation_message: OptionalField<string>;
  moderation_message_body: OptionalField<string>;
}

/**
 * Build a patch; keys not given are absent
 *
 * @example
 * createProjectPatch({ title: value("New title"), wiki_url: NULL })
 */
export function createProjectPatch(fields: Partial<ProjectPatch> = {}): ProjectPatch {
  return {
    ...EMPTY_PROJECT_FIELDS,
    moderation_message: ABSENT,
    moderation_message_body: ABSENT,
    ...fields,
  };
}

export function decodeProjectPatch(raw: unknown, path = "patch"): ProjectPatch {
  const o = expectObject(raw, path);
  return {
    ...decodeProjectFields(o, path),
    moderation_message: clearableKey(o, "moderation_message", StringCodec, path),
    moderation_message_body: clearableKey(o, "moderation_message_body", StringCodec, path),
  };
}

export function encodeProjectPatch(patch: ProjectPatch): JsonObject {
  const out: JsonObject = {};
  encodeProjectFields(out, patch);
  encodeField(out, "moderation_message", patch.moderation_message, StringCodec);
  encodeField(out, "moderation_message_body", patch.moderation_message_body, StringCodec);
  return out;
}

// ============================================================================
// ProjectCreate
// ============================================================================

/**
 * Metadata part of a project creation request. New projects are always
 * drafts, so `is_draft: true` is written unconditionally.
 */
export interface ProjectCreate extends ProjectFields {
  project_type: ProjectType;
}

export function createProjectCreate(projectType: ProjectType, fields: Partial<ProjectFields> = {}): ProjectCreate {
  return { ...EMPTY_PROJECT_FIELDS, ...fields, project_type: projectType };
}

export function decodeProjectCreate(raw: unknown, path = "create"): ProjectCreate {
  const o = expectObject(raw, path);
  if (o.is_draft !== true) {
    throw new MalformedFieldError(`${path}.is_draft`, "Expected true");
  }
  return {
    ...decodeProjectFields(o, path),
    project_type: requireField(o, "project_type", ProjectTypeCodec, path),
  };
}

export function encodeProjectCreate(create: ProjectCreate): JsonObject {
  const out: JsonObject = { project_type: create.project_type };
  encodeProjectFields(out, create);
  out.is_draft = true;
  return out;
}

// ============================================================================
// ProjectBulkPatch
// ============================================================================

/**
 * Patch applied to many projects at once. List fields are replaced or
 * adjusted (see BulkAdjustment); the link fields may be set or cleared.
 */
export interface ProjectBulkPatch {
  categories: BulkAdjustment<string>;
  additional_categories: BulkAdjustment<string>;
  donation_urls: BulkAdjustment<DonationLink>;
  issues_url: OptionalField<string>;
  source_url: OptionalField<string>;
  wiki_url: OptionalField<string>;
  discord_url: OptionalField<string>;
}

export function createProjectBulkPatch(fields: Partial<ProjectBulkPatch> = {}): ProjectBulkPatch {
  return {
    categories: BulkAdjustment.unset(),
    additional_categories: BulkAdjustment.unset(),
    donation_urls: BulkAdjustment.unset(),
    issues_url: ABSENT,
    source_url: ABSENT,
    wiki_url: ABSENT,
    discord_url: ABSENT,
    ...fields,
  };
}

/**
 * @throws ConflictingFieldAdjustmentError if a list field is both set and adjusted
 */
export function decodeProjectBulkPatch(raw: unknown, path = "patch"): ProjectBulkPatch {
  const o = expectObject(raw, path);
  return {
    categories: decodeBulkAdjustment(o, "categories", StringCodec, path),
    additional_categories: decodeBulkAdjustment(o, "additional_categories", StringCodec, path),
    donation_urls: decodeBulkAdjustment(o, "donation_urls", DonationLinkCodec, path),
    issues_url: clearableKey(o, "issues_url", StringCodec, path),
    source_url: clearableKey(o, "source_url", StringCodec, path),
    wiki_url: clearableKey(o, "wiki_url", StringCodec, path),
    discord_url: clearableKey(o, "discord_url", StringCodec, path),
  };
}

export function encodeProjectBulkPatch(patch: ProjectBulkPatch): JsonObject {
  const out: JsonObject = {};
  encodeBulkAdjustment(out, "categories", patch.categories, StringCodec);
  encodeBulkAdjustment(out, "additional_categories", patch.additional_categories, StringCodec);
  encodeBulkAdjustment(out, "donation_urls", patch.donation_urls, DonationLinkCodec);
  encodeField(out, "issues_url", patch.issues_url, StringCodec);
  encodeField(out, "source_url", patch.source_url, StringCodec);
  encodeField(out, "wiki_url", patch.wiki_url, StringCodec);
  encodeField(out, "discord_url", patch.discord_url, StringCodec);
  return out;
}
