/**
 * Version write payloads: patch, creation and dependency declarations
 */

import {
  ABSENT,
  arrayCodec,
  type Codec,
  encodeField,
  expectObject,
  type JsonObject,
  type OptionalField,
  type PatchField,
  requireField,
  schemaCodec,
  type VersionNumber,
  VersionNumberCodec,
} from "@modrinth-kit/codec";
import { z } from "zod";
import {
  DependencyTypeSchema,
  type DependencyType,
  FileTypeSchema,
  HashAlgorithmSchema,
  HashSchema,
  ModrinthIdSchema,
  RequestedVersionStatusSchema,
  type RequestedVersionStatus,
  VersionStatusSchema,
  type VersionStatus,
  VersionTypeSchema,
  type VersionType,
} from "./common.ts";
import { BooleanCodec, clearableKey, patchKey, StringCodec, StringListCodec } from "./fields.ts";
import { type VersionDependency, VersionDependencySchema } from "./version.ts";

const VersionTypeCodec = schemaCodec(VersionTypeSchema);
const VersionStatusCodec = schemaCodec(VersionStatusSchema);
const RequestedStatusCodec = schemaCodec(RequestedVersionStatusSchema);
const DependencyTypeCodec = schemaCodec(DependencyTypeSchema);
const ModrinthIdCodec = schemaCodec(ModrinthIdSchema);
const DependenciesCodec = schemaCodec(z.array(VersionDependencySchema));

// ============================================================================
// File Selectors
// ============================================================================

/**
 * `[algorithm, hash]` naming one of the version's files
 */
export const PrimaryFileSchema = z.tuple([HashAlgorithmSchema, HashSchema]);
export type PrimaryFile = z.infer<typeof PrimaryFileSchema>;
const PrimaryFileCodec = schemaCodec(PrimaryFileSchema);

/** Changes the type of one existing file */
export const FileTypeEditSchema = z.object({
  algorithm: HashAlgorithmSchema,
  hash: HashSchema,
  file_type: FileTypeSchema.nullable(),
});
export type FileTypeEdit = z.infer<typeof FileTypeEditSchema>;
const FileTypeEditsCodec = schemaCodec(z.array(FileTypeEditSchema));

// ============================================================================
// VersionPatch
// ============================================================================

export interface VersionPatch {
  name: PatchField<string>;
  version_number: PatchField<VersionNumber>;
  changelog: OptionalField<string>;
  dependencies: PatchField<VersionDependency[]>;
  game_versions: PatchField<string[]>;
  version_type: PatchField<VersionType>;
  loaders: PatchField<string[]>;
  featured: PatchField<boolean>;
  status: PatchField<VersionStatus>;
  requested_status: OptionalField<RequestedVersionStatus>;
  primary_file: PatchField<PrimaryFile>;
  file_types: PatchField<FileTypeEdit[]>;
}

export function createVersionPatch(fields: Partial<VersionPatch> = {}): VersionPatch {
  return {
    name: ABSENT,
    version_number: ABSENT,
    changelog: ABSENT,
    dependencies: ABSENT,
    game_versions: ABSENT,
    version_type: ABSENT,
    loaders: ABSENT,
    featured: ABSENT,
    status: ABSENT,
    requested_status: ABSENT,
    primary_file: ABSENT,
    file_types: ABSENT,
    ...fields,
  };
}

export function decodeVersionPatch(raw: unknown, path = "patch"): VersionPatch {
  const o = expectObject(raw, path);
  return {
    name: patchKey(o, "name", StringCodec, path),
    version_number: patchKey(o, "version_number", VersionNumberCodec, path),
    changelog: clearableKey(o, "changelog", StringCodec, path),
    dependencies: patchKey(o, "dependencies", DependenciesCodec, path),
    game_versions: patchKey(o, "game_versions", StringListCodec, path),
    version_type: patchKey(o, "version_type", VersionTypeCodec, path),
    loaders: patchKey(o, "loaders", StringListCodec, path),
    featured: patchKey(o, "featured", BooleanCodec, path),
    status: patchKey(o, "status", VersionStatusCodec, path),
    requested_status: clearableKey(o, "requested_status", RequestedStatusCodec, path),
    primary_file: patchKey(o, "primary_file", PrimaryFileCodec, path),
    file_types: patchKey(o, "file_types", FileTypeEditsCodec, path),
  };
}

export function encodeVersionPatch(patch: VersionPatch): JsonObject {
  const out: JsonObject = {};
  encodeField(out, "name", patch.name, StringCodec);
  encodeField(out, "version_number", patch.version_number, VersionNumberCodec);
  encodeField(out, "changelog", patch.changelog, StringCodec);
  encodeField(out, "dependencies", patch.dependencies, DependenciesCodec);
  encodeField(out, "game_versions", patch.game_versions, StringListCodec);
  encodeField(out, "version_type", patch.version_type, VersionTypeCodec);
  encodeField(out, "loaders", patch.loaders, StringListCodec);
  encodeField(out, "featured", patch.featured, BooleanCodec);
  encodeField(out, "status", patch.status, VersionStatusCodec);
  encodeField(out, "requested_status", patch.requested_status, RequestedStatusCodec);
  encodeField(out, "primary_file", patch.primary_file, PrimaryFileCodec);
  encodeField(out, "file_types", patch.file_types, FileTypeEditsCodec);
  return out;
}

// ============================================================================
// VersionDependencyCreate
// ============================================================================

/**
 * Dependency declared while creating a version. Each reference may be
 * omitted, sent as null, or set.
 */
export interface VersionDependencyCreate {
  version_id: OptionalField<string>;
  project_id: OptionalField<string>;
  file_name: OptionalField<string>;
  dependency_type: DependencyType;
}

export const VersionDependencyCreateCodec: Codec<VersionDependencyCreate, JsonObject> = {
  decode: (raw, path) => {
    const o = expectObject(raw, path);
    return {
      version_id: clearableKey(o, "version_id", ModrinthIdCodec, path),
      project_id: clearableKey(o, "project_id", ModrinthIdCodec, path),
      file_name: clearableKey(o, "file_name", StringCodec, path),
      dependency_type: requireField(o, "dependency_type", DependencyTypeCodec, path),
    };
  },
  encode: (dependency) => {
    const out: JsonObject = {};
    encodeField(out, "version_id", dependency.version_id, ModrinthIdCodec);
    encodeField(out, "project_id", dependency.project_id, ModrinthIdCodec);
    encodeField(out, "file_name", dependency.file_name, StringCodec);
    out.dependency_type = dependency.dependency_type;
    return out;
  },
};

const DependencyCreatesCodec = arrayCodec(VersionDependencyCreateCodec);

// ============================================================================
// VersionCreate
// ============================================================================

/**
 * Metadata part of a version creation request. `file_parts` names the
 * multipart parts carrying the files.
 */
export interface VersionCreate {
  project_id: string;
  file_parts: string[];
  name: PatchField<string>;
  version_number: PatchField<VersionNumber>;
  changelog: OptionalField<string>;
  dependencies: PatchField<VersionDependencyCreate[]>;
  game_versions: PatchField<string[]>;
  version_type: PatchField<VersionType>;
  loaders: PatchField<string[]>;
  featured: PatchField<boolean>;
  status: PatchField<VersionStatus>;
  requested_status: OptionalField<RequestedVersionStatus>;
  primary_file: PatchField<string>;
}

export function createVersionCreate(
  projectId: string,
  fileParts: string[],
  fields: Partial<Omit<VersionCreate, "project_id" | "file_parts">> = {}
): VersionCreate {
  return {
    name: ABSENT,
    version_number: ABSENT,
    changelog: ABSENT,
    dependencies: ABSENT,
    game_versions: ABSENT,
    version_type: ABSENT,
    loaders: ABSENT,
    featured: ABSENT,
    status: ABSENT,
    requested_status: ABSENT,
    primary_file: ABSENT,
    ...fields,
    project_id: projectId,
    file_parts: fileParts,
  };
}

export function decodeVersionCreate(raw: unknown, path = "create"): VersionCreate {
  const o = expectObject(raw, path);
  return {
    project_id: requireField(o, "project_id", ModrinthIdCodec, path),
    file_parts: requireField(o, "file_parts", StringListCodec, path),
    name: patchKey(o, "name", StringCodec, path),
    version_number: patchKey(o, "version_number", VersionNumberCodec, path),
    changelog: clearableKey(o, "changelog", StringCodec, path),
    dependencies: patchKey(o, "dependencies", DependencyCreatesCodec, path),
    game_versions: patchKey(o, "game_versions", StringListCodec, path),
    version_type: patchKey(o, "version_type", VersionTypeCodec, path),
    loaders: patchKey(o, "loaders", StringListCodec, path),
    featured: patchKey(o, "featured", BooleanCodec, path),
    status: patchKey(o, "status", VersionStatusCodec, path),
    requested_status: clearableKey(o, "requested_status", RequestedStatusCodec, path),
    primary_file: patchKey(o, "primary_file", StringCodec, path),
  };
}

export function encodeVersionCreate(create: VersionCreate): JsonObject {
  const out: JsonObject = { project_id: create.project_id, file_parts: create.file_parts };
  encodeField(out, "name", create.name, StringCodec);
  encodeField(out, "version_number", create.version_number, VersionNumberCodec);
  encodeField(out, "changelog", create.changelog, StringCodec);
  encodeField(out, "dependencies", create.dependencies, DependencyCreatesCodec);
  encodeField(out, "game_versions", create.game_versions, StringListCodec);
  encodeField(out, "version_type", create.version_type, VersionTypeCodec);
  encodeField(out, "loaders", create.loaders, StringListCodec);
  encodeField(out, "featured", create.featured, BooleanCodec);
  encodeField(out, "status", create.status, VersionStatusCodec);
  encodeField(out, "requested_status", create.requested_status, RequestedStatusCodec);
  encodeField(out, "primary_file", create.primary_file, StringCodec);
  return out;
}
