/**
 * Team schemas
 */

import {
  ABSENT,
  type BitfieldFlags,
  type Codec,
  defineBitfield,
  encodeField,
  expectObject,
  type JsonObject,
  parseWith,
  type PatchField,
} from "@modrinth-kit/codec";
import { z } from "zod";
import { BitfieldIntSchema, ModrinthIdSchema } from "./common.ts";
import { IntCodec, NumberCodec, patchKey, StringCodec } from "./fields.ts";
import { encodeUser, UserSchema } from "./user.ts";

// ============================================================================
// Permissions
// ============================================================================

/**
 * Project permissions of a team member, least-significant bit first
 */
export const PermissionsBitfield = defineBitfield([
  "UPLOAD_VERSION",
  "DELETE_VERSIONS",
  "EDIT_DETAILS",
  "EDIT_BODY",
  "MANAGE_INVITES",
  "REMOVE_MEMBER",
  "EDIT_MEMBER",
  "DELETE_PROJECT",
  "VIEW_ANALYTICS",
  "VIEW_PAYOUTS",
] as const);
export type PermissionFlag = (typeof PermissionsBitfield.flags)[number];
export type Permissions = BitfieldFlags<PermissionFlag>;

const PermissionsSchema = BitfieldIntSchema.transform((n) => PermissionsBitfield.decode(n, "permissions"));

// ============================================================================
// TeamMember
// ============================================================================

/**
 * `permissions` and `payouts_split` are null unless the requester is on
 * the team
 */
export const TeamMemberSchema = z.object({
  team_id: ModrinthIdSchema,
  user: UserSchema,
  role: z.string(),
  permissions: PermissionsSchema.nullable(),
  accepted: z.boolean(),
  payouts_split: z.number().nullable(),
  ordering: z.number().int(),
});
export type TeamMember = z.output<typeof TeamMemberSchema>;
export type TeamMemberJson = z.input<typeof TeamMemberSchema>;

export function decodeTeamMember(raw: unknown, path = "member"): TeamMember {
  return parseWith(TeamMemberSchema, raw, path);
}

export function encodeTeamMember(member: TeamMember): TeamMemberJson {
  return {
    ...member,
    user: encodeUser(member.user),
    permissions: member.permissions === null ? null : PermissionsBitfield.encode(member.permissions),
  };
}

export const TeamMemberCodec: Codec<TeamMember, TeamMemberJson> = {
  decode: decodeTeamMember,
  encode: encodeTeamMember,
};

/** Members of several teams, one list per team in request order */
export const TeamsSchema = z.array(z.array(TeamMemberSchema));
export type Teams = z.output<typeof TeamsSchema>;

// ============================================================================
// TeamMemberPatch
// ============================================================================

export interface TeamMemberPatch {
  role: PatchField<string>;
  permissions: PatchField<Permissions>;
  payouts_split: PatchField<number>;
  ordering: PatchField<number>;
}

export function createTeamMemberPatch(fields: Partial<TeamMemberPatch> = {}): TeamMemberPatch {
  return { role: ABSENT, permissions: ABSENT, payouts_split: ABSENT, ordering: ABSENT, ...fields };
}

export function decodeTeamMemberPatch(raw: unknown, path = "patch"): TeamMemberPatch {
  const o = expectObject(raw, path);
  return {
    role: patchKey(o, "role", StringCodec, path),
    permissions: patchKey(o, "permissions", PermissionsBitfield, path),
    payouts_split: patchKey(o, "payouts_split", NumberCodec, path),
    ordering: patchKey(o, "ordering", IntCodec, path),
  };
}

export function encodeTeamMemberPatch(patch: TeamMemberPatch): JsonObject {
  const out: JsonObject = {};
  encodeField(out, "role", patch.role, StringCodec);
  encodeField(out, "permissions", patch.permissions, PermissionsBitfield);
  encodeField(out, "payouts_split", patch.payouts_split, NumberCodec);
  encodeField(out, "ordering", patch.ordering, IntCodec);
  return out;
}
