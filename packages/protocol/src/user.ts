/**
 * User schemas
 */

import {
  ABSENT,
  type BitfieldFlags,
  type Codec,
  defineBitfield,
  encodeField,
  expectObject,
  type JsonObject,
  type OptionalField,
  parseWith,
  type PatchField,
  schemaCodec,
} from "@modrinth-kit/codec";
import { z } from "zod";
import {
  BitfieldIntSchema,
  ModrinthIdSchema,
  PayoutWalletSchema,
  type PayoutWallet,
  PayoutWalletTypeSchema,
  type PayoutWalletType,
  TimestampSchema,
  UserRoleSchema,
} from "./common.ts";
import { clearableKey, patchKey, StringCodec } from "./fields.ts";

// ============================================================================
// Badges
// ============================================================================

/**
 * Profile badges, least-significant bit first. Bit 0 is reserved.
 */
export const BadgesBitfield = defineBitfield([
  "unused",
  "EARLY_MODPACK_ADOPTER",
  "EARLY_RESPACK_ADOPTER",
  "EARLY_PLUGIN_ADOPTER",
  "ALPHA_TESTER",
  "CONTRIBUTOR",
  "TRANSLATOR",
] as const);
export type BadgeFlag = (typeof BadgesBitfield.flags)[number];
export type Badges = BitfieldFlags<BadgeFlag>;

const BadgesSchema = BitfieldIntSchema.transform((n) => BadgesBitfield.decode(n, "badges"));

// ============================================================================
// Payouts
// ============================================================================

export const PayoutSchema = z.object({
  balance: z.number(),
  payout_wallet: PayoutWalletSchema,
  payout_wallet_type: PayoutWalletTypeSchema,
  payout_address: z.string(),
});
export type Payout = z.infer<typeof PayoutSchema>;

export const PayoutEventSchema = z.object({
  created: TimestampSchema,
  amount: z.number(),
  status: z.string(),
});
export type PayoutEvent = z.infer<typeof PayoutEventSchema>;

/** Amounts are decimal strings */
export const PayoutHistorySchema = z.object({
  all_time: z.string(),
  last_month: z.string(),
  payouts: z.array(PayoutEventSchema),
});
export type PayoutHistory = z.infer<typeof PayoutHistorySchema>;

export function decodePayoutHistory(raw: unknown, path = "payouts"): PayoutHistory {
  return parseWith(PayoutHistorySchema, raw, path);
}

// ============================================================================
// User
// ============================================================================

const userShape = {
  id: ModrinthIdSchema,
  username: z.string(),
  name: z.string().nullable(),
  bio: z.string().nullable(),
  avatar_url: z.string().nullable(),
  created: TimestampSchema,
  role: UserRoleSchema,
  badges: BadgesSchema,
  github_id: z.number().int().nullable(),
};

/**
 * Public profile. The private keys are present but null unless the
 * requester is the user themself.
 */
export const UserSchema = z.object({
  ...userShape,
  email: z.string().nullable(),
  payout_data: PayoutSchema.nullable(),
  auth_providers: z.array(z.string()).nullable(),
  email_verified: z.boolean().nullable(),
  has_password: z.boolean().nullable(),
  has_totp: z.boolean().nullable(),
});
export type User = z.output<typeof UserSchema>;
export type UserJson = z.input<typeof UserSchema>;

/**
 * The authenticated user's own profile, with the private keys filled in
 */
export const PersonalUserSchema = z.object({
  ...userShape,
  email: z.string().nullable(),
  payout_data: PayoutSchema.nullable(),
  auth_providers: z.array(z.string()),
  email_verified: z.boolean(),
  has_password: z.boolean(),
  has_totp: z.boolean(),
});
export type PersonalUser = z.output<typeof PersonalUserSchema>;
export type PersonalUserJson = z.input<typeof PersonalUserSchema>;

export function decodeUser(raw: unknown, path = "user"): User {
  return parseWith(UserSchema, raw, path);
}

export function encodeUser(user: User): UserJson {
  return { ...user, badges: BadgesBitfield.encode(user.badges) };
}

export const UserCodec: Codec<User, UserJson> = { decode: decodeUser, encode: encodeUser };

export function decodePersonalUser(raw: unknown, path = "user"): PersonalUser {
  return parseWith(PersonalUserSchema, raw, path);
}

export function encodePersonalUser(user: PersonalUser): PersonalUserJson {
  return { ...user, badges: BadgesBitfield.encode(user.badges) };
}

/** Widen a personal profile to the public User shape */
export function toUser(personal: PersonalUser): User {
  return { ...personal };
}

// ============================================================================
// Patches
// ============================================================================

const PayoutWalletCodec = schemaCodec(PayoutWalletSchema);
const PayoutWalletTypeCodec = schemaCodec(PayoutWalletTypeSchema);

export interface PayoutPatch {
  payout_wallet: PatchField<PayoutWallet>;
  payout_wallet_type: PatchField<PayoutWalletType>;
  payout_address: PatchField<string>;
}

export const PayoutPatchCodec: Codec<PayoutPatch, JsonObject> = {
  decode: (raw, path) => {
    const o = expectObject(raw, path);
    return {
      payout_wallet: patchKey(o, "payout_wallet", PayoutWalletCodec, path),
      payout_wallet_type: patchKey(o, "payout_wallet_type", PayoutWalletTypeCodec, path),
      payout_address: patchKey(o, "payout_address", StringCodec, path),
    };
  },
  encode: (patch) => {
    const out: JsonObject = {};
    encodeField(out, "payout_wallet", patch.payout_wallet, PayoutWalletCodec);
    encodeField(out, "payout_wallet_type", patch.payout_wallet_type, PayoutWalletTypeCodec);
    encodeField(out, "payout_address", patch.payout_address, StringCodec);
    return out;
  },
};

export interface UserPatch {
  username: PatchField<string>;
  name: OptionalField<string>;
  email: OptionalField<string>;
  bio: OptionalField<string>;
  payout_data: PatchField<PayoutPatch>;
}

export function createUserPatch(fields: Partial<UserPatch> = {}): UserPatch {
  return { username: ABSENT, name: ABSENT, email: ABSENT, bio: ABSENT, payout_data: ABSENT, ...fields };
}

export function decodeUserPatch(raw: unknown, path = "patch"): UserPatch {
  const o = expectObject(raw, path);
  return {
    username: patchKey(o, "username", StringCodec, path),
    name: clearableKey(o, "name", StringCodec, path),
    email: clearableKey(o, "email", StringCodec, path),
    bio: clearableKey(o, "bio", StringCodec, path),
    payout_data: patchKey(o, "payout_data", PayoutPatchCodec, path),
  };
}

export function encodeUserPatch(patch: UserPatch): JsonObject {
  const out: JsonObject = {};
  encodeField(out, "username", patch.username, StringCodec);
  encodeField(out, "name", patch.name, StringCodec);
  encodeField(out, "email", patch.email, StringCodec);
  encodeField(out, "bio", patch.bio, StringCodec);
  encodeField(out, "payout_data", patch.payout_data, PayoutPatchCodec);
  return out;
}
