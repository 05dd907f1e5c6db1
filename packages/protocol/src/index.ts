/**
 * Modrinth Protocol - wire schemas and entity codecs for the v2 API
 *
 * @packageDocumentation
 */

// ============================================================================
// Common schemas and types
// ============================================================================

export {
  // ID patterns
  MODRINTH_ID_REGEX,
  SHA1_HASH_REGEX,
  SHA512_HASH_REGEX,
  SLUG_REGEX,
  // ID and hash schemas
  HashAlgorithmSchema,
  HashSchema,
  ModrinthIdSchema,
  ProjectRefSchema,
  Sha1HashSchema,
  Sha512HashSchema,
  SlugSchema,
  TimestampSchema,
  // Enum schemas
  DependencyTypeSchema,
  FileTypeSchema,
  MonetizationStatusSchema,
  NotificationTypeSchema,
  PayoutWalletSchema,
  PayoutWalletTypeSchema,
  ProjectStatusSchema,
  ProjectTypeSchema,
  ReportItemTypeSchema,
  RequestedProjectStatusSchema,
  RequestedVersionStatusSchema,
  SideSupportSchema,
  ThreadTypeSchema,
  UserRoleSchema,
  VersionStatusSchema,
  VersionTypeSchema,
  // Packed scalars
  BitfieldIntSchema,
  ColorSchema,
  VersionNumberSchema,
  // Raw JSON
  JsonObjectSchema,
  JsonValueSchema,
} from "./common.ts";

export type {
  DependencyType,
  FileType,
  MonetizationStatus,
  NotificationType,
  PayoutWallet,
  PayoutWalletType,
  ProjectStatus,
  ProjectType,
  ReportItemType,
  RequestedProjectStatus,
  RequestedVersionStatus,
  SideSupport,
  ThreadType,
  UserRole,
  VersionStatus,
  VersionType,
} from "./common.ts";

export { BooleanCodec, clearableKey, IntCodec, NumberCodec, patchKey, StringCodec, StringListCodec } from "./fields.ts";

// ============================================================================
// Projects
// ============================================================================

export {
  decodeProject,
  decodeSearchResult,
  DonationLinkSchema,
  encodeProject,
  encodeSearchResult,
  GalleryItemSchema,
  LicenseSchema,
  ModeratorMessageSchema,
  ProjectCodec,
  ProjectIdCheckSchema,
  ProjectSchema,
  SearchHitSchema,
  SearchResultSchema,
} from "./project.ts";

export type {
  DonationLink,
  GalleryItem,
  License,
  ModeratorMessage,
  Project,
  ProjectIdCheck,
  ProjectJson,
  SearchHit,
  SearchHitJson,
  SearchResult,
  SearchResultJson,
} from "./project.ts";

export {
  createProjectBulkPatch,
  createProjectCreate,
  createProjectPatch,
  decodeProjectBulkPatch,
  decodeProjectCreate,
  decodeProjectPatch,
  encodeProjectBulkPatch,
  encodeProjectCreate,
  encodeProjectPatch,
} from "./project-patch.ts";

export type { ProjectBulkPatch, ProjectCreate, ProjectFields, ProjectPatch } from "./project-patch.ts";

// ============================================================================
// Versions
// ============================================================================

export {
  decodeProjectDependencies,
  decodeVersion,
  decodeVersionsByHash,
  encodeProjectDependencies,
  encodeVersion,
  HashMappingSchema,
  ProjectDependenciesSchema,
  VersionCodec,
  VersionDependencySchema,
  VersionFileSchema,
  VersionSchema,
  VersionsByHashSchema,
} from "./version.ts";

export type {
  HashMapping,
  ProjectDependencies,
  ProjectDependenciesJson,
  Version,
  VersionDependency,
  VersionFile,
  VersionJson,
  VersionsByHash,
} from "./version.ts";

export {
  createVersionCreate,
  createVersionPatch,
  decodeVersionCreate,
  decodeVersionPatch,
  encodeVersionCreate,
  encodeVersionPatch,
  FileTypeEditSchema,
  PrimaryFileSchema,
  VersionDependencyCreateCodec,
} from "./version-patch.ts";

export type {
  FileTypeEdit,
  PrimaryFile,
  VersionCreate,
  VersionDependencyCreate,
  VersionPatch,
} from "./version-patch.ts";

// ============================================================================
// Users and Teams
// ============================================================================

export {
  BadgesBitfield,
  createUserPatch,
  decodePayoutHistory,
  decodePersonalUser,
  decodeUser,
  decodeUserPatch,
  encodePersonalUser,
  encodeUser,
  encodeUserPatch,
  PayoutEventSchema,
  PayoutHistorySchema,
  PayoutPatchCodec,
  PayoutSchema,
  PersonalUserSchema,
  toUser,
  UserCodec,
  UserSchema,
} from "./user.ts";

export type {
  BadgeFlag,
  Badges,
  Payout,
  PayoutEvent,
  PayoutHistory,
  PayoutPatch,
  PersonalUser,
  PersonalUserJson,
  User,
  UserJson,
  UserPatch,
} from "./user.ts";

export {
  createTeamMemberPatch,
  decodeTeamMember,
  decodeTeamMemberPatch,
  encodeTeamMember,
  encodeTeamMemberPatch,
  PermissionsBitfield,
  TeamMemberCodec,
  TeamMemberSchema,
  TeamsSchema,
} from "./team.ts";

export type { PermissionFlag, Permissions, TeamMember, TeamMemberJson, TeamMemberPatch, Teams } from "./team.ts";

// ============================================================================
// Threads, Notifications, Reports
// ============================================================================

export {
  decodeMessageBody,
  decodeThread,
  DeletedMessageBodySchema,
  encodeMessageBody,
  encodeThread,
  encodeThreadMessage,
  MESSAGE_BODY_TYPES,
  MessageBodySchema,
  StatusChangeMessageBodySchema,
  TextMessageBodySchema,
  textMessageRequest,
  ThreadClosureMessageBodySchema,
  ThreadMessageSchema,
  ThreadSchema,
} from "./thread.ts";

export type {
  DeletedMessageBody,
  MessageBody,
  MessageBodyJson,
  StatusChangeMessageBody,
  TextMessageBody,
  Thread,
  ThreadClosureMessageBody,
  ThreadJson,
  ThreadMessage,
  ThreadMessageJson,
  UnknownMessageBody,
} from "./thread.ts";

export { ActionRouteSchema, decodeNotification, NotificationActionSchema, NotificationSchema } from "./notification.ts";
export type { ActionRoute, Notification, NotificationAction } from "./notification.ts";

export {
  createReportPatch,
  decodeReport,
  decodeReportPatch,
  encodeReportPatch,
  ReportCreateSchema,
  ReportSchema,
} from "./report.ts";
export type { Report, ReportCreate, ReportPatch } from "./report.ts";

// ============================================================================
// Tags and Statistics
// ============================================================================

export {
  CategorySchema,
  DonationPlatformSchema,
  ForgeUpdatesSchema,
  GameVersionTagSchema,
  LicenseTagSchema,
  LicenseTextSchema,
  LoaderSchema,
  StringTagsSchema,
} from "./tags.ts";

export type {
  Category,
  DonationPlatform,
  ForgeUpdates,
  GameVersionTag,
  LicenseTag,
  LicenseText,
  Loader,
} from "./tags.ts";

export { PlatformStatisticsSchema } from "./statistics.ts";
export type { PlatformStatistics } from "./statistics.ts";
