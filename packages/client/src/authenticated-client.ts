/**
 * AuthenticatedModrinthClient - endpoints that need a personal access token
 *
 * Every request made through this client, including the inherited public
 * ones, carries the token.
 */

import { type HashAlgorithmRequest, parseWith, resolveHashAlgorithm } from "@modrinth-kit/codec";
import {
  decodeNotification,
  decodePayoutHistory,
  decodePersonalUser,
  decodeReport,
  decodeThread,
  encodeProjectBulkPatch,
  encodeProjectPatch,
  encodeReportPatch,
  encodeTeamMemberPatch,
  encodeUserPatch,
  encodeVersionPatch,
  NotificationSchema,
  ProjectSchema,
  ReportCreateSchema,
  ReportSchema,
  TeamMemberSchema,
  textMessageRequest,
  ThreadSchema,
  type Notification,
  type PayoutHistory,
  type PersonalUser,
  type Project,
  type ProjectBulkPatch,
  type ProjectPatch,
  type Report,
  type ReportCreate,
  type ReportPatch,
  type RequestedProjectStatus,
  type RequestedVersionStatus,
  type TeamMember,
  type TeamMemberPatch,
  type Thread,
  type UserPatch,
  type VersionPatch,
} from "@modrinth-kit/protocol";
import { z } from "zod";

import { idsParam, ModrinthClient } from "./client.ts";
import type { ModrinthClientConfig } from "./config.ts";
import { ConfigError, WithdrawalNotAcknowledgedError } from "./errors.ts";

export interface AuthenticatedClientConfig extends ModrinthClientConfig {
  token: string;
}

export interface DeleteVersionFileOptions {
  /** "auto" resolves to sha512 for 128-character hashes, sha1 otherwise */
  algorithm?: HashAlgorithmRequest;
  /** Only delete the file from this version */
  versionId?: string;
}

export interface SendMessageOptions {
  /** Visible to moderators only */
  private?: boolean;
  /** ID of the message being answered */
  replyingTo?: string;
}

export interface WithdrawOptions {
  /**
   * Confirms the withdrawal fees shown on the website have been read.
   * Withdrawals are refused unless this is `true`.
   */
  acknowledgeFees: boolean;
}

/**
 * Gallery image metadata to change. Unset fields are left as they are.
 */
export interface GalleryImageEdit {
  featured?: boolean;
  title?: string;
  description?: string;
  /** Images sort by ordering, then by age */
  ordering?: number;
}

const NotificationListSchema = z.array(NotificationSchema);
const ReportListSchema = z.array(ReportSchema);
const ThreadListSchema = z.array(ThreadSchema);

/**
 * AuthenticatedModrinthClient - full client for token holders
 */
export class AuthenticatedModrinthClient extends ModrinthClient {
  constructor(config: AuthenticatedClientConfig) {
    if (!config.token) {
      throw new ConfigError("Invalid client config: token is required for the authenticated client");
    }
    super(config);
  }

  // ============================================================================
  // Projects
  // ============================================================================

  async modifyProject(projectId: string, patch: ProjectPatch): Promise<void> {
    await this.request("PATCH", `/project/${encodeURIComponent(projectId)}`, { body: encodeProjectPatch(patch) });
  }

  async deleteProject(projectId: string): Promise<void> {
    await this.request("DELETE", `/project/${encodeURIComponent(projectId)}`);
  }

  /**
   * Apply one patch to several projects
   */
  async modifyProjects(projectIds: Iterable<string>, patch: ProjectBulkPatch): Promise<void> {
    await this.request("PATCH", "/projects", {
      query: { ids: idsParam(projectIds) },
      body: encodeProjectBulkPatch(patch),
    });
  }

  async followProject(projectId: string): Promise<void> {
    await this.request("POST", `/project/${encodeURIComponent(projectId)}/follow`);
  }

  async unfollowProject(projectId: string): Promise<void> {
    await this.request("DELETE", `/project/${encodeURIComponent(projectId)}/follow`);
  }

  async scheduleProject(projectId: string, time: Date, requestedStatus: RequestedProjectStatus): Promise<void> {
    await this.request("POST", `/project/${encodeURIComponent(projectId)}/schedule`, {
      body: { time: time.toISOString(), requested_status: requestedStatus },
    });
  }

  async deleteProjectIcon(projectId: string): Promise<void> {
    await this.request("DELETE", `/project/${encodeURIComponent(projectId)}/icon`);
  }

  /**
   * Remove a gallery image, identified by its URL
   */
  async deleteGalleryImage(projectId: string, url: string): Promise<void> {
    await this.request("DELETE", `/project/${encodeURIComponent(projectId)}/gallery`, { query: { url } });
  }

  async modifyGalleryImage(projectId: string, url: string, edit: GalleryImageEdit): Promise<void> {
    await this.request("PATCH", `/project/${encodeURIComponent(projectId)}/gallery`, {
      query: {
        url,
        featured: edit.featured,
        title: edit.title,
        description: edit.description,
        ordering: edit.ordering,
      },
    });
  }

  // ============================================================================
  // Versions
  // ============================================================================

  async modifyVersion(versionId: string, patch: VersionPatch): Promise<void> {
    await this.request("PATCH", `/version/${encodeURIComponent(versionId)}`, { body: encodeVersionPatch(patch) });
  }

  async deleteVersion(versionId: string): Promise<void> {
    await this.request("DELETE", `/version/${encodeURIComponent(versionId)}`);
  }

  async scheduleVersion(versionId: string, time: Date, requestedStatus: RequestedVersionStatus): Promise<void> {
    await this.request("POST", `/version/${encodeURIComponent(versionId)}/schedule`, {
      body: { time: time.toISOString(), requested_status: requestedStatus },
    });
  }

  /**
   * Delete a file by its hash. The algorithm is always sent.
   */
  async deleteVersionFile(hash: string, options: DeleteVersionFileOptions = {}): Promise<void> {
    await this.request("DELETE", `/version_file/${encodeURIComponent(hash)}`, {
      query: {
        algorithm: resolveHashAlgorithm(hash, options.algorithm ?? "auto", "sha1"),
        version_id: options.versionId,
      },
    });
  }

  // ============================================================================
  // User
  // ============================================================================

  async modifyUser(userId: string, patch: UserPatch): Promise<void> {
    await this.request("PATCH", `/user/${encodeURIComponent(userId)}`, { body: encodeUserPatch(patch) });
  }

  /**
   * The user the token belongs to, private fields included
   */
  async getSelf(): Promise<PersonalUser> {
    return decodePersonalUser(await this.request("GET", "/user"));
  }

  async getFollowedProjects(userId: string): Promise<Project[]> {
    const raw = await this.request("GET", `/user/${encodeURIComponent(userId)}/follows`);
    return parseWith(z.array(ProjectSchema), raw, "projects");
  }

  async deleteUserAvatar(userId: string): Promise<void> {
    await this.request("DELETE", `/user/${encodeURIComponent(userId)}/icon`);
  }

  async getPayoutHistory(userId: string): Promise<PayoutHistory> {
    return decodePayoutHistory(await this.request("GET", `/user/${encodeURIComponent(userId)}/payouts`));
  }

  /**
   * Withdraw `amount` US dollars from the user's balance
   */
  async withdrawPayout(userId: string, amount: number, options: WithdrawOptions): Promise<void> {
    if (options.acknowledgeFees !== true) {
      throw new WithdrawalNotAcknowledgedError(userId, amount);
    }
    await this.request("POST", `/user/${encodeURIComponent(userId)}/payouts`, { query: { amount } });
  }

  // ============================================================================
  // Notifications
  // ============================================================================

  async getUserNotifications(userId: string): Promise<Notification[]> {
    const raw = await this.request("GET", `/user/${encodeURIComponent(userId)}/notifications`);
    return parseWith(NotificationListSchema, raw, "notifications");
  }

  async getNotification(notificationId: string): Promise<Notification> {
    return decodeNotification(await this.request("GET", `/notification/${encodeURIComponent(notificationId)}`));
  }

  async markNotificationRead(notificationId: string): Promise<void> {
    await this.request("PATCH", `/notification/${encodeURIComponent(notificationId)}`);
  }

  async deleteNotification(notificationId: string): Promise<void> {
    await this.request("DELETE", `/notification/${encodeURIComponent(notificationId)}`);
  }

  async getNotifications(notificationIds: Iterable<string>): Promise<Notification[]> {
    const raw = await this.request("GET", "/notifications", { query: { ids: idsParam(notificationIds) } });
    return parseWith(NotificationListSchema, raw, "notifications");
  }

  async markNotificationsRead(notificationIds: Iterable<string>): Promise<void> {
    await this.request("PATCH", "/notifications", { query: { ids: idsParam(notificationIds) } });
  }

  async deleteNotifications(notificationIds: Iterable<string>): Promise<void> {
    await this.request("DELETE", "/notifications", { query: { ids: idsParam(notificationIds) } });
  }

  // ============================================================================
  // Reports
  // ============================================================================

  /**
   * Open reports visible to the user (server default count: 100)
   */
  async getOpenReports(count?: number): Promise<Report[]> {
    const raw = await this.request("GET", "/report", { query: { count } });
    return parseWith(ReportListSchema, raw, "reports");
  }

  async submitReport(report: ReportCreate): Promise<Report> {
    const { report_type, item_id, item_type, body } = parseWith(ReportCreateSchema, report, "report");
    const raw = await this.request("POST", "/report", { body: { report_type, item_id, item_type, body } });
    return decodeReport(raw);
  }

  async getReport(reportId: string): Promise<Report> {
    return decodeReport(await this.request("GET", `/report/${encodeURIComponent(reportId)}`));
  }

  async modifyReport(reportId: string, patch: ReportPatch): Promise<void> {
    await this.request("PATCH", `/report/${encodeURIComponent(reportId)}`, { body: encodeReportPatch(patch) });
  }

  async getReports(reportIds: Iterable<string>): Promise<Report[]> {
    const raw = await this.request("GET", "/reports", { query: { ids: idsParam(reportIds) } });
    return parseWith(ReportListSchema, raw, "reports");
  }

  // ============================================================================
  // Threads
  // ============================================================================

  async getThread(threadId: string): Promise<Thread> {
    return decodeThread(await this.request("GET", `/thread/${encodeURIComponent(threadId)}`));
  }

  async getThreads(threadIds: Iterable<string>): Promise<Thread[]> {
    const raw = await this.request("GET", "/threads", { query: { ids: idsParam(threadIds) } });
    return parseWith(ThreadListSchema, raw, "threads");
  }

  /**
   * Post a text message and return the updated thread
   */
  async sendTextMessage(threadId: string, body: string, options: SendMessageOptions = {}): Promise<Thread> {
    const raw = await this.request("POST", `/thread/${encodeURIComponent(threadId)}`, {
      body: textMessageRequest(body, options),
    });
    return decodeThread(raw);
  }

  async deleteThreadMessage(messageId: string): Promise<void> {
    await this.request("DELETE", `/message/${encodeURIComponent(messageId)}`);
  }

  // ============================================================================
  // Teams
  // ============================================================================

  /**
   * Team members, including pending invites the user is allowed to see
   */
  async getTeamMembers(teamId: string): Promise<TeamMember[]> {
    const raw = await this.request("GET", `/team/${encodeURIComponent(teamId)}/members`);
    return parseWith(z.array(TeamMemberSchema), raw, "members");
  }

  /**
   * Invite a user to a team
   */
  async addTeamMember(teamId: string, userId: string): Promise<void> {
    await this.request("POST", `/team/${encodeURIComponent(teamId)}/members`, { body: { user_id: userId } });
  }

  /**
   * Accept a pending invite
   */
  async joinTeam(teamId: string): Promise<void> {
    await this.request("POST", `/team/${encodeURIComponent(teamId)}/join`);
  }

  async removeTeamMember(teamId: string, userId: string): Promise<void> {
    await this.request("DELETE", `/team/${encodeURIComponent(teamId)}/members/${encodeURIComponent(userId)}`);
  }

  async modifyTeamMember(teamId: string, userId: string, patch: TeamMemberPatch): Promise<void> {
    await this.request("PATCH", `/team/${encodeURIComponent(teamId)}/members/${encodeURIComponent(userId)}`, {
      body: encodeTeamMemberPatch(patch),
    });
  }

  async transferTeamOwnership(teamId: string, userId: string): Promise<void> {
    await this.request("PATCH", `/team/${encodeURIComponent(teamId)}/owner`, { body: { user_id: userId } });
  }

  // ============================================================================
  // HTTP Helpers
  // ============================================================================

  protected override getHeaders(): Record<string, string> {
    return super.getHeaders(true);
  }
}
