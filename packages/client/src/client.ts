/**
 * ModrinthClient - public Modrinth v2 API client
 *
 * Covers every endpoint that works without a token:
 * - Search
 * - Projects and their versions
 * - Version lookup by file hash
 * - Users and teams
 * - Tags and platform statistics
 *
 * Responses are validated and decoded through the protocol schemas; a
 * response that does not match throws MalformedFieldError.
 */

import {
  type AllFacets,
  facetsToQueryParam,
  type HashAlgorithm,
  type HashAlgorithmRequest,
  type JsonValue,
  parseWith,
  resolveHashAlgorithm,
} from "@modrinth-kit/codec";
import {
  CategorySchema,
  decodeProject,
  decodeProjectDependencies,
  decodeSearchResult,
  decodeUser,
  decodeVersion,
  decodeVersionsByHash,
  DonationPlatformSchema,
  ForgeUpdatesSchema,
  GameVersionTagSchema,
  LicenseTagSchema,
  LicenseTextSchema,
  LoaderSchema,
  PlatformStatisticsSchema,
  ProjectIdCheckSchema,
  ProjectSchema,
  StringTagsSchema,
  TeamMemberSchema,
  TeamsSchema,
  UserSchema,
  VersionSchema,
  type Category,
  type DonationPlatform,
  type ForgeUpdates,
  type GameVersionTag,
  type LicenseTag,
  type LicenseText,
  type Loader,
  type PlatformStatistics,
  type Project,
  type ProjectDependencies,
  type SearchResult,
  type TeamMember,
  type Teams,
  type User,
  type Version,
  type VersionsByHash,
} from "@modrinth-kit/protocol";
import { z } from "zod";

import { type ModrinthClientConfig, type ResolvedConfig, resolveConfig } from "./config.ts";
import { ApiError } from "./errors.ts";
import type { HttpMethod, QueryValue, TransportResponse } from "./transport.ts";

// ============================================================================
// Request Types
// ============================================================================

export type SearchIndex = "relevance" | "downloads" | "follows" | "newest" | "updated";

export interface SearchOptions {
  query?: string;
  facets?: AllFacets;
  /** Sort order (server default: relevance) */
  index?: SearchIndex;
  offset?: number;
  /** 1..100 (server default: 10) */
  limit?: number;
}

export interface ProjectVersionsFilter {
  loaders?: Iterable<string>;
  gameVersions?: Iterable<string>;
  /** Only featured (true) or only non-featured (false) versions */
  featured?: boolean;
}

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  body?: JsonValue;
  /** Send the Authorization header even when alwaysUseAuth is off */
  auth?: boolean;
}

const ProjectListSchema = z.array(ProjectSchema);
const VersionListSchema = z.array(VersionSchema);
const UserListSchema = z.array(UserSchema);
const TeamMemberListSchema = z.array(TeamMemberSchema);

/** `ids=["a","b"]`, the list encoding every bulk endpoint takes */
export function idsParam(ids: Iterable<string>): string {
  return JSON.stringify([...ids]);
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * ModrinthClient - client for the public endpoints
 */
export class ModrinthClient {
  protected readonly config: ResolvedConfig;

  constructor(config: ModrinthClientConfig) {
    this.config = resolveConfig(config);
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  // ============================================================================
  // Search
  // ============================================================================

  async searchProjects(options: SearchOptions = {}): Promise<SearchResult> {
    const raw = await this.request("GET", "/search", {
      query: {
        query: options.query,
        facets: options.facets ? facetsToQueryParam(options.facets) : undefined,
        index: options.index,
        offset: options.offset,
        limit: options.limit,
      },
    });
    return decodeSearchResult(raw);
  }

  // ============================================================================
  // Projects
  // ============================================================================

  /**
   * Get a project by ID or slug
   */
  async getProject(projectId: string): Promise<Project> {
    return decodeProject(await this.request("GET", `/project/${encodeURIComponent(projectId)}`));
  }

  async getProjects(projectIds: Iterable<string>): Promise<Project[]> {
    const raw = await this.request("GET", "/projects", { query: { ids: idsParam(projectIds) } });
    return parseWith(ProjectListSchema, raw, "projects");
  }

  async getRandomProjects(count: number): Promise<Project[]> {
    const raw = await this.request("GET", "/projects_random", { query: { count } });
    return parseWith(ProjectListSchema, raw, "projects");
  }

  /**
   * Check whether an ID or slug names a project visible to the caller.
   * A hidden project reads as invalid.
   */
  async isProjectIdValid(projectId: string): Promise<boolean> {
    const path = `/project/${encodeURIComponent(projectId)}/check`;
    const response = await this.send("GET", path);
    if (response.status === 404) {
      return false;
    }
    this.ensureSuccess("GET", path, response);
    parseWith(ProjectIdCheckSchema, response.body, "check");
    return true;
  }

  async getProjectDependencies(projectId: string): Promise<ProjectDependencies> {
    const raw = await this.request("GET", `/project/${encodeURIComponent(projectId)}/dependencies`);
    return decodeProjectDependencies(raw);
  }

  async getProjectVersions(projectId: string, filter: ProjectVersionsFilter = {}): Promise<Version[]> {
    const raw = await this.request("GET", `/project/${encodeURIComponent(projectId)}/version`, {
      query: {
        loaders: filter.loaders ? JSON.stringify([...filter.loaders]) : undefined,
        game_versions: filter.gameVersions ? JSON.stringify([...filter.gameVersions]) : undefined,
        featured: filter.featured,
      },
    });
    return parseWith(VersionListSchema, raw, "versions");
  }

  /**
   * Get a version of a project by its version ID or version number
   */
  async getProjectVersion(projectId: string, versionIdOrNumber: string): Promise<Version> {
    const path = `/project/${encodeURIComponent(projectId)}/version/${encodeURIComponent(versionIdOrNumber)}`;
    return decodeVersion(await this.request("GET", path));
  }

  // ============================================================================
  // Versions
  // ============================================================================

  async getVersion(versionId: string): Promise<Version> {
    return decodeVersion(await this.request("GET", `/version/${encodeURIComponent(versionId)}`));
  }

  async getVersions(versionIds: Iterable<string>): Promise<Version[]> {
    const raw = await this.request("GET", "/versions", { query: { ids: idsParam(versionIds) } });
    return parseWith(VersionListSchema, raw, "versions");
  }

  /**
   * Get the version a file belongs to.
   *
   * With "auto", a 128-character hash is sent as sha512; anything else
   * leaves the algorithm out and the server assumes sha1.
   */
  async getVersionFromHash(hash: string, algorithm: HashAlgorithmRequest = "auto"): Promise<Version> {
    const raw = await this.request("GET", `/version_file/${encodeURIComponent(hash)}`, {
      query: { algorithm: resolveHashAlgorithm(hash, algorithm), multiple: false },
    });
    return decodeVersion(raw);
  }

  /**
   * Get every version containing a file. Same algorithm rules as getVersionFromHash.
   */
  async getVersionsFromHash(hash: string, algorithm: HashAlgorithmRequest = "auto"): Promise<Version[]> {
    const raw = await this.request("GET", `/version_file/${encodeURIComponent(hash)}`, {
      query: { algorithm: resolveHashAlgorithm(hash, algorithm), multiple: true },
    });
    return parseWith(VersionListSchema, raw, "versions");
  }

  /**
   * Get the newest version of the file's project matching the loaders and
   * game versions. "auto" resolves to sha512 or sha1 and is always sent.
   */
  async getLatestVersionFromHash(
    hash: string,
    loaders: Iterable<string>,
    gameVersions: Iterable<string>,
    algorithm: HashAlgorithmRequest = "auto"
  ): Promise<Version> {
    const raw = await this.request("POST", `/version_file/${encodeURIComponent(hash)}/update`, {
      query: { algorithm: resolveHashAlgorithm(hash, algorithm, "sha1") },
      body: { loaders: [...loaders], game_versions: [...gameVersions] },
    });
    return decodeVersion(raw);
  }

  /**
   * Look up many files at once. All hashes must use `algorithm`.
   */
  async getVersionsFromHashes(hashes: Iterable<string>, algorithm: HashAlgorithm): Promise<VersionsByHash> {
    const raw = await this.request("POST", "/version_files", {
      body: { hashes: [...hashes], algorithm },
    });
    return decodeVersionsByHash(raw);
  }

  async getLatestVersionsFromHashes(
    hashes: Iterable<string>,
    algorithm: HashAlgorithm,
    loaders: Iterable<string>,
    gameVersions: Iterable<string>
  ): Promise<VersionsByHash> {
    const raw = await this.request("POST", "/version_files/update", {
      body: {
        hashes: [...hashes],
        algorithm,
        loaders: [...loaders],
        game_versions: [...gameVersions],
      },
    });
    return decodeVersionsByHash(raw);
  }

  // ============================================================================
  // Users and Teams
  // ============================================================================

  /**
   * Get a user by ID or username
   */
  async getUser(userId: string): Promise<User> {
    return decodeUser(await this.request("GET", `/user/${encodeURIComponent(userId)}`));
  }

  async getUsers(userIds: Iterable<string>): Promise<User[]> {
    const raw = await this.request("GET", "/users", { query: { ids: idsParam(userIds) } });
    return parseWith(UserListSchema, raw, "users");
  }

  async getUserProjects(userId: string): Promise<Project[]> {
    const raw = await this.request("GET", `/user/${encodeURIComponent(userId)}/projects`);
    return parseWith(ProjectListSchema, raw, "projects");
  }

  async getProjectTeamMembers(projectId: string): Promise<TeamMember[]> {
    const raw = await this.request("GET", `/project/${encodeURIComponent(projectId)}/members`);
    return parseWith(TeamMemberListSchema, raw, "members");
  }

  /**
   * Members of several teams, one list per team in request order
   */
  async getTeams(teamIds: Iterable<string>): Promise<Teams> {
    const raw = await this.request("GET", "/teams", { query: { ids: idsParam(teamIds) } });
    return parseWith(TeamsSchema, raw, "teams");
  }

  // ============================================================================
  // Tags
  // ============================================================================

  async getCategories(): Promise<Category[]> {
    return parseWith(z.array(CategorySchema), await this.request("GET", "/tag/category"), "categories");
  }

  async getLoaders(): Promise<Loader[]> {
    return parseWith(z.array(LoaderSchema), await this.request("GET", "/tag/loader"), "loaders");
  }

  async getGameVersions(): Promise<GameVersionTag[]> {
    return parseWith(z.array(GameVersionTagSchema), await this.request("GET", "/tag/game_version"), "game_versions");
  }

  async getLicenses(): Promise<LicenseTag[]> {
    return parseWith(z.array(LicenseTagSchema), await this.request("GET", "/tag/license"), "licenses");
  }

  /**
   * Full text of a license, by SPDX identifier
   */
  async getLicenseText(licenseId: string): Promise<LicenseText> {
    const raw = await this.request("GET", `/tag/license/${encodeURIComponent(licenseId)}`);
    return parseWith(LicenseTextSchema, raw, "license");
  }

  async getDonationPlatforms(): Promise<DonationPlatform[]> {
    const raw = await this.request("GET", "/tag/donation_platform");
    return parseWith(z.array(DonationPlatformSchema), raw, "donation_platforms");
  }

  async getReportTypes(): Promise<string[]> {
    return parseWith(StringTagsSchema, await this.request("GET", "/tag/report_type"), "report_types");
  }

  async getProjectTypes(): Promise<string[]> {
    return parseWith(StringTagsSchema, await this.request("GET", "/tag/project_type"), "project_types");
  }

  async getSideTypes(): Promise<string[]> {
    return parseWith(StringTagsSchema, await this.request("GET", "/tag/side_type"), "side_types");
  }

  // ============================================================================
  // Miscellaneous
  // ============================================================================

  /**
   * Forge update-checker manifest for a mod
   */
  async getForgeUpdates(projectId: string): Promise<ForgeUpdates> {
    const raw = await this.request("GET", `/updates/${encodeURIComponent(projectId)}/forge_updates.json`);
    return parseWith(ForgeUpdatesSchema, raw, "forge_updates");
  }

  async getStatistics(): Promise<PlatformStatistics> {
    return parseWith(PlatformStatisticsSchema, await this.request("GET", "/statistics"), "statistics");
  }

  // ============================================================================
  // HTTP Helpers
  // ============================================================================

  /**
   * Send a request and return the body of a 2xx response
   * @throws ApiError for any other status
   */
  protected async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.send(method, path, options);
    this.ensureSuccess(method, path, response);
    return response.body;
  }

  protected async send(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.config.transport.request({
      method,
      url: `${this.config.baseUrl}${path}`,
      headers: this.getHeaders(options.auth ?? false),
      query: options.query,
      body: options.body,
    });
  }

  protected getHeaders(requireAuth: boolean): Record<string, string> {
    const headers: Record<string, string> = { "User-Agent": this.config.userAgent };
    const { token } = this.config;
    if (token !== undefined && (requireAuth || this.config.alwaysUseAuth)) {
      headers.Authorization = token;
    }
    return headers;
  }

  private ensureSuccess(method: HttpMethod, path: string, response: TransportResponse): void {
    if (isSuccess(response.status)) {
      return;
    }
    const url = `${this.config.baseUrl}${path}`;
    console.warn(`[ModrinthClient] ${method} ${path} failed with status ${response.status}`);
    throw new ApiError(response.status, method, url, response.body);
  }
}
