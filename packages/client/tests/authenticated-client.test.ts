/**
 * AuthenticatedModrinthClient tests
 */
import { BulkAdjustment, createVersionNumber, NULL, value } from "@modrinth-kit/codec";
import {
  createProjectBulkPatch,
  createProjectPatch,
  createReportPatch,
  createTeamMemberPatch,
  createUserPatch,
  createVersionPatch,
  PermissionsBitfield,
} from "@modrinth-kit/protocol";
import { beforeEach, describe, expect, it } from "vitest";
import { AuthenticatedModrinthClient } from "../src/authenticated-client.ts";
import { ConfigError, WithdrawalNotAcknowledgedError } from "../src/errors.ts";
import projectJson from "./fixtures/project.json";
import userJson from "./fixtures/user.json";
import { API, RecordingTransport, TOKEN, USER_AGENT } from "./recording-transport.ts";

const SHA1 = "0123456789abcdef0123456789abcdef01234567";
const SHA512 = "00112233445566778899aabbccddeeff".repeat(4);

const threadJson = {
  id: "Th1aaaaa",
  type: "project",
  project_id: "Lx4mP0q2",
  report_id: null,
  messages: [
    {
      id: "Msg00001",
      author_id: "Us3rAb12",
      body: { type: "text", body: "Ready for review.", private: false, replying_to: null },
      created: "2024-02-02T12:00:00Z",
    },
  ],
  members: [userJson],
};

describe("AuthenticatedModrinthClient", () => {
  let transport: RecordingTransport;
  let client: AuthenticatedModrinthClient;

  beforeEach(() => {
    transport = new RecordingTransport();
    client = new AuthenticatedModrinthClient({ userAgent: USER_AGENT, token: TOKEN, transport });
  });

  describe("constructor", () => {
    it("should require a token", () => {
      expect(() => new AuthenticatedModrinthClient({ userAgent: USER_AGENT, token: "", transport })).toThrow(
        ConfigError
      );
    });

    it("should send the token on inherited public requests", async () => {
      transport.respond(projectJson);
      await client.getProject("lantern-lights");

      expect(transport.last.headers).toEqual({ "User-Agent": USER_AGENT, Authorization: TOKEN });
    });
  });

  describe("projects", () => {
    it("should send only the fields a patch sets", async () => {
      const patch = createProjectPatch({ title: value("Lantern Lights Reborn"), issues_url: NULL });
      await client.modifyProject("lantern-lights", patch);

      expect(transport.last.method).toBe("PATCH");
      expect(transport.last.url).toBe(`${API}/project/lantern-lights`);
      expect(transport.last.body).toEqual({ title: "Lantern Lights Reborn", issues_url: null });
    });

    it("should patch several projects with list adjustments", async () => {
      const patch = createProjectBulkPatch({
        categories: BulkAdjustment.adjust(["lighting"]),
        wiki_url: NULL,
      });
      await client.modifyProjects(["Lx4mP0q2", "AbCd1234"], patch);

      expect(transport.last.url).toBe(`${API}/projects`);
      expect(transport.last.query).toEqual({ ids: '["Lx4mP0q2","AbCd1234"]' });
      expect(transport.last.body).toEqual({ add_categories: ["lighting"], wiki_url: null });
    });

    it("should schedule a status change with an ISO timestamp", async () => {
      await client.scheduleProject("lantern-lights", new Date(Date.UTC(2025, 0, 1)), "approved");

      expect(transport.last.url).toBe(`${API}/project/lantern-lights/schedule`);
      expect(transport.last.body).toEqual({ time: "2025-01-01T00:00:00.000Z", requested_status: "approved" });
    });

    it("should follow and unfollow", async () => {
      await client.followProject("lantern-lights");
      await client.unfollowProject("lantern-lights");

      expect(transport.calls.map((c) => `${c.method} ${c.url}`)).toEqual([
        `POST ${API}/project/lantern-lights/follow`,
        `DELETE ${API}/project/lantern-lights/follow`,
      ]);
    });

    it("should delete the project icon", async () => {
      await client.deleteProjectIcon("lantern-lights");

      expect(transport.last.method).toBe("DELETE");
      expect(transport.last.url).toBe(`${API}/project/lantern-lights/icon`);
      expect(transport.last.query).toBeUndefined();
    });

    it("should delete a gallery image by its URL", async () => {
      await client.deleteGalleryImage("lantern-lights", "https://cdn.example.test/gallery/lamp.png");

      expect(transport.last.method).toBe("DELETE");
      expect(transport.last.url).toBe(`${API}/project/lantern-lights/gallery`);
      expect(transport.last.query).toEqual({ url: "https://cdn.example.test/gallery/lamp.png" });
    });

    it("should send gallery image edits as query parameters", async () => {
      await client.modifyGalleryImage("lantern-lights", "https://cdn.example.test/gallery/lamp.png", {
        featured: false,
        description: "Lanterns at dusk",
        ordering: 2,
      });

      expect(transport.last.method).toBe("PATCH");
      expect(transport.last.url).toBe(`${API}/project/lantern-lights/gallery`);
      expect(transport.last.query).toEqual({
        url: "https://cdn.example.test/gallery/lamp.png",
        featured: false,
        title: undefined,
        description: "Lanterns at dusk",
        ordering: 2,
      });
      expect(transport.last.body).toBeUndefined();
    });
  });

  describe("versions", () => {
    it("should format the version number in a patch", async () => {
      await client.modifyVersion("Vr1aaaaa", createVersionPatch({ version_number: value(createVersionNumber(2, 4, 1)) }));

      expect(transport.last.url).toBe(`${API}/version/Vr1aaaaa`);
      expect(transport.last.body).toEqual({ version_number: "2.4.1" });
    });

    it("should delete a version by its own path", async () => {
      await client.deleteVersion("Vr1aaaaa");

      expect(transport.last.method).toBe("DELETE");
      expect(transport.last.url).toBe(`${API}/version/Vr1aaaaa`);
    });

    it("should send sha1 when deleting a file by a short hash", async () => {
      await client.deleteVersionFile(SHA1);

      expect(transport.last.url).toBe(`${API}/version_file/${SHA1}`);
      expect(transport.last.query).toEqual({ algorithm: "sha1", version_id: undefined });
    });

    it("should send sha512 and the version when deleting a file by a long hash", async () => {
      await client.deleteVersionFile(SHA512, { versionId: "Vr1aaaaa" });

      expect(transport.last.query).toEqual({ algorithm: "sha512", version_id: "Vr1aaaaa" });
    });
  });

  describe("user", () => {
    it("should decode the personal profile", async () => {
      transport.respond({
        ...userJson,
        email: "lamp@example.test",
        auth_providers: ["github"],
        email_verified: true,
        has_password: false,
        has_totp: false,
      });
      const self = await client.getSelf();

      expect(transport.last.url).toBe(`${API}/user`);
      expect(self.auth_providers).toEqual(["github"]);
      expect(self.email_verified).toBe(true);
    });

    it("should clear a nullable user field", async () => {
      await client.modifyUser("lamplighter", createUserPatch({ bio: NULL }));

      expect(transport.last.body).toEqual({ bio: null });
    });

    it("should pass the withdrawal amount as a query parameter", async () => {
      await client.withdrawPayout("Us3rAb12", 25, { acknowledgeFees: true });

      expect(transport.last.method).toBe("POST");
      expect(transport.last.url).toBe(`${API}/user/Us3rAb12/payouts`);
      expect(transport.last.query).toEqual({ amount: 25 });
    });

    it("should refuse a withdrawal without the fee acknowledgement", async () => {
      await expect(client.withdrawPayout("Us3rAb12", 25, { acknowledgeFees: false })).rejects.toMatchObject({
        name: "WithdrawalNotAcknowledgedError",
        code: "WITHDRAWAL_NOT_ACKNOWLEDGED",
        userId: "Us3rAb12",
        amount: 25,
        message: 'Withdrawal of 25 for user "Us3rAb12" refused: acknowledgeFees must be true',
      });
      await expect(client.withdrawPayout("Us3rAb12", 25, { acknowledgeFees: false })).rejects.toBeInstanceOf(
        WithdrawalNotAcknowledgedError
      );
      expect(transport.calls).toEqual([]);
    });

    it("should delete the user avatar", async () => {
      await client.deleteUserAvatar("Us3rAb12");

      expect(transport.last.method).toBe("DELETE");
      expect(transport.last.url).toBe(`${API}/user/Us3rAb12/icon`);
    });
  });

  describe("notifications", () => {
    it("should decode a notification action route", async () => {
      transport.respond({
        id: "No1aaaaa",
        user_id: "Us3rAb12",
        type: "team_invite",
        title: "You have been invited to join a team",
        text: "An invite has been sent to you",
        link: "/project/lantern-lights",
        read: false,
        created: "2024-02-03T10:00:00Z",
        actions: [{ title: "Accept", action_route: ["POST", "team/Tm7fQ2zK/join"] }],
      });
      const notification = await client.getNotification("No1aaaaa");

      expect(notification.actions[0]?.action_route).toEqual(["POST", "team/Tm7fQ2zK/join"]);
    });

    it("should mark several notifications as read", async () => {
      await client.markNotificationsRead(["No1aaaaa", "No2bbbbb"]);

      expect(transport.last.method).toBe("PATCH");
      expect(transport.last.url).toBe(`${API}/notifications`);
      expect(transport.last.query).toEqual({ ids: '["No1aaaaa","No2bbbbb"]' });
    });
  });

  describe("reports", () => {
    const reportJson = {
      id: "Rp1aaaaa",
      report_type: "spam",
      item_id: "Lx4mP0q2",
      item_type: "project",
      body: "Duplicate upload.",
      reporter: "Us3rAb12",
      created: "2024-02-04T09:30:00Z",
      closed: false,
      thread_id: "Th2bbbbb",
    };

    it("should submit a report as JSON", async () => {
      transport.respond(reportJson);
      const report = await client.submitReport({
        report_type: "spam",
        item_id: "Lx4mP0q2",
        item_type: "project",
        body: "Duplicate upload.",
      });

      expect(transport.last.method).toBe("POST");
      expect(transport.last.body).toEqual({
        report_type: "spam",
        item_id: "Lx4mP0q2",
        item_type: "project",
        body: "Duplicate upload.",
      });
      expect(report.thread_id).toBe("Th2bbbbb");
    });

    it("should close a report with a boolean", async () => {
      await client.modifyReport("Rp1aaaaa", createReportPatch({ closed: value(true) }));

      expect(transport.last.body).toEqual({ closed: true });
    });
  });

  describe("threads", () => {
    it("should send a text reply and decode the thread", async () => {
      transport.respond(threadJson);
      const thread = await client.sendTextMessage("Th1aaaaa", "Thanks!", { replyingTo: "Msg00001" });

      expect(transport.last.url).toBe(`${API}/thread/Th1aaaaa`);
      expect(transport.last.body).toEqual({ body: { type: "text", body: "Thanks!", replying_to: "Msg00001" } });
      expect(thread.messages[0]?.body).toEqual({
        type: "text",
        body: "Ready for review.",
        private: false,
        replying_to: null,
      });
    });

    it("should fetch several threads by id", async () => {
      transport.respond([threadJson]);
      const threads = await client.getThreads(["Th1aaaaa"]);

      expect(transport.last.query).toEqual({ ids: '["Th1aaaaa"]' });
      expect(threads[0]?.members[0]?.username).toBe("lamplighter");
    });
  });

  describe("teams", () => {
    it("should pack permissions when modifying a member", async () => {
      const patch = createTeamMemberPatch({
        permissions: value(PermissionsBitfield.of("UPLOAD_VERSION", "DELETE_VERSIONS")),
        ordering: value(2),
      });
      await client.modifyTeamMember("Tm7fQ2zK", "Us3rAb12", patch);

      expect(transport.last.url).toBe(`${API}/team/Tm7fQ2zK/members/Us3rAb12`);
      expect(transport.last.body).toEqual({ permissions: 3, ordering: 2 });
    });

    it("should transfer ownership by user id", async () => {
      await client.transferTeamOwnership("Tm7fQ2zK", "Us3rAb12");

      expect(transport.last.method).toBe("PATCH");
      expect(transport.last.url).toBe(`${API}/team/Tm7fQ2zK/owner`);
      expect(transport.last.body).toEqual({ user_id: "Us3rAb12" });
    });
  });
});
