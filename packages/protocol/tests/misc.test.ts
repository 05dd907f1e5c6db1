/**
 * Notification, report, tag and statistics schema tests
 */
import { ABSENT, parseWith, value } from "@modrinth-kit/codec";
import { describe, expect, it } from "vitest";
import { decodeNotification } from "../src/notification.ts";
import {
  createReportPatch,
  decodeReport,
  decodeReportPatch,
  encodeReportPatch,
  ReportCreateSchema,
} from "../src/report.ts";
import { PlatformStatisticsSchema } from "../src/statistics.ts";
import { ForgeUpdatesSchema, GameVersionTagSchema, LoaderSchema } from "../src/tags.ts";

describe("Notification", () => {
  it("should decode action routes as [method, path] pairs", () => {
    const notification = decodeNotification({
      id: "Nt000001",
      user_id: "Us3rAb12",
      type: "team_invite",
      title: "You have been invited to join a team",
      text: "An invite has been sent to you",
      link: "/project/Lx4mP0q2",
      read: false,
      created: "2024-03-09T17:21:44Z",
      actions: [
        { title: "Accept", action_route: ["POST", "team/Tm7fQ2zK/join"] },
        { title: "Deny", action_route: ["DELETE", "team/Tm7fQ2zK/members/Us3rAb12"] },
      ],
    });
    expect(notification.actions.map((action) => action.action_route[0])).toEqual(["POST", "DELETE"]);
  });
});

describe("Report", () => {
  const reportJson = {
    id: "Rp000001",
    report_type: "spam",
    item_id: "Lx4mP0q2",
    item_type: "project",
    body: "Duplicate upload",
    reporter: "Us3rAb12",
    created: "2024-03-09T17:21:44Z",
    closed: false,
    thread_id: "Th9xYz02",
  };

  it("should decode", () => {
    expect(decodeReport(reportJson).item_type).toBe("project");
  });

  it("should not accept an unknown item type on new reports", () => {
    const result = ReportCreateSchema.safeParse({ ...reportJson, item_type: "unknown" });
    expect(result.success).toBe(false);
  });

  it("should encode only changed keys of a patch", () => {
    expect(encodeReportPatch(createReportPatch({ closed: value(true) }))).toEqual({ closed: true });
  });

  it("should decode an empty patch as absent", () => {
    expect(decodeReportPatch({}).body).toBe(ABSENT);
  });
});

describe("Tags", () => {
  it("should decode game versions", () => {
    const tag = parseWith(
      GameVersionTagSchema,
      { version: "24w10a", version_type: "snapshot", date: "2024-03-06T14:01:02Z", major: false },
      "tag"
    );
    expect(tag.version_type).toBe("snapshot");
  });

  it("should decode loaders", () => {
    const loader = parseWith(
      LoaderSchema,
      { icon: "<svg></svg>", name: "fabric", supported_project_types: ["mod", "modpack"] },
      "loader"
    );
    expect(loader.supported_project_types).toEqual(["mod", "modpack"]);
  });

  it("should decode forge promos", () => {
    const updates = parseWith(
      ForgeUpdatesSchema,
      { homepage: "https://example.test/lantern", promos: { "1.20.1-latest": "2.4.0" } },
      "updates"
    );
    expect(updates.promos["1.20.1-latest"]).toBe("2.4.0");
  });
});

describe("PlatformStatistics", () => {
  it("should reject negative counters", () => {
    expect(() =>
      parseWith(PlatformStatisticsSchema, { projects: -1, versions: 0, files: 0, authors: 0 }, "statistics")
    ).toThrow('Malformed field "statistics.projects"');
  });
});
