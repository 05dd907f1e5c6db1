/**
 * Project schema tests
 */
import { MalformedFieldError } from "@modrinth-kit/codec";
import { describe, expect, it } from "vitest";
import {
  decodeProject,
  decodeSearchResult,
  encodeProject,
  encodeSearchResult,
  ProjectCodec,
} from "../src/project.ts";
import projectJson from "./fixtures/project.json";

function expectMalformed(fn: () => unknown, path: string): void {
  try {
    fn();
    expect.unreachable();
  } catch (error) {
    expect(error).toBeInstanceOf(MalformedFieldError);
    if (error instanceof MalformedFieldError) {
      expect(error.path).toBe(path);
    }
  }
}

describe("Project", () => {
  describe("decodeProject", () => {
    it("should unpack the colour integer", () => {
      const project = decodeProject(projectJson);
      expect(project.color).toEqual({ red: 234, green: 234, blue: 243 });
    });

    it("should keep timestamps as received", () => {
      const project = decodeProject(projectJson);
      expect(project.updated).toBe("2024-02-01T17:03:11.004127Z");
      expect(project.gallery[0]?.created).toBe("2023-06-14T09:20:00+02:00");
    });

    it("should accept a null colour", () => {
      expect(decodeProject({ ...projectJson, color: null }).color).toBeNull();
    });

    it("should report a missing key with its path", () => {
      const { title: _title, ...withoutTitle } = projectJson;
      expectMalformed(() => decodeProject(withoutTitle), "project.title");
    });

    it("should report nested paths", () => {
      const license = { ...projectJson.license, name: 5 };
      expectMalformed(() => decodeProject({ ...projectJson, license }), "project.license.name");
    });

    it("should reject a colour outside 24 bits", () => {
      expectMalformed(() => decodeProject({ ...projectJson, color: 0x1000000 }), "project.color");
    });

    it("should reject a non-object", () => {
      expectMalformed(() => decodeProject([]), "project");
    });
  });

  describe("encodeProject", () => {
    it("should reproduce the wire object", () => {
      expect(encodeProject(decodeProject(projectJson))).toEqual(projectJson);
    });

    it("should repack the colour", () => {
      const encoded = ProjectCodec.encode(ProjectCodec.decode(projectJson, "project"));
      expect(encoded.color).toBe(15395571);
    });
  });

  describe("SearchResult", () => {
    const hit = {
      project_id: projectJson.id,
      slug: projectJson.slug,
      project_type: "mod",
      author: "lamplighter",
      title: projectJson.title,
      description: projectJson.description,
      categories: ["decoration", "utility", "fabric"],
      display_categories: ["decoration", "utility"],
      versions: ["1.20.1", "1.20.4"],
      downloads: 48213,
      follows: 377,
      icon_url: null,
      date_created: "2023-06-14T09:12:45.381Z",
      date_modified: "2024-02-01T17:03:11.004127Z",
      latest_version: "1.20.4",
      license: "MIT",
      client_side: "required",
      server_side: "optional",
      gallery: [],
      featured_gallery: null,
      color: 8703084,
    };
    const result = { hits: [hit], offset: 0, limit: 10, total_hits: 1 };

    it("should decode hits", () => {
      const decoded = decodeSearchResult(result);
      expect(decoded.total_hits).toBe(1);
      expect(decoded.hits[0]?.color).toEqual({ red: 132, green: 204, blue: 108 });
    });

    it("should round-trip", () => {
      expect(encodeSearchResult(decodeSearchResult(result))).toEqual(result);
    });
  });
});
