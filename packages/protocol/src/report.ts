/**
 * Report schemas
 */

import {
  ABSENT,
  encodeField,
  expectObject,
  type JsonObject,
  parseWith,
  type PatchField,
} from "@modrinth-kit/codec";
import { z } from "zod";
import { ModrinthIdSchema, ReportItemTypeSchema, TimestampSchema } from "./common.ts";
import { BooleanCodec, patchKey, StringCodec } from "./fields.ts";

export const ReportSchema = z.object({
  id: ModrinthIdSchema,
  report_type: z.string(),
  item_id: ModrinthIdSchema,
  item_type: ReportItemTypeSchema,
  body: z.string(),
  reporter: ModrinthIdSchema,
  created: TimestampSchema,
  closed: z.boolean(),
  thread_id: ModrinthIdSchema,
});
export type Report = z.infer<typeof ReportSchema>;

export function decodeReport(raw: unknown, path = "report"): Report {
  return parseWith(ReportSchema, raw, path);
}

/** Body of a new report; `report_type` is one of the report type tags */
export const ReportCreateSchema = z.object({
  report_type: z.string(),
  item_id: ModrinthIdSchema,
  item_type: ReportItemTypeSchema.exclude(["unknown"]),
  body: z.string(),
});
export type ReportCreate = z.infer<typeof ReportCreateSchema>;

export interface ReportPatch {
  body: PatchField<string>;
  closed: PatchField<boolean>;
}

export function createReportPatch(fields: Partial<ReportPatch> = {}): ReportPatch {
  return { body: ABSENT, closed: ABSENT, ...fields };
}

export function decodeReportPatch(raw: unknown, path = "patch"): ReportPatch {
  const o = expectObject(raw, path);
  return {
    body: patchKey(o, "body", StringCodec, path),
    closed: patchKey(o, "closed", BooleanCodec, path),
  };
}

export function encodeReportPatch(patch: ReportPatch): JsonObject {
  const out: JsonObject = {};
  encodeField(out, "body", patch.body, StringCodec);
  encodeField(out, "closed", patch.closed, BooleanCodec);
  return out;
}
