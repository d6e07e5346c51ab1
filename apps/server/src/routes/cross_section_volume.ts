import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";

import { CrossSectionDocumentV1Z, ReportProfileNameZ } from "@earthwork/contracts";
import type { ReportProfileV1 } from "@earthwork/contracts";
import { createSnapshotSource, runCrossSectionVolumeReport } from "@earthwork/volume-kernel";
import type { CrossSectionVolumeOutcome } from "@earthwork/volume-kernel";

import { ReportProfileRejected, loadReportProfile, toRenderOptions } from "../config/report_profile";

const ReportRequestZ = z
  .object({
    alignment_id: z.string().nullable(),
    document: CrossSectionDocumentV1Z,
    profile: ReportProfileNameZ.optional()
  })
  .strict();

const ReportQueryZ = z.object({
  format: z.enum(["json", "text"]).default("json")
});

export type CrossSectionVolumeRouteOptions = {
  repoRoot: string;
  defaultProfile: string;
};

function statusOf(outcome: CrossSectionVolumeOutcome): number {
  switch (outcome.kind) {
    case "report":
    case "no_data":
      return 200;
    case "cancelled":
      return 400;
    case "failed":
      return 500;
  }
}

function sendText(reply: FastifyReply, status: number, text: string): FastifyReply {
  return reply.code(status).type("text/plain; charset=utf-8").send(text);
}

export function registerCrossSectionVolumeRoutes(app: FastifyInstance, opts: CrossSectionVolumeRouteOptions): void {
  // Profiles are read once per name for the life of the process.
  const profiles = new Map<string, ReportProfileV1>();
  const profileFor = (name: string): ReportProfileV1 => {
    const hit = profiles.get(name);
    if (hit) return hit;
    const loaded = loadReportProfile(opts.repoRoot, name);
    profiles.set(name, loaded);
    return loaded;
  };

  app.post("/api/reports/cross_section_volume", async (req, reply) => {
    const query = ReportQueryZ.safeParse(req.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ ok: false, error: "invalid query", issues: query.error.issues });
    }
    const asText = query.data.format === "text";

    const body = ReportRequestZ.safeParse(req.body ?? {});
    if (!body.success) {
      return asText
        ? sendText(reply, 400, "invalid body")
        : reply.code(400).send({ ok: false, error: "invalid body", issues: body.error.issues });
    }

    let profile: ReportProfileV1;
    try {
      profile = profileFor(body.data.profile ?? opts.defaultProfile);
    } catch (e) {
      if (e instanceof ReportProfileRejected) {
        return asText ? sendText(reply, e.status, e.message) : reply.code(e.status).send({ ok: false, error: e.message });
      }
      throw e;
    }

    const outcome = runCrossSectionVolumeReport({
      source: createSnapshotSource(body.data.document),
      alignmentId: body.data.alignment_id,
      profile: toRenderOptions(profile),
      logger: req.log
    });
    const status = statusOf(outcome);

    if (asText) {
      return sendText(reply, status, outcome.kind === "report" ? outcome.text : outcome.message);
    }

    switch (outcome.kind) {
      case "report":
        return reply.code(status).send({
          ok: true,
          outcome: outcome.kind,
          alignment: outcome.alignment,
          text: outcome.text,
          table: outcome.table,
          faults: outcome.faults
        });
      case "no_data":
        return reply.code(status).send({
          ok: true,
          outcome: outcome.kind,
          alignment: outcome.alignment,
          message: outcome.message,
          faults: outcome.faults
        });
      case "cancelled":
      case "failed":
        return reply.code(status).send({ ok: false, outcome: outcome.kind, error: outcome.message });
    }
  });
}
