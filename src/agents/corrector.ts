import { validateCorrectorReply } from "../config/schema-validation.js";
import type { CorrectorOutput, IssueList, Requirement, Resolution } from "../ledger/types.js";
import { buildCorrectorPrompt } from "./prompts.js";
import { parseReply, runRole, type RoleContext } from "./role.js";
import { extractSignatures, findMissingSignatures } from "./signature.js";
import type { CorrectorReply, ParseOutcome, RoleReply } from "./types.js";

export type CorrectorInput = {
  requirement: Requirement;
  issueList: IssueList;
};

/**
 * Rejects an empty rewrite and one that alters a function signature written in the
 * requirement it was given.
 */
export const normalizeCorrectorReply = (
  reply: CorrectorReply,
  requirement: Requirement
): ParseOutcome<CorrectorOutput> => {
  const updated = reply.updated_requirement.trim();
  if (updated.length === 0) {
    return { ok: false, reasons: ["updated_requirement is empty"] };
  }

  const missing = findMissingSignatures(extractSignatures(requirement.text), updated);
  if (missing.length > 0) {
    return {
      ok: false,
      reasons: missing.map((signature) => `updated_requirement changed signature: ${signature.text}`)
    };
  }

  const resolutions: Resolution[] = reply.resolutions.map((resolution) => {
    const assumption = resolution.assumption?.trim();
    return {
      issue_id: resolution.issue_id.trim(),
      action_taken: resolution.action_taken.trim(),
      ...(assumption ? { assumption } : {})
    };
  });

  return {
    ok: true,
    value: {
      updated_requirement: updated,
      resolutions,
      open_questions: (reply.open_questions ?? [])
        .map((question) => question.trim())
        .filter((question) => question.length > 0)
    }
  };
};

export const runCorrector = (
  context: RoleContext,
  input: CorrectorInput
): Promise<RoleReply<CorrectorOutput>> =>
  runRole(
    "corrector",
    context,
    buildCorrectorPrompt(context.template, input),
    (raw) =>
      parseReply(raw, "corrector", validateCorrectorReply, (reply) =>
        normalizeCorrectorReply(reply, input.requirement)
      )
  );
