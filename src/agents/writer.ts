import { validateWriterReply } from "../config/schema-validation.js";
import { SignatureMismatchError } from "../engine/errors.js";
import type { Requirement, WriterOutput } from "../ledger/types.js";
import { buildWriterPrompt } from "./prompts.js";
import { parseReply, runRole, type RoleContext } from "./role.js";
import { extractSignatures, findMissingSignatures } from "./signature.js";
import type { ParseOutcome, RoleReply, WriterReply } from "./types.js";

export type WriterResult = RoleReply<WriterOutput> & {
  preservedSignatures: string[];
};

const normalizeAssumptions = (raw: WriterReply["assumptions"]): string[] => {
  if (!raw) {
    return [];
  }
  const items = typeof raw === "string" ? raw.split(/\r?\n/) : raw;
  return items
    .map((item) => item.replace(/^\s*[-*]\s*/, "").trim())
    .filter((item) => item.length > 0);
};

export const normalizeWriterReply = (reply: WriterReply): ParseOutcome<WriterOutput> => {
  const code = reply.code.trim();
  if (code.length === 0) {
    return { ok: false, reasons: ["code is empty"] };
  }
  return {
    ok: true,
    value: {
      code,
      tests: reply.tests?.trim() ?? "",
      assumptions: normalizeAssumptions(reply.assumptions)
    }
  };
};

/**
 * Generates code for the finalized requirement only. Every function signature in the
 * requirement must appear token for token in the generated code; a reply that drops or
 * rewrites one raises SignatureMismatchError and is not retried.
 */
export const runWriter = async (
  context: RoleContext,
  requirement: Requirement
): Promise<WriterResult> => {
  const reply = await runRole(
    "writer",
    context,
    buildWriterPrompt(context.template, requirement),
    (raw) => parseReply(raw, "writer", validateWriterReply, normalizeWriterReply)
  );

  const signatures = extractSignatures(requirement.text);
  const missing = findMissingSignatures(signatures, reply.value.code);
  if (missing.length > 0) {
    throw new SignatureMismatchError(missing.map((signature) => signature.text));
  }

  return {
    ...reply,
    preservedSignatures: signatures.map((signature) => signature.text)
  };
};
