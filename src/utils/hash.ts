import { createHash } from "node:crypto";

/** Hex sha256 of a prompt template or any other recorded input. */
export const sha256Hex = (data: string | Uint8Array): string =>
  createHash("sha256").update(data).digest("hex");
