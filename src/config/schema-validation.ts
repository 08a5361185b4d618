import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { ErrorObject, Options, ValidateFunction } from "ajv";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import type { AnalyzerReply, CorrectorReply, WriterReply } from "../agents/types.js";
import type { Trace } from "../ledger/types.js";
import { getAssetRoot } from "../utils/asset-root.js";
import type { ReqloopConfig } from "./types.js";

const Ajv2020Ctor = Ajv2020 as unknown as new (opts?: Options) => {
  compile: <T>(schema: unknown) => ValidateFunction<T>;
};

const ajv = new Ajv2020Ctor({
  allErrors: true,
  strict: true,
  allowUnionTypes: true
});

const applyFormats = addFormats as unknown as (instance: unknown) => void;
applyFormats(ajv);

const compileSchema = <T>(fileName: string): ValidateFunction<T> => {
  const path = resolve(getAssetRoot(), "schemas", fileName);
  const schema: unknown = JSON.parse(readFileSync(path, "utf8"));
  return ajv.compile<T>(schema);
};

export const validateConfig = compileSchema<ReqloopConfig>("config.schema.json");

/** Role reply contracts; a reply that fails one is malformed and retried. */
export const validateAnalyzerReply = compileSchema<AnalyzerReply>("analyzer-output.schema.json");
export const validateCorrectorReply = compileSchema<CorrectorReply>("corrector-output.schema.json");
export const validateWriterReply = compileSchema<WriterReply>("writer-output.schema.json");

export const validateTrace = compileSchema<Trace>("trace.schema.json");

/** One `label<instancePath>: message` line per ajv error. */
export const formatAjvErrors = (
  label: string,
  errors: ErrorObject[] | null | undefined
): string[] =>
  (errors ?? []).map((error) => `${label}${error.instancePath}: ${error.message ?? "is invalid"}`);
