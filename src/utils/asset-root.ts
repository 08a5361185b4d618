import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

/** Nearest ancestor of this module holding `package.json`; prompts, schemas and templates ship beside it. */
const detectAssetRoot = (): string => {
  let current = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (existsSync(resolve(current, "package.json")) && existsSync(resolve(current, "prompts"))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      return process.cwd();
    }
    current = parent;
  }
};

const ASSET_ROOT = detectAssetRoot();

export const getAssetRoot = (): string => ASSET_ROOT;
