import { createHash } from "node:crypto";
import { canonicalizeJson } from "./canonicalJson.js";

export const sha256Hex = (value: string | Uint8Array) =>
  createHash("sha256").update(value).digest("hex");

export const hashCanonicalJson = (value: unknown) => sha256Hex(canonicalizeJson(value));
