import crypto from "crypto";

/** Stable non-negative integer derived from the text (first 32 bits of sha256). */
export function stableHash(text: string): number {
  const digest = crypto.createHash("sha256").update(text, "utf8").digest("hex");
  return parseInt(digest.slice(0, 8), 16);
}
