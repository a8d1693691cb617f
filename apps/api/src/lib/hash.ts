import { createHash } from "node:crypto";

export function sha256Hex(value: string) {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

// Short form for log fields.
export function fingerprint(value: string) {
  return sha256Hex(value).slice(0, 16);
}
