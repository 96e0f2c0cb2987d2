import { createHash, createHmac, timingSafeEqual } from "node:crypto";

import { v7 as uuidv7 } from "uuid";

/** Time-ordered UUIDv7 for stored rows. */
export function createId(): string {
  return uuidv7();
}

export function sha256(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

export function hmacSha256(secret: string, input: string): string {
  return createHmac("sha256", secret).update(input).digest("hex");
}

export function hexDigestsEqual(left: string, right: string): boolean {
  const leftBuffer = Buffer.from(left, "hex");
  const rightBuffer = Buffer.from(right, "hex");
  if (leftBuffer.length === 0 || leftBuffer.length !== rightBuffer.length) {
    return false;
  }

  return timingSafeEqual(leftBuffer, rightBuffer);
}
