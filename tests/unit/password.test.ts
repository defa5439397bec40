import { afterEach, describe, expect, it, vi } from "vitest";
import {
  BCRYPT_ROUNDS,
  hashCost,
  hashPassword,
  verifyPassword,
} from "../../src/utils/password";
import { ValidationError } from "../../src/utils/errors";
import { logger } from "../../src/utils/logger";

describe("password hashing", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("hashes at the configured cost with a fresh salt each time", async () => {
    const first = await hashPassword("correct horse");
    const second = await hashPassword("correct horse");

    expect(hashCost(first)).toBe(BCRYPT_ROUNDS);
    expect(first).not.toBe(second);
    expect(first).not.toContain("correct horse");
  });

  it("verifies the right password and rejects the wrong one", async () => {
    const hash = await hashPassword("s3cret-pass");

    expect(await verifyPassword("s3cret-pass", hash)).toBe(true);
    expect(await verifyPassword("s3cret-pasS", hash)).toBe(false);
  });

  it("treats a malformed stored hash as a mismatch and logs it", async () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => undefined);

    expect(await verifyPassword("anything", "not-a-bcrypt-hash")).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("⚠️ Stored password hash is malformed; treating as mismatch");
  });

  it("does not log for a well-formed hash that simply mismatches", async () => {
    const warn = vi.spyOn(logger, "warn");
    const hash = await hashPassword("s3cret-pass");

    expect(await verifyPassword("other-pass", hash)).toBe(false);
    expect(warn).not.toHaveBeenCalled();
  });

  it("refuses to hash input past the 72-byte bcrypt limit", async () => {
    await expect(hashPassword(`${"a".repeat(72)}one`)).rejects.toThrow(
      new ValidationError("Password must be at most 72 bytes")
    );
    // multi-byte characters count by their encoded size
    await expect(hashPassword("é".repeat(37))).rejects.toBeInstanceOf(ValidationError);
  });

  it("never matches input that differs only past the bcrypt limit", async () => {
    const hash = await hashPassword("a".repeat(72));

    expect(await verifyPassword("a".repeat(72), hash)).toBe(true);
    expect(await verifyPassword(`${"a".repeat(72)}two`, hash)).toBe(false);
  });

  it("refuses to hash an empty password", async () => {
    await expect(hashPassword("")).rejects.toBeInstanceOf(ValidationError);
  });

  it("reports no cost for a malformed hash", () => {
    expect(hashCost("not-a-bcrypt-hash")).toBeNull();
  });
});
