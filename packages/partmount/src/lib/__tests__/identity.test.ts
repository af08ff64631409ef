// IMPLEMENTATION_VALIDATION
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { verifyUuid } from "@/lib/identity";
import { createFakeSystem } from "@/__tests__/helpers/fake-system";

let logSpy: MockInstance<typeof console.log>;

beforeEach(() => {
  logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  logSpy.mockRestore();
});

describe("verifyUuid", () => {
  it("returns true and confirms on a match", () => {
    const subprocess = createFakeSystem({ uuids: { "/dev/sda2": "ABCD-1234" } });
    expect(verifyUuid("/dev/sda2", "ABCD-1234", { subprocess })).toBe(true);
    expect(logSpy).toHaveBeenCalledWith("  |- Identity: UUID verified.");
  });

  it("returns false and warns on a mismatch", () => {
    const subprocess = createFakeSystem({ uuids: { "/dev/sda2": "FFFF-0000" } });
    expect(verifyUuid("/dev/sda2", "ABCD-1234", { subprocess })).toBe(false);
    expect(logSpy).toHaveBeenCalledWith(
      "[WARNING]: UUID Mismatch! Dev: /dev/sda2 | Expected: ABCD-1234 | Actual: FFFF-0000",
    );
  });

  it("treats a failed query as a mismatch", () => {
    const subprocess = createFakeSystem();
    expect(verifyUuid("/dev/sdb1", "ABCD-1234", { subprocess })).toBe(false);
    expect(logSpy).toHaveBeenCalledWith(
      "[WARNING]: UUID Mismatch! Dev: /dev/sdb1 | Expected: ABCD-1234 | Actual: ",
    );
  });
});
