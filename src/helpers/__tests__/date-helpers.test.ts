import { describe, it, expect, vi } from "vitest";
import { getCurrentDate, isIsoDate } from "../date-helpers.js";

describe("isIsoDate", () => {
  it("accepts real calendar dates", () => {
    expect(isIsoDate("2025-03-01")).toBe(true);
    expect(isIsoDate("2024-02-29")).toBe(true);
  });

  it("rejects impossible dates and other formats", () => {
    expect(isIsoDate("2025-02-29")).toBe(false);
    expect(isIsoDate("2025-13-01")).toBe(false);
    expect(isIsoDate("2025-3-1")).toBe(false);
    expect(isIsoDate("01/03/2025")).toBe(false);
  });
});

describe("getCurrentDate", () => {
  const now = new Date("2025-03-01T23:30:00Z");

  it("formats in UTC by default", () => {
    expect(getCurrentDate(undefined, now)).toBe("2025-03-01");
  });

  it("uses the given timezone", () => {
    expect(getCurrentDate("Asia/Tokyo", now)).toBe("2025-03-02");
  });

  it("falls back to UTC for an unknown timezone", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(getCurrentDate("Not/AZone", now)).toBe("2025-03-01");
    expect(warn).toHaveBeenCalledOnce();
    warn.mockRestore();
  });
});
