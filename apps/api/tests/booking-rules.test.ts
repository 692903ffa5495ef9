import { describe, expect, it } from "vitest";

import {
  computeTotalPrice,
  findBookingRuleViolation,
  parseDateOnly,
  stayNights,
} from "../src/modules/bookings/booking-rules";

const baseFacts = {
  checkInDate: "2026-05-01",
  checkOutDate: "2026-05-04",
  numGuests: 2,
  today: "2026-04-01",
  listing: { maxGuests: 4, availability: true },
};

describe("booking rules", () => {
  it("parses calendar dates and rejects impossible ones", () => {
    expect(parseDateOnly("2026-05-01")).toBe(Date.UTC(2026, 4, 1));
    expect(parseDateOnly("2025-02-30")).toBeNull();
    expect(parseDateOnly("2026-5-1")).toBeNull();
  });

  it("counts nights between check-in and check-out", () => {
    expect(stayNights("2026-05-01", "2026-05-04")).toBe(3);
    expect(stayNights("2026-02-27", "2026-03-02")).toBe(3);
    expect(stayNights("2026-05-04", "2026-05-01")).toBe(0);
  });

  it("multiplies the nightly price in minor units", () => {
    expect(computeTotalPrice("150.00", 3)).toBe("450.00");
    expect(computeTotalPrice("99.99", 3)).toBe("299.97");
    expect(computeTotalPrice("150.00", 0)).toBeNull();
  });

  it("accepts a valid request", () => {
    expect(findBookingRuleViolation(baseFacts)).toBeNull();
  });

  it("allows check-in today", () => {
    expect(findBookingRuleViolation({ ...baseFacts, checkInDate: "2026-04-01" })).toBeNull();
  });

  it("reports the first violated rule", () => {
    expect(
      findBookingRuleViolation({ ...baseFacts, checkOutDate: "2026-05-01" })
    ).toBe("invalid_stay_dates");
    expect(
      findBookingRuleViolation({
        ...baseFacts,
        checkInDate: "2026-03-30",
        numGuests: 10,
      })
    ).toBe("check_in_in_past");
    expect(
      findBookingRuleViolation({
        ...baseFacts,
        numGuests: 5,
        listing: { maxGuests: 4, availability: false },
      })
    ).toBe("too_many_guests");
    expect(
      findBookingRuleViolation({ ...baseFacts, listing: { maxGuests: 4, availability: false } })
    ).toBe("listing_unavailable");
  });
});
