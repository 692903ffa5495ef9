import { formatMinorUnits, toMinorUnits } from "../../core/money";

const DAY_MS = 86_400_000;
const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

export type BookingRuleViolation =
  | "invalid_stay_dates"
  | "check_in_in_past"
  | "too_many_guests"
  | "listing_unavailable";

export type BookingRequestFacts = {
  checkInDate: string;
  checkOutDate: string;
  numGuests: number;
  today: string;
  listing: {
    maxGuests: number;
    availability: boolean;
  };
};

/** UTC midnight of a calendar date, or null for strings like "2025-02-30". */
export function parseDateOnly(value: string): number | null {
  const match = DATE_ONLY.exec(value);
  if (!match) return null;
  const [, year, month, day] = match;
  const time = Date.UTC(Number(year), Number(month) - 1, Number(day));
  const parsed = new Date(time);
  if (
    parsed.getUTCFullYear() !== Number(year) ||
    parsed.getUTCMonth() !== Number(month) - 1 ||
    parsed.getUTCDate() !== Number(day)
  ) {
    return null;
  }
  return time;
}

export function formatDateOnly(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function stayNights(checkInDate: string, checkOutDate: string): number {
  const checkIn = parseDateOnly(checkInDate);
  const checkOut = parseDateOnly(checkOutDate);
  if (checkIn === null || checkOut === null || checkOut <= checkIn) return 0;
  return Math.round((checkOut - checkIn) / DAY_MS);
}

export function computeTotalPrice(pricePerNight: string, nights: number): string | null {
  const minor = toMinorUnits(pricePerNight);
  if (minor === null || nights <= 0) return null;
  return formatMinorUnits(minor * nights);
}

// First violated rule, in the order guests see them.
export function findBookingRuleViolation(facts: BookingRequestFacts): BookingRuleViolation | null {
  const checkIn = parseDateOnly(facts.checkInDate);
  const checkOut = parseDateOnly(facts.checkOutDate);
  if (checkIn === null || checkOut === null || checkOut <= checkIn) {
    return "invalid_stay_dates";
  }

  const today = parseDateOnly(facts.today);
  if (today !== null && checkIn < today) {
    return "check_in_in_past";
  }

  if (facts.numGuests > facts.listing.maxGuests) {
    return "too_many_guests";
  }

  if (!facts.listing.availability) {
    return "listing_unavailable";
  }

  return null;
}
