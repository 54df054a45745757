/**
 * US Equity Market Session
 *
 * Decides which trading day an analysis covers. While the regular session is
 * open that is today; otherwise it is the most recent completed session
 * before today.
 */

import holidays from "./holidays.json" with { type: "json" };

/** Regular session open, minutes after midnight (09:30) */
const REGULAR_OPEN_MINUTES = 9 * 60 + 30;
/** Regular session close, minutes after midnight (16:00) */
const REGULAR_CLOSE_MINUTES = 16 * 60;
/** Earliest pre-market activity (04:00) */
const PRE_MARKET_OPEN_MINUTES = 4 * 60;
/** Latest after-hours activity (20:00) */
const POST_MARKET_CLOSE_MINUTES = 20 * 60;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const MARKET_HOLIDAYS: ReadonlySet<string> = new Set(holidays.dates);

export type MarketState = "pre" | "regular" | "post" | "closed";

/**
 * Wall-clock reading in the market timezone
 */
export interface MarketClock {
  /** Calendar date, "YYYY-MM-DD" */
  date: string;
  hour: number;
  minute: number;
  /** Minutes after local midnight */
  minutesOfDay: number;
}

export interface MarketStatus {
  isOpen: boolean;
  state: MarketState;
  clock: MarketClock;
}

/**
 * Read the wall clock in a timezone
 */
export function getMarketClock(now: Date, timezone: string): MarketClock {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(now);

  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? "00";

  const hour = parseInt(get("hour"), 10);
  const minute = parseInt(get("minute"), 10);

  return {
    date: `${get("year")}-${get("month")}-${get("day")}`,
    hour,
    minute,
    minutesOfDay: hour * 60 + minute,
  };
}

/**
 * Shift a "YYYY-MM-DD" date by a number of calendar days
 */
export function addCalendarDays(date: string, days: number): string {
  const [year, month, day] = date.split("-").map((part) => parseInt(part, 10));
  return new Date(Date.UTC(year, month - 1, day) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Check whether the exchange trades on a "YYYY-MM-DD" date
 */
export function isTradingDay(date: string): boolean {
  const [year, month, day] = date.split("-").map((part) => parseInt(part, 10));
  const weekday = new Date(Date.UTC(year, month - 1, day)).getUTCDay();
  if (weekday === 0 || weekday === 6) {
    return false;
  }
  return !MARKET_HOLIDAYS.has(date);
}

/**
 * Most recent trading day strictly before a date
 */
export function getPreviousTradingDay(date: string): string {
  let candidate = addCalendarDays(date, -1);
  while (!isTradingDay(candidate)) {
    candidate = addCalendarDays(candidate, -1);
  }
  return candidate;
}

/**
 * Current market session state
 */
export function getMarketStatus(now: Date, timezone: string): MarketStatus {
  const clock = getMarketClock(now, timezone);

  let state: MarketState = "closed";
  if (isTradingDay(clock.date)) {
    const minutes = clock.minutesOfDay;
    if (minutes >= REGULAR_OPEN_MINUTES && minutes < REGULAR_CLOSE_MINUTES) {
      state = "regular";
    } else if (minutes >= PRE_MARKET_OPEN_MINUTES && minutes < REGULAR_OPEN_MINUTES) {
      state = "pre";
    } else if (minutes >= REGULAR_CLOSE_MINUTES && minutes < POST_MARKET_CLOSE_MINUTES) {
      state = "post";
    }
  }

  return { isOpen: state === "regular", state, clock };
}

/**
 * Pick the trading date to analyze
 *
 * @param now - Current instant
 * @param timezone - Market timezone (e.g. "America/New_York")
 * @returns Today's date while the regular session is open, otherwise the
 *   previous trading day
 */
export function getAnalysisDate(now: Date, timezone: string): string {
  const status = getMarketStatus(now, timezone);
  if (status.isOpen) {
    return status.clock.date;
  }
  return getPreviousTradingDay(status.clock.date);
}
