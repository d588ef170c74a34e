/**
 * Entity Extractor
 *
 * Rule-based extraction of contact, money and date/time entities. Each rule
 * is independent and carries a fixed confidence from ENTITY_CONFIDENCE.
 * Unmatched rules produce nothing; no input makes this throw.
 *
 * Layer: Decision Layer
 */

import type { Day } from "date-fns";
import { ENTITY_CONFIDENCE } from "../config/constants";
import { mergeEntities, type Entity } from "./intent";

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const PHONE_PATTERN = /(?<!\d)(?:\+?1[-.\s]?)?\(?(\d{3})\)?[-.\s]?(\d{3})[-.\s]?(\d{4})(?!\d)/g;
const MONEY_PATTERN = /\$\s?\d[\d,]*(?:\.\d+)?(?:\s?(?:k|m|million|thousand)\b)?|\b\d[\d,]*(?:\.\d+)?\s?k\b/gi;
const NAME_FROM_COMPANY_PATTERN = /\b([A-Z][a-z]+(?:\s+[A-Z][a-z]+){0,2})\s+from\s+([A-Z][A-Za-z0-9&.'-]*(?:\s+[A-Z][A-Za-z0-9&.'-]*){0,3})/g;

// Capitalized sentence openers that are not part of a person's name
const NAME_PREFIX_NOISE = new Set([
  "met", "spoke", "talked", "called", "hi", "hello", "hey", "this", "is",
  "lead", "new", "meet", "with", "just", "today", "yesterday", "so",
]);

const WEEKDAY_INDEX: Record<string, Day> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tues: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thur: 4, thurs: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const DAY_PATTERN = /\b(today|tomorrow|(next\s+)?(sunday|monday|tuesday|wednesday|thursday|friday|saturday|sun|mon|tues|tue|wed|thurs|thur|thu|fri|sat))\b/i;
const CLOCK_WITH_MINUTES = /\b(\d{1,2}):(\d{2})\s*(am|pm)?\b/i;
const CLOCK_WITH_MERIDIEM = /\b(\d{1,2})\s*(am|pm)\b/i;
const CLOCK_AFTER_AT = /\bat\s+(\d{1,2})\b(?!\s*(?:%|k\b|:))/i;

export type RelativeDay =
  | { kind: "today"; raw: string }
  | { kind: "tomorrow"; raw: string }
  | { kind: "weekday"; weekday: Day; explicitNext: boolean; raw: string };

export type ClockTime = {
  hour: number;
  minute: number;
  raw: string;
};

export type DateTimeParts = {
  day: RelativeDay | null;
  time: ClockTime | null;
};

/**
 * Converts a clock reading to 24h. Without am/pm, 1-7 is read as afternoon
 * since nobody books a 3am call.
 */
export function toTwentyFourHour(hour: number, minute: number, meridiem: string | undefined): { hour: number; minute: number } | null {
  if (minute < 0 || minute > 59) return null;
  const m = meridiem?.toLowerCase();
  if (m === "am" || m === "pm") {
    if (hour < 1 || hour > 12) return null;
    const base = hour % 12;
    return { hour: m === "pm" ? base + 12 : base, minute };
  }
  if (hour < 0 || hour > 23) return null;
  if (hour >= 1 && hour <= 7) return { hour: hour + 12, minute };
  return { hour, minute };
}

function parseRelativeDay(text: string): RelativeDay | null {
  const match = DAY_PATTERN.exec(text);
  if (!match) return null;
  const raw = match[1].toLowerCase().replace(/\s+/g, " ");
  if (raw === "today") return { kind: "today", raw };
  if (raw === "tomorrow") return { kind: "tomorrow", raw };
  const weekday = WEEKDAY_INDEX[match[3].toLowerCase()];
  if (weekday === undefined) return null;
  return { kind: "weekday", weekday, explicitNext: Boolean(match[2]), raw };
}

export function parseClockTime(text: string): ClockTime | null {
  const withMinutes = CLOCK_WITH_MINUTES.exec(text);
  if (withMinutes) {
    const resolved = toTwentyFourHour(Number(withMinutes[1]), Number(withMinutes[2]), withMinutes[3]);
    if (resolved) return { ...resolved, raw: withMinutes[0] };
  }

  const withMeridiem = CLOCK_WITH_MERIDIEM.exec(text);
  if (withMeridiem) {
    const resolved = toTwentyFourHour(Number(withMeridiem[1]), 0, withMeridiem[2]);
    if (resolved) return { ...resolved, raw: withMeridiem[0] };
  }

  const afterAt = CLOCK_AFTER_AT.exec(text);
  if (afterAt) {
    const resolved = toTwentyFourHour(Number(afterAt[1]), 0, undefined);
    if (resolved) return { ...resolved, raw: afterAt[0] };
  }

  return null;
}

export function extractDateTimeParts(text: string): DateTimeParts {
  return {
    day: parseRelativeDay(text),
    time: parseClockTime(text),
  };
}

export function formatClock(time: { hour: number; minute: number }): string {
  return `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;
}

function stripTrailingPunctuation(value: string): string {
  return value.replace(/[.,;:!?'-]+$/, "").trim();
}

function stripNamePrefix(name: string): string {
  const words = name.split(/\s+/);
  while (words.length > 1 && NAME_PREFIX_NOISE.has(words[0].toLowerCase())) {
    words.shift();
  }
  if (words.length === 1 && NAME_PREFIX_NOISE.has(words[0].toLowerCase())) {
    return "";
  }
  return words.join(" ");
}

export class EntityExtractor {
  extract(text: string): Entity[] {
    if (!text || !text.trim()) return [];

    return mergeEntities(
      this.extractEmails(text),
      this.extractPhones(text),
      this.extractMoney(text),
      this.extractNameAndCompany(text),
      this.extractDateTime(text),
    );
  }

  private extractEmails(text: string): Entity[] {
    return Array.from(text.matchAll(EMAIL_PATTERN), match => ({
      type: "email" as const,
      value: match[0].toLowerCase(),
      confidence: ENTITY_CONFIDENCE.email,
    }));
  }

  private extractPhones(text: string): Entity[] {
    return Array.from(text.matchAll(PHONE_PATTERN), match => ({
      type: "phone" as const,
      value: `(${match[1]}) ${match[2]}-${match[3]}`,
      confidence: ENTITY_CONFIDENCE.phone,
    }));
  }

  private extractMoney(text: string): Entity[] {
    return Array.from(text.matchAll(MONEY_PATTERN), match => ({
      type: "money" as const,
      value: match[0].replace(/\s+/g, ""),
      confidence: ENTITY_CONFIDENCE.money,
    }));
  }

  private extractNameAndCompany(text: string): Entity[] {
    const entities: Entity[] = [];
    for (const match of text.matchAll(NAME_FROM_COMPANY_PATTERN)) {
      const name = stripNamePrefix(match[1]);
      const company = stripTrailingPunctuation(match[2]);
      if (name) {
        entities.push({ type: "name", value: name, confidence: ENTITY_CONFIDENCE.name });
      }
      if (company) {
        entities.push({ type: "company", value: company, confidence: ENTITY_CONFIDENCE.company });
      }
    }
    return entities;
  }

  private extractDateTime(text: string): Entity[] {
    const { day, time } = extractDateTimeParts(text);
    if (!day && !time) return [];
    const value = [day?.raw, time ? formatClock(time) : undefined]
      .filter((part): part is string => Boolean(part))
      .join(" ");
    return [{ type: "datetime", value, confidence: ENTITY_CONFIDENCE.datetime }];
  }
}
