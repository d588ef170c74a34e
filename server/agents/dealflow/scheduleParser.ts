/**
 * Schedule Parser
 *
 * Resolves "next Tue at 10:00 with Dana" style requests against a fixed
 * "now". Defaults: no day means tomorrow, no time means 10:00, no end or
 * duration means one hour.
 *
 * A named weekday (with or without "next") is its next occurrence strictly
 * after today.
 *
 * Layer: Agents (dealflow)
 */

import { addDays, addMinutes, isAfter, nextDay, set } from "date-fns";
import { DEALFLOW_CONSTANTS } from "../../config/constants";
import {
  extractDateTimeParts,
  parseClockTime,
  toTwentyFourHour,
  type RelativeDay,
} from "../../decisionLayer/entityExtractor";
import type { ScheduleInfo } from "./types";

const RANGE_PATTERN = /(?:\b(at|from)\s+)?\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)?\s*(?:-|–|to|until|till)\s*(\d{1,2})(?::(\d{2}))?\s*(am|pm)?\b/gi;
const UNTIL_PATTERN = /\b(?:until|till)\s+(\d{1,2})(?::(\d{2}))?\s*(am|pm)?\b/i;
const DURATION_PATTERN = /\bfor\s+(half an|an?|one|\d+(?:\.\d+)?)\s*(hours?|hrs?|minutes?|mins?)\b/i;
const KIND_PATTERN = /\b(call|meeting|demo|sync|catch[- ]up|follow[- ]up|check[- ]in|review|lunch|coffee)\b/i;
const TOPIC_PATTERN = /\babout\s+(.+?)(?=\s+(?:on|at|next|tomorrow|today|with|for)\b|[.?!,;]|$)/i;
const WITH_PATTERN = /\bwith\s+/g;
const ATTENDEE_NAME = /^([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)/;
const ATTENDEE_SEPARATOR = /^(\s*,\s*(?:and\s+)?|\s+and\s+|\s*&\s*)/;

// Capitalized words after "with" that are not people
const NOT_ATTENDEES = new Set([
  "the", "our", "their", "my", "me", "us", "them", "everyone", "team",
  "today", "tomorrow", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday",
]);

type TimeOfDay = { hour: number; minute: number };

type ExplicitRange = {
  start: TimeOfDay;
  end: TimeOfDay;
};

/**
 * Only a range that reads as clock times counts: one with am/pm, minutes, or
 * a leading "at"/"from". "2 to 3 people" is a head count.
 */
function parseRange(text: string): ExplicitRange | null {
  for (const match of text.matchAll(RANGE_PATTERN)) {
    const [, anchor, startHour, startMinute, startSuffix, endHour, endMinute, endSuffix] = match;
    if (!anchor && !startSuffix && !endSuffix && startMinute === undefined && endMinute === undefined) {
      continue;
    }
    // A single am/pm applies to both ends ("2-3pm")
    const start = toTwentyFourHour(Number(startHour), Number(startMinute ?? 0), startSuffix ?? endSuffix);
    const end = toTwentyFourHour(Number(endHour), Number(endMinute ?? 0), endSuffix ?? startSuffix);
    if (start && end) return { start, end };
  }
  return null;
}

function parseDurationMinutes(text: string): number | null {
  const match = DURATION_PATTERN.exec(text);
  if (!match) return null;
  const amount = match[1].toLowerCase();
  const unit = match[2].toLowerCase();
  if (amount === "half an") return 30;
  const count = amount === "a" || amount === "an" || amount === "one" ? 1 : Number(amount);
  if (!Number.isFinite(count) || count <= 0) return null;
  return unit.startsWith("h") ? Math.round(count * 60) : Math.round(count);
}

function resolveDay(day: RelativeDay | null, now: Date): Date {
  if (!day) return addDays(now, 1);
  switch (day.kind) {
    case "today":
      return now;
    case "tomorrow":
      return addDays(now, 1);
    case "weekday":
      return nextDay(now, day.weekday);
  }
}

function atTime(day: Date, time: TimeOfDay): Date {
  return set(day, { hours: time.hour, minutes: time.minute, seconds: 0, milliseconds: 0 });
}

export function extractAttendees(text: string): string[] {
  const attendees: string[] = [];
  for (const match of text.matchAll(WITH_PATTERN)) {
    let rest = text.slice((match.index ?? 0) + match[0].length);
    for (;;) {
      const nameMatch = ATTENDEE_NAME.exec(rest);
      if (!nameMatch) break;
      const name = nameMatch[1];
      if (NOT_ATTENDEES.has(name.split(/\s+/)[0].toLowerCase())) break;
      if (!attendees.includes(name)) attendees.push(name);
      rest = rest.slice(nameMatch[0].length);
      const separator = ATTENDEE_SEPARATOR.exec(rest);
      if (!separator) break;
      rest = rest.slice(separator[0].length);
    }
  }
  return attendees;
}

function meetingKind(text: string): string {
  const match = KIND_PATTERN.exec(text);
  if (!match) return "Meeting";
  const kind = match[1].toLowerCase().replace(/\s+/, "-");
  return kind.charAt(0).toUpperCase() + kind.slice(1);
}

function meetingTopic(text: string): string | null {
  const topic = TOPIC_PATTERN.exec(text)?.[1]?.trim();
  return topic ? topic : null;
}

export function buildMeetingTitle(text: string, attendees: string[]): string {
  const parts = [meetingKind(text)];
  if (attendees.length > 0) parts.push(`with ${attendees.join(", ")}`);
  const topic = meetingTopic(text);
  if (topic) parts.push(`about ${topic}`);
  return parts.join(" ");
}

export function parseSchedule(text: string, now: Date): ScheduleInfo {
  const { day } = extractDateTimeParts(text);
  const range = parseRange(text);
  const clock = range?.start ?? parseClockTime(text) ?? { hour: DEALFLOW_CONSTANTS.DEFAULT_MEETING_HOUR, minute: 0 };

  const startTimestamp = atTime(resolveDay(day, now), clock);

  let endTimestamp = addMinutes(startTimestamp, DEALFLOW_CONSTANTS.DEFAULT_MEETING_DURATION_MINUTES);
  const durationMinutes = parseDurationMinutes(text);
  if (durationMinutes !== null) {
    endTimestamp = addMinutes(startTimestamp, durationMinutes);
  } else {
    let explicitEnd: TimeOfDay | null = range?.end ?? null;
    if (!explicitEnd) {
      const until = UNTIL_PATTERN.exec(text);
      if (until) explicitEnd = toTwentyFourHour(Number(until[1]), Number(until[2] ?? 0), until[3]);
    }
    if (explicitEnd) {
      const candidate = atTime(startTimestamp, explicitEnd);
      if (isAfter(candidate, startTimestamp)) endTimestamp = candidate;
    }
  }

  const attendees = extractAttendees(text);
  return {
    title: buildMeetingTitle(text, attendees),
    startTimestamp,
    endTimestamp,
    attendees,
  };
}
