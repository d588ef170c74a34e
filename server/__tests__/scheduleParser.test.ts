import { describe, it, expect } from "vitest";
import { buildMeetingTitle, extractAttendees, parseSchedule } from "../agents/dealflow/scheduleParser";

// Wednesday, 15 January 2025, 09:00 local time
const NOW = new Date(2025, 0, 15, 9, 0);

describe("parseSchedule", () => {
  it("resolves next weekday, explicit time and attendee", () => {
    const schedule = parseSchedule("Schedule a call next Tue at 10:00 with Dana about refunds", NOW);
    expect(schedule).toEqual({
      title: "Call with Dana about refunds",
      startTimestamp: new Date(2025, 0, 21, 10, 0),
      endTimestamp: new Date(2025, 0, 21, 11, 0),
      attendees: ["Dana"],
    });
  });

  it("defaults to tomorrow at 10:00 for one hour", () => {
    const schedule = parseSchedule("Set up a sync with the team", NOW);
    expect(schedule.startTimestamp).toEqual(new Date(2025, 0, 16, 10, 0));
    expect(schedule.endTimestamp).toEqual(new Date(2025, 0, 16, 11, 0));
    expect(schedule.attendees).toEqual([]);
    expect(schedule.title).toBe("Sync");
  });

  it("takes a time range with a shared meridiem", () => {
    const schedule = parseSchedule("Book a demo tomorrow 2-3pm with Sam and Alex Kim", NOW);
    expect(schedule.startTimestamp).toEqual(new Date(2025, 0, 16, 14, 0));
    expect(schedule.endTimestamp).toEqual(new Date(2025, 0, 16, 15, 0));
    expect(schedule.attendees).toEqual(["Sam", "Alex Kim"]);
    expect(schedule.title).toBe("Demo with Sam, Alex Kim");
  });

  it("does not read a head count as a time range", () => {
    const schedule = parseSchedule("Schedule a call with 2 to 3 people tomorrow at 10am", NOW);
    expect(schedule.startTimestamp).toEqual(new Date(2025, 0, 16, 10, 0));
    expect(schedule.endTimestamp).toEqual(new Date(2025, 0, 16, 11, 0));
  });

  it("takes a bare range introduced by 'from'", () => {
    const schedule = parseSchedule("Meeting tomorrow from 2 to 4", NOW);
    expect(schedule.startTimestamp).toEqual(new Date(2025, 0, 16, 14, 0));
    expect(schedule.endTimestamp).toEqual(new Date(2025, 0, 16, 16, 0));
  });

  it("reads an explicit end time", () => {
    const schedule = parseSchedule("call on Friday at 9:30am until 11", NOW);
    expect(schedule.startTimestamp).toEqual(new Date(2025, 0, 17, 9, 30));
    expect(schedule.endTimestamp).toEqual(new Date(2025, 0, 17, 11, 0));
  });

  it("reads a duration in minutes or hours", () => {
    const short = parseSchedule("Meeting today at 4 for 30 minutes", NOW);
    expect(short.startTimestamp).toEqual(new Date(2025, 0, 15, 16, 0));
    expect(short.endTimestamp).toEqual(new Date(2025, 0, 15, 16, 30));

    const long = parseSchedule("catch up with Lee tomorrow at 11am for 2 hours", NOW);
    expect(long.endTimestamp).toEqual(new Date(2025, 0, 16, 13, 0));
    expect(long.title).toBe("Catch-up with Lee");
  });

  it("ignores an end time that is not after the start", () => {
    const schedule = parseSchedule("call today at 3pm until 1pm", NOW);
    expect(schedule.startTimestamp).toEqual(new Date(2025, 0, 15, 15, 0));
    expect(schedule.endTimestamp).toEqual(new Date(2025, 0, 15, 16, 0));
  });

  it("moves a weekday equal to today to next week", () => {
    const schedule = parseSchedule("meeting Wednesday", NOW);
    expect(schedule.startTimestamp).toEqual(new Date(2025, 0, 22, 10, 0));
  });
});

describe("extractAttendees", () => {
  it("reads comma and 'and' separated names", () => {
    expect(extractAttendees("lunch with Maria, Tom and Priya")).toEqual(["Maria", "Tom", "Priya"]);
  });

  it("ignores day names and pronouns after 'with'", () => {
    expect(extractAttendees("sync with Monday standup folks")).toEqual([]);
    expect(extractAttendees("call with us")).toEqual([]);
  });
});

describe("buildMeetingTitle", () => {
  it("includes kind, attendees and topic", () => {
    const text = "Schedule a review with Kim about the Q3 roadmap on Monday";
    expect(buildMeetingTitle(text, extractAttendees(text))).toBe("Review with Kim about the Q3 roadmap");
  });
});
