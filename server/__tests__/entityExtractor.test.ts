import { describe, it, expect } from "vitest";
import {
  EntityExtractor,
  extractDateTimeParts,
  parseClockTime,
  toTwentyFourHour,
} from "../decisionLayer/entityExtractor";

describe("EntityExtractor", () => {
  const extractor = new EntityExtractor();

  it("returns nothing for empty text", () => {
    expect(extractor.extract("")).toEqual([]);
    expect(extractor.extract("   ")).toEqual([]);
  });

  it("extracts emails (lowercased) and normalises phones", () => {
    expect(extractor.extract("Reach me at jane.doe@Globex.com or (555) 234-5678")).toEqual([
      { type: "email", value: "jane.doe@globex.com", confidence: 0.95 },
      { type: "phone", value: "(555) 234-5678", confidence: 0.9 },
    ]);
  });

  it("accepts dotted phones with a country code", () => {
    expect(extractor.extract("call +1 415.555.0199")).toContainEqual(
      { type: "phone", value: "(415) 555-0199", confidence: 0.9 },
    );
  });

  it("extracts name, company and budget from a lead sentence", () => {
    expect(extractor.extract("John Smith from Acme Corp wants a PoC in September, budget around 10k")).toEqual([
      { type: "money", value: "10k", confidence: 0.8 },
      { type: "name", value: "John Smith", confidence: 0.6 },
      { type: "company", value: "Acme Corp", confidence: 0.6 },
    ]);
  });

  it("drops sentence openers from names and trailing punctuation from companies", () => {
    expect(extractor.extract("Met Sarah Lee from Initech.")).toEqual([
      { type: "name", value: "Sarah Lee", confidence: 0.6 },
      { type: "company", value: "Initech", confidence: 0.6 },
    ]);
  });

  it("keeps dollar amounts without whitespace", () => {
    const money = extractor.extract("budget is $ 20,000 or maybe $2M").filter(e => e.type === "money");
    expect(money.map(e => e.value)).toEqual(["$20,000", "$2M"]);
  });

  it("combines relative day and clock into one datetime entity", () => {
    expect(extractor.extract("next Tue at 10:00")).toEqual([
      { type: "datetime", value: "next tue 10:00", confidence: 0.75 },
    ]);
    expect(extractor.extract("tomorrow at 3")).toEqual([
      { type: "datetime", value: "tomorrow 15:00", confidence: 0.75 },
    ]);
  });

  it("dedupes repeated values", () => {
    const emails = extractor.extract("a@b.com and A@B.com").filter(e => e.type === "email");
    expect(emails).toEqual([{ type: "email", value: "a@b.com", confidence: 0.95 }]);
  });
});

describe("clock parsing", () => {
  it("converts am/pm", () => {
    expect(toTwentyFourHour(12, 0, "am")).toEqual({ hour: 0, minute: 0 });
    expect(toTwentyFourHour(12, 30, "pm")).toEqual({ hour: 12, minute: 30 });
    expect(toTwentyFourHour(2, 0, "PM")).toEqual({ hour: 14, minute: 0 });
  });

  it("reads bare 1-7 as afternoon", () => {
    expect(toTwentyFourHour(3, 0, undefined)).toEqual({ hour: 15, minute: 0 });
    expect(toTwentyFourHour(9, 0, undefined)).toEqual({ hour: 9, minute: 0 });
  });

  it("rejects impossible readings", () => {
    expect(toTwentyFourHour(13, 0, "pm")).toBeNull();
    expect(toTwentyFourHour(10, 75, undefined)).toBeNull();
  });

  it("prefers H:MM, then H am/pm, then 'at H'", () => {
    expect(parseClockTime("at 4 or 10:15")).toEqual({ hour: 10, minute: 15, raw: "10:15" });
    expect(parseClockTime("around 11am")).toEqual({ hour: 11, minute: 0, raw: "11am" });
    expect(parseClockTime("at 9")).toEqual({ hour: 9, minute: 0, raw: "at 9" });
    expect(parseClockTime("no time here")).toBeNull();
  });

  it("structures weekday references", () => {
    expect(extractDateTimeParts("next Friday")).toEqual({
      day: { kind: "weekday", weekday: 5, explicitNext: true, raw: "next friday" },
      time: null,
    });
  });
});
