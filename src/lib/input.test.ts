import { describe, it, expect } from "vitest";
import { splitMessages } from "./input.js";

describe("splitMessages", () => {
  it("splits plain text by line and drops blanks", () => {
    expect(splitMessages("A\r\nB\n\n  C  ")).toEqual(["A", "B", "C"]);
  });

  it("strips a byte order mark", () => {
    expect(splitMessages("\uFEFFFPL-1\nFPL-2")).toEqual(["FPL-1", "FPL-2"]);
  });

  it("reads a JSON array of strings and {text} objects", () => {
    expect(splitMessages('["FPL-1", {"text":"FPL-2"}, 5]')).toEqual(["FPL-1", "FPL-2"]);
  });

  it("reads a {messages} envelope", () => {
    expect(splitMessages('{"messages":["FPL-1"," FPL-2 ",""]}')).toEqual(["FPL-1", "FPL-2"]);
  });

  it("reads NDJSON with mixed line kinds", () => {
    expect(splitMessages('{"text":"FPL-1"}\n"FPL-2"\nFPL-3')).toEqual(["FPL-1", "FPL-2", "FPL-3"]);
  });

  it("falls back to lines when a JSON upload is not JSON", () => {
    expect(splitMessages("FPL-1\nFPL-2", "application/json")).toEqual(["FPL-1", "FPL-2"]);
  });

  it("reads the message column of a CSV upload", () => {
    const csv = 'id,message\n1,"FPL-RA1, 1000"\n2,FPL-RB2\n3,';
    expect(splitMessages(csv, "text/csv")).toEqual(["FPL-RA1, 1000", "FPL-RB2"]);
  });

  it("falls back to the first CSV column and detects the delimiter", () => {
    const csv = 'telegram;note\nFPL-1;a\n"FPL-""2""";b';
    expect(splitMessages(csv, "text/csv")).toEqual(["FPL-1", 'FPL-"2"']);
  });

  it("returns nothing for a CSV header alone", () => {
    expect(splitMessages("message", "text/csv")).toEqual([]);
  });

  it("returns nothing for empty input", () => {
    expect(splitMessages("")).toEqual([]);
    expect(splitMessages(" \n \n")).toEqual([]);
  });
});
