import { describe, expect, it } from "vitest";
import { parseAskArguments } from "../../src/scripts/ask.js";
import { parseIngestArguments } from "../../src/scripts/ingest-text.js";

describe("scripts/ingest-text", () => {
  it("parses law metadata and files", () => {
    expect(
      parseIngestArguments([
        "--country",
        "egypt",
        "--law-type",
        "criminal",
        "--law-name",
        "قانون العقوبات",
        "--law-number",
        "58",
        "--law-year",
        "1937",
        "penal.txt"
      ])
    ).toEqual({
      files: ["penal.txt"],
      country: "egypt",
      lawType: "criminal",
      lawName: "قانون العقوبات",
      lawNumber: "58",
      lawYear: 1937
    });
  });

  it("names each law after its file when several are given", () => {
    expect(parseIngestArguments(["--country", "uae", "--law-type", "civil", "a.txt", "b.txt"])).toMatchObject({
      files: ["a.txt", "b.txt"],
      lawName: undefined,
      lawYear: undefined
    });
    expect(() =>
      parseIngestArguments(["--country", "uae", "--law-type", "civil", "--law-name", "x", "a.txt", "b.txt"])
    ).toThrow("--law-name applies to a single file; omit it to name each law after its file.");
  });

  it("requires a country, a law type and at least one file", () => {
    expect(() => parseIngestArguments(["--country", "egypt", "penal.txt"])).toThrow(/^Usage: npm run ingest/);
    expect(() => parseIngestArguments(["--country", "egypt", "--law-type", "criminal"])).toThrow(
      /^Usage: npm run ingest/
    );
  });

  it("ignores a year that is not a number", () => {
    expect(
      parseIngestArguments(["--country", "egypt", "--law-type", "criminal", "--law-year", "soon", "p.txt"]).lawYear
    ).toBeUndefined();
  });
});

describe("scripts/ask", () => {
  it("joins the positional words into the question", () => {
    expect(
      parseAskArguments([
        "--country",
        "egypt",
        "--session",
        "s-1",
        "--top-k",
        "3",
        "--law-type",
        "criminal",
        "--law-type",
        "civil",
        "ما",
        "عقوبة",
        "السرقة؟"
      ])
    ).toEqual({
      question: "ما عقوبة السرقة؟",
      country: "egypt",
      sessionId: "s-1",
      topK: 3,
      lawTypes: ["criminal", "civil"]
    });
  });

  it("requires a country and a question", () => {
    expect(() => parseAskArguments(["ما عقوبة السرقة؟"])).toThrow(/^Usage: npm run ask/);
    expect(() => parseAskArguments(["--country", "egypt"])).toThrow(/^Usage: npm run ask/);
  });

  it("rejects options it does not know", () => {
    expect(() => parseAskArguments(["--country", "egypt", "--verbose", "سؤال"])).toThrow();
  });
});
