import { describe, expect, it } from "vitest";

import { MalformedLineError } from "../lib/errors.js";
import { createCardRequest, parseDecklist, parseDecklistLine, requestKey } from "../modules/decklist/index.js";

describe("parseDecklistLine", () => {
  it("parses quantity, name, set code and collector number", () => {
    expect(parseDecklistLine("1 Sol Ring (LTC) 280", 1)).toEqual({
      quantity: 1,
      name: "Sol Ring",
      setCode: "LTC",
      collectorNumber: "280",
      lineNumber: 1,
    });
  });

  it("parses quantity and name only", () => {
    const request = parseDecklistLine("4 Counterspell", 2);

    expect(request).toEqual({ quantity: 4, name: "Counterspell", lineNumber: 2 });
    expect(request.setCode).toBeUndefined();
    expect(request.collectorNumber).toBeUndefined();
  });

  it("keeps punctuation inside the name", () => {
    expect(parseDecklistLine("1 Bruna, the Fading Light (EMN) 15a", 1).name).toBe("Bruna, the Fading Light");
    expect(parseDecklistLine("2 Jace's Erasure", 1).name).toBe("Jace's Erasure");
    expect(parseDecklistLine("1 Fire // Ice (MH2) 290", 1)).toMatchObject({
      name: "Fire // Ice",
      setCode: "MH2",
      collectorNumber: "290",
    });
  });

  it("accepts collector numbers with letters and symbols", () => {
    expect(parseDecklistLine("1 Lightning Bolt (PLST) 2XM-129", 1).collectorNumber).toBe("2XM-129");
    expect(parseDecklistLine("1 Sol Ring (SLD) 1011★", 1).collectorNumber).toBe("1011★");
  });

  it("treats a set code with no collector number as part of the name", () => {
    expect(parseDecklistLine("4 Counterspell (MH2)", 1)).toEqual({
      quantity: 4,
      name: "Counterspell (MH2)",
      lineNumber: 1,
    });
  });

  it("treats parentheses that are not a 2-5 character code as part of the name", () => {
    expect(parseDecklistLine("1 Sol Ring (LONGCODE) 280", 1).name).toBe("Sol Ring (LONGCODE) 280");
  });

  it("trims surrounding whitespace", () => {
    expect(parseDecklistLine("  3   Island   ", 1)).toEqual({ quantity: 3, name: "Island", lineNumber: 1 });
  });

  it("accepts an x after the quantity", () => {
    expect(parseDecklistLine("2x Brainstorm", 1)).toEqual({ quantity: 2, name: "Brainstorm", lineNumber: 1 });
  });

  it("rejects a line without a leading quantity", () => {
    expect(() => parseDecklistLine("Sol Ring", 1)).toThrow(MalformedLineError);
  });

  it("rejects a zero quantity", () => {
    expect(() => parseDecklistLine("0 Sol Ring", 1)).toThrow(MalformedLineError);
  });
});

describe("parseDecklist", () => {
  it("stops at the first blank line", () => {
    const { requests, malformed } = parseDecklist("1 Sol Ring\n\n4 Counterspell");

    expect(requests).toEqual([{ quantity: 1, name: "Sol Ring", lineNumber: 1 }]);
    expect(malformed).toEqual([]);
  });

  it("treats a whitespace-only line as the end of the list", () => {
    const { requests } = parseDecklist("1 Sol Ring\n   \n4 Counterspell");

    expect(requests.map((r) => r.name)).toEqual(["Sol Ring"]);
  });

  it("reports malformed lines and keeps parsing", () => {
    const { requests, malformed } = parseDecklist("1 Sol Ring (LTC) 280\nSol Ring\n4 Counterspell");

    expect(requests.map((r) => r.name)).toEqual(["Sol Ring", "Counterspell"]);
    expect(malformed).toHaveLength(1);
    expect(malformed[0].lineNumber).toBe(2);
    expect(malformed[0].line).toBe("Sol Ring");
    expect(malformed[0].error).toBeInstanceOf(MalformedLineError);
  });

  it("keeps input order and handles CRLF line endings", () => {
    const { requests } = parseDecklist("1 Island\r\n1 Swamp\r\n1 Forest\r\n");

    expect(requests.map((r) => [r.name, r.lineNumber])).toEqual([
      ["Island", 1],
      ["Swamp", 2],
      ["Forest", 3],
    ]);
  });

  it("returns nothing for empty input", () => {
    expect(parseDecklist("")).toEqual({ requests: [], malformed: [] });
  });
});

describe("createCardRequest", () => {
  it("drops a collector number that has no set code", () => {
    expect(createCardRequest({ quantity: 1, name: "Sol Ring", collectorNumber: "280", lineNumber: 1 })).toEqual({
      quantity: 1,
      name: "Sol Ring",
      lineNumber: 1,
    });
  });

  it("drops a set code that has no collector number", () => {
    const request = createCardRequest({ quantity: 1, name: "Sol Ring", setCode: "ltc", lineNumber: 1 });

    expect(request).toEqual({ quantity: 1, name: "Sol Ring", lineNumber: 1 });
    expect(request.setCode).toBeUndefined();
  });

  it("keeps set code and collector number as a pair", () => {
    expect(
      createCardRequest({ quantity: 1, name: "Sol Ring", setCode: "ltc", collectorNumber: "280", lineNumber: 1 })
    ).toEqual({ quantity: 1, name: "Sol Ring", setCode: "ltc", collectorNumber: "280", lineNumber: 1 });
  });
});

describe("requestKey", () => {
  it("keys exact requests by set and number, case-insensitively", () => {
    expect(requestKey(parseDecklistLine("1 Sol Ring (LTC) 280", 1))).toBe("ltc-280");
    expect(requestKey(parseDecklistLine("2 sol ring (ltc) 280", 2))).toBe("ltc-280");
  });

  it("keys name-only requests by lower-cased name", () => {
    expect(requestKey(parseDecklistLine("4 Counterspell", 1))).toBe("counterspell");
  });
});
