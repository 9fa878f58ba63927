import { describe, expect, test } from "vitest";

import { LocationParseError } from "../errors";
import { formatLocation, instanceCodeOf, isLocation, parseLocation } from "../location";

describe("parseLocation", () => {
  test("parses an owned instance with world, owner and nonce", () => {
    expect(parseLocation("wrld_1:name~public(usr_1)~nonce(abc)")).toEqual({
      raw: "wrld_1:name~public(usr_1)~nonce(abc)",
      form: "owned",
      worldId: "wrld_1",
      name: "name",
      type: "public",
      userId: "usr_1",
      nonce: "abc",
    });
  });

  test("parses a bare instance code as public", () => {
    expect(parseLocation("instance_code")).toMatchObject({
      worldId: null,
      name: "instance_code",
      type: "public",
      userId: null,
      nonce: null,
    });
  });

  test("parses a bare code with a world prefix", () => {
    expect(parseLocation("wrld_1:12345")).toMatchObject({ form: "bare", worldId: "wrld_1", name: "12345" });
  });

  test("treats special locations as bare names", () => {
    expect(parseLocation("private")).toMatchObject({ form: "bare", name: "private", worldId: null });
    expect(parseLocation("offline").name).toBe("offline");
  });

  // The single-separator form has not been confirmed against captured
  // server traces; these cases pin the current reading of it.
  describe("single separator form", () => {
    test("splits into name and type", () => {
      expect(parseLocation("wrld_1:room~friends")).toMatchObject({
        form: "typed",
        worldId: "wrld_1",
        name: "room",
        type: "friends",
        userId: null,
        nonce: null,
      });
    });

    test("keeps the type segment verbatim", () => {
      expect(parseLocation("room~hidden(usr_1)").type).toBe("hidden(usr_1)");
    });

    test("rejects empty halves", () => {
      expect(() => parseLocation("room~")).toThrow(LocationParseError);
      expect(() => parseLocation("~friends")).toThrow(LocationParseError);
    });
  });

  test.each([
    ["", "location is empty"],
    [":12345", "world id before ':' is empty"],
    ["wrld_1:", "instance code is empty"],
    ["wrld_1:a:b", "more than one ':' separator"],
    ["a~b(c)~nonce(d)~extra", "unsupported number of '~' separators (3)"],
    ["a~public~nonce(d)", "type segment must look like label(value)"],
    ["a~public(usr_1~nonce(d)", "type segment must look like label(value)"],
    ["a~public(usr_1)~nonce", "nonce segment must look like label(value)"],
    ["a~public(usr_1)~token(d)", "expected nonce segment, received token"],
    ["~public(usr_1)~nonce(d)", "instance name is empty"],
  ])("rejects %j", (raw, detail) => {
    expect(() => parseLocation(raw)).toThrow(`Unable to parse location "${raw}": ${detail}`);
  });

  test("exposes the raw string on parse errors", () => {
    try {
      parseLocation("a~b~c~d");
      throw new Error("expected failure");
    } catch (error) {
      expect(error).toBeInstanceOf(LocationParseError);
      if (error instanceof LocationParseError) {
        expect(error.raw).toBe("a~b~c~d");
      }
    }
  });
});

describe("formatLocation", () => {
  test.each([
    "instance_code",
    "wrld_1:12345",
    "wrld_1:room~friends",
    "wrld_1:name~public(usr_1)~nonce(abc)",
    "name~hidden(usr_2)~nonce(f00)",
  ])("reproduces %s", (raw) => {
    expect(formatLocation(parseLocation(raw))).toBe(raw);
  });

  test("instanceCodeOf drops the world prefix", () => {
    expect(instanceCodeOf(parseLocation("wrld_1:name~public(usr_1)~nonce(abc)"))).toBe(
      "name~public(usr_1)~nonce(abc)",
    );
  });
});

describe("isLocation", () => {
  test("recognizes parsed locations only", () => {
    expect(isLocation(parseLocation("wrld_1:1"))).toBe(true);
    expect(isLocation({ raw: "x", name: "x", form: "other" })).toBe(false);
    expect(isLocation("wrld_1:1")).toBe(false);
  });
});
