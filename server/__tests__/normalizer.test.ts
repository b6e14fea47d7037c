import { emptyCandidate } from "@shared/schemas";
import { describe, expect, it } from "vitest";
import { normalize, normalizeReply, parseReplyJson, toObjectList } from "../services/normalizer";

const fence = (payload: string) => "```json\n" + payload + "\n```";

describe("normalize", () => {
  it("always returns exactly expectedCount records", () => {
    const replies = [
      "",
      "Sorry, I cannot help",
      "42",
      '{"first_name":"Ann"}',
      '[{"first_name":"Ann"},{"first_name":"Bo"},{"first_name":"Cy"}]',
      "[[], [[]], null]",
      fence('[{"email":"a@b.co"}]'),
    ];

    for (const reply of replies) {
      for (const count of [0, 1, 2, 4]) {
        expect(normalize(reply, count)).toHaveLength(count);
      }
    }
  });

  it("returns nothing for a negative count", () => {
    expect(normalize('[{"first_name":"Ann"}]', -2)).toEqual([]);
  });

  it("gives the same result with or without a code fence", () => {
    const payloads = [
      '[{"first_name":"Ann","email":"ann@example.com"}]',
      '{"first_name":"Bo"}',
      '[[{"last_name":"Cy"}]]',
    ];

    for (const payload of payloads) {
      expect(normalize(fence(payload), 2)).toEqual(normalize(payload, 2));
      expect(normalize("```\n" + payload + "\n```", 2)).toEqual(normalize(payload, 2));
    }
  });

  it("yields empty records when the reply is prose", () => {
    const result = normalizeReply("Sorry, I cannot help", 3);

    expect(result.records).toEqual([emptyCandidate(), emptyCandidate(), emptyCandidate()]);
    expect(result.outcomes).toEqual(["parse_failed", "parse_failed", "parse_failed"]);
    expect(result.parsed).toBe(false);
  });

  it("recovers an array embedded in surrounding text", () => {
    const [record] = normalize('Here you go: [{"email":"a@b.co"}] thanks', 1);

    expect(record?.email).toBe("a@b.co");
  });

  it("recovers an object embedded in surrounding text", () => {
    const [record] = normalize('Result: {"first_name":"Li"} end', 1);

    expect(record?.first_name).toBe("Li");
  });

  it("reduces nested lists to their first element", () => {
    const result = normalizeReply('[[{"first_name":"A"},{"first_name":"X"}],[],{"first_name":"C"}]', 3);

    expect(result.records.map((r) => r.first_name)).toEqual(["A", "", "C"]);
    expect(result.outcomes).toEqual(["ok", "parse_failed", "ok"]);
  });

  it("marks positions that held no object as unparsed", () => {
    const result = normalizeReply('["Sorry", []]', 2);

    expect(result.records).toEqual([emptyCandidate(), emptyCandidate()]);
    expect(result.outcomes).toEqual(["parse_failed", "parse_failed"]);
    expect(result.parsed).toBe(true);
  });

  it("pads a short reply and marks the padded positions", () => {
    const result = normalizeReply('[{"first_name":"A"}]', 3);

    expect(result.records.map((r) => r.first_name)).toEqual(["A", "", ""]);
    expect(result.outcomes).toEqual(["ok", "parse_failed", "parse_failed"]);
    expect(result.parsed).toBe(true);
  });

  it("ignores extra objects beyond the expected count", () => {
    const records = normalize('[{"first_name":"A"},{"first_name":"B"}]', 1);

    expect(records.map((r) => r.first_name)).toEqual(["A"]);
  });

  it("treats a bare scalar as carrying no records", () => {
    const result = normalizeReply("42", 2);

    expect(result.parsed).toBe(false);
    expect(result.outcomes).toEqual(["parse_failed", "parse_failed"]);
  });

  it("coerces each element through the schema", () => {
    const [record] = normalize('[{"first_name":"  Ann ","phone":412345678,"current_org":["x"]}]', 1);

    expect(record).toEqual({ ...emptyCandidate(), first_name: "Ann", phone: "412345678" });
  });

  it("is pure for identical inputs", () => {
    const reply = fence('[{"first_name":"Ann"}]');

    expect(normalize(reply, 2)).toEqual(normalize(reply, 2));
  });
});

describe("parseReplyJson", () => {
  it("fails when no span parses", () => {
    expect(parseReplyJson("{ not json ]").ok).toBe(false);
  });
});

describe("toObjectList", () => {
  it("wraps a single object", () => {
    expect(toObjectList({ a: 1 })).toEqual([{ a: 1 }]);
  });

  it("leaves placeholders for array items that hold no object", () => {
    expect(toObjectList(["x", [], [{ a: 1 }], null])).toEqual([null, null, { a: 1 }, null]);
  });

  it("returns null for other shapes", () => {
    expect(toObjectList("text")).toBeNull();
    expect(toObjectList(null)).toBeNull();
  });
});
