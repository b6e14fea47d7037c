import { emptyCandidate, type CandidateRecord } from "@shared/schemas";
import { describe, expect, it } from "vitest";
import {
  cleanPhone,
  enrich,
  findEmail,
  findJobTitle,
  findName,
  findPhone,
  findPhoneNearEmail,
  PHONE_PATTERNS,
} from "../services/fallback";

const record = (fields: Partial<CandidateRecord> = {}): CandidateRecord => ({
  ...emptyCandidate(),
  ...fields,
});

describe("enrich", () => {
  it("recovers email and phone the model left empty", () => {
    const enriched = enrich(record(), "Contact: jane@acme.com, 0412 345 678");

    expect(enriched.email).toBe("jane@acme.com");
    expect(enriched.phone).toBe("0412 345 678");
  });

  it("keeps a well-formed email from the model", () => {
    const enriched = enrich(record({ email: "ok@x.com" }), "reach me at other@y.com");

    expect(enriched.email).toBe("ok@x.com");
  });

  it("replaces a malformed email from the model", () => {
    const enriched = enrich(record({ email: "jane at acme" }), "Email: jane@acme.com");

    expect(enriched.email).toBe("jane@acme.com");
  });

  it("clears a malformed email when the text has none", () => {
    expect(enrich(record({ email: "bad@" }), "no address here").email).toBe("");
  });

  it("keeps a model phone with enough digits", () => {
    const enriched = enrich(record({ phone: "0412 999 888" }), "Call 0400 111 222");

    expect(enriched.phone).toBe("0412 999 888");
  });

  it("replaces a model phone with too few digits", () => {
    const enriched = enrich(record({ phone: "12345" }), "Call 0400 111 222");

    expect(enriched.phone).toBe("0400 111 222");
  });

  it("honours a configured digit threshold", () => {
    const enriched = enrich(record({ phone: "12345" }), "Call 0400 111 222", { minPhoneDigits: 4 });

    expect(enriched.phone).toBe("12345");
  });

  it("keeps a model phone with a trailing label intact", () => {
    expect(enrich(record({ phone: "0412 345 678 (mobile)" }), "").phone).toBe("0412 345 678");
  });

  it("strips stray characters from the chosen phone", () => {
    expect(enrich(record({ phone: "tel: +61 412  345 678" }), "").phone).toBe("+61 412 345 678");
  });

  it("fills the name only when both name fields are empty", () => {
    const text = "Curriculum Vitae\nJane Mary Doe\nSenior Engineer";

    expect(enrich(record(), text)).toMatchObject({ first_name: "Jane", last_name: "Mary Doe" });
    expect(enrich(record({ last_name: "Smith" }), text)).toMatchObject({
      first_name: "",
      last_name: "Smith",
    });
  });

  it("fills the current title only when it is empty", () => {
    const text = "Position: manager";

    expect(enrich(record(), text).current_title).toBe("Manager");
    expect(enrich(record({ current_title: "Chef" }), text).current_title).toBe("Chef");
  });

  it("leaves organisation fields untouched", () => {
    const enriched = enrich(record({ current_org: "Acme", previous_title: "Intern" }), "Acme Pty Ltd");

    expect(enriched.current_org).toBe("Acme");
    expect(enriched.previous_title).toBe("Intern");
    expect(enriched.previous_org).toBe("");
  });

  it("does not mutate its input and is deterministic", () => {
    const input = record();
    const text = "Jane Doe\njane@acme.com 0412 345 678";

    const first = enrich(input, text);
    const second = enrich(input, text);

    expect(input).toEqual(emptyCandidate());
    expect(first).toEqual(second);
  });
});

describe("findPhoneNearEmail", () => {
  it("prefers a number next to the email address", () => {
    const text = "Office: 0412 000 111\nsam@site.org | 0499 888 777";

    expect(findPhoneNearEmail(text, "sam@site.org", 150)).toBe("0499 888 777");
    expect(findPhone(text)).toBe("0412 000 111");
  });

  it("falls back to the whole text when nothing follows the email", () => {
    expect(findPhoneNearEmail("0412 000 111\nsam@site.org", "sam@site.org", 150)).toBe("0412 000 111");
  });
});

describe("findPhone", () => {
  it("matches the supported formats", () => {
    expect(findPhone("Mobile +61 412 345 678")).toBe("+61 412 345 678");
    expect(findPhone("Phone 555-123-4567")).toBe("555-123-4567");
    expect(findPhone("Phone (555) 123-4567")).toBe("(555) 123-4567");
    expect(findPhone("Phone 555.123.4567")).toBe("555.123.4567");
    expect(findPhone("Phone 5551234567")).toBe("5551234567");
  });

  it("returns an empty string when nothing matches", () => {
    expect(findPhone("no digits")).toBe("");
  });

  it("lets every pattern win for some input", () => {
    const samples = [
      "+61 412 345 678",
      "+1 555 123 4567",
      "0412 345 678",
      "0298 765 432",
      "061 234 5678",
      "555-123-4567",
      "(555) 123-4567",
      "555.123.4567",
      "5551234567",
    ];

    const winners = samples.map((sample) => PHONE_PATTERNS.findIndex((pattern) => pattern.test(sample)));

    expect(winners).toEqual(PHONE_PATTERNS.map((_pattern, index) => index));
  });
});

describe("findEmail", () => {
  it("returns the first address", () => {
    expect(findEmail("a@b.co and c@d.io")).toBe("a@b.co");
  });
});

describe("findName", () => {
  it("skips boilerplate and lower-case lines", () => {
    expect(findName("Resume\njane doe\nJohn Smith")).toEqual({ first_name: "John", last_name: "Smith" });
  });

  it("rejects lines with too many words or non-letters", () => {
    expect(findName("Office: 0412 000 111\nSenior Operations Manager At Acme")).toBeNull();
  });
});

describe("findJobTitle", () => {
  it("reads a labelled title", () => {
    expect(findJobTitle("Position: senior data engineer. Based in Perth")).toBe("Senior Data Engineer");
    expect(findJobTitle("Currently working as a barista\n")).toBe("A Barista");
    expect(findJobTitle("Job: line cook\nSkills: knives")).toBe("Line Cook");
    expect(findJobTitle("Job title: head chef")).toBe("Head Chef");
  });

  it("expands a lexicon match to its surrounding phrase", () => {
    const text = "2019 - now\nwarehouse supervisor at Acme Foods\n";

    expect(findJobTitle(text)).toBe("Warehouse Supervisor At Acme Foods");
  });

  it("uses a custom lexicon", () => {
    expect(findJobTitle("Head baker. Loves bread", ["baker"])).toBe("Head Baker");
  });

  it("returns an empty string when nothing matches", () => {
    expect(findJobTitle("Jane Doe")).toBe("");
  });
});

describe("cleanPhone", () => {
  it("keeps digits, separators and a leading plus", () => {
    expect(cleanPhone(" ph: (02)\t9876-5432 ")).toBe("(02) 9876-5432");
  });

  it("drops brackets left empty by the cleanup", () => {
    expect(cleanPhone("0412 345 678 (mobile)")).toBe("0412 345 678");
    expect(cleanPhone("+61 (0) 412 345 678")).toBe("+61 (0) 412 345 678");
  });
});
