import { describe, expect, it } from "vitest";
import {
  categorizeDomain,
  companyFromDomain,
  extractAddress,
  extractDisplayName,
  extractDomain,
  isPersonalDomain,
  nameFromLocalPart,
} from "./parsers.js";

describe("address parsing", () => {
  it("extracts and lowercases the bracketed address", () => {
    expect(extractAddress("Jane Doe <Jane.Doe@Example.COM>")).toBe("jane.doe@example.com");
    expect(extractAddress("  bob@x.org ")).toBe("bob@x.org");
  });

  it("extracts the domain or an empty string", () => {
    expect(extractDomain("Jane <jane@mail.acme.co.uk>")).toBe("mail.acme.co.uk");
    expect(extractDomain("not-an-address")).toBe("");
  });

  it("extracts a display name only when one is present", () => {
    expect(extractDisplayName('"Tech Weekly" <news@techweekly.io>')).toBe("Tech Weekly");
    expect(extractDisplayName("news@techweekly.io")).toBeNull();
    expect(extractDisplayName("<news@techweekly.io>")).toBeNull();
  });

  it("derives a name from a dotted local part", () => {
    expect(nameFromLocalPart("john.doe@example.com")).toBe("John Doe");
    expect(nameFromLocalPart("mary-jane.watson@example.com")).toBe("Mary Jane");
    expect(nameFromLocalPart("j.doe@example.com")).toBeNull();
    expect(nameFromLocalPart("info@example.com")).toBeNull();
  });
});

describe("categorizeDomain", () => {
  it("matches exact, subdomain and suffix entries", () => {
    expect(categorizeDomain("techcrunch.com")).toBe("technology");
    expect(categorizeDomain("mail.github.com")).toBe("technology");
    expect(categorizeDomain("cs.stanford.edu")).toBe("education");
    expect(categorizeDomain("ox.ac.uk")).toBe("education");
    expect(categorizeDomain("bbc.co.uk")).toBe("news");
  });

  it("does not match on a bare string suffix", () => {
    expect(categorizeDomain("dropbox.com")).toBe("productivity");
  });

  it("returns null for unknown or empty domains", () => {
    expect(categorizeDomain("unknown-startup.io")).toBeNull();
    expect(categorizeDomain("")).toBeNull();
  });
});

describe("company names", () => {
  it("capitalizes the registrable label", () => {
    expect(companyFromDomain("acmecorp.com")).toBe("Acmecorp");
    expect(companyFromDomain("mail.acme.io")).toBe("Acme");
  });

  it("skips country second levels and splits hyphens", () => {
    expect(companyFromDomain("acme-labs.co.uk")).toBe("Acme Labs");
  });

  it("returns null for personal and single-label domains", () => {
    expect(companyFromDomain("gmail.com")).toBeNull();
    expect(companyFromDomain("localhost")).toBeNull();
  });

  it("recognizes personal domains case-insensitively", () => {
    expect(isPersonalDomain("GMAIL.com")).toBe(true);
    expect(isPersonalDomain("acmecorp.com")).toBe(false);
  });
});
