import { describe, expect, it } from "vitest";
import { categorizeDomain } from "./parsers.js";
import { buildSignalTables, compilePhrase, defaultTables, extendSignalTables, loadSignalTables } from "./tables.js";

describe("compilePhrase", () => {
  it("bounds phrases on word characters only", () => {
    const { regex } = compilePhrase("thanks!");
    expect("Thanks! See you".match(regex)).toEqual(["Thanks!"]);
    expect("thanksgiving".match(compilePhrase("thanks").regex)).toBeNull();
  });
});

describe("signal tables", () => {
  it("loads the shipped tables", () => {
    expect(defaultTables.version).toBe(3);
    expect(defaultTables.personalDomains.has("gmail.com")).toBe(true);
    expect(defaultTables.greetings[0].phrase).toBe("good afternoon");
  });

  it("loads a table file and rejects malformed data", () => {
    const tables = loadSignalTables(new URL("./data/lookup-tables.json", import.meta.url));

    expect(tables.version).toBe(3);
    expect(tables.newsletterPlatforms.has("substack.com")).toBe(true);
    expect(() => buildSignalTables({ version: 3 })).toThrow();
  });

  it("extends categories without touching the defaults", () => {
    const tables = extendSignalTables({ finance: ["Ledger.example"] });

    expect(categorizeDomain("app.ledger.example", tables)).toBe("finance");
    expect(categorizeDomain("app.ledger.example")).toBeNull();
  });
});
