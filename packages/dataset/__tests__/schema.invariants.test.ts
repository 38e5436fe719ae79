import { describe, it, expect } from "vitest";
import { DEFAULT_QA_CONFIG, parseQaConfig } from "../src/schema.js";
import { assertDatasetInvariants, checkDatasetInvariants } from "../src/invariants.js";
import { ConfigurationError, DataFormatError } from "../src/errors.js";
import { MISSING, numberCell, rawCell, stateIdOf, type Dataset } from "../src/types.js";

describe("QA config", () => {
  it("fills defaults", () => {
    expect(DEFAULT_QA_CONFIG.increase_threshold_multiplier).toBe(2);
    expect(DEFAULT_QA_CONFIG.decrease_whitelist).toEqual(["Total Individuals not fully vaccinated"]);
  });

  it("rejects a non-positive multiplier and empty names", () => {
    expect(() => parseQaConfig({ increase_threshold_multiplier: 0 })).toThrow(ConfigurationError);
    expect(() => parseQaConfig({ state_column: "" })).toThrow(/state_column/);
  });
});

describe("state identifiers", () => {
  it("resolves ids from cells", () => {
    expect(stateIdOf(rawCell(" CA "))).toBe("CA");
    expect(stateIdOf(rawCell(""))).toBeNull();
    expect(stateIdOf(MISSING)).toBeNull();
    expect(stateIdOf(numberCell(6))).toBe("6");
  });
});

describe("dataset invariants", () => {
  const d: Dataset = {
    columns: ["Abbr"],
    rows: [{ Abbr: rawCell("CA") }, { Abbr: rawCell("CA") }, { Abbr: rawCell("CA") }, { Abbr: MISSING }],
  };

  it("reports each duplicated state once and ignores blank ids", () => {
    expect(checkDatasetInvariants(d, "new", DEFAULT_QA_CONFIG)).toEqual([
      {
        code: "DUPLICATE_STATE",
        dataset: "new",
        state: "CA",
        message: 'new dataset repeats state "CA" in column "Abbr"',
      },
    ]);
  });

  it("throws DataFormatError for duplicates and ConfigurationError for a missing column", () => {
    expect(() => assertDatasetInvariants(d, "new", DEFAULT_QA_CONFIG)).toThrow(DataFormatError);
    expect(() => assertDatasetInvariants(d, "new", DEFAULT_QA_CONFIG)).toThrow(
      'duplicate state identifier in new dataset in column "Abbr" (state CA): "CA"'
    );
    const none: Dataset = { columns: ["State"], rows: [] };
    expect(() => assertDatasetInvariants(none, "existing", DEFAULT_QA_CONFIG)).toThrow(ConfigurationError);
  });
});
