import { describe, expect, it } from "vitest";
import { DEFAULT_UMBRELLA_PROJECT_IDS, parseList } from "../config.js";

describe("parseList", () => {
  it("splits and trims comma-separated accessions", () => {
    expect(parseList(" PRJEB39908, PRJEB40349 ,,", [])).toEqual(["PRJEB39908", "PRJEB40349"]);
  });

  it("falls back when unset or blank", () => {
    expect(parseList(undefined, DEFAULT_UMBRELLA_PROJECT_IDS)).toBe(DEFAULT_UMBRELLA_PROJECT_IDS);
    expect(parseList(" , ", ["PRJEB39908"])).toEqual(["PRJEB39908"]);
  });
});
